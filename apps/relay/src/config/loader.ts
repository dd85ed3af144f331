/**
 * Pipeline configuration loader
 *
 * Reads the YAML document, substitutes ${env:NAME} references, validates each
 * component body against its type's schema and then checks the pipeline wiring.
 * Every problem found is collected into a single ConfigError so an operator
 * sees the whole list at once.
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import { getRequiredEnv, logger, type Signal } from '@telemetry-relay/core';
import {
  batchProcessorSchema,
  debugExporterSchema,
  documentSchema,
  healthCheckSchema,
  memoryLimiterSchema,
  otlpGrpcExporterSchema,
  otlpHttpExporterSchema,
  otlpReceiverSchema,
  prometheusExporterSchema,
  resourceProcessorSchema,
  zipkinExporterSchema,
  type PipelineSettings,
} from './schema.js';
import {
  ConfigError,
  EXPORTER_SIGNALS,
  type ExporterConfig,
  type PipelineConfig,
  type ProcessorConfig,
  type ProcessorType,
  type ReceiverConfig,
  type RelayConfig,
} from './types.js';

const COMPONENT_ID = /^([a-z][a-z0-9_]*)(?:\/([A-Za-z0-9_.-]+))?$/;

// ${env:NAME}, ${NAME} and ${env:NAME:-default}
const ENV_REFERENCE = /\$\{(?:env:)?([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

// Fixed processor order inside a pipeline
const PROCESSOR_RANK: Record<ProcessorType, number> = {
  memory_limiter: 0,
  resource: 1,
  batch: 2,
};

export function parseComponentId(id: string): { type: string; name?: string } | undefined {
  const match = COMPONENT_ID.exec(id);
  if (!match) {
    return undefined;
  }
  return { type: match[1], name: match[2] };
}

export async function loadConfigFile(path: string): Promise<RelayConfig> {
  let text: string;
  try {
    text = await fs.promises.readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError([`cannot read file: ${errorMessage(error)}`], path);
  }

  const config = parseConfig(text, path);
  for (const warning of findUnusedComponents(config)) {
    logger.warn(warning, { config: path });
  }
  return config;
}

export function parseConfig(text: string, source = 'inline'): RelayConfig {
  let raw: unknown;
  try {
    raw = yaml.parse(text);
  } catch (error) {
    throw new ConfigError([`invalid YAML: ${errorMessage(error)}`], source);
  }

  const issues: string[] = [];
  const substituted = substituteEnv(raw, '', issues);
  if (issues.length > 0) {
    throw new ConfigError(issues, source);
  }

  const document = documentSchema.safeParse(substituted ?? {});
  if (!document.success) {
    throw new ConfigError(formatZodIssues(document.error, ''), source);
  }

  const receivers: Record<string, ReceiverConfig> = {};
  for (const [id, body] of Object.entries(document.data.receivers)) {
    const receiver = parseReceiver(id, body, issues);
    if (receiver) receivers[id] = receiver;
  }

  const processors: Record<string, ProcessorConfig> = {};
  for (const [id, body] of Object.entries(document.data.processors)) {
    const processor = parseProcessor(id, body, issues);
    if (processor) processors[id] = processor;
  }

  const exporters: Record<string, ExporterConfig> = {};
  for (const [id, body] of Object.entries(document.data.exporters)) {
    const exporter = parseExporter(id, body, issues);
    if (exporter) exporters[id] = exporter;
  }

  const extensions: RelayConfig['extensions'] = {};
  for (const [id, body] of Object.entries(document.data.extensions)) {
    if (parseComponentId(id)?.type !== 'health_check') {
      issues.push(`extensions.${id}: unknown extension type`);
      continue;
    }
    if (!document.data.service.extensions.includes(id)) {
      continue;
    }
    const settings = parseSection(healthCheckSchema, body, `extensions.${id}`, issues);
    if (settings) extensions.health_check = settings;
  }

  for (const id of document.data.service.extensions) {
    if (!(id in document.data.extensions)) {
      issues.push(`service.extensions: references undefined extension "${id}"`);
    }
  }

  const pipelines: PipelineConfig[] = [];
  for (const [id, settings] of Object.entries(document.data.service.pipelines)) {
    const pipeline = validatePipeline(id, settings, { receivers, processors, exporters }, issues);
    if (pipeline) pipelines.push(pipeline);
  }

  if (Object.keys(document.data.service.pipelines).length === 0) {
    issues.push('service.pipelines: at least one pipeline is required');
  }

  const config: RelayConfig = {
    source,
    receivers,
    processors,
    exporters,
    extensions,
    pipelines,
    service: document.data.service,
  };

  issues.push(...validateListeners(config));

  if (issues.length > 0) {
    throw new ConfigError(issues, source);
  }

  return config;
}

function parseReceiver(id: string, body: unknown, issues: string[]): ReceiverConfig | undefined {
  const path = `receivers.${id}`;
  const type = parseComponentId(id)?.type;

  switch (type) {
    case 'otlp': {
      const settings = parseSection(otlpReceiverSchema, body, path, issues);
      return settings && { id, type, settings };
    }
    default:
      issues.push(`${path}: unknown receiver type "${type ?? id}"`);
      return undefined;
  }
}

function parseProcessor(id: string, body: unknown, issues: string[]): ProcessorConfig | undefined {
  const path = `processors.${id}`;
  const type = parseComponentId(id)?.type;

  switch (type) {
    case 'memory_limiter': {
      const settings = parseSection(memoryLimiterSchema, body, path, issues);
      return settings && { id, type, settings };
    }
    case 'resource': {
      const settings = parseSection(resourceProcessorSchema, body, path, issues);
      return settings && { id, type, settings };
    }
    case 'batch': {
      const settings = parseSection(batchProcessorSchema, body, path, issues);
      return settings && { id, type, settings };
    }
    default:
      issues.push(`${path}: unknown processor type "${type ?? id}"`);
      return undefined;
  }
}

function parseExporter(id: string, body: unknown, issues: string[]): ExporterConfig | undefined {
  const path = `exporters.${id}`;
  const type = parseComponentId(id)?.type;

  switch (type) {
    case 'otlp': {
      const settings = parseSection(otlpGrpcExporterSchema, body, path, issues);
      return settings && { id, type, settings };
    }
    case 'otlphttp': {
      const settings = parseSection(otlpHttpExporterSchema, body, path, issues);
      return settings && { id, type, settings };
    }
    case 'zipkin': {
      const settings = parseSection(zipkinExporterSchema, body, path, issues);
      return settings && { id, type, settings };
    }
    case 'prometheus': {
      const settings = parseSection(prometheusExporterSchema, body, path, issues);
      return settings && { id, type, settings };
    }
    case 'debug': {
      const settings = parseSection(debugExporterSchema, body, path, issues);
      return settings && { id, type, settings };
    }
    default:
      issues.push(`${path}: unknown exporter type "${type ?? id}"`);
      return undefined;
  }
}

interface DeclaredComponents {
  receivers: Record<string, ReceiverConfig>;
  processors: Record<string, ProcessorConfig>;
  exporters: Record<string, ExporterConfig>;
}

function validatePipeline(
  id: string,
  settings: PipelineSettings,
  declared: DeclaredComponents,
  issues: string[]
): PipelineConfig | undefined {
  const path = `service.pipelines.${id}`;
  const before = issues.length;

  const signalType = parseComponentId(id)?.type;
  let signal: Signal | undefined;
  if (signalType === 'traces' || signalType === 'metrics') {
    signal = signalType;
  } else {
    issues.push(`${path}: pipeline id must start with "traces" or "metrics"`);
  }

  if (settings.receivers.length === 0) {
    issues.push(`${path}: at least one receiver is required`);
  }
  if (settings.exporters.length === 0) {
    issues.push(`${path}: at least one exporter is required`);
  }

  for (const [kind, ids] of Object.entries({
    receivers: settings.receivers,
    processors: settings.processors,
    exporters: settings.exporters,
  })) {
    const seen = new Set<string>();
    for (const ref of ids) {
      if (seen.has(ref)) {
        issues.push(`${path}.${kind}: "${ref}" is listed twice`);
      }
      seen.add(ref);
    }
  }

  for (const ref of settings.receivers) {
    if (!declared.receivers[ref]) {
      issues.push(`${path}: references undefined receiver "${ref}"`);
    }
  }

  let lastRank = -1;
  const singletons = new Set<ProcessorType>();
  for (const ref of settings.processors) {
    const processor = declared.processors[ref];
    if (!processor) {
      issues.push(`${path}: references undefined processor "${ref}"`);
      continue;
    }

    const rank = PROCESSOR_RANK[processor.type];
    if (rank < lastRank) {
      issues.push(`${path}: processors must be ordered memory_limiter, resource, batch ("${ref}" is out of order)`);
    }
    lastRank = Math.max(lastRank, rank);

    if (processor.type !== 'resource') {
      if (singletons.has(processor.type)) {
        issues.push(`${path}: only one ${processor.type} processor is allowed`);
      }
      singletons.add(processor.type);
    }
  }

  for (const ref of settings.exporters) {
    const exporter = declared.exporters[ref];
    if (!exporter) {
      issues.push(`${path}: references undefined exporter "${ref}"`);
      continue;
    }
    if (signal && !EXPORTER_SIGNALS[exporter.type].includes(signal)) {
      issues.push(`${path}: exporter "${ref}" does not support ${signal}`);
    }
  }

  if (issues.length > before || !signal) {
    return undefined;
  }

  return {
    id,
    signal,
    receivers: settings.receivers,
    processors: settings.processors,
    exporters: settings.exporters,
  };
}

/**
 * Listening endpoints must not collide. Port 0 asks the OS for a free port
 * and never collides.
 */
export function listeningEndpoints(config: RelayConfig): Array<{ owner: string; endpoint: string }> {
  const endpoints: Array<{ owner: string; endpoint: string }> = [];

  for (const receiver of Object.values(config.receivers)) {
    const { grpc, http } = receiver.settings.protocols;
    if (grpc) endpoints.push({ owner: `receivers.${receiver.id}.protocols.grpc`, endpoint: grpc.endpoint });
    if (http) endpoints.push({ owner: `receivers.${receiver.id}.protocols.http`, endpoint: http.endpoint });
  }

  for (const exporter of Object.values(config.exporters)) {
    if (exporter.type === 'prometheus') {
      endpoints.push({ owner: `exporters.${exporter.id}`, endpoint: exporter.settings.endpoint });
    }
  }

  if (config.extensions.health_check) {
    endpoints.push({ owner: 'extensions.health_check', endpoint: config.extensions.health_check.endpoint });
  }

  return endpoints;
}

function validateListeners(config: RelayConfig): string[] {
  const issues: string[] = [];
  const owners = new Map<number, string>();

  for (const { owner, endpoint } of listeningEndpoints(config)) {
    const port = parseInt(endpoint.slice(endpoint.lastIndexOf(':') + 1), 10);
    if (port > 65535) {
      issues.push(`${owner}: port ${port} is out of range`);
      continue;
    }
    if (port === 0) {
      continue;
    }

    const previous = owners.get(port);
    if (previous) {
      issues.push(`${owner}: port ${port} is already used by ${previous}`);
    } else {
      owners.set(port, owner);
    }
  }

  return issues;
}

export function findUnusedComponents(config: RelayConfig): string[] {
  const used = new Set<string>();
  for (const pipeline of config.pipelines) {
    for (const id of [...pipeline.receivers, ...pipeline.processors, ...pipeline.exporters]) {
      used.add(id);
    }
  }

  const warnings: string[] = [];
  for (const [section, ids] of [
    ['receivers', Object.keys(config.receivers)],
    ['processors', Object.keys(config.processors)],
    ['exporters', Object.keys(config.exporters)],
  ] as const) {
    for (const id of ids) {
      if (!used.has(id)) {
        warnings.push(`${section}.${id} is configured but not used by any pipeline`);
      }
    }
  }
  return warnings;
}

function substituteEnv(value: unknown, path: string, issues: string[]): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_REFERENCE, (_match, name: string, fallback: string | undefined) => {
      if (fallback !== undefined) {
        return process.env[name]?.trim() || fallback;
      }
      try {
        return getRequiredEnv(name, `Referenced by ${path || 'the configuration'}.`);
      } catch (error) {
        issues.push(`${path}: ${errorMessage(error)}`);
        return '';
      }
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => substituteEnv(item, `${path}[${index}]`, issues));
  }

  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, substituteEnv(item, path ? `${path}.${key}` : key, issues)])
    );
  }

  return value;
}

function parseSection<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
  path: string,
  issues: string[]
): T | undefined {
  const result = schema.safeParse(body ?? {});
  if (result.success) {
    return result.data;
  }
  issues.push(...formatZodIssues(result.error, path));
  return undefined;
}

function formatZodIssues(error: z.ZodError, path: string): string[] {
  return error.issues.map((issue) => {
    const location = [path, ...issue.path.map(String)].filter((part) => part !== '').join('.');
    return `${location || '<root>'}: ${issue.message}`;
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
