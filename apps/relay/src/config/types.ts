/**
 * Validated relay configuration. Component bodies keep the collector's
 * snake_case keys; every duration is already converted to milliseconds.
 */

import type { Signal } from '@telemetry-relay/core';
import type {
  BatchProcessorSettings,
  DebugExporterSettings,
  HealthCheckSettings,
  MemoryLimiterSettings,
  OtlpGrpcExporterSettings,
  OtlpHttpExporterSettings,
  OtlpReceiverSettings,
  PrometheusExporterSettings,
  ResourceProcessorSettings,
  ServiceSettings,
  ZipkinExporterSettings,
} from './schema.js';

export interface ReceiverConfig {
  id: string;
  type: 'otlp';
  settings: OtlpReceiverSettings;
}

export type ProcessorConfig =
  | { id: string; type: 'memory_limiter'; settings: MemoryLimiterSettings }
  | { id: string; type: 'resource'; settings: ResourceProcessorSettings }
  | { id: string; type: 'batch'; settings: BatchProcessorSettings };

export type ExporterConfig =
  | { id: string; type: 'otlp'; settings: OtlpGrpcExporterSettings }
  | { id: string; type: 'otlphttp'; settings: OtlpHttpExporterSettings }
  | { id: string; type: 'zipkin'; settings: ZipkinExporterSettings }
  | { id: string; type: 'prometheus'; settings: PrometheusExporterSettings }
  | { id: string; type: 'debug'; settings: DebugExporterSettings };

export type ProcessorType = ProcessorConfig['type'];
export type ExporterType = ExporterConfig['type'];

export const EXPORTER_SIGNALS: Record<ExporterType, readonly Signal[]> = {
  otlp: ['traces', 'metrics'],
  otlphttp: ['traces', 'metrics'],
  zipkin: ['traces'],
  prometheus: ['metrics'],
  debug: ['traces', 'metrics'],
};

export interface PipelineConfig {
  id: string;
  signal: Signal;
  receivers: string[];
  processors: string[];
  exporters: string[];
}

export interface RelayConfig {
  /** File the snapshot was read from, for log lines and reload. */
  source: string;
  receivers: Record<string, ReceiverConfig>;
  processors: Record<string, ProcessorConfig>;
  exporters: Record<string, ExporterConfig>;
  extensions: {
    health_check?: HealthCheckSettings;
  };
  pipelines: PipelineConfig[];
  service: ServiceSettings;
}

export class ConfigError extends Error {
  constructor(
    readonly issues: string[],
    readonly source: string
  ) {
    super(`Invalid configuration (${source}):\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}
