import { z } from 'zod';
import { LOG_LEVELS, parseBooleanFlag } from '@telemetry-relay/core';

// Durations are written like the collector's ("200ms", "5s", "1m") and parsed to milliseconds
const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m|h)$/;

const DURATION_UNITS_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

export function parseDuration(value: string | number): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : undefined;
  }

  const match = DURATION_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }

  return Math.round(parseFloat(match[1]) * DURATION_UNITS_MS[match[2]]);
}

export const durationSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const ms = parseDuration(value);
  if (ms === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid duration "${value}"` });
    return z.NEVER;
  }
  return ms;
});

// Substituted ${env:...} values arrive as strings
const intSchema = z.preprocess(
  (value) => (typeof value === 'string' && /^\s*\d+\s*$/.test(value) ? Number(value) : value),
  z.number().int().nonnegative()
);

const numberSchema = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' && !isNaN(Number(value)) ? Number(value) : value),
  z.number()
);

const booleanSchema = z.preprocess(
  (value) => (typeof value === 'string' ? (parseBooleanFlag(value) ?? value) : value),
  z.boolean()
);

export const endpointSchema = z
  .string()
  .regex(/^[^\s:/]*:\d{1,5}$/, 'expected "host:port"');

// YAML `grpc:` with no body parses to null and means "enabled with defaults"
function nullAsEmpty(value: unknown): unknown {
  return value === null ? {} : value;
}

// ============================================================================
// Receivers
// ============================================================================

export const grpcProtocolSchema = z
  .object({
    endpoint: endpointSchema.default('0.0.0.0:4317'),
    max_recv_msg_size_mib: intSchema.default(4),
  })
  .strict();

export const httpProtocolSchema = z
  .object({
    endpoint: endpointSchema.default('0.0.0.0:4318'),
    max_request_body_size: intSchema.default(20 * 1024 * 1024),
  })
  .strict();

export const otlpReceiverSchema = z
  .object({
    protocols: z
      .object({
        grpc: z.preprocess(nullAsEmpty, grpcProtocolSchema).optional(),
        http: z.preprocess(nullAsEmpty, httpProtocolSchema).optional(),
      })
      .strict()
      .refine((protocols) => protocols.grpc !== undefined || protocols.http !== undefined, {
        message: 'at least one of grpc or http must be enabled',
      }),
  })
  .strict();

export type GrpcProtocolConfig = z.infer<typeof grpcProtocolSchema>;
export type HttpProtocolConfig = z.infer<typeof httpProtocolSchema>;
export type OtlpReceiverSettings = z.infer<typeof otlpReceiverSchema>;

// ============================================================================
// Processors
// ============================================================================

const MIB = 1024 * 1024;

export const memoryLimiterSchema = z
  .object({
    check_interval: durationSchema.default('1s'),
    limit_mib: intSchema.optional(),
    spike_limit_mib: intSchema.optional(),
    limit_bytes: intSchema.optional(),
    spike_limit_bytes: intSchema.optional(),
  })
  .strict()
  .transform((settings, ctx) => {
    const limitBytes =
      settings.limit_bytes ?? (settings.limit_mib !== undefined ? settings.limit_mib * MIB : undefined);

    if (limitBytes === undefined || limitBytes === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'limit_mib or limit_bytes must be set and non-zero' });
      return z.NEVER;
    }

    // Spike default mirrors the collector: 20% of the hard limit
    const spikeLimitBytes =
      settings.spike_limit_bytes ??
      (settings.spike_limit_mib !== undefined ? settings.spike_limit_mib * MIB : Math.floor(limitBytes * 0.2));

    if (spikeLimitBytes >= limitBytes) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'spike limit must be lower than the limit' });
      return z.NEVER;
    }

    return {
      check_interval: settings.check_interval,
      limit_bytes: limitBytes,
      spike_limit_bytes: spikeLimitBytes,
    };
  });

export const RESOURCE_ACTIONS = ['insert', 'upsert', 'update', 'delete'] as const;

export const resourceAttributeActionSchema = z
  .object({
    key: z.string().min(1),
    value: z.union([z.string(), z.number(), z.boolean()]).optional(),
    action: z.enum(RESOURCE_ACTIONS),
  })
  .strict()
  .refine((entry) => entry.action === 'delete' || entry.value !== undefined, {
    message: 'value is required unless action is delete',
  });

export const resourceProcessorSchema = z
  .object({
    attributes: z.array(resourceAttributeActionSchema).min(1),
  })
  .strict();

export const batchProcessorSchema = z
  .object({
    send_batch_size: intSchema.default(8192),
    send_batch_max_size: intSchema.default(0),
    timeout: durationSchema.default('200ms'),
  })
  .strict()
  .refine(
    (settings) => settings.send_batch_max_size === 0 || settings.send_batch_max_size >= settings.send_batch_size,
    { message: 'send_batch_max_size must be 0 or at least send_batch_size' }
  );

export type MemoryLimiterSettings = z.infer<typeof memoryLimiterSchema>;
export type ResourceAttributeAction = z.infer<typeof resourceAttributeActionSchema>;
export type ResourceProcessorSettings = z.infer<typeof resourceProcessorSchema>;
export type BatchProcessorSettings = z.infer<typeof batchProcessorSchema>;

// ============================================================================
// Exporters
// ============================================================================

export const retrySchema = z
  .object({
    enabled: booleanSchema.default(true),
    initial_interval: durationSchema.default('5s'),
    max_interval: durationSchema.default('30s'),
    multiplier: numberSchema.pipe(z.number().min(1)).default(1.5),
    randomization_factor: numberSchema.pipe(z.number().min(0).max(1)).default(0.5),
    max_attempts: intSchema.pipe(z.number().min(1)).default(5),
  })
  .strict();

export const sendingQueueSchema = z
  .object({
    queue_size: intSchema.pipe(z.number().min(1)).default(1000),
    num_consumers: intSchema.pipe(z.number().min(1)).default(1),
  })
  .strict();

const exporterCommonShape = {
  timeout: durationSchema.default('5s'),
  retry_on_failure: retrySchema.default({}),
  sending_queue: sendingQueueSchema.default({}),
  best_effort: booleanSchema.default(false),
};

const headersSchema = z.record(z.string()).default({});

export const otlpGrpcExporterSchema = z
  .object({
    ...exporterCommonShape,
    // scheme is tolerated and stripped: the client always dials plaintext
    endpoint: z.string().transform((value) => value.replace(/^https?:\/\//, '')).pipe(endpointSchema),
    headers: headersSchema,
  })
  .strict();

export const otlpHttpExporterSchema = z
  .object({
    ...exporterCommonShape,
    endpoint: z.string().url().optional(),
    traces_endpoint: z.string().url().optional(),
    metrics_endpoint: z.string().url().optional(),
    encoding: z.enum(['json', 'proto']).default('json'),
    headers: headersSchema,
  })
  .strict()
  .refine(
    (settings) =>
      settings.endpoint !== undefined || settings.traces_endpoint !== undefined || settings.metrics_endpoint !== undefined,
    { message: 'endpoint (or traces_endpoint/metrics_endpoint) is required' }
  );

export const zipkinExporterSchema = z
  .object({
    ...exporterCommonShape,
    endpoint: z.string().url(),
    headers: headersSchema,
  })
  .strict();

export const prometheusExporterSchema = z
  .object({
    ...exporterCommonShape,
    endpoint: endpointSchema,
    namespace: z.string().default(''),
    const_labels: z.record(z.string()).default({}),
    metric_expiration: durationSchema.default('5m'),
    add_metric_suffixes: booleanSchema.default(true),
    resource_to_telemetry_conversion: z
      .object({ enabled: booleanSchema.default(false) })
      .strict()
      .default({}),
  })
  .strict();

export const debugExporterSchema = z
  .object({
    ...exporterCommonShape,
    verbosity: z.enum(['basic', 'normal', 'detailed']).default('basic'),
  })
  .strict();

export type RetrySettings = z.infer<typeof retrySchema>;
export type ExporterCommonSettings = z.infer<z.ZodObject<typeof exporterCommonShape>>;
export type SendingQueueSettings = z.infer<typeof sendingQueueSchema>;
export type OtlpGrpcExporterSettings = z.infer<typeof otlpGrpcExporterSchema>;
export type OtlpHttpExporterSettings = z.infer<typeof otlpHttpExporterSchema>;
export type ZipkinExporterSettings = z.infer<typeof zipkinExporterSchema>;
export type PrometheusExporterSettings = z.infer<typeof prometheusExporterSchema>;
export type DebugExporterSettings = z.infer<typeof debugExporterSchema>;

// ============================================================================
// Extensions & service
// ============================================================================

export const healthCheckSchema = z
  .object({
    endpoint: endpointSchema.default('0.0.0.0:13133'),
    connectivity_check_interval: durationSchema.default('10s'),
  })
  .strict();

export type HealthCheckSettings = z.infer<typeof healthCheckSchema>;

export const pipelineSchema = z
  .object({
    receivers: z.array(z.string()).default([]),
    processors: z.array(z.string()).default([]),
    exporters: z.array(z.string()).default([]),
  })
  .strict();

export type PipelineSettings = z.infer<typeof pipelineSchema>;

export const serviceSchema = z
  .object({
    extensions: z.array(z.string()).default([]),
    pipelines: z.record(pipelineSchema),
    workers: intSchema.pipe(z.number().min(1)).default(2),
    shutdown_timeout: durationSchema.default('10s'),
    telemetry: z
      .object({
        logs: z.object({ level: z.enum(LOG_LEVELS).default('info') }).strict().default({}),
      })
      .strict()
      .default({}),
  })
  .strict();

export type ServiceSettings = z.infer<typeof serviceSchema>;

// Component bodies are validated per type once the id is known
const componentMapSchema = z.record(z.unknown()).default({});

export const documentSchema = z
  .object({
    receivers: z.record(z.unknown()),
    processors: componentMapSchema,
    exporters: z.record(z.unknown()),
    extensions: componentMapSchema,
    service: serviceSchema,
  })
  .strict();

export type RawDocument = z.infer<typeof documentSchema>;
