/**
 * Shape of OTLP export requests as they arrive: OTLP/JSON (hex ids, int64 as
 * string or number) or protobuf decoded by proto-loader (Buffer ids, int64 as
 * string). Unknown fields such as exemplars are stripped.
 */

import { z } from 'zod';

const int64Schema = z.union([z.string().regex(/^-?\d+$/, 'expected an integer'), z.number().int()]);

const bytesSchema = z.union([z.string(), z.instanceof(Uint8Array)]);

export interface OtlpAnyValue {
  stringValue?: string;
  boolValue?: boolean;
  intValue?: string | number;
  doubleValue?: number;
  arrayValue?: { values?: OtlpAnyValue[] };
  kvlistValue?: { values?: OtlpKeyValue[] };
  bytesValue?: string | Uint8Array;
}

export interface OtlpKeyValue {
  key: string;
  value?: OtlpAnyValue;
}

export const anyValueSchema: z.ZodType<OtlpAnyValue> = z.lazy(() =>
  z.object({
    stringValue: z.string().optional(),
    boolValue: z.boolean().optional(),
    intValue: int64Schema.optional(),
    doubleValue: z.number().optional(),
    arrayValue: z.object({ values: z.array(anyValueSchema).optional() }).optional(),
    kvlistValue: z.object({ values: z.array(keyValueSchema).optional() }).optional(),
    bytesValue: bytesSchema.optional(),
  })
);

export const keyValueSchema: z.ZodType<OtlpKeyValue> = z.lazy(() =>
  z.object({
    key: z.string(),
    value: anyValueSchema.optional(),
  })
);

const attributesSchema = z.array(keyValueSchema).optional();

const resourceSchema = z.object({ attributes: attributesSchema }).optional();

const scopeSchema = z
  .object({
    name: z.string().optional(),
    version: z.string().optional(),
  })
  .optional();

// ============================================================================
// Traces
// ============================================================================

export const spanSchema = z.object({
  traceId: bytesSchema,
  spanId: bytesSchema,
  parentSpanId: bytesSchema.optional(),
  name: z.string().optional(),
  kind: z.number().int().min(0).max(5).optional(),
  startTimeUnixNano: int64Schema.optional(),
  endTimeUnixNano: int64Schema.optional(),
  attributes: attributesSchema,
  events: z
    .array(
      z.object({
        timeUnixNano: int64Schema.optional(),
        name: z.string().optional(),
        attributes: attributesSchema,
      })
    )
    .optional(),
  status: z
    .object({
      code: z.number().int().min(0).max(2).optional(),
      message: z.string().optional(),
    })
    .optional(),
});

export const exportTraceRequestSchema = z.object({
  resourceSpans: z
    .array(
      z.object({
        resource: resourceSchema,
        scopeSpans: z
          .array(
            z.object({
              scope: scopeSchema,
              spans: z.array(spanSchema).optional(),
            })
          )
          .optional(),
      })
    )
    .optional(),
});

export type OtlpSpan = z.infer<typeof spanSchema>;
export type ExportTraceRequest = z.infer<typeof exportTraceRequestSchema>;

// ============================================================================
// Metrics
// ============================================================================

const temporalitySchema = z.number().int().min(0).max(2).optional();

export const numberDataPointSchema = z.object({
  attributes: attributesSchema,
  startTimeUnixNano: int64Schema.optional(),
  timeUnixNano: int64Schema.optional(),
  asDouble: z.number().optional(),
  asInt: int64Schema.optional(),
});

export const histogramDataPointSchema = z.object({
  attributes: attributesSchema,
  startTimeUnixNano: int64Schema.optional(),
  timeUnixNano: int64Schema.optional(),
  count: int64Schema.optional(),
  sum: z.number().optional(),
  min: z.number().optional(),
  max: z.number().optional(),
  bucketCounts: z.array(int64Schema).optional(),
  explicitBounds: z.array(z.number()).optional(),
});

export const metricSchema = z.object({
  name: z.string().min(1, 'metric name is required'),
  description: z.string().optional(),
  unit: z.string().optional(),
  gauge: z.object({ dataPoints: z.array(numberDataPointSchema).optional() }).optional(),
  sum: z
    .object({
      dataPoints: z.array(numberDataPointSchema).optional(),
      aggregationTemporality: temporalitySchema,
      isMonotonic: z.boolean().optional(),
    })
    .optional(),
  histogram: z
    .object({
      dataPoints: z.array(histogramDataPointSchema).optional(),
      aggregationTemporality: temporalitySchema,
    })
    .optional(),
});

export const exportMetricsRequestSchema = z.object({
  resourceMetrics: z
    .array(
      z.object({
        resource: resourceSchema,
        scopeMetrics: z
          .array(
            z.object({
              scope: scopeSchema,
              metrics: z.array(metricSchema).optional(),
            })
          )
          .optional(),
      })
    )
    .optional(),
});

export type OtlpMetric = z.infer<typeof metricSchema>;
export type OtlpNumberDataPoint = z.infer<typeof numberDataPointSchema>;
export type OtlpHistogramDataPoint = z.infer<typeof histogramDataPointSchema>;
export type ExportMetricsRequest = z.infer<typeof exportMetricsRequestSchema>;
