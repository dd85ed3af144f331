/**
 * OTLP Decoder - turns Export requests into relay records
 *
 * Accepts the request object from either binding (OTLP/JSON or protobuf as
 * decoded by proto-loader). A request that does not have the OTLP shape is a
 * DecodeError; individual spans or data points that cannot be represented
 * are skipped and counted as rejected, and the rest of the request is kept.
 */

import { z } from 'zod';
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import {
  SpanKind,
  SpanStatusCode,
  UNKNOWN_SERVICE,
  type AggregationTemporality,
  type AttributeValue,
  type Attributes,
  type CounterPoint,
  type GaugePoint,
  type InstrumentationScope,
  type MetricPoint,
  type Signal,
  type Span,
  type TelemetryRecord,
} from '@telemetry-relay/core';
import {
  exportMetricsRequestSchema,
  exportTraceRequestSchema,
  type OtlpAnyValue,
  type OtlpHistogramDataPoint,
  type OtlpKeyValue,
  type OtlpMetric,
  type OtlpNumberDataPoint,
  type OtlpSpan,
} from './otlp-schema.js';

export class DecodeError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'DecodeError';
  }
}

export interface DecodeResult {
  records: TelemetryRecord[];
  /** Spans or data points that were present but could not be decoded. */
  rejected: number;
}

// Index is the OTLP enum value; 0 (unspecified) reads as internal
const SPAN_KINDS: readonly SpanKind[] = [
  SpanKind.INTERNAL,
  SpanKind.INTERNAL,
  SpanKind.SERVER,
  SpanKind.CLIENT,
  SpanKind.PRODUCER,
  SpanKind.CONSUMER,
];

const STATUS_CODES: readonly SpanStatusCode[] = [SpanStatusCode.UNSET, SpanStatusCode.OK, SpanStatusCode.ERROR];

const TRACE_ID_BYTES = 16;
const SPAN_ID_BYTES = 8;

export function decodeRequest(signal: Signal, body: unknown): DecodeResult {
  return signal === 'traces' ? decodeTraceRequest(body) : decodeMetricsRequest(body);
}

// ============================================================================
// Traces
// ============================================================================

export function decodeTraceRequest(body: unknown): DecodeResult {
  const parsed = exportTraceRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new DecodeError('invalid ExportTraceServiceRequest', formatIssues(parsed.error));
  }

  const records: TelemetryRecord[] = [];
  let rejected = 0;

  for (const resourceSpans of parsed.data.resourceSpans ?? []) {
    const resource = toAttributes(resourceSpans.resource?.attributes);
    const serviceName = serviceNameOf(resource);

    for (const scopeSpans of resourceSpans.scopeSpans ?? []) {
      const scope = toScope(scopeSpans.scope);
      for (const otlpSpan of scopeSpans.spans ?? []) {
        const span = toSpan(otlpSpan, resource, serviceName, scope);
        if (span) {
          records.push(span);
        } else {
          rejected++;
        }
      }
    }
  }

  return { records, rejected };
}

function toSpan(
  span: OtlpSpan,
  resource: Attributes,
  serviceName: string,
  scope: InstrumentationScope | undefined
): Span | undefined {
  const traceId = toHexId(span.traceId, TRACE_ID_BYTES);
  const spanId = toHexId(span.spanId, SPAN_ID_BYTES);
  if (!traceId || !spanId) {
    return undefined;
  }

  let parentSpanId: string | undefined;
  if (span.parentSpanId !== undefined && span.parentSpanId.length > 0) {
    parentSpanId = toHexId(span.parentSpanId, SPAN_ID_BYTES);
    if (!parentSpanId) {
      return undefined;
    }
  }

  return {
    type: 'span',
    traceId,
    spanId,
    parentSpanId,
    name: span.name ?? '',
    kind: SPAN_KINDS[span.kind ?? 0] ?? SpanKind.INTERNAL,
    serviceName,
    startTimeUnixNano: toNanos(span.startTimeUnixNano),
    endTimeUnixNano: toNanos(span.endTimeUnixNano),
    attributes: toAttributes(span.attributes),
    resource,
    status: {
      code: STATUS_CODES[span.status?.code ?? 0] ?? SpanStatusCode.UNSET,
      message: span.status?.message || undefined,
    },
    events: (span.events ?? []).map((event) => ({
      name: event.name ?? '',
      timeUnixNano: toNanos(event.timeUnixNano),
      attributes: toAttributes(event.attributes),
    })),
    scope,
  };
}

/**
 * OTLP/JSON carries ids as hex strings, protobuf as raw bytes. All-zero ids
 * are invalid.
 */
function toHexId(value: string | Uint8Array, bytes: number): string | undefined {
  const hex = typeof value === 'string' ? value.toLowerCase() : Buffer.from(value).toString('hex');
  if (hex.length !== bytes * 2 || !/^[0-9a-f]+$/.test(hex) || /^0+$/.test(hex)) {
    return undefined;
  }
  return hex;
}

// ============================================================================
// Metrics
// ============================================================================

export function decodeMetricsRequest(body: unknown): DecodeResult {
  const parsed = exportMetricsRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new DecodeError('invalid ExportMetricsServiceRequest', formatIssues(parsed.error));
  }

  const records: TelemetryRecord[] = [];
  let rejected = 0;

  for (const resourceMetrics of parsed.data.resourceMetrics ?? []) {
    const resource = toAttributes(resourceMetrics.resource?.attributes);

    for (const scopeMetrics of resourceMetrics.scopeMetrics ?? []) {
      const scope = toScope(scopeMetrics.scope);
      for (const metric of scopeMetrics.metrics ?? []) {
        const decoded = toMetricPoints(metric, resource, scope);
        records.push(...decoded.points);
        rejected += decoded.rejected;
      }
    }
  }

  return { records, rejected };
}

interface MetricIdentity {
  type: 'metric';
  name: string;
  description?: string;
  unit?: string;
  resource: Attributes;
  scope?: InstrumentationScope;
}

function toMetricPoints(
  metric: OtlpMetric,
  resource: Attributes,
  scope: InstrumentationScope | undefined
): { points: MetricPoint[]; rejected: number } {
  const identity: MetricIdentity = {
    type: 'metric',
    name: metric.name,
    description: metric.description || undefined,
    unit: metric.unit || undefined,
    resource,
    scope,
  };

  if (metric.gauge) {
    return {
      points: (metric.gauge.dataPoints ?? []).map((point): GaugePoint => ({
        ...identity,
        ...pointTimes(point),
        kind: 'gauge',
        labels: toAttributes(point.attributes),
        ...numberValue(point),
      })),
      rejected: 0,
    };
  }

  if (metric.sum) {
    const temporality = toTemporality(metric.sum.aggregationTemporality);
    const monotonic = metric.sum.isMonotonic ?? false;
    return {
      points: (metric.sum.dataPoints ?? []).map((point): CounterPoint => ({
        ...identity,
        ...pointTimes(point),
        kind: 'counter',
        labels: toAttributes(point.attributes),
        ...numberValue(point),
        monotonic,
        temporality,
      })),
      rejected: 0,
    };
  }

  if (metric.histogram) {
    const temporality = toTemporality(metric.histogram.aggregationTemporality);
    const points: MetricPoint[] = [];
    let rejected = 0;

    for (const point of metric.histogram.dataPoints ?? []) {
      const bucketCounts = (point.bucketCounts ?? []).map(Number);
      const explicitBounds = point.explicitBounds ?? [];
      // n bounds delimit n + 1 buckets; a point without buckets is allowed
      if (bucketCounts.length > 0 && bucketCounts.length !== explicitBounds.length + 1) {
        rejected++;
        continue;
      }
      points.push({
        ...identity,
        ...pointTimes(point),
        kind: 'histogram',
        labels: toAttributes(point.attributes),
        temporality,
        count: Number(point.count ?? 0),
        sum: point.sum,
        min: point.min,
        max: point.max,
        bucketCounts,
        explicitBounds,
      });
    }
    return { points, rejected };
  }

  // Exponential histograms and summaries are not relayed
  return { points: [], rejected: 1 };
}

function pointTimes(point: OtlpNumberDataPoint | OtlpHistogramDataPoint): {
  timeUnixNano: bigint;
  startTimeUnixNano?: bigint;
} {
  return {
    timeUnixNano: toNanos(point.timeUnixNano),
    startTimeUnixNano: point.startTimeUnixNano !== undefined ? toNanos(point.startTimeUnixNano) : undefined,
  };
}

function numberValue(point: OtlpNumberDataPoint): { value: number; integer?: true } {
  if (point.asDouble !== undefined) {
    return { value: point.asDouble };
  }
  if (point.asInt !== undefined) {
    return { value: Number(point.asInt), integer: true };
  }
  // proto3 omits a zero value entirely
  return { value: 0 };
}

function toTemporality(value: number | undefined): AggregationTemporality {
  return value === 1 ? 'delta' : 'cumulative';
}

// ============================================================================
// Shared
// ============================================================================

function toNanos(value: string | number | undefined): bigint {
  return value === undefined ? 0n : BigInt(value);
}

function toScope(scope: { name?: string; version?: string } | undefined): InstrumentationScope | undefined {
  if (!scope?.name) {
    return undefined;
  }
  return { name: scope.name, version: scope.version || undefined };
}

export function toAttributes(keyValues: OtlpKeyValue[] | undefined): Attributes {
  const attributes: Record<string, AttributeValue> = {};
  for (const { key, value } of keyValues ?? []) {
    const flattened = value && flattenAnyValue(value);
    if (flattened !== undefined) {
      attributes[key] = flattened;
    }
  }
  return attributes;
}

/**
 * Attribute values are kept scalar; arrays and maps are carried as their JSON
 * text and bytes as base64.
 */
function flattenAnyValue(value: OtlpAnyValue): AttributeValue | undefined {
  if (value.stringValue !== undefined) return value.stringValue;
  if (value.boolValue !== undefined) return value.boolValue;
  if (value.intValue !== undefined) return Number(value.intValue);
  if (value.doubleValue !== undefined) return value.doubleValue;
  if (value.bytesValue !== undefined) {
    return typeof value.bytesValue === 'string' ? value.bytesValue : Buffer.from(value.bytesValue).toString('base64');
  }
  if (value.arrayValue) {
    return JSON.stringify((value.arrayValue.values ?? []).map((item) => flattenAnyValue(item) ?? null));
  }
  if (value.kvlistValue) {
    return JSON.stringify(toAttributes(value.kvlistValue.values));
  }
  return undefined;
}

function serviceNameOf(resource: Attributes): string {
  const name = resource[ATTR_SERVICE_NAME];
  return typeof name === 'string' && name.length > 0 ? name : UNKNOWN_SERVICE;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.slice(0, 10).map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
