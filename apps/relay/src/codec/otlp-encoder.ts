/**
 * OTLP Encoder - relay records back into Export requests
 *
 * `json` produces OTLP/JSON (hex ids, int64 as decimal strings); `proto`
 * produces the object the proto-loader serializer takes (ids as Buffers).
 * Records are grouped by resource and scope in first-seen order.
 */

import {
  SpanKind,
  type AggregationTemporality,
  type AttributeValue,
  type Attributes,
  type CounterPoint,
  type GaugePoint,
  type InstrumentationScope,
  type MetricPoint,
  type Span,
} from '@telemetry-relay/core';
import type { OtlpAnyValue, OtlpKeyValue } from './otlp-schema.js';

export type OtlpEncoding = 'json' | 'proto';

type OtlpBytes = string | Buffer;

export interface OtlpScope {
  name: string;
  version?: string;
}

export interface OtlpResource {
  attributes: OtlpKeyValue[];
}

export interface OtlpSpanOut {
  traceId: OtlpBytes;
  spanId: OtlpBytes;
  parentSpanId?: OtlpBytes;
  name: string;
  kind: number;
  startTimeUnixNano: string;
  endTimeUnixNano: string;
  attributes: OtlpKeyValue[];
  events: Array<{ timeUnixNano: string; name: string; attributes: OtlpKeyValue[] }>;
  status: { code: number; message?: string };
}

export interface ExportTraceServiceRequest {
  resourceSpans: Array<{
    resource: OtlpResource;
    scopeSpans: Array<{ scope?: OtlpScope; spans: OtlpSpanOut[] }>;
  }>;
}

interface OtlpNumberPointOut {
  attributes: OtlpKeyValue[];
  startTimeUnixNano?: string;
  timeUnixNano: string;
  asDouble?: number;
  asInt?: string;
}

interface OtlpHistogramPointOut {
  attributes: OtlpKeyValue[];
  startTimeUnixNano?: string;
  timeUnixNano: string;
  count: string;
  sum?: number;
  min?: number;
  max?: number;
  bucketCounts: string[];
  explicitBounds: number[];
}

export interface OtlpMetricOut {
  name: string;
  description?: string;
  unit?: string;
  gauge?: { dataPoints: OtlpNumberPointOut[] };
  sum?: { dataPoints: OtlpNumberPointOut[]; aggregationTemporality: number; isMonotonic: boolean };
  histogram?: { dataPoints: OtlpHistogramPointOut[]; aggregationTemporality: number };
}

export interface ExportMetricsServiceRequest {
  resourceMetrics: Array<{
    resource: OtlpResource;
    scopeMetrics: Array<{ scope?: OtlpScope; metrics: OtlpMetricOut[] }>;
  }>;
}

// ============================================================================
// Traces
// ============================================================================

export function encodeTraceRequest(records: readonly Span[], encoding: OtlpEncoding): ExportTraceServiceRequest {
  const groups = groupByResourceAndScope(records);

  return {
    resourceSpans: groups.map(({ resource, scopes }) => ({
      resource: { attributes: encodeAttributes(resource) },
      scopeSpans: scopes.map(({ scope, items }) => ({
        scope: encodeScope(scope),
        spans: items.map((span) => encodeSpan(span, encoding)),
      })),
    })),
  };
}

function encodeSpan(span: Span, encoding: OtlpEncoding): OtlpSpanOut {
  return {
    traceId: encodeId(span.traceId, encoding),
    spanId: encodeId(span.spanId, encoding),
    parentSpanId: span.parentSpanId !== undefined ? encodeId(span.parentSpanId, encoding) : undefined,
    name: span.name,
    kind: toOtlpKind(span.kind),
    startTimeUnixNano: span.startTimeUnixNano.toString(),
    endTimeUnixNano: span.endTimeUnixNano.toString(),
    attributes: encodeAttributes(span.attributes),
    events: span.events.map((event) => ({
      timeUnixNano: event.timeUnixNano.toString(),
      name: event.name,
      attributes: encodeAttributes(event.attributes),
    })),
    status: { code: span.status.code, message: span.status.message },
  };
}

// OTLP numbers span kinds from 1 (0 is unspecified)
function toOtlpKind(kind: SpanKind): number {
  return kind + 1;
}

function encodeId(hex: string, encoding: OtlpEncoding): OtlpBytes {
  return encoding === 'json' ? hex : Buffer.from(hex, 'hex');
}

// ============================================================================
// Metrics
// ============================================================================

export function encodeMetricsRequest(records: readonly MetricPoint[]): ExportMetricsServiceRequest {
  const groups = groupByResourceAndScope(records);

  return {
    resourceMetrics: groups.map(({ resource, scopes }) => ({
      resource: { attributes: encodeAttributes(resource) },
      scopeMetrics: scopes.map(({ scope, items }) => ({
        scope: encodeScope(scope),
        metrics: encodeMetrics(items),
      })),
    })),
  };
}

/**
 * Points of the same metric within a scope are folded back into one Metric
 * with several data points.
 */
function encodeMetrics(points: readonly MetricPoint[]): OtlpMetricOut[] {
  const metrics = new Map<string, OtlpMetricOut>();

  for (const point of points) {
    const key = `${point.kind}\u0000${point.name}`;
    let metric = metrics.get(key);
    if (!metric) {
      metric = { name: point.name, description: point.description, unit: point.unit };
      metrics.set(key, metric);
    }

    const common = {
      attributes: encodeAttributes(point.labels),
      startTimeUnixNano: point.startTimeUnixNano?.toString(),
      timeUnixNano: point.timeUnixNano.toString(),
    };

    switch (point.kind) {
      case 'gauge':
        metric.gauge ??= { dataPoints: [] };
        metric.gauge.dataPoints.push({ ...common, ...numberField(point) });
        break;
      case 'counter':
        metric.sum ??= {
          dataPoints: [],
          aggregationTemporality: toOtlpTemporality(point.temporality),
          isMonotonic: point.monotonic,
        };
        metric.sum.dataPoints.push({ ...common, ...numberField(point) });
        break;
      case 'histogram':
        metric.histogram ??= { dataPoints: [], aggregationTemporality: toOtlpTemporality(point.temporality) };
        metric.histogram.dataPoints.push({
          ...common,
          count: String(point.count),
          sum: point.sum,
          min: point.min,
          max: point.max,
          bucketCounts: point.bucketCounts.map(String),
          explicitBounds: [...point.explicitBounds],
        });
        break;
    }
  }

  return [...metrics.values()];
}

function toOtlpTemporality(temporality: AggregationTemporality): number {
  return temporality === 'delta' ? 1 : 2;
}

/** Integer points go back out as `asInt`, everything else as `asDouble`. */
function numberField(point: CounterPoint | GaugePoint): { asInt: string } | { asDouble: number } {
  if (point.integer && Number.isInteger(point.value)) {
    return { asInt: BigInt(point.value).toString() };
  }
  return { asDouble: point.value };
}

// ============================================================================
// Shared
// ============================================================================

interface Grouped<T> {
  resource: Attributes;
  scopes: Array<{ scope?: InstrumentationScope; items: T[] }>;
}

function groupByResourceAndScope<T extends { resource: Attributes; scope?: InstrumentationScope }>(
  records: readonly T[]
): Grouped<T>[] {
  const resources = new Map<string, Grouped<T> & { scopeIndex: Map<string, T[]> }>();

  for (const record of records) {
    const resourceKey = JSON.stringify(record.resource);
    let group = resources.get(resourceKey);
    if (!group) {
      group = { resource: record.resource, scopes: [], scopeIndex: new Map() };
      resources.set(resourceKey, group);
    }

    const scopeKey = `${record.scope?.name ?? ''}@${record.scope?.version ?? ''}`;
    let items = group.scopeIndex.get(scopeKey);
    if (!items) {
      items = [];
      group.scopeIndex.set(scopeKey, items);
      group.scopes.push({ scope: record.scope, items });
    }
    items.push(record);
  }

  return [...resources.values()].map(({ resource, scopes }) => ({ resource, scopes }));
}

function encodeScope(scope: InstrumentationScope | undefined): OtlpScope | undefined {
  return scope && { name: scope.name, version: scope.version };
}

export function encodeAttributes(attributes: Attributes): OtlpKeyValue[] {
  return Object.entries(attributes).map(([key, value]) => ({ key, value: encodeValue(value) }));
}

function encodeValue(value: AttributeValue): OtlpAnyValue {
  switch (typeof value) {
    case 'string':
      return { stringValue: value };
    case 'boolean':
      return { boolValue: value };
    default:
      return Number.isSafeInteger(value) ? { intValue: String(value) } : { doubleValue: value };
  }
}
