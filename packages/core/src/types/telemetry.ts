/**
 * Relay Telemetry Model
 *
 * Protocol-neutral records decoded from OTLP requests. Receivers produce them,
 * processors derive new ones, exporters encode them for their destination.
 * Timestamps are Unix nanoseconds kept as bigint; they do not fit in a double.
 */

import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

export { SpanKind, SpanStatusCode };

export type Signal = 'traces' | 'metrics';

export const SIGNALS: readonly Signal[] = ['traces', 'metrics'];

export type AttributeValue = string | number | boolean;

export type Attributes = Readonly<Record<string, AttributeValue>>;

export interface InstrumentationScope {
  readonly name: string;
  readonly version?: string;
}

export interface SpanStatus {
  readonly code: SpanStatusCode;
  readonly message?: string;
}

export interface SpanEvent {
  readonly name: string;
  readonly timeUnixNano: bigint;
  readonly attributes: Attributes;
}

export interface Span {
  readonly type: 'span';
  readonly traceId: string; // 32 lowercase hex chars
  readonly spanId: string; // 16 lowercase hex chars
  readonly parentSpanId?: string;
  readonly name: string;
  readonly kind: SpanKind;
  readonly serviceName: string;
  readonly startTimeUnixNano: bigint;
  readonly endTimeUnixNano: bigint;
  readonly attributes: Attributes;
  readonly resource: Attributes;
  readonly status: SpanStatus;
  readonly events: readonly SpanEvent[];
  readonly scope?: InstrumentationScope;
}

export type AggregationTemporality = 'delta' | 'cumulative';

export type MetricKind = 'counter' | 'gauge' | 'histogram';

interface MetricPointBase {
  readonly type: 'metric';
  readonly name: string;
  readonly description?: string;
  readonly unit?: string;
  readonly labels: Attributes;
  readonly resource: Attributes;
  readonly timeUnixNano: bigint;
  readonly startTimeUnixNano?: bigint;
  readonly scope?: InstrumentationScope;
}

export interface CounterPoint extends MetricPointBase {
  readonly kind: 'counter';
  readonly value: number;
  /** The value arrived as an OTLP integer (`asInt`). */
  readonly integer?: boolean;
  readonly monotonic: boolean;
  readonly temporality: AggregationTemporality;
}

export interface GaugePoint extends MetricPointBase {
  readonly kind: 'gauge';
  readonly value: number;
  readonly integer?: boolean;
}

export interface HistogramPoint extends MetricPointBase {
  readonly kind: 'histogram';
  readonly temporality: AggregationTemporality;
  readonly count: number;
  readonly sum?: number;
  readonly min?: number;
  readonly max?: number;
  readonly bucketCounts: readonly number[];
  readonly explicitBounds: readonly number[];
}

export type MetricPoint = CounterPoint | GaugePoint | HistogramPoint;

export type TelemetryRecord = Span | MetricPoint;

export interface TelemetryBatch {
  readonly id: string;
  readonly signal: Signal;
  /** Component id of the receiver that accepted the data. */
  readonly source: string;
  /** Epoch milliseconds. */
  readonly receivedAt: number;
  readonly records: readonly TelemetryRecord[];
}

export const UNKNOWN_SERVICE = 'unknown_service';

export function createBatch(
  signal: Signal,
  source: string,
  records: readonly TelemetryRecord[],
  receivedAt: number = Date.now()
): TelemetryBatch {
  return { id: uuidv4(), signal, source, receivedAt, records };
}

/**
 * Same provenance, new records. Processors never touch a batch in place.
 */
export function withRecords(batch: TelemetryBatch, records: readonly TelemetryRecord[]): TelemetryBatch {
  return { ...batch, records };
}

export function isSpan(record: TelemetryRecord): record is Span {
  return record.type === 'span';
}

export function isMetricPoint(record: TelemetryRecord): record is MetricPoint {
  return record.type === 'metric';
}

export function signalOf(record: TelemetryRecord): Signal {
  return isSpan(record) ? 'traces' : 'metrics';
}

export function spans(batch: TelemetryBatch): Span[] {
  return batch.records.filter(isSpan);
}

export function metricPoints(batch: TelemetryBatch): MetricPoint[] {
  return batch.records.filter(isMetricPoint);
}
