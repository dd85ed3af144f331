import { describe, expect, it } from 'vitest';
import {
  SpanKind,
  SpanStatusCode,
  createBatch,
  isMetricPoint,
  isSpan,
  metricPoints,
  signalOf,
  spans,
  withRecords,
  type GaugePoint,
  type Span,
} from '../types/telemetry.js';
import { EXPORT_SUCCESS, ExportError, ExportErrorCategory, exportFailure } from '../types/export.js';

const span: Span = {
  type: 'span',
  traceId: '0af7651916cd43dd8448eb211c80319c',
  spanId: 'b7ad6b7169203331',
  name: 'checkout',
  kind: SpanKind.SERVER,
  serviceName: 'shop',
  startTimeUnixNano: 1_700_000_000_000_000_000n,
  endTimeUnixNano: 1_700_000_000_250_000_000n,
  attributes: {},
  resource: { 'service.name': 'shop' },
  status: { code: SpanStatusCode.OK },
  events: [],
};

const gauge: GaugePoint = {
  type: 'metric',
  kind: 'gauge',
  name: 'queue_depth',
  value: 3,
  labels: {},
  resource: {},
  timeUnixNano: 1_700_000_000_000_000_000n,
};

describe('telemetry model', () => {
  it('creates batches with a fresh id each time', () => {
    const first = createBatch('traces', 'otlp', [span], 1000);
    const second = createBatch('traces', 'otlp', [span], 1000);

    expect(first).toMatchObject({ signal: 'traces', source: 'otlp', receivedAt: 1000, records: [span] });
    expect(first.id).not.toBe(second.id);
  });

  it('keeps provenance when replacing records', () => {
    const batch = createBatch('traces', 'otlp/edge', [span], 42);
    const next = withRecords(batch, []);

    expect(next).toEqual({ id: batch.id, signal: 'traces', source: 'otlp/edge', receivedAt: 42, records: [] });
    expect(batch.records).toHaveLength(1);
  });

  it('tells spans and metric points apart', () => {
    expect(isSpan(span)).toBe(true);
    expect(isMetricPoint(span)).toBe(false);
    expect(isMetricPoint(gauge)).toBe(true);
    expect(signalOf(span)).toBe('traces');
    expect(signalOf(gauge)).toBe('metrics');
  });

  it('filters records by kind', () => {
    const batch = createBatch('traces', 'otlp', [span, gauge]);
    expect(spans(batch)).toEqual([span]);
    expect(metricPoints(batch)).toEqual([gauge]);
  });
});

describe('export results', () => {
  it('carries retryability and the requested delay', () => {
    const error = new ExportError('HTTP 429', {
      category: ExportErrorCategory.RATE_LIMIT,
      retryable: true,
      statusCode: 429,
      retryAfterMs: 2000,
    });

    expect(exportFailure(error)).toEqual({ status: 'failure', retryable: true, error, retryAfterMs: 2000 });
    expect(error.name).toBe('ExportError');
  });

  it('shares one frozen success value', () => {
    expect(EXPORT_SUCCESS).toEqual({ status: 'success' });
    expect(Object.isFrozen(EXPORT_SUCCESS)).toBe(true);
  });
});
