/**
 * Zipkin v2 JSON span encoding.
 */

import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import { SpanKind, SpanStatusCode, type Span } from '@telemetry-relay/core';

export interface ZipkinSpan {
  traceId: string;
  id: string;
  parentId?: string;
  name: string;
  kind?: 'CLIENT' | 'SERVER' | 'PRODUCER' | 'CONSUMER';
  timestamp: number;
  duration: number;
  localEndpoint: { serviceName: string };
  tags: Record<string, string>;
  annotations?: Array<{ timestamp: number; value: string }>;
}

const ZIPKIN_KINDS: Partial<Record<SpanKind, ZipkinSpan['kind']>> = {
  [SpanKind.CLIENT]: 'CLIENT',
  [SpanKind.SERVER]: 'SERVER',
  [SpanKind.PRODUCER]: 'PRODUCER',
  [SpanKind.CONSUMER]: 'CONSUMER',
};

export function toZipkinSpans(spans: readonly Span[]): ZipkinSpan[] {
  return spans.map(toZipkinSpan);
}

export function toZipkinSpan(span: Span): ZipkinSpan {
  const tags: Record<string, string> = {};

  for (const [key, value] of Object.entries(span.resource)) {
    if (key !== ATTR_SERVICE_NAME) {
      tags[key] = String(value);
    }
  }
  // span attributes win over resource attributes of the same name
  for (const [key, value] of Object.entries(span.attributes)) {
    tags[key] = String(value);
  }

  if (span.scope) {
    tags['otel.scope.name'] = span.scope.name;
    if (span.scope.version) {
      tags['otel.scope.version'] = span.scope.version;
    }
  }

  if (span.status.code === SpanStatusCode.OK) {
    tags['otel.status_code'] = 'OK';
  } else if (span.status.code === SpanStatusCode.ERROR) {
    tags['otel.status_code'] = 'ERROR';
    tags['error'] = span.status.message ?? '';
  }

  const timestamp = toMicros(span.startTimeUnixNano);
  const duration = Math.max(toMicros(span.endTimeUnixNano) - timestamp, 0);

  const zipkinSpan: ZipkinSpan = {
    traceId: span.traceId,
    id: span.spanId,
    parentId: span.parentSpanId,
    name: span.name,
    kind: ZIPKIN_KINDS[span.kind],
    timestamp,
    duration,
    localEndpoint: { serviceName: span.serviceName },
    tags,
  };

  if (span.events.length > 0) {
    zipkinSpan.annotations = span.events.map((event) => ({
      timestamp: toMicros(event.timeUnixNano),
      value: Object.keys(event.attributes).length > 0 ? `${event.name}|${JSON.stringify(event.attributes)}` : event.name,
    }));
  }

  return zipkinSpan;
}

function toMicros(nanos: bigint): number {
  return Number(nanos / 1000n);
}
