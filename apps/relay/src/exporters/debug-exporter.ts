/**
 * Debug Exporter - writes batches to the relay log
 *
 * basic: one summary line per batch; normal: one line per record;
 * detailed: one line per record with every attribute.
 */

import {
  SpanStatusCode,
  isSpan,
  type MetricPoint,
  type Span,
  type TelemetryBatch,
  type TelemetryRecord,
} from '@telemetry-relay/core';
import type { DebugExporterSettings } from '../config/schema.js';
import { BaseExporter } from './exporter.js';

export class DebugExporter extends BaseExporter<DebugExporterSettings> {
  constructor(id: string, settings: DebugExporterSettings) {
    super(id, 'debug', settings);
  }

  protected async send(batch: TelemetryBatch): Promise<void> {
    const unit = batch.signal === 'traces' ? 'spans' : 'data points';
    this.log.info(`${batch.signal === 'traces' ? 'TracesExporter' : 'MetricsExporter'} ${batch.records.length} ${unit}`, {
      batchId: batch.id,
      source: batch.source,
    });

    if (this.settings.verbosity === 'basic') {
      return;
    }

    const detailed = this.settings.verbosity === 'detailed';
    for (const record of batch.records) {
      this.logRecord(record, detailed);
    }
  }

  private logRecord(record: TelemetryRecord, detailed: boolean): void {
    if (isSpan(record)) {
      const level = record.status.code === SpanStatusCode.ERROR ? 'warn' : 'info';
      this.log.log(level, `[${record.serviceName}] ${record.name} ${this.formatSpanData(record)}`, detailed ? spanDetails(record) : {});
    } else {
      this.log.info(`${record.name} ${this.formatMetricData(record)}`, detailed ? metricDetails(record) : {});
    }
  }

  private formatSpanData(span: Span): string {
    const context = [`trace:${span.traceId.slice(0, 8)}`, `span:${span.spanId.slice(0, 8)}`];
    if (span.parentSpanId) context.push(`parent:${span.parentSpanId.slice(0, 8)}`);

    const durationMs = Number((span.endTimeUnixNano - span.startTimeUnixNano) / 1_000_000n);
    return `[${context.join(' ')}] (${durationMs}ms)`;
  }

  private formatMetricData(point: MetricPoint): string {
    const labels = Object.entries(point.labels)
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(',');
    const value = point.kind === 'histogram' ? `count=${point.count} sum=${point.sum ?? 'n/a'}` : String(point.value);
    return `${point.kind}{${labels}} ${value}`;
  }
}

// bigint timestamps do not survive JSON log formatting; send them as strings
function spanDetails(span: Span): Record<string, unknown> {
  return {
    traceId: span.traceId,
    spanId: span.spanId,
    parentSpanId: span.parentSpanId,
    kind: span.kind,
    startTimeUnixNano: span.startTimeUnixNano.toString(),
    endTimeUnixNano: span.endTimeUnixNano.toString(),
    attributes: span.attributes,
    resource: span.resource,
    status: span.status,
    events: span.events.map((event) => ({ ...event, timeUnixNano: event.timeUnixNano.toString() })),
    scope: span.scope,
  };
}

function metricDetails(point: MetricPoint): Record<string, unknown> {
  return {
    ...point,
    timeUnixNano: point.timeUnixNano.toString(),
    startTimeUnixNano: point.startTimeUnixNano?.toString(),
  };
}
