import { metricPoints, spans, type TelemetryBatch } from '@telemetry-relay/core';
import { encodeMetricsRequest, encodeTraceRequest } from '../codec/otlp-encoder.js';
import { exportMethod } from '../codec/otlp-proto.js';
import type { OtlpHttpExporterSettings } from '../config/schema.js';
import { HttpExporter, joinUrl, type HttpRequest } from './http-exporter.js';

/**
 * OTLP/HTTP exporter: POSTs to `<endpoint>/v1/traces` and `/v1/metrics`, or
 * to the per-signal endpoints when set.
 */
export class OtlpHttpExporter extends HttpExporter<OtlpHttpExporterSettings> {
  constructor(id: string, settings: OtlpHttpExporterSettings) {
    super(id, 'otlphttp', settings);
  }

  get tracesUrl(): string | undefined {
    const { traces_endpoint, endpoint } = this.settings;
    return traces_endpoint ?? (endpoint !== undefined ? joinUrl(endpoint, '/v1/traces') : undefined);
  }

  get metricsUrl(): string | undefined {
    const { metrics_endpoint, endpoint } = this.settings;
    return metrics_endpoint ?? (endpoint !== undefined ? joinUrl(endpoint, '/v1/metrics') : undefined);
  }

  protected targets(): string[] {
    return [this.tracesUrl, this.metricsUrl].filter((url): url is string => url !== undefined);
  }

  protected buildRequest(batch: TelemetryBatch): HttpRequest {
    const url = batch.signal === 'traces' ? this.tracesUrl : this.metricsUrl;
    if (!url) {
      throw new Error(`no ${batch.signal} endpoint configured`);
    }

    const { encoding } = this.settings;
    const request =
      batch.signal === 'traces' ? encodeTraceRequest(spans(batch), encoding) : encodeMetricsRequest(metricPoints(batch));

    if (encoding === 'proto') {
      return {
        url,
        body: exportMethod(batch.signal).requestSerialize(request),
        contentType: 'application/x-protobuf',
      };
    }
    return { url, body: JSON.stringify(request), contentType: 'application/json' };
  }
}
