import { spans, type TelemetryBatch } from '@telemetry-relay/core';
import { toZipkinSpans } from '../codec/zipkin-encoder.js';
import type { ZipkinExporterSettings } from '../config/schema.js';
import { HttpExporter, type HttpRequest } from './http-exporter.js';

/** Zipkin v2 JSON exporter, e.g. `http://zipkin:9411/api/v2/spans`. */
export class ZipkinExporter extends HttpExporter<ZipkinExporterSettings> {
  constructor(id: string, settings: ZipkinExporterSettings) {
    super(id, 'zipkin', settings);
  }

  protected targets(): string[] {
    return [this.settings.endpoint];
  }

  protected buildRequest(batch: TelemetryBatch): HttpRequest {
    return {
      url: this.settings.endpoint,
      body: JSON.stringify(toZipkinSpans(spans(batch))),
      contentType: 'application/json',
    };
  }
}
