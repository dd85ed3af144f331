import type { ExporterConfig } from '../config/types.js';
import type { RelayMetrics } from '../telemetry/self-metrics.js';
import { DebugExporter } from './debug-exporter.js';
import type { TelemetryExporter } from './exporter.js';
import { OtlpGrpcExporter } from './otlp-grpc-exporter.js';
import { OtlpHttpExporter } from './otlp-http-exporter.js';
import { PrometheusExporter } from './prometheus-exporter.js';
import { ZipkinExporter } from './zipkin-exporter.js';

export function createExporter(config: ExporterConfig, metrics?: RelayMetrics): TelemetryExporter {
  switch (config.type) {
    case 'otlp':
      return new OtlpGrpcExporter(config.id, config.settings);
    case 'otlphttp':
      return new OtlpHttpExporter(config.id, config.settings);
    case 'zipkin':
      return new ZipkinExporter(config.id, config.settings);
    case 'prometheus':
      return new PrometheusExporter(config.id, config.settings, metrics);
    case 'debug':
      return new DebugExporter(config.id, config.settings);
  }
}
