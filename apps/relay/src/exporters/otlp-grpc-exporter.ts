/**
 * OTLP/gRPC exporter (`otlp`), e.g. towards a Jaeger collector on :4317.
 */

import * as grpc from '@grpc/grpc-js';
import {
  ExportError,
  ExportErrorCategory,
  metricPoints,
  spans,
  type TelemetryBatch,
} from '@telemetry-relay/core';
import { encodeMetricsRequest, encodeTraceRequest } from '../codec/otlp-encoder.js';
import { exportMethod } from '../codec/otlp-proto.js';
import type { OtlpGrpcExporterSettings } from '../config/schema.js';
import { BaseExporter, type ExportOptions } from './exporter.js';

const RETRYABLE_CODES = new Set<grpc.status>([
  grpc.status.CANCELLED,
  grpc.status.DEADLINE_EXCEEDED,
  grpc.status.RESOURCE_EXHAUSTED,
  grpc.status.ABORTED,
  grpc.status.OUT_OF_RANGE,
  grpc.status.UNAVAILABLE,
  grpc.status.DATA_LOSS,
]);

export class OtlpGrpcExporter extends BaseExporter<OtlpGrpcExporterSettings> {
  private client: grpc.Client | null = null;

  constructor(id: string, settings: OtlpGrpcExporterSettings) {
    super(id, 'otlp', settings);
  }

  async start(): Promise<void> {
    this.getClient();
  }

  async checkConnectivity(): Promise<boolean> {
    const client = this.getClient();
    return new Promise((resolve) => {
      client.waitForReady(Date.now() + this.settings.timeout, (error) => {
        if (error) {
          this.log.debug('Connectivity check failed', { endpoint: this.settings.endpoint, error: error.message });
        }
        resolve(!error);
      });
    });
  }

  async shutdown(): Promise<void> {
    this.client?.close();
    this.client = null;
  }

  protected send(batch: TelemetryBatch, options: ExportOptions): Promise<void> {
    const method = exportMethod(batch.signal);
    const request =
      batch.signal === 'traces' ? encodeTraceRequest(spans(batch), 'proto') : encodeMetricsRequest(metricPoints(batch));

    const metadata = new grpc.Metadata();
    for (const [key, value] of Object.entries(this.settings.headers)) {
      metadata.set(key.toLowerCase(), value);
    }

    const client = this.getClient();
    return new Promise((resolve, reject) => {
      const call = client.makeUnaryRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        request,
        metadata,
        { deadline: Date.now() + this.settings.timeout },
        (error: grpc.ServiceError | null) => {
          options.signal?.removeEventListener('abort', cancel);
          if (error) {
            reject(this.categorizeGrpcError(error));
            return;
          }
          this.log.debug('Batch exported', { batchId: batch.id, records: batch.records.length });
          resolve();
        }
      );

      const cancel = (): void => call.cancel();
      options.signal?.addEventListener('abort', cancel, { once: true });
    });
  }

  private getClient(): grpc.Client {
    if (!this.client) {
      this.client = new grpc.Client(this.settings.endpoint, grpc.credentials.createInsecure());
    }
    return this.client;
  }

  private categorizeGrpcError(error: grpc.ServiceError): ExportError {
    let category: ExportErrorCategory;
    switch (error.code) {
      case grpc.status.UNAUTHENTICATED:
      case grpc.status.PERMISSION_DENIED:
        category = ExportErrorCategory.AUTHENTICATION;
        break;
      case grpc.status.RESOURCE_EXHAUSTED:
        category = ExportErrorCategory.RATE_LIMIT;
        break;
      case grpc.status.UNAVAILABLE:
        category = ExportErrorCategory.SERVICE_UNAVAILABLE;
        break;
      case grpc.status.DEADLINE_EXCEEDED:
        category = ExportErrorCategory.TIMEOUT;
        break;
      case grpc.status.INVALID_ARGUMENT:
        category = ExportErrorCategory.BAD_REQUEST;
        break;
      case grpc.status.NOT_FOUND:
      case grpc.status.UNIMPLEMENTED:
        category = ExportErrorCategory.NOT_FOUND;
        break;
      default:
        category = ExportErrorCategory.UNKNOWN;
    }

    this.log.warn('gRPC export failed', {
      endpoint: this.settings.endpoint,
      code: grpc.status[error.code],
      category,
      message: error.details,
    });

    return new ExportError(`gRPC ${grpc.status[error.code]}: ${error.details}`, {
      category,
      retryable: RETRYABLE_CODES.has(error.code),
      statusCode: error.code,
    });
  }
}
