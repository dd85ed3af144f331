/**
 * HttpExporter - base class for exporters that POST to an HTTP destination
 *
 * Owns the axios client, maps HTTP failures onto ExportError categories and
 * honours Retry-After. Variants only build the request for a batch.
 */

import axios, { AxiosError, type AxiosInstance } from 'axios';
import { ExportError, ExportErrorCategory, type TelemetryBatch } from '@telemetry-relay/core';
import type { ExporterCommonSettings } from '../config/schema.js';
import type { ExporterType } from '../config/types.js';
import { BaseExporter, type ExportOptions } from './exporter.js';

export interface HttpExporterSettings extends ExporterCommonSettings {
  headers: Record<string, string>;
}

export interface HttpRequest {
  url: string;
  body: string | Buffer;
  contentType: string;
}

// Transient by the OTLP/HTTP rules; every other status is final
const RETRYABLE_STATUS_CODES = [408, 429, 502, 503, 504];

export abstract class HttpExporter<S extends HttpExporterSettings> extends BaseExporter<S> {
  protected readonly httpClient: AxiosInstance;

  constructor(id: string, type: ExporterType, settings: S) {
    super(id, type, settings);
    this.httpClient = axios.create({
      timeout: settings.timeout,
      maxRedirects: 3,
      headers: {
        'User-Agent': 'telemetry-relay/1.0.0',
        ...settings.headers,
      },
    });
  }

  /** Target URLs probed by the connectivity check. */
  protected abstract targets(): string[];

  protected abstract buildRequest(batch: TelemetryBatch): HttpRequest;

  protected async send(batch: TelemetryBatch, options: ExportOptions): Promise<void> {
    const request = this.buildRequest(batch);
    try {
      await this.httpClient.post(request.url, request.body, {
        headers: { 'Content-Type': request.contentType },
        signal: options.signal,
      });
      this.log.debug('Batch exported', { batchId: batch.id, records: batch.records.length, url: request.url });
    } catch (error) {
      const exportError = this.categorizeHTTPError(error);
      this.log.warn('HTTP export failed', {
        url: request.url,
        status: exportError.statusCode,
        category: exportError.category,
        retryable: exportError.retryable,
        message: exportError.message,
      });
      throw exportError;
    }
  }

  /**
   * Any HTTP answer means the destination is reachable; only a transport
   * failure counts as down.
   */
  async checkConnectivity(): Promise<boolean> {
    for (const url of this.targets()) {
      try {
        await this.httpClient.request({ method: 'HEAD', url, validateStatus: () => true });
      } catch (error) {
        this.log.debug('Connectivity check failed', { url, error: error instanceof Error ? error.message : error });
        return false;
      }
    }
    return true;
  }

  async shutdown(): Promise<void> {
    this.log.debug('HTTP exporter stopped');
  }

  /**
   * Categorize HTTP errors for consistent retry decisions
   */
  protected categorizeHTTPError(error: unknown): ExportError {
    if (!(error instanceof AxiosError)) {
      return this.toExportError(error);
    }

    if (!error.response) {
      const timedOut = error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT;
      return new ExportError(error.message, {
        category: timedOut ? ExportErrorCategory.TIMEOUT : ExportErrorCategory.NETWORK_ERROR,
        retryable: error.code !== AxiosError.ERR_CANCELED,
      });
    }

    const status = error.response.status;
    const retryable = RETRYABLE_STATUS_CODES.includes(status);
    const retryAfterMs = retryable ? parseRetryAfter(error.response.headers['retry-after']) : undefined;
    const message = `HTTP ${status} from ${error.config?.url ?? 'destination'}`;

    let category: ExportErrorCategory;
    switch (true) {
      case status === 401 || status === 403:
        category = ExportErrorCategory.AUTHENTICATION;
        break;
      case status === 429:
        category = ExportErrorCategory.RATE_LIMIT;
        break;
      case status === 408 || status === 504:
        category = ExportErrorCategory.TIMEOUT;
        break;
      case status === 404:
        category = ExportErrorCategory.NOT_FOUND;
        break;
      case status >= 400 && status < 500:
        category = ExportErrorCategory.BAD_REQUEST;
        break;
      case status >= 500 && status < 600:
        category = ExportErrorCategory.SERVICE_UNAVAILABLE;
        break;
      default:
        category = ExportErrorCategory.UNKNOWN;
    }

    return new ExportError(message, { category, retryable, statusCode: status, retryAfterMs });
  }
}

/**
 * Retry-After as delay-seconds or an HTTP date, in milliseconds.
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value !== 'string' || value.trim() === '') return undefined;

  if (/^\d+$/.test(value.trim())) {
    return parseInt(value, 10) * 1000;
  }

  const date = Date.parse(value);
  return isNaN(date) ? undefined : Math.max(0, date - now);
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}${path}`;
}
