/**
 * Export outcomes shared by every exporter variant.
 */

// Standard error categories for consistent retry decisions across protocols
export enum ExportErrorCategory {
  AUTHENTICATION = 'authentication',
  RATE_LIMIT = 'rate_limit',
  SERVICE_UNAVAILABLE = 'service_unavailable',
  BAD_REQUEST = 'bad_request',
  NOT_FOUND = 'not_found',
  TIMEOUT = 'timeout',
  NETWORK_ERROR = 'network_error',
  UNKNOWN = 'unknown',
}

export interface ExportErrorDetails {
  category: ExportErrorCategory;
  retryable: boolean;
  statusCode?: number;
  retryAfterMs?: number;
}

export class ExportError extends Error {
  readonly category: ExportErrorCategory;
  readonly retryable: boolean;
  readonly statusCode?: number;
  readonly retryAfterMs?: number;

  constructor(message: string, details: ExportErrorDetails) {
    super(message);
    this.name = 'ExportError';
    this.category = details.category;
    this.retryable = details.retryable;
    this.statusCode = details.statusCode;
    this.retryAfterMs = details.retryAfterMs;
  }
}

export type ExportResult =
  | { readonly status: 'success' }
  | {
      readonly status: 'failure';
      readonly retryable: boolean;
      readonly error: ExportError;
      /** Delay the destination asked for, overrides the backoff schedule. */
      readonly retryAfterMs?: number;
    };

export const EXPORT_SUCCESS: ExportResult = Object.freeze({ status: 'success' });

export function exportFailure(error: ExportError): ExportResult {
  return {
    status: 'failure',
    retryable: error.retryable,
    error,
    retryAfterMs: error.retryAfterMs,
  };
}

export type DropReason = 'non_retryable' | 'retries_exhausted' | 'queue_full' | 'shutdown';

/** Terminal result of one batch at one exporter. */
export type DeliveryOutcome =
  | { readonly status: 'delivered'; readonly exporter: string; readonly attempts: number }
  | {
      readonly status: 'dropped';
      readonly exporter: string;
      readonly attempts: number;
      readonly reason: DropReason;
      readonly error?: Error;
    };
