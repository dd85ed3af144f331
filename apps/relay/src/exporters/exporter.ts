/**
 * TelemetryExporter - the capability every destination implements
 *
 * `export` never throws: every outcome, including programming errors inside a
 * variant, comes back as an ExportResult so the sending queue can decide on
 * retry or drop.
 */

import {
  componentLogger,
  EXPORT_SUCCESS,
  ExportError,
  ExportErrorCategory,
  exportFailure,
  type ExportResult,
  type Logger,
  type Signal,
  type TelemetryBatch,
} from '@telemetry-relay/core';
import type { ExporterCommonSettings } from '../config/schema.js';
import { EXPORTER_SIGNALS, type ExporterType } from '../config/types.js';

export interface ExportOptions {
  /** Aborted when the relay gives up on in-flight work during shutdown. */
  signal?: AbortSignal;
}

export interface TelemetryExporter {
  readonly id: string;
  readonly type: ExporterType;
  readonly signals: readonly Signal[];
  readonly settings: ExporterCommonSettings;

  start(): Promise<void>;
  export(batch: TelemetryBatch, options?: ExportOptions): Promise<ExportResult>;
  /** Whether the destination is reachable right now. */
  checkConnectivity(): Promise<boolean>;
  shutdown(): Promise<void>;
}

export abstract class BaseExporter<S extends ExporterCommonSettings> implements TelemetryExporter {
  protected readonly log: Logger;

  constructor(
    readonly id: string,
    readonly type: ExporterType,
    readonly settings: S
  ) {
    this.log = componentLogger(id);
  }

  get signals(): readonly Signal[] {
    return EXPORTER_SIGNALS[this.type];
  }

  async start(): Promise<void> {}

  async checkConnectivity(): Promise<boolean> {
    return true;
  }

  async shutdown(): Promise<void> {}

  async export(batch: TelemetryBatch, options: ExportOptions = {}): Promise<ExportResult> {
    if (batch.records.length === 0) {
      return EXPORT_SUCCESS;
    }
    if (!this.signals.includes(batch.signal)) {
      return exportFailure(
        new ExportError(`${this.type} exporter does not handle ${batch.signal}`, {
          category: ExportErrorCategory.BAD_REQUEST,
          retryable: false,
        })
      );
    }

    try {
      await this.send(batch, options);
      return EXPORT_SUCCESS;
    } catch (error) {
      return exportFailure(this.toExportError(error));
    }
  }

  /** Delivers the batch or throws; thrown ExportErrors keep their category. */
  protected abstract send(batch: TelemetryBatch, options: ExportOptions): Promise<void>;

  protected toExportError(error: unknown): ExportError {
    if (error instanceof ExportError) {
      return error;
    }
    return new ExportError(error instanceof Error ? error.message : String(error), {
      category: ExportErrorCategory.UNKNOWN,
      retryable: false,
    });
  }
}
