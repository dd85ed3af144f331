/**
 * Batch Processor - size/timeout batching
 *
 * Records accumulate until `send_batch_size` is reached (0 disables the size
 * trigger) or `timeout` has passed since the first pending record arrived.
 * Released batches are split at `send_batch_max_size` (0 = no split). Record
 * order is preserved across splits and flushes.
 */

import { componentLogger, createBatch, signalOf, type Logger, type TelemetryRecord } from '@telemetry-relay/core';
import type { BatchProcessorSettings } from '../config/schema.js';
import type { ChargedBatch } from '../pipeline/charged-batch.js';

export type BatchSink = (item: ChargedBatch) => void;

export class BatchProcessor {
  private readonly log: Logger;
  private pendingRecords: TelemetryRecord[] = [];
  private pendingCharges: number[] = [];
  private pendingSource = '';
  private pendingReceivedAt = 0;
  private flushTimer: NodeJS.Timeout | null = null;

  constructor(
    readonly id: string,
    private readonly settings: () => BatchProcessorSettings,
    private readonly sink: BatchSink
  ) {
    this.log = componentLogger(id);
  }

  get pendingCount(): number {
    return this.pendingRecords.length;
  }

  add(item: ChargedBatch): void {
    const { records } = item.batch;
    if (records.length === 0) return;

    if (this.pendingRecords.length === 0) {
      this.pendingSource = item.batch.source;
      this.pendingReceivedAt = item.batch.receivedAt;
    }
    for (let i = 0; i < records.length; i++) {
      this.pendingRecords.push(records[i]);
      this.pendingCharges.push(item.charges[i] ?? 0);
    }

    const { send_batch_size, send_batch_max_size, timeout } = this.settings();

    if (send_batch_size > 0) {
      while (this.pendingRecords.length >= send_batch_size) {
        const size = send_batch_max_size > 0 ? send_batch_max_size : this.pendingRecords.length;
        this.emit(size);
      }
    }

    if (this.pendingRecords.length === 0) {
      this.clearTimer();
    } else if (!this.flushTimer) {
      this.flushTimer = setTimeout(() => {
        this.flushTimer = null;
        this.log.debug('Batch timeout reached', { pending: this.pendingRecords.length });
        this.flush();
      }, timeout);
    }
  }

  /** Releases everything pending, split at the max size. */
  flush(): void {
    this.clearTimer();
    const { send_batch_max_size } = this.settings();
    while (this.pendingRecords.length > 0) {
      this.emit(send_batch_max_size > 0 ? send_batch_max_size : this.pendingRecords.length);
    }
  }

  stop(): void {
    this.flush();
  }

  private emit(size: number): void {
    const records = this.pendingRecords.splice(0, size);
    const charges = this.pendingCharges.splice(0, size);
    const first = records[0];
    if (!first) return;

    this.sink({
      batch: createBatch(signalOf(first), this.pendingSource, records, this.pendingReceivedAt),
      charges,
    });
  }

  private clearTimer(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
  }
}
