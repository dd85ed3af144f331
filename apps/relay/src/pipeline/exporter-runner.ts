/**
 * ExporterRunner - one sending queue in front of one exporter
 *
 * The fan-out enqueues and never waits. `num_consumers` consumers drain the
 * queue, each delivering one batch at a time with retry. A slow or failing
 * destination only ever backs up its own queue; when that queue is full the
 * batch is dropped for this exporter alone.
 */

import { componentLogger, type DeliveryOutcome, type Logger, type TelemetryBatch } from '@telemetry-relay/core';
import type { TelemetryExporter } from '../exporters/exporter.js';
import { deliverWithRetry } from '../exporters/retry.js';
import type { RelayMetrics } from '../telemetry/self-metrics.js';
import { BoundedQueue } from './bounded-queue.js';

export type OutcomeCallback = (outcome: DeliveryOutcome) => void;

interface QueuedBatch {
  batch: TelemetryBatch;
  onOutcome: OutcomeCallback;
}

export class ExporterRunner {
  private readonly log: Logger;
  private readonly queue: BoundedQueue<QueuedBatch>;
  private readonly abort = new AbortController();
  private consumers: Promise<void>[] = [];
  private connected = false;
  private stopped = false;
  private connectivityTimer: NodeJS.Timeout | null = null;

  constructor(
    readonly exporter: TelemetryExporter,
    private readonly metrics: RelayMetrics
  ) {
    this.log = componentLogger(exporter.id);
    this.queue = new BoundedQueue(() => exporter.settings.sending_queue.queue_size);
  }

  get id(): string {
    return this.exporter.id;
  }

  get queueSize(): number {
    return this.queue.size;
  }

  /** Passed its connectivity check, or does not need one to be ready. */
  get ready(): boolean {
    return this.connected || this.exporter.settings.best_effort;
  }

  get reachable(): boolean {
    return this.connected;
  }

  /**
   * Starts the exporter and its consumers. The first connectivity check runs
   * in the background; until it passes the exporter is not ready.
   */
  async start(connectivityCheckInterval: number): Promise<void> {
    await this.exporter.start();

    const consumerCount = this.exporter.settings.sending_queue.num_consumers;
    for (let i = 0; i < consumerCount; i++) {
      this.consumers.push(this.consume());
    }

    this.checkConnectivity(connectivityCheckInterval).catch((error: unknown) => {
      this.log.error('Connectivity check failed', { error });
    });
  }

  /** Never blocks. Returns false when the batch was dropped right away. */
  enqueue(batch: TelemetryBatch, onOutcome: OutcomeCallback): boolean {
    if (this.queue.isClosed) {
      this.drop({ batch, onOutcome }, 'shutdown', 0);
      return false;
    }
    if (!this.queue.push({ batch, onOutcome })) {
      this.log.warn('Sending queue is full, dropping batch', {
        batchId: batch.id,
        records: batch.records.length,
        queueSize: this.queue.size,
      });
      this.drop({ batch, onOutcome }, 'queue_full', 0);
      return false;
    }
    this.metrics.setQueueSize(this.id, this.queue.size);
    return true;
  }

  /**
   * Stops taking batches and gives queued ones until the deadline to be
   * delivered. After that in-flight retries are aborted and whatever is still
   * queued is dropped, never retried.
   */
  async shutdown(timeoutMs: number): Promise<void> {
    this.stopped = true;
    this.stopConnectivityChecks();
    this.queue.close();

    const drained = Promise.all(this.consumers).then(() => true);
    let deadline: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
      deadline = setTimeout(() => resolve(false), timeoutMs);
    });

    const finished = await Promise.race([drained, expired]);
    clearTimeout(deadline);

    if (!finished) {
      this.log.warn('Shutdown timeout reached, abandoning queued batches', { queued: this.queue.size });
      this.abort.abort();
      for (const item of this.queue.drain()) {
        this.drop(item, 'shutdown', 0);
      }
      await Promise.all(this.consumers);
    }

    try {
      await this.exporter.shutdown();
    } catch (error) {
      this.log.error('Exporter shutdown failed', { error });
    }
  }

  private async consume(): Promise<void> {
    while (true) {
      const item = await this.queue.take();
      if (!item) return;
      this.metrics.setQueueSize(this.id, this.queue.size);

      let outcome: DeliveryOutcome;
      try {
        outcome = await deliverWithRetry(this.exporter, item.batch, {
          policy: this.exporter.settings.retry_on_failure,
          signal: this.abort.signal,
          log: this.log,
        });
      } catch (error) {
        this.log.error('Delivery loop failed', { batchId: item.batch.id, error });
        outcome = {
          status: 'dropped',
          exporter: this.id,
          attempts: 0,
          reason: 'non_retryable',
          error: error instanceof Error ? error : new Error(String(error)),
        };
      }

      this.settle(item, outcome);
    }
  }

  private drop(item: QueuedBatch, reason: 'queue_full' | 'shutdown', attempts: number): void {
    this.settle(item, { status: 'dropped', exporter: this.id, attempts, reason });
  }

  private settle(item: QueuedBatch, outcome: DeliveryOutcome): void {
    const records = item.batch.records.length;

    if (outcome.status === 'delivered') {
      this.metrics.recordSent(this.id, records);
    } else {
      this.metrics.recordBatchDropped(this.id, outcome.reason, records);
      this.log.error('Batch dropped', {
        batchId: item.batch.id,
        records,
        reason: outcome.reason,
        attempts: outcome.attempts,
        error: outcome.error?.message,
      });
    }

    try {
      item.onOutcome(outcome);
    } catch (error) {
      this.log.error('Outcome callback failed', { error });
    }
  }

  private async checkConnectivity(interval: number): Promise<void> {
    try {
      this.connected = await this.exporter.checkConnectivity();
    } catch (error) {
      this.log.debug('Connectivity check threw', { error });
      this.connected = false;
    }

    if (this.connected) {
      this.log.info('Exporter reachable');
      return;
    }
    if (this.stopped) return;

    this.log.warn(`Exporter not reachable, retrying in ${interval}ms`, { bestEffort: this.exporter.settings.best_effort });
    this.connectivityTimer = setTimeout(() => {
      this.connectivityTimer = null;
      this.checkConnectivity(interval).catch((error: unknown) => {
        this.log.error('Connectivity check failed', { error });
      });
    }, interval);
    this.connectivityTimer.unref();
  }

  private stopConnectivityChecks(): void {
    if (this.connectivityTimer) {
      clearTimeout(this.connectivityTimer);
      this.connectivityTimer = null;
    }
  }
}
