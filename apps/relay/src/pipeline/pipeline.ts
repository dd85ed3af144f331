/**
 * Pipeline - input queue, processor chain, exporter fan-out
 *
 * Receivers hand batches to `ingest`, which charges them against the memory
 * limiter and queues them without waiting. `service.workers` workers take
 * batches off the queue, run the resource processors and the batcher, and
 * dispatch the result to the fan-out.
 */

import {
  componentLogger,
  type Logger,
  type Signal,
  type TelemetryBatch,
} from '@telemetry-relay/core';
import type { PipelineConfig } from '../config/types.js';
import type { BatchProcessor } from '../processors/batch-processor.js';
import { estimateRecordBytes, type MemoryLimiter } from '../processors/memory-limiter.js';
import type { ResourceProcessor } from '../processors/resource-processor.js';
import type { ProcessorDropReason, RelayMetrics } from '../telemetry/self-metrics.js';
import { BoundedQueue } from './bounded-queue.js';
import { chargedBytes, type ChargedBatch } from './charged-batch.js';
import type { FanOut } from './fanout.js';

export type IngestResult = 'accepted' | 'refused';

export interface PipelineComponents {
  limiter?: MemoryLimiter;
  resourceProcessors: ResourceProcessor[];
  /** Builds the pipeline's batcher around the sink it releases batches to. */
  createBatcher?: (sink: (item: ChargedBatch) => void) => BatchProcessor;
  fanout: FanOut;
  workers: number;
  metrics: RelayMetrics;
}

export class Pipeline {
  private readonly log: Logger;
  private readonly queue = new BoundedQueue<ChargedBatch>(() => Number.POSITIVE_INFINITY);
  private readonly batcher?: BatchProcessor;
  private workerLoops: Promise<void>[] = [];

  constructor(
    readonly config: PipelineConfig,
    private readonly components: PipelineComponents
  ) {
    this.log = componentLogger(config.id);
    this.batcher = components.createBatcher?.((item) => this.components.fanout.dispatch(item));
    components.limiter?.onRelief(() => this.shedOldest());
  }

  get id(): string {
    return this.config.id;
  }

  get signal(): Signal {
    return this.config.signal;
  }

  get queuedBatches(): number {
    return this.queue.size;
  }

  accepts(receiverId: string, signal: Signal): boolean {
    return this.config.signal === signal && this.config.receivers.includes(receiverId);
  }

  start(): void {
    for (let i = 0; i < this.components.workers; i++) {
      this.workerLoops.push(this.work());
    }
    this.log.info('Pipeline started', {
      receivers: this.config.receivers,
      processors: this.config.processors,
      exporters: this.config.exporters,
      workers: this.components.workers,
    });
  }

  ingest(batch: TelemetryBatch): IngestResult {
    if (batch.records.length === 0) {
      return 'accepted';
    }

    const { limiter } = this.components;
    const charges = limiter ? batch.records.map(estimateRecordBytes) : batch.records.map(() => 0);
    const item: ChargedBatch = { batch, charges };
    const bytes = chargedBytes(item);

    if (limiter && limiter.admit(bytes) === 'refused') {
      return 'refused';
    }

    if (!this.queue.push(item)) {
      limiter?.release(bytes);
      return 'refused';
    }
    return 'accepted';
  }

  /**
   * Stops accepting input, processes what is queued and flushes the batcher.
   */
  async drain(): Promise<void> {
    this.queue.close();
    await Promise.all(this.workerLoops);
    this.batcher?.stop();
  }

  private async work(): Promise<void> {
    while (true) {
      const item = await this.queue.take();
      if (!item) return;

      try {
        this.process(item);
      } catch (error) {
        this.log.error('Processing failed, dropping batch', { batchId: item.batch.id, error });
        this.discard(item, 'processing_error');
      }
    }
  }

  private process(item: ChargedBatch): void {
    let batch = item.batch;
    for (const processor of this.components.resourceProcessors) {
      batch = processor.process(batch);
    }

    const processed: ChargedBatch = { batch, charges: item.charges };
    if (this.batcher) {
      this.batcher.add(processed);
    } else {
      this.components.fanout.dispatch(processed);
    }
  }

  /** Memory pressure relief: drop queued batches, oldest first. */
  private shedOldest(): number {
    const { limiter } = this.components;
    let freed = 0;

    while (limiter && limiter.inUseBytes >= limiter.softLimitBytes) {
      const oldest = this.queue.dropOldest();
      if (!oldest) break;
      freed += chargedBytes(oldest);
      this.discard(oldest, 'memory_pressure');
    }
    return freed;
  }

  private discard(item: ChargedBatch, reason: ProcessorDropReason): void {
    const { limiter, metrics } = this.components;
    const records = item.batch.records.length;
    limiter?.release(chargedBytes(item));
    metrics.recordProcessorDrop(limiter?.id ?? this.id, this.id, reason, records);
    this.log.warn('Dropped queued batch', { batchId: item.batch.id, records, reason });
  }
}
