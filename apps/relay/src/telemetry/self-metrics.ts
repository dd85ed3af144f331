/**
 * Relay self-telemetry, served by the health_check extension at GET /metrics.
 *
 * Every record or batch the relay discards moves one of these counters.
 */

import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';
import type { DropReason, Signal } from '@telemetry-relay/core';

export type ProcessorDropReason = 'memory_pressure' | 'processing_error';

export class RelayMetrics {
  readonly registry: Registry;

  private readonly acceptedRecords: Counter<'receiver' | 'signal'>;
  private readonly refusedRecords: Counter<'receiver' | 'signal'>;
  private readonly rejectedRecords: Counter<'receiver' | 'signal'>;
  private readonly processorDroppedRecords: Counter<'processor' | 'pipeline' | 'reason'>;
  private readonly sentRecords: Counter<'exporter'>;
  private readonly failedRecords: Counter<'exporter'>;
  private readonly droppedBatches: Counter<'exporter' | 'reason'>;
  private readonly skippedFamilies: Counter<'exporter'>;
  private readonly queueSize: Gauge<'exporter'>;
  private readonly inUseBytes: Gauge<'processor'>;
  private readonly hardLimited: Gauge<'processor'>;

  constructor(options: { registry?: Registry; defaultMetrics?: boolean } = {}) {
    this.registry = options.registry ?? new Registry();
    const registers = [this.registry];

    if (options.defaultMetrics) {
      collectDefaultMetrics({ register: this.registry, prefix: 'relay_process_' });
    }

    this.acceptedRecords = new Counter({
      name: 'relay_receiver_accepted_records_total',
      help: 'Records accepted by a receiver and handed to its pipelines',
      labelNames: ['receiver', 'signal'],
      registers,
    });

    this.refusedRecords = new Counter({
      name: 'relay_receiver_refused_records_total',
      help: 'Records refused by a receiver because of memory pressure',
      labelNames: ['receiver', 'signal'],
      registers,
    });

    this.rejectedRecords = new Counter({
      name: 'relay_receiver_rejected_records_total',
      help: 'Records dropped by a receiver because they could not be decoded',
      labelNames: ['receiver', 'signal'],
      registers,
    });

    this.processorDroppedRecords = new Counter({
      name: 'relay_processor_dropped_records_total',
      help: 'Queued records dropped inside a pipeline',
      labelNames: ['processor', 'pipeline', 'reason'],
      registers,
    });

    this.sentRecords = new Counter({
      name: 'relay_exporter_sent_records_total',
      help: 'Records delivered by an exporter',
      labelNames: ['exporter'],
      registers,
    });

    this.failedRecords = new Counter({
      name: 'relay_exporter_send_failed_records_total',
      help: 'Records an exporter gave up on',
      labelNames: ['exporter'],
      registers,
    });

    this.droppedBatches = new Counter({
      name: 'relay_exporter_dropped_batches_total',
      help: 'Batches an exporter dropped, by reason',
      labelNames: ['exporter', 'reason'],
      registers,
    });

    this.skippedFamilies = new Counter({
      name: 'relay_exporter_skipped_metric_families_total',
      help: 'Metric families left out of a Prometheus scrape because their names clash',
      labelNames: ['exporter'],
      registers,
    });

    this.queueSize = new Gauge({
      name: 'relay_exporter_queue_size',
      help: 'Batches waiting in an exporter sending queue',
      labelNames: ['exporter'],
      registers,
    });

    this.inUseBytes = new Gauge({
      name: 'relay_memory_limiter_in_use_bytes',
      help: 'Estimated bytes of telemetry admitted and not yet released',
      labelNames: ['processor'],
      registers,
    });

    this.hardLimited = new Gauge({
      name: 'relay_memory_limiter_hard_limited',
      help: '1 while the memory limiter is above its hard limit',
      labelNames: ['processor'],
      registers,
    });
  }

  recordAccepted(receiver: string, signal: Signal, count: number): void {
    this.acceptedRecords.inc({ receiver, signal }, count);
  }

  recordRefused(receiver: string, signal: Signal, count: number): void {
    this.refusedRecords.inc({ receiver, signal }, count);
  }

  recordRejected(receiver: string, signal: Signal, count: number): void {
    if (count > 0) {
      this.rejectedRecords.inc({ receiver, signal }, count);
    }
  }

  recordProcessorDrop(processor: string, pipeline: string, reason: ProcessorDropReason, count: number): void {
    this.processorDroppedRecords.inc({ processor, pipeline, reason }, count);
  }

  recordSent(exporter: string, count: number): void {
    this.sentRecords.inc({ exporter }, count);
  }

  recordBatchDropped(exporter: string, reason: DropReason, records: number): void {
    this.droppedBatches.inc({ exporter, reason });
    this.failedRecords.inc({ exporter }, records);
  }

  recordSkippedFamily(exporter: string): void {
    this.skippedFamilies.inc({ exporter });
  }

  setQueueSize(exporter: string, size: number): void {
    this.queueSize.set({ exporter }, size);
  }

  setMemoryState(processor: string, inUseBytes: number, hardLimited: boolean): void {
    this.inUseBytes.set({ processor }, inUseBytes);
    this.hardLimited.set({ processor }, hardLimited ? 1 : 0);
  }

  async render(): Promise<{ contentType: string; body: string }> {
    return { contentType: this.registry.contentType, body: await this.registry.metrics() };
  }
}
