/**
 * Routes decoded batches from a receiver to every pipeline that lists it for
 * the batch's signal.
 */

import type { TelemetryBatch } from '@telemetry-relay/core';
import type { RelayMetrics } from '../telemetry/self-metrics.js';
import type { Pipeline } from './pipeline.js';

export type RouteResult = 'accepted' | 'refused' | 'no_pipeline';

/** What receivers hand their batches to. */
export interface IngestSink {
  ingest(receiverId: string, batch: TelemetryBatch): RouteResult;
  /** Whether any pipeline takes this signal from the receiver. */
  routes(receiverId: string, signal: TelemetryBatch['signal']): boolean;
}

export class PipelineRouter implements IngestSink {
  constructor(
    private readonly pipelines: readonly Pipeline[],
    private readonly metrics: RelayMetrics
  ) {}

  routes(receiverId: string, signal: TelemetryBatch['signal']): boolean {
    return this.pipelines.some((pipeline) => pipeline.accepts(receiverId, signal));
  }

  /**
   * Refused when any target pipeline refused. The client retries the whole
   * request, so pipelines that accepted it may see it twice.
   */
  ingest(receiverId: string, batch: TelemetryBatch): RouteResult {
    const targets = this.pipelines.filter((pipeline) => pipeline.accepts(receiverId, batch.signal));
    if (targets.length === 0) {
      return 'no_pipeline';
    }

    let refused = false;
    for (const pipeline of targets) {
      if (pipeline.ingest(batch) === 'refused') {
        refused = true;
      }
    }

    const count = batch.records.length;
    if (refused) {
      this.metrics.recordRefused(receiverId, batch.signal, count);
      return 'refused';
    }
    this.metrics.recordAccepted(receiverId, batch.signal, count);
    return 'accepted';
  }
}
