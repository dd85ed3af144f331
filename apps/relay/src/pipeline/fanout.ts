/**
 * Exporter fan-out for one pipeline.
 *
 * Each exporter gets its own deep copy of the batch, so no exporter can see
 * another's mutations or hold another back. The batch's memory charge is
 * released once every exporter has reported a terminal outcome; success is
 * counted per exporter, independently.
 */

import type { DeliveryOutcome } from '@telemetry-relay/core';
import { chargedBytes, type ChargedBatch } from './charged-batch.js';
import type { ExporterRunner } from './exporter-runner.js';

export class CompletionTracker {
  private readonly outcomes: DeliveryOutcome[] = [];
  private done = false;

  constructor(
    private readonly expected: number,
    private readonly onComplete: (outcomes: readonly DeliveryOutcome[]) => void
  ) {
    if (expected === 0) {
      this.finish();
    }
  }

  complete(outcome: DeliveryOutcome): void {
    if (this.done) return;
    this.outcomes.push(outcome);
    if (this.outcomes.length >= this.expected) {
      this.finish();
    }
  }

  private finish(): void {
    this.done = true;
    this.onComplete(this.outcomes);
  }
}

export type BatchSettledListener = (item: ChargedBatch, outcomes: readonly DeliveryOutcome[]) => void;

export class FanOut {
  private readonly listeners: BatchSettledListener[] = [];

  constructor(
    private readonly runners: readonly ExporterRunner[],
    private readonly release: (bytes: number) => void
  ) {}

  /** Called once per dispatched batch, after its last exporter outcome. */
  onSettled(listener: BatchSettledListener): void {
    this.listeners.push(listener);
  }

  dispatch(item: ChargedBatch): void {
    const bytes = chargedBytes(item);
    const tracker = new CompletionTracker(this.runners.length, (outcomes) => {
      if (bytes > 0) {
        this.release(bytes);
      }
      for (const listener of this.listeners) {
        listener(item, outcomes);
      }
    });

    for (const runner of this.runners) {
      runner.enqueue(structuredClone(item.batch), (outcome) => tracker.complete(outcome));
    }
  }
}
