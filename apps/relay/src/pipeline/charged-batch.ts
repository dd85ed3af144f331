import type { TelemetryBatch } from '@telemetry-relay/core';

/**
 * A batch moving through a pipeline together with the memory charge of each
 * record (`charges[i]` belongs to `batch.records[i]`). Processors keep records
 * one-to-one, so whatever shape the batch takes the charge released at the end
 * is the charge admitted at the start.
 */
export interface ChargedBatch {
  readonly batch: TelemetryBatch;
  readonly charges: readonly number[];
}

export function chargedBytes(item: ChargedBatch): number {
  let total = 0;
  for (const charge of item.charges) {
    total += charge;
  }
  return total;
}

export function uncharged(batch: TelemetryBatch): ChargedBatch {
  return { batch, charges: batch.records.map(() => 0) };
}
