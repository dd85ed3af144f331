/**
 * Bounded exponential backoff around a single exporter.
 */

import { setTimeout as sleep } from 'timers/promises';
import type { DeliveryOutcome, Logger, TelemetryBatch } from '@telemetry-relay/core';
import type { RetrySettings } from '../config/schema.js';
import type { TelemetryExporter } from './exporter.js';

/**
 * Delay before retry number `attempt` (1-based):
 * initial × multiplier^(attempt−1), capped at max_interval, then spread by
 * ±randomization_factor.
 */
export function backoffDelay(attempt: number, policy: RetrySettings, random: () => number = Math.random): number {
  const base = Math.min(policy.initial_interval * Math.pow(policy.multiplier, attempt - 1), policy.max_interval);
  const delta = policy.randomization_factor * base;
  return Math.max(0, Math.round(base - delta + random() * 2 * delta));
}

export interface RetryContext {
  policy: RetrySettings;
  signal: AbortSignal;
  log: Logger;
  random?: () => number;
}

export async function deliverWithRetry(
  exporter: TelemetryExporter,
  batch: TelemetryBatch,
  { policy, signal, log, random }: RetryContext
): Promise<DeliveryOutcome> {
  const maxAttempts = policy.enabled ? policy.max_attempts : 1;
  let attempts = 0;

  while (true) {
    if (signal.aborted) {
      return { status: 'dropped', exporter: exporter.id, attempts, reason: 'shutdown' };
    }

    attempts++;
    const result = await exporter.export(batch, { signal });

    if (result.status === 'success') {
      return { status: 'delivered', exporter: exporter.id, attempts };
    }

    if (signal.aborted) {
      return { status: 'dropped', exporter: exporter.id, attempts, reason: 'shutdown', error: result.error };
    }

    if (!result.retryable) {
      return { status: 'dropped', exporter: exporter.id, attempts, reason: 'non_retryable', error: result.error };
    }

    if (attempts >= maxAttempts) {
      return { status: 'dropped', exporter: exporter.id, attempts, reason: 'retries_exhausted', error: result.error };
    }

    const delay = result.retryAfterMs ?? backoffDelay(attempts, policy, random);
    log.debug(`Export failed, retry ${attempts}/${maxAttempts - 1} after ${delay}ms`, {
      batchId: batch.id,
      category: result.error.category,
      statusCode: result.error.statusCode,
      error: result.error.message,
    });

    try {
      await sleep(delay, undefined, { signal });
    } catch (error) {
      if (signal.aborted) {
        return { status: 'dropped', exporter: exporter.id, attempts, reason: 'shutdown', error: result.error };
      }
      throw error;
    }
  }
}
