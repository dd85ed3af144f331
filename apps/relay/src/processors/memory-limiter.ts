/**
 * Memory Limiter - shared in-flight byte budget
 *
 * One limiter instance per configured memory_limiter processor, shared by every
 * pipeline that names it. Bytes are estimated per record at admission and
 * released when every exporter reached a terminal result for them, or when a
 * queued batch is dropped.
 *
 * All state changes happen in synchronous methods, so admissions and releases
 * from different receivers and exporter consumers never interleave.
 */

import { componentLogger, isSpan, type Logger, type TelemetryRecord } from '@telemetry-relay/core';
import type { MemoryLimiterSettings } from '../config/schema.js';

export type AdmitResult = 'admitted' | 'refused';

/**
 * Asked to release queued data while the limiter is over its hard limit.
 * Returns the number of bytes freed.
 */
export type PressureRelief = () => number;

export interface MemoryLimiterStats {
  inUseBytes: number;
  limitBytes: number;
  softLimitBytes: number;
  hardLimited: boolean;
  refusedAdmissions: number;
  reliefRuns: number;
}

export type MemoryStateListener = (inUseBytes: number, hardLimited: boolean) => void;

export class MemoryLimiter {
  private readonly log: Logger;
  private inUse = 0;
  private hard = false;
  private refused = 0;
  private reliefRuns = 0;
  private readonly reliefHandlers: PressureRelief[] = [];
  private readonly listeners: MemoryStateListener[] = [];
  private checkTimer: NodeJS.Timeout | null = null;

  constructor(
    readonly id: string,
    private readonly settings: () => MemoryLimiterSettings
  ) {
    this.log = componentLogger(id);
  }

  get limitBytes(): number {
    return this.settings().limit_bytes;
  }

  get softLimitBytes(): number {
    const { limit_bytes, spike_limit_bytes } = this.settings();
    return limit_bytes - spike_limit_bytes;
  }

  get inUseBytes(): number {
    return this.inUse;
  }

  get hardLimited(): boolean {
    return this.hard;
  }

  onRelief(handler: PressureRelief): void {
    this.reliefHandlers.push(handler);
  }

  onStateChange(listener: MemoryStateListener): void {
    this.listeners.push(listener);
  }

  admit(bytes: number): AdmitResult {
    const limit = this.limitBytes;

    // can never fit; shedding queued data would not help
    if (bytes > limit) {
      this.refused++;
      return 'refused';
    }

    if (this.inUse + bytes > limit) {
      if (!this.hard) {
        this.hard = true;
        this.log.warn('Memory limiter above hard limit, shedding load', {
          inUseBytes: this.inUse,
          requestedBytes: bytes,
          limitBytes: limit,
        });
      }
      this.relieve();
    }

    if (this.inUse + bytes > limit || this.inUse >= this.softLimitBytes) {
      this.refused++;
      this.notify();
      return 'refused';
    }

    this.inUse += bytes;
    this.notify();
    return 'admitted';
  }

  release(bytes: number): void {
    this.inUse = Math.max(0, this.inUse - bytes);
    this.leaveHardStateIfRecovered();
    this.notify();
  }

  start(): void {
    if (this.checkTimer) return;
    const interval = this.settings().check_interval;
    if (interval <= 0) return;

    this.checkTimer = setInterval(() => this.check(), interval);
    this.checkTimer.unref();
  }

  stop(): void {
    if (this.checkTimer) {
      clearInterval(this.checkTimer);
      this.checkTimer = null;
    }
  }

  /** Periodic re-evaluation; relief keeps running while the hard state lasts. */
  check(): void {
    if (this.hard) {
      this.relieve();
    }
    this.leaveHardStateIfRecovered();
    this.notify();
  }

  stats(): MemoryLimiterStats {
    return {
      inUseBytes: this.inUse,
      limitBytes: this.limitBytes,
      softLimitBytes: this.softLimitBytes,
      hardLimited: this.hard,
      refusedAdmissions: this.refused,
      reliefRuns: this.reliefRuns,
    };
  }

  private relieve(): void {
    this.reliefRuns++;

    const gc: unknown = Reflect.get(globalThis, 'gc');
    if (typeof gc === 'function') {
      gc();
    }

    let freed = 0;
    for (const handler of this.reliefHandlers) {
      if (this.inUse < this.softLimitBytes) break;
      try {
        freed += handler();
      } catch (error) {
        this.log.error('Pressure relief handler failed', { error });
      }
    }

    if (freed > 0) {
      this.log.info('Pressure relief dropped queued data', { freedBytes: freed, inUseBytes: this.inUse });
    }
    this.leaveHardStateIfRecovered();
  }

  private leaveHardStateIfRecovered(): void {
    if (this.hard && this.inUse < this.softLimitBytes) {
      this.hard = false;
      this.log.info('Memory limiter back below soft limit', { inUseBytes: this.inUse });
    }
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener(this.inUse, this.hard);
    }
  }
}

// Fixed per-record overhead: object headers, ids, timestamps
const RECORD_OVERHEAD_BYTES = 128;

/**
 * Rough heap cost of a record. Only has to be stable: the same number is
 * charged on admission and credited on release.
 */
export function estimateRecordBytes(record: TelemetryRecord): number {
  let bytes = RECORD_OVERHEAD_BYTES + record.name.length * 2;
  bytes += attributeBytes(record.resource);

  if (isSpan(record)) {
    bytes += attributeBytes(record.attributes);
    bytes += (record.status.message?.length ?? 0) * 2;
    for (const event of record.events) {
      bytes += 32 + event.name.length * 2 + attributeBytes(event.attributes);
    }
  } else {
    bytes += attributeBytes(record.labels);
    if (record.kind === 'histogram') {
      bytes += (record.bucketCounts.length + record.explicitBounds.length) * 8;
    }
  }

  return bytes;
}

function attributeBytes(attributes: Readonly<Record<string, string | number | boolean>>): number {
  let bytes = 0;
  for (const [key, value] of Object.entries(attributes)) {
    bytes += 16 + key.length * 2 + (typeof value === 'string' ? value.length * 2 : 8);
  }
  return bytes;
}
