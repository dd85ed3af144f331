import fc from 'fast-check';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createBatch, type TelemetryBatch } from '@telemetry-relay/core';
import type { BatchProcessorSettings, MemoryLimiterSettings, ResourceAttributeAction } from '../config/schema.js';
import type { ChargedBatch } from '../pipeline/charged-batch.js';
import { BatchProcessor } from '../processors/batch-processor.js';
import { MemoryLimiter, estimateRecordBytes } from '../processors/memory-limiter.js';
import { ResourceProcessor, applyResourceActions } from '../processors/resource-processor.js';
import { makeCounter, makeSpan } from './helpers.js';

const LIMITER_SETTINGS: MemoryLimiterSettings = { check_interval: 0, limit_bytes: 1_000, spike_limit_bytes: 200 };

describe('MemoryLimiter', () => {
  function limiter(settings: MemoryLimiterSettings = LIMITER_SETTINGS): MemoryLimiter {
    return new MemoryLimiter('memory_limiter', () => settings);
  }

  it('admits until the soft limit is reached', () => {
    const memory = limiter();

    expect(memory.softLimitBytes).toBe(800);
    expect(memory.admit(500)).toBe('admitted');
    expect(memory.admit(400)).toBe('admitted');
    expect(memory.admit(50)).toBe('refused');
    expect(memory.inUseBytes).toBe(900);
    expect(memory.hardLimited).toBe(false);
  });

  it('refuses a request larger than the whole limit', () => {
    const memory = limiter();

    expect(memory.admit(1_001)).toBe('refused');
    expect(memory.inUseBytes).toBe(0);
    expect(memory.stats().refusedAdmissions).toBe(1);
  });

  it('enters the hard state when a request would pass the limit, and leaves it below the soft limit', () => {
    const memory = limiter();
    memory.admit(900);

    expect(memory.admit(200)).toBe('refused');
    expect(memory.hardLimited).toBe(true);

    memory.release(200);
    expect(memory.inUseBytes).toBe(700);
    expect(memory.hardLimited).toBe(false);
  });

  it('asks relief handlers to shed load and admits once there is room', () => {
    const memory = limiter();
    memory.admit(900);
    const relief = vi.fn(() => {
      memory.release(300);
      return 300;
    });
    memory.onRelief(relief);

    expect(memory.admit(200)).toBe('admitted');
    expect(relief).toHaveBeenCalledTimes(1);
    expect(memory.inUseBytes).toBe(800);
    expect(memory.hardLimited).toBe(false);
    expect(memory.stats().reliefRuns).toBe(1);
  });

  it('reports every state change', () => {
    const memory = limiter();
    const states: Array<[number, boolean]> = [];
    memory.onStateChange((inUse, hard) => states.push([inUse, hard]));

    memory.admit(900);
    memory.admit(200);
    memory.release(900);

    expect(states).toEqual([
      [900, false],
      [900, true],
      [0, false],
    ]);
  });

  it('reads its limits on every call', () => {
    let settings = LIMITER_SETTINGS;
    const memory = new MemoryLimiter('memory_limiter', () => settings);
    memory.admit(700);

    settings = { check_interval: 0, limit_bytes: 2_000, spike_limit_bytes: 400 };

    expect(memory.softLimitBytes).toBe(1_600);
    expect(memory.admit(700)).toBe('admitted');
  });

  it('never holds more than its limit and accounts every byte', () => {
    const command = fc.oneof(
      fc.record({ op: fc.constant('admit' as const), bytes: fc.integer({ min: 1, max: 1_200 }) }),
      fc.record({ op: fc.constant('release' as const) })
    );

    fc.assert(
      fc.property(fc.array(command, { maxLength: 60 }), (commands) => {
        const memory = limiter();
        const outstanding: number[] = [];

        for (const next of commands) {
          if (next.op === 'admit') {
            const before = memory.inUseBytes;
            if (memory.admit(next.bytes) === 'admitted') {
              expect(before).toBeLessThan(memory.softLimitBytes);
              outstanding.push(next.bytes);
            }
          } else {
            const bytes = outstanding.shift();
            if (bytes !== undefined) memory.release(bytes);
          }

          expect(memory.inUseBytes).toBeLessThanOrEqual(memory.limitBytes);
          expect(memory.inUseBytes).toBe(outstanding.reduce((sum, bytes) => sum + bytes, 0));
        }
      })
    );
  });
});

describe('estimateRecordBytes', () => {
  it('charges a fixed overhead plus names and attributes', () => {
    // 128 overhead + name 16 + resource 72 + attributes 56
    expect(estimateRecordBytes(makeSpan())).toBe(272);
  });

  it('grows with span events', () => {
    const withEvent = makeSpan({ events: [{ name: 'retry', timeUnixNano: 1n, attributes: {} }] });
    expect(estimateRecordBytes(withEvent)).toBe(272 + 32 + 10);
  });
});

describe('applyResourceActions', () => {
  const resource = { 'service.name': 'checkout-service', host: 'node-1', region: 'us' };

  it('applies actions in order', () => {
    const actions: ResourceAttributeAction[] = [
      { key: 'environment', value: 'prod', action: 'upsert' },
      { key: 'service.name', value: 'cart', action: 'update' },
      { key: 'host', action: 'delete' },
      { key: 'region', value: 'eu', action: 'insert' },
    ];

    expect(applyResourceActions(resource, actions)).toEqual({
      'service.name': 'cart',
      region: 'us',
      environment: 'prod',
    });
  });

  it('leaves missing keys alone on update and present keys alone on insert', () => {
    expect(applyResourceActions(resource, [{ key: 'zone', value: 'a', action: 'update' }])).toEqual(resource);
    expect(applyResourceActions(resource, [{ key: 'host', value: 'node-2', action: 'insert' }])).toEqual(resource);
  });
});

describe('ResourceProcessor', () => {
  it('returns new records and leaves the input batch untouched', () => {
    const processor = new ResourceProcessor('resource', () => ({
      attributes: [{ key: 'environment', value: 'prod', action: 'upsert' }],
    }));
    const batch = createBatch('traces', 'otlp', [makeSpan(), makeSpan({ spanId: '00f067aa0ba902b7' })]);

    const processed = processor.process(batch);

    expect(processed.id).toBe(batch.id);
    expect(processed.records.map((record) => record.resource)).toEqual([
      { 'service.name': 'checkout-service', environment: 'prod' },
      { 'service.name': 'checkout-service', environment: 'prod' },
    ]);
    expect(batch.records[0].resource).toEqual({ 'service.name': 'checkout-service' });
  });

  it('keeps a span service name in step with service.name', () => {
    let actions: ResourceAttributeAction[] = [{ key: 'service.name', value: 'cart', action: 'upsert' }];
    const processor = new ResourceProcessor('resource', () => ({ attributes: actions }));

    expect(processor.process(createBatch('traces', 'otlp', [makeSpan()])).records[0]).toMatchObject({
      serviceName: 'cart',
    });

    actions = [{ key: 'service.name', action: 'delete' }];
    expect(processor.process(createBatch('traces', 'otlp', [makeSpan()])).records[0]).toMatchObject({
      serviceName: 'unknown_service',
    });
  });

  it('rewrites metric resources', () => {
    const processor = new ResourceProcessor('resource', () => ({
      attributes: [{ key: 'environment', value: 'prod', action: 'insert' }],
    }));

    const [point] = processor.process(createBatch('metrics', 'otlp', [makeCounter()])).records;

    expect(point.resource).toEqual({ 'service.name': 'shop', environment: 'prod' });
  });
});

describe('BatchProcessor', () => {
  let settings: BatchProcessorSettings;
  let released: ChargedBatch[];
  let batcher: BatchProcessor;

  function spansBatch(names: string[], source = 'otlp', receivedAt = 1_000): ChargedBatch {
    const batch: TelemetryBatch = createBatch(
      'traces',
      source,
      names.map((name) => makeSpan({ name })),
      receivedAt
    );
    return { batch, charges: names.map((_, index) => index + 1) };
  }

  function releasedNames(): string[][] {
    return released.map((item) => item.batch.records.map((record) => record.name));
  }

  beforeEach(() => {
    vi.useFakeTimers();
    settings = { send_batch_size: 3, send_batch_max_size: 0, timeout: 200 };
    released = [];
    batcher = new BatchProcessor('batch', () => settings, (item) => released.push(item));
  });

  afterEach(() => {
    batcher.stop();
    vi.useRealTimers();
  });

  it('releases everything pending once send_batch_size is reached', () => {
    batcher.add(spansBatch(['a', 'b']));
    expect(released).toHaveLength(0);

    batcher.add(spansBatch(['c', 'd']));

    expect(releasedNames()).toEqual([['a', 'b', 'c', 'd']]);
    expect(batcher.pendingCount).toBe(0);
  });

  it('splits at send_batch_max_size and keeps record order', () => {
    settings = { send_batch_size: 3, send_batch_max_size: 2, timeout: 200 };

    batcher.add(spansBatch(['a', 'b', 'c', 'd', 'e']));

    expect(releasedNames()).toEqual([
      ['a', 'b'],
      ['c', 'd'],
    ]);
    expect(batcher.pendingCount).toBe(1);

    vi.advanceTimersByTime(200);
    expect(releasedNames()).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
  });

  it('releases a partial batch after the timeout', () => {
    batcher.add(spansBatch(['a']));

    vi.advanceTimersByTime(199);
    expect(released).toHaveLength(0);

    vi.advanceTimersByTime(1);
    expect(releasedNames()).toEqual([['a']]);
  });

  it('times out from the first pending record, not the last', () => {
    batcher.add(spansBatch(['a']));
    vi.advanceTimersByTime(150);
    batcher.add(spansBatch(['b']));
    vi.advanceTimersByTime(50);

    expect(releasedNames()).toEqual([['a', 'b']]);
  });

  it('carries charges and provenance with the records', () => {
    batcher.add(spansBatch(['a', 'b'], 'otlp/edge', 5_000));
    batcher.add(spansBatch(['c'], 'otlp', 6_000));

    expect(released).toHaveLength(1);
    expect(released[0].charges).toEqual([1, 2, 1]);
    expect(released[0].batch.source).toBe('otlp/edge');
    expect(released[0].batch.receivedAt).toBe(5_000);
    expect(released[0].batch.signal).toBe('traces');
  });

  it('flushes pending records on stop', () => {
    batcher.add(spansBatch(['a']));

    batcher.stop();

    expect(releasedNames()).toEqual([['a']]);
  });

  it('only batches on the timeout when send_batch_size is 0', () => {
    settings = { send_batch_size: 0, send_batch_max_size: 0, timeout: 200 };

    batcher.add(spansBatch(['a', 'b', 'c', 'd']));
    expect(released).toHaveLength(0);

    vi.advanceTimersByTime(200);
    expect(releasedNames()).toEqual([['a', 'b', 'c', 'd']]);
  });
});
