import { describe, expect, it, vi } from 'vitest';
import { ConfigStore } from '../config/config-store.js';
import { parseConfig } from '../config/loader.js';
import type { RelayConfig } from '../config/types.js';

function document(options: { timeout?: string; exporters?: string } = {}): string {
  return `
receivers:
  otlp:
    protocols:
      http:
        endpoint: 127.0.0.1:0
processors:
  batch:
    timeout: ${options.timeout ?? '200ms'}
exporters:
  debug:
${options.exporters ?? ''}
service:
  pipelines:
    traces:
      receivers: [otlp]
      processors: [batch]
      exporters: [debug]
`;
}

function batchTimeout(config: RelayConfig): number | undefined {
  const batch = config.processors.batch;
  return batch.type === 'batch' ? batch.settings.timeout : undefined;
}

describe('ConfigStore', () => {
  function storeWith(initial: string) {
    let text = initial;
    const store = new ConfigStore(parseConfig(initial, 'relay.yaml'), async () => parseConfig(text, 'relay.yaml'));
    return {
      store,
      edit(next: string) {
        text = next;
      },
    };
  }

  it('hands out a frozen snapshot', () => {
    const { store } = storeWith(document());
    const config = store.current();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.processors.batch.settings)).toBe(true);
    expect(Object.isFrozen(config.pipelines[0].exporters)).toBe(true);
  });

  it('applies processor setting changes and notifies listeners', async () => {
    const { store, edit } = storeWith(document());
    const before = store.current();
    const listener = vi.fn();
    store.onChange(listener);

    edit(document({ timeout: '2s' }));
    await expect(store.reload()).resolves.toEqual({ status: 'applied' });

    expect(batchTimeout(store.current())).toBe(2000);
    expect(batchTimeout(before)).toBe(200);
    expect(listener).toHaveBeenCalledWith(store.current(), before);
  });

  it('reports an unchanged document', async () => {
    const { store } = storeWith(document());
    const before = store.current();

    await expect(store.reload()).resolves.toEqual({ status: 'unchanged' });
    expect(store.current()).toBe(before);
  });

  it('keeps the old snapshot when the new document is invalid', async () => {
    const { store, edit } = storeWith(document());
    const before = store.current();

    edit(document({ timeout: 'later' }));
    await expect(store.reload()).resolves.toEqual({
      status: 'invalid',
      issues: ['processors.batch.timeout: invalid duration "later"'],
    });
    expect(store.current()).toBe(before);
  });

  it('refuses topology changes', async () => {
    const { store, edit } = storeWith(document());
    const before = store.current();

    edit(document({ exporters: '  zipkin:\n    endpoint: http://localhost:9411/api/v2/spans\n' }));
    await expect(store.reload()).resolves.toEqual({ status: 'topology_changed' });
    expect(store.current()).toBe(before);
  });

  it('serializes concurrent reloads', async () => {
    const { store, edit } = storeWith(document());
    edit(document({ timeout: '1s' }));

    const results = await Promise.all([store.reload(), store.reload()]);

    expect(results).toEqual([{ status: 'applied' }, { status: 'unchanged' }]);
    expect(batchTimeout(store.current())).toBe(1000);
  });
});
