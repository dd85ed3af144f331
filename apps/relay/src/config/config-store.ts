/**
 * Config Store - atomically swapped, immutable configuration snapshots
 *
 * Components never cache settings: each operation reads `current()` once and
 * uses that snapshot to completion, so a reload is never observed half-applied.
 * Reloads are serialized; a reload that would change the topology (component
 * ids, endpoints, pipeline wiring) is refused because running listeners and
 * exporters cannot be rebuilt in place.
 */

import { logger } from '@telemetry-relay/core';
import { ConfigError, type RelayConfig } from './types.js';

export type ReloadResult =
  | { status: 'applied' }
  | { status: 'unchanged' }
  | { status: 'invalid'; issues: string[] }
  | { status: 'topology_changed' };

export type ConfigListener = (next: RelayConfig, previous: RelayConfig) => void;

export class ConfigStore {
  private snapshot: RelayConfig;
  private reloading: Promise<ReloadResult> = Promise.resolve({ status: 'unchanged' });
  private listeners: ConfigListener[] = [];

  constructor(
    initial: RelayConfig,
    private readonly load: () => Promise<RelayConfig>
  ) {
    this.snapshot = deepFreeze(initial);
  }

  current(): RelayConfig {
    return this.snapshot;
  }

  onChange(listener: ConfigListener): void {
    this.listeners.push(listener);
  }

  reload(): Promise<ReloadResult> {
    this.reloading = this.reloading.then(
      () => this.reloadNow(),
      () => this.reloadNow()
    );
    return this.reloading;
  }

  private async reloadNow(): Promise<ReloadResult> {
    let next: RelayConfig;
    try {
      next = await this.load();
    } catch (error) {
      if (error instanceof ConfigError) {
        logger.error('Configuration reload rejected: invalid document', { issues: error.issues });
        return { status: 'invalid', issues: error.issues };
      }
      throw error;
    }

    const previous = this.snapshot;
    if (topologyOf(next) !== topologyOf(previous)) {
      logger.warn('Configuration reload rejected: receivers, exporters or pipelines changed; restart required');
      return { status: 'topology_changed' };
    }

    if (JSON.stringify(next) === JSON.stringify(previous)) {
      return { status: 'unchanged' };
    }

    this.snapshot = deepFreeze(next);
    logger.info('Configuration reloaded', { source: next.source });

    for (const listener of this.listeners) {
      try {
        listener(this.snapshot, previous);
      } catch (error) {
        logger.error('Configuration listener failed', { error });
      }
    }

    return { status: 'applied' };
  }
}

/**
 * Everything that needs a restart to change. Processor settings are left out:
 * they are the reloadable part.
 */
export function topologyOf(config: RelayConfig): string {
  return JSON.stringify({
    receivers: config.receivers,
    exporters: config.exporters,
    extensions: config.extensions,
    pipelines: config.pipelines,
    processors: Object.values(config.processors).map(({ id, type }) => [id, type]),
    workers: config.service.workers,
  });
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
  }
  return value;
}
