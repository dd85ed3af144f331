/**
 * Telemetry Relay - wires receivers, pipelines and exporters from a config
 * snapshot and owns their lifecycle.
 *
 * Start order: memory limiters, exporters, pipelines, receivers, health check.
 * Stop order: receivers close, pipelines drain and flush, exporter queues get
 * `service.shutdown_timeout` to deliver, then the health check goes down.
 */

import { componentLogger, setLogLevel, type Logger } from '@telemetry-relay/core';
import type { ConfigStore, ReloadResult } from './config/config-store.js';
import type { BatchProcessorSettings, MemoryLimiterSettings, ResourceProcessorSettings } from './config/schema.js';
import type { PipelineConfig, ProcessorConfig, RelayConfig } from './config/types.js';
import { createExporter } from './exporters/factory.js';
import type { TelemetryExporter } from './exporters/exporter.js';
import { HealthServer, type ReadinessReport, type RelayStatusSource } from './health/health-server.js';
import { ExporterRunner } from './pipeline/exporter-runner.js';
import { FanOut } from './pipeline/fanout.js';
import { Pipeline } from './pipeline/pipeline.js';
import { PipelineRouter } from './pipeline/router.js';
import { BatchProcessor, type BatchSink } from './processors/batch-processor.js';
import { MemoryLimiter } from './processors/memory-limiter.js';
import { ResourceProcessor } from './processors/resource-processor.js';
import { OtlpGrpcReceiver } from './receivers/otlp-grpc-receiver.js';
import { OtlpHttpReceiver } from './receivers/otlp-http-receiver.js';
import type { Receiver, ReceiverProtocol } from './receivers/receiver.js';
import { RelayMetrics } from './telemetry/self-metrics.js';
import type { Endpoint } from './utils/http-server.js';

type RelayState = 'created' | 'starting' | 'running' | 'stopping' | 'stopped';

export interface TelemetryRelayOptions {
  metrics?: RelayMetrics;
  /** Stop on SIGTERM/SIGINT and reload on SIGHUP. */
  handleSignals?: boolean;
  /** Called after a signal-triggered stop finished. */
  onSignalStop?: (error?: unknown) => void;
}

export class TelemetryRelay implements RelayStatusSource {
  readonly metrics: RelayMetrics;
  private readonly log: Logger;
  private readonly limiters = new Map<string, MemoryLimiter>();
  private readonly runners = new Map<string, ExporterRunner>();
  private readonly pipelines: Pipeline[] = [];
  private readonly receivers: Receiver[] = [];
  private readonly router: PipelineRouter;
  private readonly health?: HealthServer;
  private readonly connectivityCheckInterval: number;
  private state: RelayState = 'created';
  private stopping: Promise<void> | null = null;
  private signalHandlers: Array<[NodeJS.Signals, () => void]> = [];

  constructor(
    private readonly store: ConfigStore,
    private readonly options: TelemetryRelayOptions = {}
  ) {
    this.log = componentLogger('relay');
    this.metrics = options.metrics ?? new RelayMetrics({ defaultMetrics: true });

    const config = store.current();

    for (const pipeline of config.pipelines) {
      this.pipelines.push(this.buildPipeline(config, pipeline));
    }
    this.router = new PipelineRouter(this.pipelines, this.metrics);
    this.buildReceivers(config);

    const healthSettings = config.extensions.health_check;
    this.connectivityCheckInterval = healthSettings?.connectivity_check_interval ?? 10_000;
    if (healthSettings && config.service.extensions.includes('health_check')) {
      this.health = new HealthServer(healthSettings, this, this.metrics);
    }

    store.onChange((next) => setLogLevel(next.service.telemetry.logs.level));
  }

  get running(): boolean {
    return this.state === 'running';
  }

  async start(): Promise<void> {
    if (this.state !== 'created') {
      throw new Error(`relay cannot start from state ${this.state}`);
    }
    this.state = 'starting';

    const config = this.store.current();
    setLogLevel(config.service.telemetry.logs.level);

    try {
      for (const limiter of this.limiters.values()) {
        limiter.start();
      }
      for (const runner of this.runners.values()) {
        await runner.start(this.connectivityCheckInterval);
      }
      for (const pipeline of this.pipelines) {
        pipeline.start();
      }
      for (const receiver of this.receivers) {
        await receiver.start();
      }
      await this.health?.start();
    } catch (error) {
      this.log.error('Relay failed to start, shutting down', { error });
      await this.stop();
      throw error;
    }

    if (this.options.handleSignals) {
      this.installSignalHandlers();
    }

    this.state = 'running';
    this.log.info('Telemetry relay started', {
      config: config.source,
      pipelines: this.pipelines.map((pipeline) => pipeline.id),
      receivers: this.receivers.map((receiver) => receiver.name),
      exporters: [...this.runners.keys()],
    });
  }

  /** Idempotent; concurrent callers share one shutdown. */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  reload(): Promise<ReloadResult> {
    return this.store.reload();
  }

  readiness(): ReadinessReport {
    const reasons: string[] = [];

    if (this.state !== 'running') {
      reasons.push(`relay is ${this.state}`);
    }
    for (const receiver of this.receivers) {
      if (!receiver.listening) {
        reasons.push(`receiver ${receiver.name} is not listening`);
      }
    }
    for (const runner of this.runners.values()) {
      if (!runner.ready) {
        reasons.push(`exporter ${runner.id} has not passed its connectivity check`);
      }
    }
    for (const limiter of this.limiters.values()) {
      if (limiter.hardLimited) {
        reasons.push(`${limiter.id} is above its hard limit`);
      }
    }

    return { ready: reasons.length === 0, reasons };
  }

  stats(): Record<string, unknown> {
    return {
      state: this.state,
      receivers: this.receivers.map((receiver) => ({
        name: receiver.name,
        listening: receiver.listening,
        address: receiver.address(),
      })),
      pipelines: this.pipelines.map((pipeline) => ({
        id: pipeline.id,
        queued_batches: pipeline.queuedBatches,
      })),
      exporters: [...this.runners.values()].map((runner) => ({
        id: runner.id,
        queue_size: runner.queueSize,
        reachable: runner.reachable,
        ready: runner.ready,
      })),
      memory_limiters: [...this.limiters.values()].map((limiter) => ({ id: limiter.id, ...limiter.stats() })),
    };
  }

  receiverAddress(id: string, protocol: ReceiverProtocol): Endpoint | undefined {
    return this.receivers.find((receiver) => receiver.id === id && receiver.protocol === protocol)?.address();
  }

  healthAddress(): Endpoint | undefined {
    return this.health?.address();
  }

  exporter(id: string): TelemetryExporter | undefined {
    return this.runners.get(id)?.exporter;
  }

  private async shutdown(): Promise<void> {
    this.state = 'stopping';
    this.removeSignalHandlers();
    const { shutdown_timeout } = this.store.current().service;
    this.log.info('Shutting down telemetry relay', { shutdownTimeoutMs: shutdown_timeout });

    await this.settleAll('receiver', this.receivers.map((receiver) => receiver.stop()));
    await this.settleAll('pipeline', this.pipelines.map((pipeline) => pipeline.drain()));
    await this.settleAll('exporter', [...this.runners.values()].map((runner) => runner.shutdown(shutdown_timeout)));
    for (const limiter of this.limiters.values()) {
      limiter.stop();
    }
    await this.settleAll('health_check', [this.health?.stop()]);

    this.state = 'stopped';
    this.log.info('Telemetry relay stopped');
  }

  private async settleAll(kind: string, tasks: Array<Promise<void> | undefined>): Promise<void> {
    const results = await Promise.allSettled(tasks);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.log.error(`Failed to stop ${kind}`, { error: result.reason });
      }
    }
  }

  private buildPipeline(config: RelayConfig, pipeline: PipelineConfig): Pipeline {
    let limiter: MemoryLimiter | undefined;
    const resourceProcessors: ResourceProcessor[] = [];
    let createBatcher: ((sink: BatchSink) => BatchProcessor) | undefined;

    for (const id of pipeline.processors) {
      const processor = config.processors[id];
      switch (processor.type) {
        case 'memory_limiter':
          limiter = this.limiterFor(id);
          break;
        case 'resource':
          resourceProcessors.push(new ResourceProcessor(id, () => this.resourceSettings(id)));
          break;
        case 'batch':
          createBatcher = (sink) => new BatchProcessor(id, () => this.batchSettings(id), sink);
          break;
      }
    }

    const runners = pipeline.exporters.map((id) => this.runnerFor(config, id));
    const pipelineLimiter = limiter;
    const fanout = new FanOut(runners, (bytes) => pipelineLimiter?.release(bytes));

    return new Pipeline(pipeline, {
      limiter,
      resourceProcessors,
      createBatcher,
      fanout,
      workers: config.service.workers,
      metrics: this.metrics,
    });
  }

  private buildReceivers(config: RelayConfig): void {
    const used = new Set(config.pipelines.flatMap((pipeline) => pipeline.receivers));
    const context = { sink: this.router, metrics: this.metrics };

    for (const id of used) {
      const { protocols } = config.receivers[id].settings;
      if (protocols.grpc) {
        this.receivers.push(new OtlpGrpcReceiver(id, protocols.grpc, context));
      }
      if (protocols.http) {
        this.receivers.push(new OtlpHttpReceiver(id, protocols.http, context));
      }
    }
  }

  /** One limiter per component id, shared by every pipeline naming it. */
  private limiterFor(id: string): MemoryLimiter {
    let limiter = this.limiters.get(id);
    if (!limiter) {
      limiter = new MemoryLimiter(id, () => this.memoryLimiterSettings(id));
      limiter.onStateChange((inUse, hard) => this.metrics.setMemoryState(id, inUse, hard));
      this.limiters.set(id, limiter);
    }
    return limiter;
  }

  /** One exporter and sending queue per component id, shared across pipelines. */
  private runnerFor(config: RelayConfig, id: string): ExporterRunner {
    let runner = this.runners.get(id);
    if (!runner) {
      runner = new ExporterRunner(createExporter(config.exporters[id], this.metrics), this.metrics);
      this.runners.set(id, runner);
    }
    return runner;
  }

  // Settings are looked up per call so reloaded values apply to the next operation

  private memoryLimiterSettings(id: string): MemoryLimiterSettings {
    const processor = this.processor(id);
    if (processor.type !== 'memory_limiter') {
      throw new Error(`processor ${id} is not a memory_limiter`);
    }
    return processor.settings;
  }

  private resourceSettings(id: string): ResourceProcessorSettings {
    const processor = this.processor(id);
    if (processor.type !== 'resource') {
      throw new Error(`processor ${id} is not a resource processor`);
    }
    return processor.settings;
  }

  private batchSettings(id: string): BatchProcessorSettings {
    const processor = this.processor(id);
    if (processor.type !== 'batch') {
      throw new Error(`processor ${id} is not a batch processor`);
    }
    return processor.settings;
  }

  private processor(id: string): ProcessorConfig {
    const processor: ProcessorConfig | undefined = this.store.current().processors[id];
    if (!processor) {
      throw new Error(`processor ${id} is not configured`);
    }
    return processor;
  }

  private installSignalHandlers(): void {
    const onStop = (signal: NodeJS.Signals) => (): void => {
      this.log.info(`Received ${signal}, shutting down`);
      this.stop().then(
        () => this.options.onSignalStop?.(),
        (error: unknown) => this.options.onSignalStop?.(error)
      );
    };
    const onReload = (): void => {
      this.log.info('Received SIGHUP, reloading configuration');
      this.reload().then(
        (result) => this.log.info('Configuration reload finished', { result: result.status }),
        (error: unknown) => this.log.error('Configuration reload failed', { error })
      );
    };

    this.signalHandlers = [
      ['SIGTERM', onStop('SIGTERM')],
      ['SIGINT', onStop('SIGINT')],
      ['SIGHUP', onReload],
    ];
    for (const [signal, handler] of this.signalHandlers) {
      process.on(signal, handler);
    }
  }

  private removeSignalHandlers(): void {
    for (const [signal, handler] of this.signalHandlers) {
      process.off(signal, handler);
    }
    this.signalHandlers = [];
  }
}
