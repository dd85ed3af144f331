import express, { type Request, type Response } from 'express';
import { createServer, type IncomingHttpHeaders } from 'http';
import {
  ExportError,
  ExportErrorCategory,
  SpanKind,
  SpanStatusCode,
  type CounterPoint,
  type ExportResult,
  type Span,
  type TelemetryBatch,
} from '@telemetry-relay/core';
import type { ExporterCommonSettings, RetrySettings } from '../config/schema.js';
import { BaseExporter } from '../exporters/exporter.js';
import type { RelayMetrics } from '../telemetry/self-metrics.js';
import { closeServer, listen } from '../utils/http-server.js';

export const TRACE_ID = '0af7651916cd43dd8448eb211c80319c';
export const SPAN_ID = 'b7ad6b7169203331';

export function makeSpan(overrides: Partial<Span> = {}): Span {
  return {
    type: 'span',
    traceId: TRACE_ID,
    spanId: SPAN_ID,
    name: 'checkout',
    kind: SpanKind.SERVER,
    serviceName: 'checkout-service',
    startTimeUnixNano: 1_700_000_000_000_000_000n,
    endTimeUnixNano: 1_700_000_000_250_000_000n,
    attributes: { 'http.status_code': 200 },
    resource: { 'service.name': 'checkout-service' },
    status: { code: SpanStatusCode.UNSET },
    events: [],
    ...overrides,
  };
}

export function makeCounter(overrides: Partial<CounterPoint> = {}): CounterPoint {
  return {
    type: 'metric',
    kind: 'counter',
    name: 'orders',
    unit: '1',
    labels: { region: 'eu' },
    resource: { 'service.name': 'shop' },
    timeUnixNano: 2_000n,
    value: 1,
    monotonic: true,
    temporality: 'cumulative',
    ...overrides,
  };
}

export function retryPolicy(overrides: Partial<RetrySettings> = {}): RetrySettings {
  return {
    enabled: true,
    initial_interval: 1,
    max_interval: 5,
    multiplier: 2,
    randomization_factor: 0,
    max_attempts: 3,
    ...overrides,
  };
}

export function exporterSettings(overrides: Partial<ExporterCommonSettings> = {}): ExporterCommonSettings {
  return {
    timeout: 2_000,
    retry_on_failure: retryPolicy(),
    sending_queue: { queue_size: 100, num_consumers: 1 },
    best_effort: false,
    ...overrides,
  };
}

export function retryableError(retryAfterMs?: number): ExportError {
  return new ExportError('HTTP 503 from test backend', {
    category: ExportErrorCategory.SERVICE_UNAVAILABLE,
    retryable: true,
    statusCode: 503,
    retryAfterMs,
  });
}

export function fatalError(): ExportError {
  return new ExportError('HTTP 400 from test backend', {
    category: ExportErrorCategory.BAD_REQUEST,
    retryable: false,
    statusCode: 400,
  });
}

export function failureOf(result: ExportResult): Extract<ExportResult, { status: 'failure' }> {
  if (result.status !== 'failure') {
    throw new Error(`expected a failed export, got ${result.status}`);
  }
  return result;
}

/** One step per send: succeed, throw the error, or run the function first. */
export type ScriptStep = 'ok' | Error | (() => Promise<void>);

/** Exporter whose sends follow a script; every send past the script succeeds. */
export class ScriptedExporter extends BaseExporter<ExporterCommonSettings> {
  readonly delivered: TelemetryBatch[] = [];
  attempts = 0;
  reachable = true;

  constructor(
    id: string,
    settings: ExporterCommonSettings = exporterSettings(),
    private readonly script: ScriptStep[] = []
  ) {
    super(id, 'debug', settings);
  }

  async checkConnectivity(): Promise<boolean> {
    return this.reachable;
  }

  protected async send(batch: TelemetryBatch): Promise<void> {
    this.attempts++;
    const step = this.script.shift() ?? 'ok';
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      await step();
    }
    this.delivered.push(batch);
  }
}

export interface CapturedRequest {
  method: string;
  path: string;
  headers: IncomingHttpHeaders;
  body: Buffer;
}

/** In-process HTTP destination recording every request it gets. */
export interface FakeBackend {
  url: string;
  requests: CapturedRequest[];
  posts(): CapturedRequest[];
  respondWith(status: number, headers?: Record<string, string>): void;
  close(): Promise<void>;
}

export async function startBackend(): Promise<FakeBackend> {
  const requests: CapturedRequest[] = [];
  let reply: { status: number; headers: Record<string, string> } = { status: 200, headers: {} };

  const app = express();
  app.use(express.raw({ type: () => true, limit: '10mb' }));
  app.all('*', (req: Request, res: Response) => {
    const body: unknown = req.body;
    requests.push({
      method: req.method,
      path: req.path,
      headers: req.headers,
      body: Buffer.isBuffer(body) ? body : Buffer.alloc(0),
    });
    res.status(reply.status).set(reply.headers).end();
  });

  const server = createServer(app);
  const { port } = await listen(server, '127.0.0.1:0');

  return {
    url: `http://127.0.0.1:${port}`,
    requests,
    posts: () => requests.filter((request) => request.method === 'POST'),
    respondWith(status, headers = {}) {
      reply = { status, headers };
    },
    close: () => closeServer(server),
  };
}

/** Current value of one series of a relay self-metric, 0 when absent. */
export async function metricValue(metrics: RelayMetrics, name: string, labels: Record<string, string>): Promise<number> {
  const metric = metrics.registry.getSingleMetric(name);
  if (!metric) return 0;
  const { values } = await metric.get();
  const series = values.find((value) => Object.entries(labels).every(([key, label]) => value.labels[key] === label));
  return series?.value ?? 0;
}

/** A promise plus the function that settles it. */
export function gate(): { opened: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}
