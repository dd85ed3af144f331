/**
 * health_check extension
 *
 * GET /health is liveness with a stats snapshot, GET /ready gates traffic on
 * receivers being bound, exporters being reachable (or best effort) and the
 * memory limiter being out of its hard state. GET /metrics serves the relay's
 * own metrics and POST /-/reload swaps the configuration snapshot.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server as HTTPServer } from 'http';
import { componentLogger, type Logger } from '@telemetry-relay/core';
import type { ReloadResult } from '../config/config-store.js';
import type { HealthCheckSettings } from '../config/schema.js';
import type { RelayMetrics } from '../telemetry/self-metrics.js';
import { boundAddress, closeServer, listen, type Endpoint } from '../utils/http-server.js';

export interface ReadinessReport {
  ready: boolean;
  /** Why the relay is not ready; empty when it is. */
  reasons: string[];
}

/** What the extension needs from the running relay. */
export interface RelayStatusSource {
  readiness(): ReadinessReport;
  stats(): Record<string, unknown>;
  reload(): Promise<ReloadResult>;
}

const RELOAD_HTTP_STATUS: Record<ReloadResult['status'], number> = {
  applied: 200,
  unchanged: 200,
  invalid: 400,
  topology_changed: 409,
};

export class HealthServer {
  private readonly app: express.Express;
  private readonly httpServer: HTTPServer;
  private readonly log: Logger;
  private readonly startedAt = Date.now();

  constructor(
    private readonly settings: HealthCheckSettings,
    private readonly source: RelayStatusSource,
    private readonly metrics: RelayMetrics
  ) {
    this.log = componentLogger('health_check');
    this.app = express();
    this.httpServer = createServer(this.app);
    this.setupRoutes();
  }

  async start(): Promise<void> {
    const bound = await listen(this.httpServer, this.settings.endpoint);
    this.log.info(`Health check listening on ${bound.host}:${bound.port}`);
  }

  async stop(): Promise<void> {
    await closeServer(this.httpServer);
  }

  address(): Endpoint | undefined {
    return boundAddress(this.httpServer);
  }

  private setupRoutes(): void {
    this.app.get('/health', (req: Request, res: Response) => {
      res.json({
        status: 'ok',
        service: 'telemetry-relay',
        timestamp: new Date().toISOString(),
        uptime_ms: Date.now() - this.startedAt,
        ...this.source.stats(),
      });
    });

    this.app.get('/ready', (req: Request, res: Response) => {
      const report = this.source.readiness();
      res.status(report.ready ? 200 : 503).json({
        status: report.ready ? 'ready' : 'not_ready',
        reasons: report.reasons,
      });
    });

    this.app.get('/metrics', async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { contentType, body } = await this.metrics.render();
        res.set('Content-Type', contentType).send(body);
      } catch (error) {
        next(error);
      }
    });

    this.app.post('/-/reload', async (req: Request, res: Response, next: NextFunction) => {
      try {
        const result = await this.source.reload();
        res.status(RELOAD_HTTP_STATUS[result.status]).json(result);
      } catch (error) {
        next(error);
      }
    });

    this.app.use((req: Request, res: Response) => {
      res.status(404).json({ error: 'Endpoint not found', path: req.originalUrl });
    });

    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      this.log.error('Health check request failed', { path: req.path, error });
      res.status(500).json({
        error: 'Internal server error',
        message: error instanceof Error ? error.message : String(error),
      });
    });
  }
}
