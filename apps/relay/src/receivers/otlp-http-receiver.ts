/**
 * OTLP/HTTP Receiver
 *
 * POST /v1/traces and /v1/metrics, OTLP/JSON or binary protobuf, optionally
 * gzip or deflate encoded. The response uses the request's encoding; error
 * bodies are a JSON google.rpc.Status.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server as HTTPServer } from 'http';
import { componentLogger, type Logger, type Signal } from '@telemetry-relay/core';
import { exportMethod } from '../codec/otlp-proto.js';
import type { HttpProtocolConfig } from '../config/schema.js';
import { boundAddress, closeServer, listen, type Endpoint } from '../utils/http-server.js';
import { receiveExport, type ReceiveContext, type Receiver } from './receiver.js';

type OtlpContentType = 'json' | 'proto';

const CONTENT_TYPES: Record<string, OtlpContentType> = {
  'application/json': 'json',
  'application/x-protobuf': 'proto',
};

const SIGNAL_PATHS: Record<Signal, string> = {
  traces: '/v1/traces',
  metrics: '/v1/metrics',
};

// google.rpc.Code
const RPC_INVALID_ARGUMENT = 3;
const RPC_NOT_FOUND = 5;
const RPC_UNAVAILABLE = 14;

/** Seconds a refused client is asked to wait before retrying. */
export const REFUSED_RETRY_AFTER_SECONDS = 1;

export function otlpContentType(header: string | undefined): OtlpContentType | undefined {
  if (!header) return undefined;
  const mediaType = header.split(';')[0].trim().toLowerCase();
  return CONTENT_TYPES[mediaType];
}

export class OtlpHttpReceiver implements Receiver {
  readonly protocol = 'http';
  readonly name: string;
  private readonly app: express.Express;
  private readonly httpServer: HTTPServer;
  private readonly log: Logger;

  constructor(
    readonly id: string,
    private readonly config: HttpProtocolConfig,
    private readonly context: Omit<ReceiveContext, 'receiverId'>
  ) {
    this.name = `${id}/http`;
    this.log = componentLogger(this.name);
    this.app = express();
    this.httpServer = createServer(this.app);
    this.setupRoutes();
  }

  get listening(): boolean {
    return this.httpServer.listening;
  }

  async start(): Promise<void> {
    const bound = await listen(this.httpServer, this.config.endpoint);
    this.log.info(`OTLP/HTTP receiver listening on ${bound.host}:${bound.port}`);
  }

  async stop(): Promise<void> {
    await closeServer(this.httpServer);
    this.log.info('OTLP/HTTP receiver stopped');
  }

  address(): Endpoint | undefined {
    return boundAddress(this.httpServer);
  }

  private setupRoutes(): void {
    const rawBody = express.raw({
      type: () => true,
      limit: this.config.max_request_body_size,
      inflate: true,
    });

    for (const signal of ['traces', 'metrics'] as const) {
      const path = SIGNAL_PATHS[signal];
      this.app.post(path, this.requireContentType, rawBody, (req: Request, res: Response) =>
        this.handleExport(signal, req, res)
      );
      this.app.all(path, (req: Request, res: Response) => {
        res.set('Allow', 'POST');
        sendStatus(res, 405, RPC_INVALID_ARGUMENT, `${req.method} is not allowed on ${path}`);
      });
    }

    this.app.use((req: Request, res: Response) => {
      sendStatus(res, 404, RPC_NOT_FOUND, `${req.method} ${req.path} not found`);
    });

    // Body parser failures: oversized, bad encoding, broken compression
    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      const status = httpStatusOf(error);
      const message = error instanceof Error ? error.message : String(error);
      if (status >= 500) {
        this.log.error('OTLP/HTTP request failed', { path: req.path, error });
      } else {
        this.log.debug('Rejected OTLP/HTTP request', { path: req.path, status, message });
      }
      sendStatus(res, status, RPC_INVALID_ARGUMENT, message);
    });
  }

  private readonly requireContentType = (req: Request, res: Response, next: NextFunction): void => {
    if (otlpContentType(req.get('content-type')) === undefined) {
      sendStatus(
        res,
        415,
        RPC_INVALID_ARGUMENT,
        `unsupported content type "${req.get('content-type') ?? ''}", expected application/json or application/x-protobuf`
      );
      return;
    }
    next();
  };

  private handleExport(signal: Signal, req: Request, res: Response): void {
    const encoding = otlpContentType(req.get('content-type')) ?? 'json';
    const body: unknown = req.body;
    const payload = Buffer.isBuffer(body) ? body : Buffer.alloc(0);

    let request: unknown;
    try {
      request = encoding === 'proto' ? exportMethod(signal).requestDeserialize(payload) : parseJson(payload);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.debug('Undecodable OTLP/HTTP body', { signal, encoding, message });
      sendStatus(res, 400, RPC_INVALID_ARGUMENT, `malformed ${encoding} body: ${message}`);
      return;
    }

    const outcome = receiveExport({ receiverId: this.id, ...this.context }, signal, request);

    switch (outcome.status) {
      case 'accepted':
        if (encoding === 'proto') {
          res
            .status(200)
            .type('application/x-protobuf')
            .send(exportMethod(signal).responseSerialize(outcome.response));
        } else {
          res.status(200).json(outcome.response);
        }
        return;
      case 'invalid':
        sendStatus(res, 400, RPC_INVALID_ARGUMENT, outcome.message);
        return;
      case 'refused':
        res.set('Retry-After', String(REFUSED_RETRY_AFTER_SECONDS));
        sendStatus(res, 503, RPC_UNAVAILABLE, 'memory limit exceeded, retry later');
        return;
      case 'no_pipeline':
        sendStatus(res, 404, RPC_NOT_FOUND, `no ${signal} pipeline for receiver ${this.id}`);
        return;
    }
  }
}

function parseJson(payload: Buffer): unknown {
  // An empty body is an empty request
  if (payload.length === 0) {
    return {};
  }
  return JSON.parse(payload.toString('utf8'));
}

function sendStatus(res: Response, httpStatus: number, code: number, message: string): void {
  res.status(httpStatus).json({ code, message });
}

function httpStatusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}
