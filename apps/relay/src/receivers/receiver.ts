/**
 * Receiver contract and the request handling both OTLP bindings share:
 * decode, route, and build the Export response.
 */

import { createBatch, type Signal } from '@telemetry-relay/core';
import { DecodeError, decodeRequest, type DecodeResult } from '../codec/otlp-decoder.js';
import type { IngestSink } from '../pipeline/router.js';
import type { RelayMetrics } from '../telemetry/self-metrics.js';
import type { Endpoint } from '../utils/http-server.js';

export type ReceiverProtocol = 'grpc' | 'http';

export interface Receiver {
  /** Component id the pipelines route by, e.g. `otlp` or `otlp/edge`. */
  readonly id: string;
  readonly protocol: ReceiverProtocol;
  readonly name: string;
  readonly listening: boolean;
  start(): Promise<void>;
  stop(): Promise<void>;
  address(): Endpoint | undefined;
}

export interface ExportPartialSuccess {
  rejectedSpans?: string;
  rejectedDataPoints?: string;
  errorMessage?: string;
}

/** Export{Trace,Metrics}ServiceResponse in proto-loader's object shape. */
export interface ExportServiceResponse {
  partialSuccess?: ExportPartialSuccess;
}

export type ReceiveOutcome =
  | { status: 'accepted'; response: ExportServiceResponse; records: number }
  | { status: 'invalid'; message: string }
  | { status: 'refused' }
  | { status: 'no_pipeline' };

export interface ReceiveContext {
  receiverId: string;
  sink: IngestSink;
  metrics: RelayMetrics;
}

/**
 * Runs one decoded Export request through the router. Never throws for bad
 * input: a DecodeError becomes the `invalid` outcome.
 */
export function receiveExport(context: ReceiveContext, signal: Signal, body: unknown): ReceiveOutcome {
  const { receiverId, sink, metrics } = context;

  if (!sink.routes(receiverId, signal)) {
    return { status: 'no_pipeline' };
  }

  let decoded: DecodeResult;
  try {
    decoded = decodeRequest(signal, body);
  } catch (error) {
    if (error instanceof DecodeError) {
      return { status: 'invalid', message: error.message };
    }
    throw error;
  }

  metrics.recordRejected(receiverId, signal, decoded.rejected);

  const result = sink.ingest(receiverId, createBatch(signal, receiverId, decoded.records));
  if (result !== 'accepted') {
    return { status: result };
  }

  return {
    status: 'accepted',
    response: exportResponse(signal, decoded.rejected),
    records: decoded.records.length,
  };
}

export function exportResponse(signal: Signal, rejected: number): ExportServiceResponse {
  if (rejected === 0) {
    return {};
  }
  const what = signal === 'traces' ? 'spans' : 'data points';
  const errorMessage = `${rejected} ${what} could not be decoded`;
  return signal === 'traces'
    ? { partialSuccess: { rejectedSpans: String(rejected), errorMessage } }
    : { partialSuccess: { rejectedDataPoints: String(rejected), errorMessage } };
}
