/**
 * OTLP/gRPC Receiver
 *
 * Serves TraceService/Export and MetricsService/Export from the run-time
 * loaded proto definitions.
 */

import * as grpc from '@grpc/grpc-js';
import { componentLogger, type Logger, type Signal } from '@telemetry-relay/core';
import { loadOtlpServices } from '../codec/otlp-proto.js';
import type { GrpcProtocolConfig } from '../config/schema.js';
import { parseEndpoint, type Endpoint } from '../utils/http-server.js';
import { receiveExport, type ReceiveContext, type ReceiveOutcome, type Receiver } from './receiver.js';

const MIB = 1024 * 1024;

export class OtlpGrpcReceiver implements Receiver {
  readonly protocol = 'grpc';
  readonly name: string;
  private readonly log: Logger;
  private server: grpc.Server | null = null;
  private bound: Endpoint | undefined;

  constructor(
    readonly id: string,
    private readonly config: GrpcProtocolConfig,
    private readonly context: Omit<ReceiveContext, 'receiverId'>
  ) {
    this.name = `${id}/grpc`;
    this.log = componentLogger(this.name);
  }

  get listening(): boolean {
    return this.bound !== undefined;
  }

  async start(): Promise<void> {
    const server = new grpc.Server({
      'grpc.max_receive_message_length': this.config.max_recv_msg_size_mib * MIB,
    });
    const services = loadOtlpServices();
    server.addService(services.traces, { Export: this.exportHandler('traces') });
    server.addService(services.metrics, { Export: this.exportHandler('metrics') });

    const { host } = parseEndpoint(this.config.endpoint);
    const port = await new Promise<number>((resolve, reject) => {
      server.bindAsync(this.config.endpoint, grpc.ServerCredentials.createInsecure(), (error, boundPort) => {
        if (error) {
          reject(error);
        } else {
          resolve(boundPort);
        }
      });
    });

    this.server = server;
    this.bound = { host, port };
    this.log.info(`OTLP/gRPC receiver listening on ${host}:${port}`);
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    this.bound = undefined;

    await new Promise<void>((resolve) => {
      server.tryShutdown((error) => {
        if (error) {
          this.log.warn('Graceful gRPC shutdown failed, forcing', { error: error.message });
          server.forceShutdown();
        }
        resolve();
      });
    });
    this.log.info('OTLP/gRPC receiver stopped');
  }

  address(): Endpoint | undefined {
    return this.bound;
  }

  private exportHandler(signal: Signal): grpc.handleUnaryCall<object, object> {
    return (call, callback) => {
      let outcome: ReceiveOutcome;
      try {
        outcome = receiveExport({ receiverId: this.id, ...this.context }, signal, call.request);
      } catch (error) {
        this.log.error('Export call failed', { signal, error });
        callback({ code: grpc.status.INTERNAL, details: 'internal error' });
        return;
      }

      switch (outcome.status) {
        case 'accepted':
          callback(null, outcome.response);
          return;
        case 'invalid':
          this.log.debug('Rejected invalid Export request', { signal, message: outcome.message });
          callback({ code: grpc.status.INVALID_ARGUMENT, details: outcome.message });
          return;
        case 'refused':
          callback({ code: grpc.status.UNAVAILABLE, details: 'memory limit exceeded, retry later' });
          return;
        case 'no_pipeline':
          callback({ code: grpc.status.UNIMPLEMENTED, details: `no ${signal} pipeline for receiver ${this.id}` });
          return;
      }
    };
  }
}
