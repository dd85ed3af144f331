import * as grpc from '@grpc/grpc-js';
import axios from 'axios';
import { gzipSync } from 'zlib';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ExportErrorCategory, createBatch, type Signal, type TelemetryBatch } from '@telemetry-relay/core';
import { encodeTraceRequest } from '../codec/otlp-encoder.js';
import { exportMethod } from '../codec/otlp-proto.js';
import { OtlpGrpcExporter } from '../exporters/otlp-grpc-exporter.js';
import type { IngestSink, RouteResult } from '../pipeline/router.js';
import { OtlpGrpcReceiver } from '../receivers/otlp-grpc-receiver.js';
import { OtlpHttpReceiver, otlpContentType } from '../receivers/otlp-http-receiver.js';
import { exportResponse } from '../receivers/receiver.js';
import { RelayMetrics } from '../telemetry/self-metrics.js';
import { SPAN_ID, TRACE_ID, exporterSettings, failureOf, makeSpan, metricValue } from './helpers.js';

class RecordingSink implements IngestSink {
  readonly batches: TelemetryBatch[] = [];
  result: RouteResult = 'accepted';
  signals: Signal[] = ['traces', 'metrics'];

  routes(receiverId: string, signal: Signal): boolean {
    return receiverId === 'otlp' && this.signals.includes(signal);
  }

  ingest(receiverId: string, batch: TelemetryBatch): RouteResult {
    this.batches.push(batch);
    return this.result;
  }
}

const checkoutSpanJson = {
  traceId: TRACE_ID,
  spanId: SPAN_ID,
  name: 'checkout',
  kind: 2,
  startTimeUnixNano: '1700000000000000000',
  endTimeUnixNano: '1700000000250000000',
};

function tracesJson(spans: object[]): object {
  return {
    resourceSpans: [
      {
        resource: { attributes: [{ key: 'service.name', value: { stringValue: 'checkout-service' } }] },
        scopeSpans: [{ spans }],
      },
    ],
  };
}

describe('otlpContentType', () => {
  it('recognises the OTLP media types with parameters', () => {
    expect(otlpContentType('application/json')).toBe('json');
    expect(otlpContentType('Application/JSON; charset=utf-8')).toBe('json');
    expect(otlpContentType('application/x-protobuf')).toBe('proto');
    expect(otlpContentType('text/plain')).toBeUndefined();
    expect(otlpContentType(undefined)).toBeUndefined();
  });
});

describe('exportResponse', () => {
  it('reports rejected records as a partial success', () => {
    expect(exportResponse('traces', 0)).toEqual({});
    expect(exportResponse('traces', 2)).toEqual({
      partialSuccess: { rejectedSpans: '2', errorMessage: '2 spans could not be decoded' },
    });
    expect(exportResponse('metrics', 1)).toEqual({
      partialSuccess: { rejectedDataPoints: '1', errorMessage: '1 data points could not be decoded' },
    });
  });
});

describe('OtlpHttpReceiver', () => {
  let sink: RecordingSink;
  let metrics: RelayMetrics;
  let receiver: OtlpHttpReceiver;
  let baseUrl: string;

  async function startReceiver(maxBodySize = 1024 * 1024): Promise<void> {
    receiver = new OtlpHttpReceiver(
      'otlp',
      { endpoint: '127.0.0.1:0', max_request_body_size: maxBodySize },
      { sink, metrics }
    );
    await receiver.start();
    const address = receiver.address();
    if (!address) throw new Error('receiver is not listening');
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  function post(path: string, body: string | Buffer, headers: Record<string, string>) {
    return axios.post<unknown>(`${baseUrl}${path}`, body, { headers, validateStatus: () => true });
  }

  function postJson(path: string, body: object) {
    return post(path, JSON.stringify(body), { 'Content-Type': 'application/json' });
  }

  beforeEach(async () => {
    sink = new RecordingSink();
    metrics = new RelayMetrics();
    await startReceiver();
  });

  afterEach(async () => {
    await receiver.stop();
  });

  it('accepts OTLP/JSON traces', async () => {
    const response = await postJson('/v1/traces', tracesJson([checkoutSpanJson]));

    expect(response.status).toBe(200);
    expect(response.data).toEqual({});
    expect(sink.batches).toHaveLength(1);
    expect(sink.batches[0].source).toBe('otlp');
    expect(sink.batches[0].records[0]).toMatchObject({
      traceId: TRACE_ID,
      spanId: SPAN_ID,
      name: 'checkout',
      serviceName: 'checkout-service',
    });
  });

  it('answers a partial success when some spans cannot be decoded', async () => {
    const broken = { ...checkoutSpanJson, traceId: '00000000000000000000000000000000' };

    const response = await postJson('/v1/traces', tracesJson([checkoutSpanJson, broken]));

    expect(response.status).toBe(200);
    expect(response.data).toEqual({
      partialSuccess: { rejectedSpans: '1', errorMessage: '1 spans could not be decoded' },
    });
    expect(sink.batches[0].records).toHaveLength(1);
    expect(await metricValue(metrics, 'relay_receiver_rejected_records_total', { receiver: 'otlp', signal: 'traces' })).toBe(1);
  });

  it('accepts protobuf and answers in protobuf', async () => {
    const body = exportMethod('traces').requestSerialize(encodeTraceRequest([makeSpan()], 'proto'));

    const response = await axios.post<ArrayBuffer>(`${baseUrl}/v1/traces`, body, {
      headers: { 'Content-Type': 'application/x-protobuf' },
      responseType: 'arraybuffer',
      validateStatus: () => true,
    });

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toBe('application/x-protobuf');
    expect(exportMethod('traces').responseDeserialize(Buffer.from(response.data))).toEqual({});
    expect(sink.batches[0].records[0]).toMatchObject({ traceId: TRACE_ID, spanId: SPAN_ID, name: 'checkout' });
  });

  it('inflates gzip bodies', async () => {
    const body = gzipSync(JSON.stringify(tracesJson([checkoutSpanJson])));

    const response = await post('/v1/traces', body, {
      'Content-Type': 'application/json',
      'Content-Encoding': 'gzip',
    });

    expect(response.status).toBe(200);
    expect(sink.batches[0].records).toHaveLength(1);
  });

  it('treats an empty JSON body as an empty request', async () => {
    const response = await post('/v1/traces', '', { 'Content-Type': 'application/json' });

    expect(response.status).toBe(200);
    expect(sink.batches[0].records).toHaveLength(0);
  });

  it('rejects an unsupported content type with 415', async () => {
    const response = await post('/v1/traces', 'hello', { 'Content-Type': 'text/plain' });

    expect(response.status).toBe(415);
    expect(response.data).toEqual({
      code: 3,
      message: 'unsupported content type "text/plain", expected application/json or application/x-protobuf',
    });
    expect(sink.batches).toHaveLength(0);
  });

  it('rejects malformed JSON with 400', async () => {
    const response = await post('/v1/traces', '{not json', { 'Content-Type': 'application/json' });

    expect(response.status).toBe(400);
    expect(response.data).toMatchObject({ code: 3, message: expect.stringMatching(/^malformed json body: /) });
  });

  it('rejects a request of the wrong shape with 400', async () => {
    const response = await postJson('/v1/traces', { resourceSpans: 'nope' });

    expect(response.status).toBe(400);
    expect(response.data).toMatchObject({
      code: 3,
      message: expect.stringMatching(/^invalid ExportTraceServiceRequest/),
    });
  });

  it('answers 503 with Retry-After when the pipeline refuses', async () => {
    sink.result = 'refused';

    const response = await postJson('/v1/traces', tracesJson([checkoutSpanJson]));

    expect(response.status).toBe(503);
    expect(response.headers['retry-after']).toBe('1');
    expect(response.data).toEqual({ code: 14, message: 'memory limit exceeded, retry later' });
  });

  it('answers 404 for a signal no pipeline takes', async () => {
    sink.signals = ['traces'];

    const response = await postJson('/v1/metrics', { resourceMetrics: [] });

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ code: 5, message: 'no metrics pipeline for receiver otlp' });
  });

  it('answers 405 for other methods on a signal path', async () => {
    const response = await axios.get<unknown>(`${baseUrl}/v1/traces`, { validateStatus: () => true });

    expect(response.status).toBe(405);
    expect(response.headers['allow']).toBe('POST');
    expect(response.data).toEqual({ code: 3, message: 'GET is not allowed on /v1/traces' });
  });

  it('answers 404 for unknown paths', async () => {
    const response = await postJson('/v1/logs', {});

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ code: 5, message: 'POST /v1/logs not found' });
  });

  it('answers 413 for a body over max_request_body_size', async () => {
    await receiver.stop();
    await startReceiver(64);

    const response = await postJson('/v1/traces', tracesJson([checkoutSpanJson]));

    expect(response.status).toBe(413);
    expect(response.data).toEqual({ code: 3, message: 'request entity too large' });
  });

  it('stops listening on stop', async () => {
    expect(receiver.listening).toBe(true);

    await receiver.stop();

    expect(receiver.listening).toBe(false);
    expect(receiver.address()).toBeUndefined();
  });
});

describe('OtlpGrpcReceiver', () => {
  let sink: RecordingSink;
  let receiver: OtlpGrpcReceiver;
  let exporter: OtlpGrpcExporter;
  let target: string;

  beforeEach(async () => {
    sink = new RecordingSink();
    receiver = new OtlpGrpcReceiver(
      'otlp',
      { endpoint: '127.0.0.1:0', max_recv_msg_size_mib: 4 },
      { sink, metrics: new RelayMetrics() }
    );
    await receiver.start();
    const address = receiver.address();
    if (!address) throw new Error('receiver is not listening');
    target = `127.0.0.1:${address.port}`;
    exporter = new OtlpGrpcExporter('otlp/out', { ...exporterSettings(), endpoint: target, headers: {} });
    await exporter.start();
  });

  afterEach(async () => {
    await exporter.shutdown();
    await receiver.stop();
  });

  function callExport(request: object): Promise<object> {
    const method = exportMethod('traces');
    const client = new grpc.Client(target, grpc.credentials.createInsecure());
    return new Promise((resolve, reject) => {
      client.makeUnaryRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        request,
        (error: grpc.ServiceError | null, response?: object) => {
          client.close();
          if (error) {
            reject(error);
          } else {
            resolve(response ?? {});
          }
        }
      );
    });
  }

  it('receives spans sent by the OTLP/gRPC exporter', async () => {
    await expect(exporter.checkConnectivity()).resolves.toBe(true);

    const result = await exporter.export(createBatch('traces', 'otlp', [makeSpan()]));

    expect(result).toEqual({ status: 'success' });
    expect(sink.batches[0].records[0]).toMatchObject({
      traceId: TRACE_ID,
      spanId: SPAN_ID,
      name: 'checkout',
      serviceName: 'checkout-service',
    });
  });

  it('answers UNAVAILABLE when the pipeline refuses', async () => {
    sink.result = 'refused';

    const failure = failureOf(await exporter.export(createBatch('traces', 'otlp', [makeSpan()])));

    expect(failure.retryable).toBe(true);
    expect(failure.error.category).toBe(ExportErrorCategory.SERVICE_UNAVAILABLE);
    expect(failure.error.message).toBe('gRPC UNAVAILABLE: memory limit exceeded, retry later');
  });

  it('answers UNIMPLEMENTED for a signal no pipeline takes', async () => {
    sink.signals = ['metrics'];

    const failure = failureOf(await exporter.export(createBatch('traces', 'otlp', [makeSpan()])));

    expect(failure.retryable).toBe(false);
    expect(failure.error.category).toBe(ExportErrorCategory.NOT_FOUND);
    expect(failure.error.message).toBe('gRPC UNIMPLEMENTED: no traces pipeline for receiver otlp');
  });

  it('answers a partial success for spans with invalid ids', async () => {
    const response = await callExport({
      resourceSpans: [
        {
          scopeSpans: [
            {
              spans: [
                { traceId: Buffer.alloc(16), spanId: Buffer.from(SPAN_ID, 'hex'), name: 'broken' },
                { traceId: Buffer.from(TRACE_ID, 'hex'), spanId: Buffer.from(SPAN_ID, 'hex'), name: 'fine' },
              ],
            },
          ],
        },
      ],
    });

    expect(response).toEqual({
      partialSuccess: { rejectedSpans: '1', errorMessage: '1 spans could not be decoded' },
    });
    expect(sink.batches[0].records.map((record) => record.name)).toEqual(['fine']);
  });

  it('stops listening on stop', async () => {
    expect(receiver.listening).toBe(true);

    await receiver.stop();

    expect(receiver.listening).toBe(false);
  });
});
