/**
 * OTLP protobuf definitions, loaded at run time from apps/relay/proto.
 *
 * The same method definitions drive the gRPC server and client and the
 * protobuf encoding of the HTTP receiver and exporter, so every binding decodes
 * into one object shape: camelCase fields, int64 as decimal strings, enums as
 * numbers, bytes as Buffers.
 */

import { fileURLToPath } from 'url';
import * as protoLoader from '@grpc/proto-loader';
import type { Signal } from '@telemetry-relay/core';

const PROTO_ROOT = fileURLToPath(new URL('../../proto', import.meta.url));

const SERVICE_NAMES: Record<Signal, string> = {
  traces: 'opentelemetry.proto.collector.trace.v1.TraceService',
  metrics: 'opentelemetry.proto.collector.metrics.v1.MetricsService',
};

const PROTO_FILES = [
  'opentelemetry/proto/collector/trace/v1/trace_service.proto',
  'opentelemetry/proto/collector/metrics/v1/metrics_service.proto',
];

export const PROTO_LOADER_OPTIONS: protoLoader.Options = {
  keepCase: false,
  longs: String,
  enums: Number,
  defaults: false,
  arrays: true,
  oneofs: false,
  includeDirs: [PROTO_ROOT],
};

export type OtlpMethod = protoLoader.MethodDefinition<object, object>;

export interface OtlpServiceDefinitions {
  traces: protoLoader.ServiceDefinition;
  metrics: protoLoader.ServiceDefinition;
}

let definitions: OtlpServiceDefinitions | undefined;

export function loadOtlpServices(): OtlpServiceDefinitions {
  if (!definitions) {
    const packageDefinition = protoLoader.loadSync(PROTO_FILES, PROTO_LOADER_OPTIONS);
    definitions = {
      traces: requireService(packageDefinition, SERVICE_NAMES.traces),
      metrics: requireService(packageDefinition, SERVICE_NAMES.metrics),
    };
  }
  return definitions;
}

/** The unary Export method of a signal's collector service. */
export function exportMethod(signal: Signal): OtlpMethod {
  const method = loadOtlpServices()[signal]['Export'];
  if (!method) {
    throw new Error(`${SERVICE_NAMES[signal]} has no Export method`);
  }
  return method;
}

function requireService(
  packageDefinition: protoLoader.PackageDefinition,
  name: string
): protoLoader.ServiceDefinition {
  const definition = packageDefinition[name];
  if (!isServiceDefinition(definition)) {
    throw new Error(`${name} is missing from the OTLP proto definitions`);
  }
  return definition;
}

function isServiceDefinition(
  definition: protoLoader.AnyDefinition | undefined
): definition is protoLoader.ServiceDefinition {
  // message and enum definitions carry a `format` tag, services do not
  return definition !== undefined && !('format' in definition);
}
