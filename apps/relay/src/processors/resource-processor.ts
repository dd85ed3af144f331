/**
 * Resource Processor - static resource attribute actions
 *
 * Pure: returns a new batch with new records, in the same order. A span's
 * service name follows its `service.name` resource attribute.
 */

import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import {
  UNKNOWN_SERVICE,
  isSpan,
  withRecords,
  type AttributeValue,
  type Attributes,
  type TelemetryBatch,
  type TelemetryRecord,
} from '@telemetry-relay/core';
import type { ResourceAttributeAction, ResourceProcessorSettings } from '../config/schema.js';

export class ResourceProcessor {
  constructor(
    readonly id: string,
    private readonly settings: () => ResourceProcessorSettings
  ) {}

  process(batch: TelemetryBatch): TelemetryBatch {
    const { attributes: actions } = this.settings();
    // Records of one request usually share a resource object; map each once
    const rewritten = new Map<Attributes, Attributes>();

    const records = batch.records.map((record) => {
      let resource = rewritten.get(record.resource);
      if (!resource) {
        resource = applyResourceActions(record.resource, actions);
        rewritten.set(record.resource, resource);
      }
      return withResource(record, resource);
    });

    return withRecords(batch, records);
  }
}

export function applyResourceActions(resource: Attributes, actions: readonly ResourceAttributeAction[]): Attributes {
  const next: Record<string, AttributeValue> = { ...resource };

  for (const { key, value, action } of actions) {
    const present = Object.prototype.hasOwnProperty.call(next, key);
    switch (action) {
      case 'insert':
        if (!present && value !== undefined) next[key] = value;
        break;
      case 'update':
        if (present && value !== undefined) next[key] = value;
        break;
      case 'upsert':
        if (value !== undefined) next[key] = value;
        break;
      case 'delete':
        delete next[key];
        break;
    }
  }

  return next;
}

function withResource(record: TelemetryRecord, resource: Attributes): TelemetryRecord {
  if (isSpan(record)) {
    const serviceName = resource[ATTR_SERVICE_NAME];
    return {
      ...record,
      resource,
      serviceName: typeof serviceName === 'string' && serviceName.length > 0 ? serviceName : UNKNOWN_SERVICE,
    };
  }
  return { ...record, resource };
}
