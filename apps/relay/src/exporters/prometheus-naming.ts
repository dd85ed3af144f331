/**
 * OTLP → Prometheus metric and label naming.
 */

import type { MetricPoint } from '@telemetry-relay/core';

const UNIT_SUFFIXES: Record<string, string> = {
  ms: 'milliseconds',
  s: 'seconds',
  us: 'microseconds',
  ns: 'nanoseconds',
  min: 'minutes',
  h: 'hours',
  By: 'bytes',
  KiBy: 'kibibytes',
  MiBy: 'mebibytes',
  GiBy: 'gibibytes',
  '%': 'percent',
};

const PER_UNIT_SUFFIXES: Record<string, string> = {
  s: 'second',
  min: 'minute',
  h: 'hour',
  d: 'day',
};

export function sanitizeMetricName(name: string): string {
  const cleaned = name.replace(/[^a-zA-Z0-9_:]/g, '_').replace(/__+/g, '_');
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}

export function sanitizeLabelName(name: string): string {
  const cleaned = name.replace(/[^a-zA-Z0-9_]/g, '_');
  if (/^[0-9]/.test(cleaned)) return `key_${cleaned}`;
  // names starting with __ are reserved for Prometheus itself
  return cleaned.startsWith('__') ? `key${cleaned}` : cleaned;
}

/**
 * Family name for a point: namespace prefix, sanitized name, and with
 * `addSuffixes` the unit suffix and `_total` for monotonic counters.
 */
export function prometheusName(point: MetricPoint, namespace: string, addSuffixes: boolean): string {
  let name = sanitizeMetricName(point.name);

  if (addSuffixes) {
    const unitSuffix = unitToSuffix(point);
    if (unitSuffix && !name.endsWith(`_${unitSuffix}`)) {
      name = `${name}_${unitSuffix}`;
    }
    if (point.kind === 'counter' && point.monotonic && !name.endsWith('_total')) {
      name = `${name}_total`;
    }
  }

  return namespace ? `${sanitizeMetricName(namespace)}_${name}` : name;
}

function unitToSuffix(point: MetricPoint): string | undefined {
  const unit = point.unit;
  if (!unit) return undefined;
  // {requests} style annotations carry no unit
  if (unit.startsWith('{')) return undefined;
  if (unit === '1') return point.kind === 'gauge' ? 'ratio' : undefined;

  const [numerator, denominator] = unit.split('/');
  if (numerator === '1' && denominator) {
    return `per_${PER_UNIT_SUFFIXES[denominator] ?? sanitizeLabelName(denominator)}`;
  }
  const head = UNIT_SUFFIXES[numerator] ?? sanitizeLabelName(numerator);
  if (!denominator) return head;
  return `${head}_per_${PER_UNIT_SUFFIXES[denominator] ?? sanitizeLabelName(denominator)}`;
}
