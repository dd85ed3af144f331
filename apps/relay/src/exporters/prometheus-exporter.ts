/**
 * Prometheus Exporter - pull-based exposition
 *
 * Keeps the latest value of every series it has been sent and renders them at
 * GET /metrics on its own endpoint. Cumulative points replace the stored value,
 * delta points are added to it. Series not updated within
 * `metric_expiration` are forgotten.
 *
 * Counters and gauges are rendered through a prom-client Registry built per
 * scrape. Histograms arrive already aggregated and a prom-client Histogram can
 * only observe raw values, so histogram families are written out here as
 * `# TYPE <family> histogram` with their `_bucket`, `_sum` and `_count` series.
 *
 * Families whose exposed names clash with a family seen earlier are left out
 * of the scrape and counted.
 */

import express, { type Request, type Response } from 'express';
import { createServer, type Server } from 'http';
import { Counter, Gauge, Registry } from 'prom-client';
import { metricPoints, type MetricPoint, type TelemetryBatch } from '@telemetry-relay/core';
import type { PrometheusExporterSettings } from '../config/schema.js';
import { boundAddress, closeServer, listen, type Endpoint } from '../utils/http-server.js';
import type { RelayMetrics } from '../telemetry/self-metrics.js';
import { BaseExporter } from './exporter.js';
import { prometheusName, sanitizeLabelName } from './prometheus-naming.js';

type Labels = Record<string, string>;

// bucket bound label of the histogram exposition
const BUCKET_LABEL = 'le';

interface SeriesBase {
  family: string;
  help: string;
  labels: Labels;
  updatedAt: number;
}

interface ScalarSeries extends SeriesBase {
  kind: 'counter' | 'gauge';
  value: number;
}

interface HistogramSeries extends SeriesBase {
  kind: 'histogram';
  count: number;
  sum: number;
  bucketCounts: number[];
  explicitBounds: number[];
}

type Series = ScalarSeries | HistogramSeries;

export class PrometheusExporter extends BaseExporter<PrometheusExporterSettings> {
  private readonly series = new Map<string, Series>();
  private readonly clashesLogged = new Set<string>();
  private readonly app: express.Express;
  private readonly httpServer: Server;

  constructor(
    id: string,
    settings: PrometheusExporterSettings,
    private readonly metrics?: RelayMetrics
  ) {
    super(id, 'prometheus', settings);
    this.app = express();
    this.app.get('/metrics', (req: Request, res: Response) => {
      this.render()
        .then((body) => {
          res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
          res.send(body);
        })
        .catch((error: unknown) => {
          this.log.error('Failed to render metrics', { error });
          res.status(500).send('failed to render metrics');
        });
    });
    this.httpServer = createServer(this.app);
  }

  async start(): Promise<void> {
    const bound = await listen(this.httpServer, this.settings.endpoint);
    this.log.info(`Prometheus exposition on http://${bound.host}:${bound.port}/metrics`);
  }

  async checkConnectivity(): Promise<boolean> {
    return this.httpServer.listening;
  }

  async shutdown(): Promise<void> {
    await closeServer(this.httpServer);
  }

  address(): Endpoint | undefined {
    return boundAddress(this.httpServer);
  }

  get seriesCount(): number {
    return this.series.size;
  }

  protected async send(batch: TelemetryBatch): Promise<void> {
    const now = Date.now();
    for (const point of metricPoints(batch)) {
      this.absorb(point, now);
    }
    this.expire(now);
  }

  /** Text exposition of every live series. */
  async render(): Promise<string> {
    this.expire(Date.now());

    const registry = new Registry();
    const families = new Map<string, Series[]>();
    for (const series of this.series.values()) {
      const members = families.get(series.family);
      if (members) {
        members.push(series);
      } else {
        families.set(series.family, [series]);
      }
    }

    const taken = new Set<string>();
    const histograms: string[] = [];
    for (const [family, members] of families) {
      const kind = members[0].kind;
      const sameKind = members.filter((series) => series.kind === kind);
      if (sameKind.length < members.length) {
        this.log.warn('Metric family has series of different types; keeping one type', { family, kind });
      }

      const names = exposedNames(family, kind);
      const clash = names.find((name) => taken.has(name));
      if (clash) {
        this.skipFamily(family, clash);
        continue;
      }
      names.forEach((name) => taken.add(name));

      if (kind === 'histogram') {
        histograms.push(renderHistogramFamily(family, sameKind));
      } else {
        this.registerFamily(registry, family, sameKind);
      }
    }

    const registered = (await registry.metrics()).trim();
    const blocks = registered ? [registered, ...histograms] : histograms;
    return blocks.length > 0 ? `${blocks.join('\n\n')}\n` : '';
  }

  private skipFamily(family: string, clash: string): void {
    this.metrics?.recordSkippedFamily(this.id);
    if (!this.clashesLogged.has(family)) {
      this.clashesLogged.add(family);
      this.log.warn('Metric family left out of the scrape: its name is already taken', { family, name: clash });
    }
  }

  private absorb(point: MetricPoint, now: number): void {
    const { namespace, add_metric_suffixes } = this.settings;
    const family = prometheusName(point, namespace, add_metric_suffixes);
    const labels = this.labelsFor(point);
    const key = `${family}\u0000${JSON.stringify(Object.entries(labels).sort(([a], [b]) => a.localeCompare(b)))}`;
    const existing = this.series.get(key);
    const help = point.description || point.name;

    switch (point.kind) {
      case 'gauge':
        this.series.set(key, { kind: 'gauge', family, help, labels, updatedAt: now, value: point.value });
        break;

      case 'counter': {
        const kind = point.monotonic ? 'counter' : 'gauge';
        let value = point.value;
        if (point.temporality === 'delta' && existing && existing.kind !== 'histogram' && existing.kind === kind) {
          value += existing.value;
        }
        this.series.set(key, { kind, family, help, labels, updatedAt: now, value });
        break;
      }

      case 'histogram': {
        const bucketCounts = [...point.bucketCounts];
        let count = point.count;
        let sum = point.sum ?? 0;
        if (
          point.temporality === 'delta' &&
          existing?.kind === 'histogram' &&
          sameBounds(existing.explicitBounds, point.explicitBounds) &&
          existing.bucketCounts.length === bucketCounts.length
        ) {
          bucketCounts.forEach((value, index) => {
            bucketCounts[index] = value + existing.bucketCounts[index];
          });
          count += existing.count;
          sum += existing.sum;
        }
        this.series.set(key, {
          kind: 'histogram',
          family,
          help,
          labels,
          updatedAt: now,
          count,
          sum,
          bucketCounts,
          explicitBounds: [...point.explicitBounds],
        });
        break;
      }
    }
  }

  private labelsFor(point: MetricPoint): Labels {
    const labels: Labels = { ...this.settings.const_labels };

    if (this.settings.resource_to_telemetry_conversion.enabled) {
      for (const [key, value] of Object.entries(point.resource)) {
        labels[sanitizeLabelName(key)] = String(value);
      }
    }
    for (const [key, value] of Object.entries(point.labels)) {
      labels[sanitizeLabelName(key)] = String(value);
    }

    if (point.kind === 'histogram' && BUCKET_LABEL in labels) {
      labels[`key_${BUCKET_LABEL}`] = labels[BUCKET_LABEL];
      delete labels[BUCKET_LABEL];
    }
    return labels;
  }

  private expire(now: number): void {
    const cutoff = now - this.settings.metric_expiration;
    for (const [key, series] of this.series) {
      if (series.updatedAt < cutoff) {
        this.series.delete(key);
      }
    }
  }

  private registerFamily(registry: Registry, family: string, members: Series[]): void {
    const labelNames = [...new Set(members.flatMap((series) => Object.keys(series.labels)))].sort();
    const registers = [registry];
    const help = members[0].help;

    if (members[0].kind === 'gauge') {
      const gauge = new Gauge({ name: family, help, labelNames, registers });
      for (const series of members) {
        if (series.kind === 'gauge' && Number.isFinite(series.value)) {
          gauge.set(fillLabels(series.labels, labelNames), series.value);
        }
      }
      return;
    }

    const counter = new Counter({ name: family, help, labelNames, registers });
    for (const series of members) {
      if (series.kind === 'counter' && Number.isFinite(series.value) && series.value >= 0) {
        counter.inc(fillLabels(series.labels, labelNames), series.value);
      }
    }
  }
}

function exposedNames(family: string, kind: Series['kind']): string[] {
  return kind === 'histogram' ? [family, `${family}_bucket`, `${family}_sum`, `${family}_count`] : [family];
}

function renderHistogramFamily(family: string, members: Series[]): string {
  const lines = [`# HELP ${family} ${escapeHelp(members[0].help)}`, `# TYPE ${family} histogram`];

  for (const series of members) {
    if (series.kind !== 'histogram') continue;

    let cumulative = 0;
    series.explicitBounds.forEach((bound, index) => {
      cumulative += series.bucketCounts[index] ?? 0;
      lines.push(sample(`${family}_bucket`, series.labels, cumulative, formatValue(bound)));
    });
    lines.push(sample(`${family}_bucket`, series.labels, series.count, '+Inf'));
    lines.push(sample(`${family}_sum`, series.labels, series.sum));
    lines.push(sample(`${family}_count`, series.labels, series.count));
  }
  return lines.join('\n');
}

function sample(name: string, labels: Labels, value: number, bucket?: string): string {
  const pairs = Object.keys(labels)
    .sort()
    .map((key) => `${key}="${escapeLabelValue(labels[key])}"`);
  if (bucket !== undefined) {
    pairs.push(`${BUCKET_LABEL}="${bucket}"`);
  }
  return `${name}${pairs.length > 0 ? `{${pairs.join(',')}}` : ''} ${formatValue(value)}`;
}

function formatValue(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Number.POSITIVE_INFINITY) return '+Inf';
  if (value === Number.NEGATIVE_INFINITY) return '-Inf';
  return String(value);
}

function escapeHelp(help: string): string {
  return help.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function fillLabels(labels: Labels, labelNames: readonly string[]): Labels {
  const filled: Labels = {};
  for (const name of labelNames) {
    filled[name] = labels[name] ?? '';
  }
  return filled;
}

function sameBounds(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((bound, index) => bound === b[index]);
}
