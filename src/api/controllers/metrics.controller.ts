/**
 * Metrics Controller
 *
 * Exposes application metrics in Prometheus text format
 * Format: https://prometheus.io/docs/instrumenting/exposition_formats/
 */

import { Request, Response } from 'express';
import { metrics } from '@/adapters/metrics/MetricsFactory';
import { InMemoryMetrics, MetricsSnapshot } from '@/adapters/metrics/InMemoryMetrics';
import { env } from '@/config/env';

/**
 * 'analysis.run_duration' -> 'analysis_run_duration'
 */
export function toPrometheusName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_]/g, '_');
}

/**
 * Label values escape backslash, double quote and line feed
 */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function labels(dimensions: Record<string, string>, extra: Record<string, string> = {}): string {
  const entries = Object.entries({ ...dimensions, ...extra });
  if (entries.length === 0) return '';
  const rendered = entries.map(([key, value]) => `${toPrometheusName(key)}="${escapeLabelValue(value)}"`);
  return `{${rendered.join(',')}}`;
}

/**
 * Render a metrics snapshot as Prometheus text lines
 */
export function renderSnapshot(snapshot: MetricsSnapshot): string[] {
  const lines: string[] = [];
  const declared = new Set<string>();
  const declare = (name: string, type: string) => {
    if (declared.has(name)) return;
    declared.add(name);
    lines.push(`# TYPE ${name} ${type}`);
  };

  for (const counter of snapshot.counters) {
    const name = `${toPrometheusName(counter.name)}_total`;
    declare(name, 'counter');
    lines.push(`${name}${labels(counter.dimensions)} ${counter.value}`);
  }

  for (const gauge of snapshot.gauges) {
    const name = toPrometheusName(gauge.name);
    declare(name, 'gauge');
    lines.push(`${name}${labels(gauge.dimensions)} ${gauge.value}`);
  }

  for (const timing of snapshot.timings) {
    const name = `${toPrometheusName(timing.name)}_ms`;
    declare(name, 'summary');
    lines.push(`${name}${labels(timing.dimensions, { quantile: '0.5' })} ${timing.p50}`);
    lines.push(`${name}${labels(timing.dimensions, { quantile: '0.95' })} ${timing.p95}`);
    lines.push(`${name}${labels(timing.dimensions, { quantile: '0.99' })} ${timing.p99}`);
    lines.push(`${name}_sum${labels(timing.dimensions)} ${timing.sum}`);
    lines.push(`${name}_count${labels(timing.dimensions)} ${timing.count}`);
  }

  return lines;
}

/**
 * GET /api/metrics
 *
 * Application metrics (when collected in memory) followed by process metrics
 */
export async function getMetrics(_req: Request, res: Response): Promise<void> {
  const lines: string[] = [];

  if (metrics instanceof InMemoryMetrics) {
    lines.push(...renderSnapshot(metrics.snapshot()));
    lines.push('');
  }

  lines.push('# HELP process_uptime_seconds Process uptime in seconds');
  lines.push('# TYPE process_uptime_seconds gauge');
  lines.push(`process_uptime_seconds ${process.uptime()}`);
  lines.push('');

  const memUsage = process.memoryUsage();

  lines.push('# HELP process_heap_used_bytes Process heap memory used in bytes');
  lines.push('# TYPE process_heap_used_bytes gauge');
  lines.push(`process_heap_used_bytes ${memUsage.heapUsed}`);
  lines.push('');

  lines.push('# HELP process_rss_bytes Process resident set size in bytes');
  lines.push('# TYPE process_rss_bytes gauge');
  lines.push(`process_rss_bytes ${memUsage.rss}`);
  lines.push('');

  const cpuUsage = process.cpuUsage();

  lines.push('# HELP process_cpu_user_seconds_total Total user CPU time in seconds');
  lines.push('# TYPE process_cpu_user_seconds_total counter');
  lines.push(`process_cpu_user_seconds_total ${cpuUsage.user / 1_000_000}`);
  lines.push('');

  lines.push('# HELP app_info Application information');
  lines.push('# TYPE app_info gauge');
  lines.push(`app_info{version="1.0.0",node_version="${process.version}",env="${env.NODE_ENV}"} 1`);
  lines.push('');

  res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
  res.send(lines.join('\n'));
}
