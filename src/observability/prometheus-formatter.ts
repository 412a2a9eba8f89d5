/**
 * Prometheus text exposition format, version 0.0.4.
 *
 * @see https://prometheus.io/docs/instrumenting/exposition_formats/
 */

import type {
  CounterMetric,
  GaugeMetric,
  HistogramMetric,
  MetricLabels,
} from './types.js';
import { DEFAULT_METRICS_PREFIX } from './types.js';

export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

/** Backslash, double quote and newline are escaped inside label values */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function escapeHelp(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}

function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return '+Inf';
  if (value === -Infinity) return '-Inf';
  return Object.is(value, -0) ? '0' : String(value);
}

/** `{a="1",b="2"}`, or '' for no labels; `le` is appended last when given */
function formatLabels(labels: MetricLabels, le?: string): string {
  const parts = Object.entries(labels).map(([k, v]) => `${k}="${escapeLabelValue(v)}"`);
  if (le !== undefined) parts.push(`le="${le}"`);
  return parts.length > 0 ? `{${parts.join(',')}}` : '';
}

function header(lines: string[], name: string, help: string, type: string): void {
  lines.push(`# HELP ${name} ${escapeHelp(help)}`);
  lines.push(`# TYPE ${name} ${type}`);
}

export function formatMetrics(
  counters: CounterMetric[],
  gauges: GaugeMetric[],
  histograms: HistogramMetric[],
  prefix: string = DEFAULT_METRICS_PREFIX,
): string {
  const lines: string[] = [];

  for (const counter of counters) {
    const name = `${prefix}_${counter.name}`;
    header(lines, name, counter.help, 'counter');
    for (const { labels, value } of counter.values) {
      lines.push(`${name}${formatLabels(labels)} ${formatNumber(value)}`);
    }
  }

  for (const gauge of gauges) {
    const name = `${prefix}_${gauge.name}`;
    header(lines, name, gauge.help, 'gauge');
    lines.push(`${name} ${formatNumber(gauge.value)}`);
  }

  for (const histogram of histograms) {
    const name = `${prefix}_${histogram.name}`;
    header(lines, name, histogram.help, 'histogram');

    for (const sample of histogram.samples) {
      histogram.buckets.forEach((bound, i) => {
        const labels = formatLabels(sample.labels, formatNumber(bound));
        lines.push(`${name}_bucket${labels} ${sample.bucketCounts[i] ?? 0}`);
      });
      lines.push(`${name}_bucket${formatLabels(sample.labels, '+Inf')} ${sample.count}`);
      lines.push(`${name}_sum${formatLabels(sample.labels)} ${formatNumber(sample.sum)}`);
      lines.push(`${name}_count${formatLabels(sample.labels)} ${sample.count}`);
    }
  }

  return lines.length === 0 ? '' : `${lines.join('\n')}\n`;
}
