/**
 * In-process metrics for the mutation pipeline.
 *
 * The interceptor and the dispatch tracker report into it directly; the
 * in-flight gauge is read lazily at scrape time through a provider callback.
 */

import type {
  CounterMetric,
  DispatchResult,
  GaugeMetric,
  HistogramMetric,
  MetricLabels,
  MetricsConfig,
} from './types.js';
import {
  DEFAULT_HISTOGRAM_BUCKETS,
  DEFAULT_MAX_LABELED_FIELDS,
  DEFAULT_METRICS_PREFIX,
} from './types.js';

// ---------------------------------------------------------------------------
// Internal state
// ---------------------------------------------------------------------------

interface CounterState {
  help: string;
  values: Map<string, { labels: MetricLabels; value: number }>;
}

interface HistogramState {
  help: string;
  samples: Map<string, { labels: MetricLabels; count: number; sum: number; bucketCounts: number[] }>;
}

/** Stable map key for a label set, independent of insertion order */
function labelsKey(labels: MetricLabels): string {
  return Object.keys(labels)
    .sort()
    .map((key) => `${key}=${labels[key] ?? ''}`)
    .join(',');
}

export const COUNTER_EXTRACTED = 'mutation_calls_extracted_total';
export const COUNTER_REJECTED = 'operations_rejected_total';
export const COUNTER_DISPATCHES = 'mutation_dispatches_total';
export const HISTOGRAM_DISPATCH_DURATION = 'dispatch_duration_seconds';

// ---------------------------------------------------------------------------
// MetricsCollector
// ---------------------------------------------------------------------------

export class MetricsCollector {
  readonly prefix: string;
  private readonly perFieldMetrics: boolean;
  private readonly maxLabeledFields: number;
  private readonly buckets: number[];
  private readonly counters = new Map<string, CounterState>();
  private readonly histograms = new Map<string, HistogramState>();
  private readonly labeledFields = new Set<string>();
  private pendingProvider: () => number = () => 0;

  constructor(config: MetricsConfig = {}) {
    this.prefix = config.prefix ?? DEFAULT_METRICS_PREFIX;
    this.perFieldMetrics = config.perFieldMetrics ?? false;
    this.maxLabeledFields = config.maxLabeledFields ?? DEFAULT_MAX_LABELED_FIELDS;
    this.buckets = config.histogramBuckets
      ? [...config.histogramBuckets].sort((a, b) => a - b)
      : [...DEFAULT_HISTOGRAM_BUCKETS];

    this.counters.set(COUNTER_EXTRACTED, {
      help: 'Mutation calls extracted from executed operations',
      values: new Map(),
    });
    this.counters.set(COUNTER_REJECTED, {
      help: 'Operations rejected during mutation extraction',
      values: new Map(),
    });
    this.counters.set(COUNTER_DISPATCHES, {
      help: 'Mutation calls handed to the sink, by outcome',
      values: new Map(),
    });
    this.histograms.set(HISTOGRAM_DISPATCH_DURATION, {
      help: 'Time from submission until the sink settled, in seconds',
      samples: new Map(),
    });
  }

  /** Source of the `dispatches_in_flight` gauge */
  setPendingProvider(provider: () => number): void {
    this.pendingProvider = provider;
  }

  // -------------------------------------------------------------------------
  // Recording
  // -------------------------------------------------------------------------

  recordExtracted(fieldName: string): void {
    this.increment(COUNTER_EXTRACTED, this.fieldLabels(fieldName));
  }

  recordRejected(code: string): void {
    this.increment(COUNTER_REJECTED, { code });
  }

  recordDispatch(fieldName: string, outcome: DispatchResult, durationSeconds: number): void {
    this.increment(COUNTER_DISPATCHES, { ...this.fieldLabels(fieldName), outcome });
    this.observe(HISTOGRAM_DISPATCH_DURATION, durationSeconds, {});
  }

  // -------------------------------------------------------------------------
  // Snapshots
  // -------------------------------------------------------------------------

  getCounters(): CounterMetric[] {
    return Array.from(this.counters, ([name, counter]) => ({
      name,
      help: counter.help,
      values: Array.from(counter.values.values(), (v) => ({ labels: v.labels, value: v.value })),
    }));
  }

  getGauges(): GaugeMetric[] {
    return [
      {
        name: 'dispatches_in_flight',
        help: 'Mutation calls submitted to the sink and not yet settled',
        value: this.pendingProvider(),
      },
    ];
  }

  getHistograms(): HistogramMetric[] {
    return Array.from(this.histograms, ([name, histogram]) => ({
      name,
      help: histogram.help,
      buckets: [...this.buckets],
      samples: Array.from(histogram.samples.values(), (s) => ({
        labels: s.labels,
        count: s.count,
        sum: s.sum,
        bucketCounts: [...s.bucketCounts],
      })),
    }));
  }

  /** Value of one counter series, 0 when never incremented */
  counterValue(name: string, labels: MetricLabels = {}): number {
    return this.counters.get(name)?.values.get(labelsKey(labels))?.value ?? 0;
  }

  reset(): void {
    for (const counter of this.counters.values()) counter.values.clear();
    for (const histogram of this.histograms.values()) histogram.samples.clear();
    this.labeledFields.clear();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /** `field` label, subject to the cardinality cap */
  private fieldLabels(fieldName: string): MetricLabels {
    if (!this.perFieldMetrics) return {};
    if (!this.labeledFields.has(fieldName)) {
      if (this.labeledFields.size >= this.maxLabeledFields) return {};
      this.labeledFields.add(fieldName);
    }
    return { field: fieldName };
  }

  private increment(name: string, labels: MetricLabels): void {
    const counter = this.counters.get(name);
    if (!counter) return;

    const key = labelsKey(labels);
    const existing = counter.values.get(key);
    if (existing) {
      existing.value++;
    } else {
      counter.values.set(key, { labels, value: 1 });
    }
  }

  private observe(name: string, value: number, labels: MetricLabels): void {
    const histogram = this.histograms.get(name);
    if (!histogram) return;

    const key = labelsKey(labels);
    let sample = histogram.samples.get(key);
    if (!sample) {
      sample = { labels, count: 0, sum: 0, bucketCounts: this.buckets.map(() => 0) };
      histogram.samples.set(key, sample);
    }

    sample.count++;
    sample.sum += value;
    const counts = sample.bucketCounts;
    this.buckets.forEach((bound, i) => {
      if (value <= bound) counts[i] = (counts[i] ?? 0) + 1;
    });
  }
}
