/**
 * Types shared by the metrics collector and the Prometheus formatter.
 */

export interface MetricsConfig {
  /** Expose the /metrics endpoint (default: true) */
  enabled?: boolean;

  /** Add a `field` label with the mutation field name to call counters (default: false) */
  perFieldMetrics?: boolean;

  /** Cap on distinct `field` label values (default: 100) */
  maxLabeledFields?: number;

  /** Histogram bucket boundaries in seconds */
  histogramBuckets?: number[];

  /** Prefix of every metric name (default: 'mutation_stream') */
  prefix?: string;
}

// ---------------------------------------------------------------------------
// Snapshot types
// ---------------------------------------------------------------------------

export type MetricLabels = Record<string, string>;

export interface LabeledValue {
  labels: MetricLabels;
  value: number;
}

/** Monotonic counter */
export interface CounterMetric {
  name: string;
  help: string;
  values: LabeledValue[];
}

/** Value sampled at scrape time */
export interface GaugeMetric {
  name: string;
  help: string;
  value: number;
}

export interface HistogramSample {
  labels: MetricLabels;
  count: number;
  sum: number;
  /** Cumulative counts, parallel to the histogram's buckets */
  bucketCounts: number[];
}

export interface HistogramMetric {
  name: string;
  help: string;
  /** Upper bounds, ascending */
  buckets: number[];
  samples: HistogramSample[];
}

/** Outcome label of a finished dispatch */
export type DispatchResult = 'succeeded' | 'failed';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Default buckets in seconds, sized for event store append latency */
export const DEFAULT_HISTOGRAM_BUCKETS: readonly number[] = [
  0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10,
];

export const DEFAULT_METRICS_PREFIX = 'mutation_stream';

export const DEFAULT_MAX_LABELED_FIELDS = 100;
