export * from './types.js';
export {
  MetricsCollector,
  COUNTER_EXTRACTED,
  COUNTER_REJECTED,
  COUNTER_DISPATCHES,
  HISTOGRAM_DISPATCH_DURATION,
} from './metrics-collector.js';
export { formatMetrics, escapeLabelValue, PROMETHEUS_CONTENT_TYPE } from './prometheus-formatter.js';
export { createLogger, type LoggerOptions, type ComponentLogger } from './logger.js';
