export type {
  CollectMetrics,
  ReportMetrics,
  MetricData,
  MetricEvent,
} from './types.js'
export { createMetricEvent } from './types.js'
export { emitMetric, appendMetricsFile, recordMetric, METRICS_FILE_NAME } from './sink.js'
export type { MetricsSettings } from './sink.js'
