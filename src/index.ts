export {
  parseConfig,
  defaultConfig,
  loadConfigFile,
  sweepstatConfigSchema,
  ConfigValidationError,
} from './config.js'
export type { SweepstatConfig, ConflictPolicy, SplitBy, ParseConfigOptions } from './config.js'

export {
  CONFIG_KEYS,
  CAPACITY_KEYS,
  CACHE_LEVELS,
  EMPTY_SUMMARY,
  UNKNOWN_CATEGORY,
  isConfigKey,
  createResultEntry,
} from './types.js'
export type {
  MetricValue,
  MetricRecord,
  ConfigKey,
  ConfigValueMap,
  ConfigRecord,
  CacheLevel,
  ResultEntry,
  ResultSet,
  ExtractionConflict,
  CollectDiagnostics,
  Summary,
} from './types.js'

export { UnknownParameterError, EmptyResultSetError } from './errors.js'
export type { AxisRole, EmptyResultReason } from './errors.js'

export { toKibibytes, toGigahertz, isCapacityString, formatCapacity, canonicalCapacity } from './units/normalize.js'

export { parseMetricLog, readMetricLog, parseNumericToken } from './parser/metric-log.js'
export type { MetricLogOptions, ParsedMetricLog } from './parser/metric-log.js'

export { buildExtractionRules } from './extract/rules.js'
export type { ExtractionRule, RuleTableOptions } from './extract/rules.js'
export { extractConfig, extractConfigFromPath, pathSegments } from './extract/extractor.js'
export type { ExtractOptions, ExtractionResult } from './extract/extractor.js'

export {
  DERIVED_METRIC_NAMES,
  DERIVED_METRICS,
  deriveMetric,
  deriveAll,
  isDerivedMetricName,
} from './derived/engine.js'
export type { DerivedMetricName, DerivedValue, DerivationBasis, DeriveOptions } from './derived/engine.js'
export { METRIC_ALIASES, resolveAlias } from './derived/aliases.js'

export { collect, findLogFiles } from './results/collect.js'
export {
  groupBy,
  groupByApplication,
  summarize,
  compareCategories,
  sortCategories,
  availableParameters,
} from './results/result-set.js'
export type { CategoryValue, ParameterInfo, ParameterKind } from './results/result-set.js'
export { resolveAxis, validAxisNames } from './results/axes.js'
export type { Axis, AxisKind } from './results/axes.js'

export { buildTableSections, renderTable } from './report/table.js'
export type { TableReport, TableSection, TableRow, TableRenderOptions } from './report/table.js'
export { buildPlotData, plotFileName, loadDefaultRenderer } from './report/plot.js'
export type { PlotData, PlotSeries, PlotPoint, PlotRenderer } from './report/plot.js'
export { summarizeSweep, renderSweepSummary } from './report/summary.js'
export type { SweepSummary, ApplicationSummary } from './report/summary.js'
export { runReport, listParameters, renderParameterList } from './report/report.js'
export type { ReportRequest, ReportDeps, ReportOutcome, ReportMode } from './report/report.js'

export { createMetricEvent, emitMetric, appendMetricsFile, recordMetric } from './metrics/index.js'
export type { MetricEvent, MetricData, CollectMetrics, ReportMetrics } from './metrics/index.js'

export { runCli } from './cli.js'
export type { CliIo } from './cli.js'
