/**
 * @rigbench/core
 *
 * Hardware identity resolution and benchmark aggregation.
 *
 * @example
 * ```typescript
 * import { BenchEngine, FileStore, loadConfig, payloadsFromDocument } from '@rigbench/core'
 *
 * const config = await loadConfig()
 * const engine = new BenchEngine({
 *   store: new FileStore(config.storage.dataDir),
 *   classification: config.classification,
 * })
 *
 * const { devices } = await engine.ingest({ payloads: payloadsFromDocument(document) })
 * for (const { device } of devices) {
 *   const report = await engine.report(device.id)
 *   console.log(report.benchmarks)
 * }
 * ```
 */

// Aggregation - medians per benchmark-specific group
export {
  type AggregatedGroup,
  type AggregationResult,
  aggregate,
  aggregatePayloads,
  finiteSorted,
  type GroupDimension,
  type GroupKeyValue,
  METRICS,
  type MetricName,
  median,
} from './aggregation'
// Config - Configuration management
export {
  ConfigError,
  type ConfigLoaderOptions,
  DEFAULT_CONFIG,
  DEFAULT_DATA_DIR,
  getDefaultConfig,
  loadConfig,
  loadConfigFromEnv,
  loadConfigFromFile,
  mergeConfig,
  type RigbenchConfig,
  type RigbenchConfigOverrides,
} from './config'
// Engine - ingestion and reports
export {
  BenchEngine,
  type BenchEngineConfig,
  type BenchmarkReport,
  type DeviceChange,
  DeviceNotFoundError,
  type DeviceReport,
  type DeviceSummary,
  type IngestedDevice,
  type IngestResult,
  type Upload,
} from './engine'
// Hardware - naming, classification, matching and extraction
export * from './hardware'
// Runs - per-device run filtering
export { belongsTo, containsDevice, filterRuns, filterView } from './runs'
// Schema - payload formats and canonical views
export * from './schema'
// Store - persistence
export * from './store'
// Utils
export {
  createLogger,
  type LogFields,
  Logger,
  type LoggerOptions,
  type LogLevel,
  type LogSink,
  logger,
} from './utils/logger'
