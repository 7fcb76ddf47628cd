/**
 * Engine Module
 *
 * Ingestion, reporting and device listing over a store.
 */

export { BenchEngine, DeviceNotFoundError } from './BenchEngine'

export type {
  BenchEngineConfig,
  BenchmarkReport,
  DeviceChange,
  DeviceReport,
  DeviceSummary,
  IngestedDevice,
  IngestResult,
  Upload,
} from './types'
