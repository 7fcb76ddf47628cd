/**
 * Schema Module
 *
 * Payload shapes and their canonical views.
 */

export {
  detectBenchmarkType,
  isJsonObject,
  isUnifiedDocument,
  parseBenchmarkType,
  payloadsFromDocument,
  splitUnifiedDocument,
  unwrap,
  view,
} from './normalizer'
export type {
  BenchmarkType,
  BenchmarkView,
  BlenderRun,
  DeviceTag,
  InventoryEntry,
  JsonObject,
  ListedDevice,
  LlamaRun,
  PayloadFormat,
  RawBenchmarkPayload,
  ReversanRun,
  ReversanSeries,
  RunOf,
  RunRecord,
  SevenzipRun,
} from './types'
export { BENCHMARK_TYPES } from './types'
