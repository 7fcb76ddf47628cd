/**
 * Schema Types
 *
 * Canonical in-memory views of raw benchmark payloads. Every supported
 * historical shape of a benchmark type is projected onto one view so that
 * extraction, filtering and aggregation never look at raw JSON.
 *
 * @packageDocumentation
 * @module schema/types
 */

import type { DeviceClass, Framework } from '../hardware/types'

export const BENCHMARK_TYPES = ['llama', 'reversan', 'sevenzip', 'blender'] as const

export type BenchmarkType = (typeof BENCHMARK_TYPES)[number]

/**
 * Which historical shape a payload was recognised as.
 *
 * - `unified`: device-centric format, runs reference an inventory by `hw_id`
 * - `legacy`: per-tool run lists, devices inferred from run metadata
 * - `device-runs`: legacy runs grouped per device
 * - `empty`: nothing recognisable
 */
export type PayloadFormat = 'unified' | 'legacy' | 'device-runs' | 'empty'

/**
 * Opaque JSON document as received.
 */
export type JsonObject = Record<string, unknown>

/**
 * Which device produced a run. All fields are `null` for tools that do not
 * tag runs with a device.
 */
export interface DeviceTag {
  deviceClass: DeviceClass | null
  deviceName: string | null
  /** Inventory reference of the unified format (`gpu-0`) */
  hwId: string | null
  /** Device id derived from the resolved name */
  deviceSlug: string | null
}

export interface LlamaRun extends DeviceTag {
  benchmark: 'llama'
  /** Model type, or model size in GiB when the type is missing */
  modelBucket: string | null
  threads: number | null
  /** Generation throughput */
  tokensPerSecond: number | null
  promptTokensPerSecond: number | null
  elapsedSeconds: number | null
}

export type ReversanSeries = 'depth' | 'threads'

export interface ReversanRun extends DeviceTag {
  benchmark: 'reversan'
  series: ReversanSeries
  depth: number | null
  threads: number | null
  elapsedSeconds: number | null
  maxRssKb: number | null
}

export interface SevenzipRun extends DeviceTag {
  benchmark: 'sevenzip'
  threads: number | null
  compressionSpeedMbS: number | null
  elapsedSeconds: number | null
  compressionRatio: number | null
  totalMips: number | null
  ruMips: number | null
  usagePercent: number | null
}

export interface BlenderRun extends DeviceTag {
  benchmark: 'blender'
  scene: string
  framework: Framework | null
  samplesPerMinute: number | null
  renderSeconds: number | null
  peakMemory: number | null
}

export type RunRecord = LlamaRun | ReversanRun | SevenzipRun | BlenderRun

/**
 * Run record type for a benchmark.
 */
export type RunOf<B extends BenchmarkType> = Extract<RunRecord, { benchmark: B }>

/**
 * One entry of the unified format's `meta.hardware` map.
 */
export interface InventoryEntry {
  hwId: string
  name: string
  type?: DeviceClass
  manufacturer?: string
  cores?: number
  threads?: number
  framework?: Framework
  driverVersion?: string
  memoryMb?: number
}

/**
 * A device name a tool reported outside of its runs: system-info blocks,
 * GPU selection lists, renderer device listings.
 */
export interface ListedDevice {
  name: string
  classHint?: DeviceClass
  cores?: number
  threads?: number
  framework?: Framework
  source: string
}

/**
 * Canonical view of one payload.
 *
 * @example
 * ```typescript
 * const llama = view('llama', payload)
 * if (llama.format === 'unified') {
 *   console.log(llama.runs.map((run) => run.tokensPerSecond))
 * }
 * ```
 */
export interface BenchmarkView<B extends BenchmarkType = BenchmarkType> {
  benchmark: B
  format: PayloadFormat
  inventory: InventoryEntry[]
  listedDevices: ListedDevice[]
  /** Build/compile time in seconds; non-positive values are reported as `null` */
  compileSeconds: number | null
  runs: RunOf<B>[]
  /** Malformed records that were skipped while parsing */
  skipped: number
}

/**
 * One stored payload: the document of one benchmark type from one upload,
 * kept exactly as received.
 */
export interface RawBenchmarkPayload {
  uploadId: string
  benchmark: BenchmarkType
  /** ISO-8601 time the payload was stored */
  storedAt: string
  document: JsonObject
}
