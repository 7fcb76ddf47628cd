/**
 * Bench Engine Types
 *
 * @packageDocumentation
 * @module engine/types
 */

import type { AggregationResult } from '../aggregation/types'
import type { RigbenchConfig } from '../config/types'
import type { PayloadSet } from '../hardware/extractor'
import type { HardwareDevice, HardwareHint } from '../hardware/types'
import type { BenchmarkType } from '../schema/types'
import type { BenchStore } from '../store/types'
import type { Logger } from '../utils/logger'

/**
 * @example
 * ```typescript
 * const config: BenchEngineConfig = {
 *   store: new FileStore('./data'),
 *   classification: { ...DEFAULT_CONFIG.classification, defaultClass: 'cpu' },
 * }
 * ```
 */
export interface BenchEngineConfig {
  store: BenchStore
  /** Classification settings (default: `DEFAULT_CONFIG.classification`) */
  classification: RigbenchConfig['classification']
  logger?: Logger
  /** Clock used for `storedAt` (default: `() => new Date()`) */
  now?: () => Date
}

/**
 * The payloads of one upload plus an optional hardware description.
 */
export interface Upload {
  payloads: PayloadSet
  hint?: HardwareHint
  /** Upload id; a ULID is generated when omitted */
  uploadId?: string
}

/**
 * - `created`: the id was new
 * - `renamed`: the stored name was replaced by a more specific one
 * - `unchanged`: the stored record was kept as is
 */
export type DeviceChange = 'created' | 'renamed' | 'unchanged'

export interface IngestedDevice {
  device: HardwareDevice
  change: DeviceChange
}

export interface IngestResult {
  uploadId: string
  devices: IngestedDevice[]
  /** Which payloads were stored under which device */
  stored: { deviceId: string; benchmark: BenchmarkType }[]
}

export interface BenchmarkReport {
  benchmark: BenchmarkType
  payloadCount: number
  /** Median build/compile time across uploads, `null` without positive samples */
  buildSeconds: number | null
  aggregation: AggregationResult
}

export interface DeviceReport {
  device: HardwareDevice
  benchmarks: BenchmarkReport[]
}

export interface DeviceSummary {
  device: HardwareDevice
  payloadCounts: Record<BenchmarkType, number>
  /** Latest `storedAt` over the device's payloads */
  lastUploadAt: string | null
}
