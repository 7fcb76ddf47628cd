/**
 * Aggregation Types
 *
 * @module aggregation/types
 */

import type { BenchmarkType } from '../schema/types'

/**
 * Metrics reported per benchmark, in report order.
 */
export const METRICS = {
  llama: ['tokensPerSecond', 'promptTokensPerSecond', 'elapsedSeconds'],
  reversan: ['elapsedSeconds', 'maxRssKb'],
  sevenzip: ['compressionSpeedMbS', 'elapsedSeconds', 'compressionRatio', 'totalMips', 'ruMips', 'usagePercent'],
  blender: ['samplesPerMinute', 'renderSeconds', 'peakMemory'],
} as const satisfies Record<BenchmarkType, readonly string[]>

export type MetricName<B extends BenchmarkType = BenchmarkType> = (typeof METRICS)[B][number]

/**
 * Parameter a group series is keyed by.
 *
 * - `model-threads`: llama, by model bucket and thread count
 * - `depth` / `threads`: reversan's two series; sevenzip uses `threads`
 * - `device-scene`: blender, by device and scene
 */
export type GroupDimension = 'model-threads' | 'depth' | 'threads' | 'device-scene'

export type GroupKeyValue = string | number | null

/**
 * Statistics of one group of runs.
 *
 * `medians[metric]` is `null` when the group has no finite value for the
 * metric; `values[metric]` holds the sorted values behind the median.
 */
export interface AggregatedGroup {
  dimension: GroupDimension
  key: Record<string, GroupKeyValue>
  label: string
  runCount: number
  medians: Record<string, number | null>
  values: Record<string, number[]>
}

export type AggregationResult =
  | {
      status: 'ok'
      benchmark: BenchmarkType
      deviceId: string
      groups: AggregatedGroup[]
    }
  | {
      status: 'no-data'
      benchmark: BenchmarkType
      deviceId: string
      reason: string
    }
