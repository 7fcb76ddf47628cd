/**
 * Aggregation Engine
 *
 * Groups a device's runs by a fixed per-benchmark key and reports medians.
 * Pure: the result depends only on the multiset of runs, not their order.
 *
 * @packageDocumentation
 * @module aggregation/engine
 */

import type { HardwareDevice } from '../hardware/types'
import { filterRuns } from '../runs/filter'
import type { BenchmarkType, RawBenchmarkPayload, RunRecord } from '../schema/types'
import { finiteSorted, median } from './median'
import { type AggregatedGroup, type AggregationResult, type GroupDimension, type GroupKeyValue, METRICS } from './types'

interface GroupSlot {
  dimension: GroupDimension
  key: Record<string, GroupKeyValue>
  label: string
}

const DIMENSION_ORDER: readonly GroupDimension[] = ['model-threads', 'depth', 'threads', 'device-scene']

function slotOf(run: RunRecord, device: HardwareDevice): GroupSlot {
  switch (run.benchmark) {
    case 'llama':
      return {
        dimension: 'model-threads',
        key: { model: run.modelBucket, threads: run.threads },
        label: `${run.modelBucket ?? 'unknown model'} @ ${run.threads ?? '?'} threads`,
      }
    case 'reversan':
      return run.series === 'depth'
        ? { dimension: 'depth', key: { depth: run.depth }, label: `depth ${run.depth ?? '?'}` }
        : { dimension: 'threads', key: { threads: run.threads }, label: `${run.threads ?? '?'} threads` }
    case 'sevenzip':
      return {
        dimension: 'threads',
        key: { threads: run.threads },
        label: run.threads === null ? 'all threads' : `${run.threads} threads`,
      }
    case 'blender':
      return {
        dimension: 'device-scene',
        key: { device: device.name, scene: run.scene },
        label: `${device.name} / ${run.scene}`,
      }
  }
}

function metricsOf(run: RunRecord): Record<string, number | null> {
  switch (run.benchmark) {
    case 'llama': {
      const { tokensPerSecond, promptTokensPerSecond, elapsedSeconds } = run
      return { tokensPerSecond, promptTokensPerSecond, elapsedSeconds }
    }
    case 'reversan': {
      const { elapsedSeconds, maxRssKb } = run
      return { elapsedSeconds, maxRssKb }
    }
    case 'sevenzip': {
      const { compressionSpeedMbS, elapsedSeconds, compressionRatio, totalMips, ruMips, usagePercent } = run
      return { compressionSpeedMbS, elapsedSeconds, compressionRatio, totalMips, ruMips, usagePercent }
    }
    case 'blender': {
      const { samplesPerMinute, renderSeconds, peakMemory } = run
      return { samplesPerMinute, renderSeconds, peakMemory }
    }
  }
}

/**
 * Numbers ascending, strings in code-unit order, `null` last.
 */
function compareKeyValues(a: GroupKeyValue, b: GroupKeyValue): number {
  if (a === b) return 0
  if (a === null) return 1
  if (b === null) return -1
  if (typeof a === 'number' && typeof b === 'number') return a - b
  const left = String(a)
  const right = String(b)
  return left < right ? -1 : left > right ? 1 : 0
}

function compareGroups(a: GroupSlot, b: GroupSlot): number {
  const byDimension = DIMENSION_ORDER.indexOf(a.dimension) - DIMENSION_ORDER.indexOf(b.dimension)
  if (byDimension !== 0) return byDimension
  for (const field of Object.keys(a.key)) {
    const order = compareKeyValues(a.key[field] ?? null, b.key[field] ?? null)
    if (order !== 0) return order
  }
  return 0
}

/**
 * Group and summarise runs of one benchmark for one device. Runs of other
 * benchmarks are ignored. Returns a `no-data` marker when no finite value
 * survives.
 *
 * @example
 * ```typescript
 * const result = aggregate('llama', gpu, runs)
 * if (result.status === 'ok') console.log(result.groups[0]?.medians.tokensPerSecond)
 * ```
 */
export function aggregate(
  benchmark: BenchmarkType,
  device: HardwareDevice,
  runs: readonly RunRecord[],
): AggregationResult {
  const relevant = runs.filter((run) => run.benchmark === benchmark)
  if (relevant.length === 0) {
    return { status: 'no-data', benchmark, deviceId: device.id, reason: 'no runs for this device' }
  }

  const metrics: readonly string[] = METRICS[benchmark]
  const buckets = new Map<string, { slot: GroupSlot; runs: RunRecord[] }>()
  for (const run of relevant) {
    const slot = slotOf(run, device)
    const id = `${slot.dimension}:${JSON.stringify(slot.key)}`
    const bucket = buckets.get(id)
    if (bucket) {
      bucket.runs.push(run)
    } else {
      buckets.set(id, { slot, runs: [run] })
    }
  }

  let finiteCount = 0
  const groups: AggregatedGroup[] = [...buckets.values()]
    .sort((a, b) => compareGroups(a.slot, b.slot))
    .map(({ slot, runs: groupRuns }) => {
      const samples = groupRuns.map(metricsOf)
      const medians: Record<string, number | null> = {}
      const values: Record<string, number[]> = {}
      for (const metric of metrics) {
        const column = samples.map((sample) => sample[metric])
        const sorted = finiteSorted(column)
        values[metric] = sorted
        medians[metric] = median(column)
        finiteCount += sorted.length
      }
      return { ...slot, runCount: groupRuns.length, medians, values }
    })

  if (finiteCount === 0) {
    return { status: 'no-data', benchmark, deviceId: device.id, reason: 'no numeric values' }
  }
  return { status: 'ok', benchmark, deviceId: device.id, groups }
}

/**
 * Filter every payload of the benchmark down to the device's runs, then
 * aggregate them together.
 */
export function aggregatePayloads(
  benchmark: BenchmarkType,
  device: HardwareDevice,
  payloads: readonly RawBenchmarkPayload[],
): AggregationResult {
  const runs = payloads
    .filter((payload) => payload.benchmark === benchmark)
    .flatMap((payload) => filterRuns(payload, device))
  return aggregate(benchmark, device, runs)
}
