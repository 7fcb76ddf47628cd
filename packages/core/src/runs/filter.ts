/**
 * Run Filter
 *
 * Picks the runs of one device out of a payload that may interleave CPU
 * runs and runs of several GPUs. Re-derived per query; nothing is stored.
 *
 * @module runs/filter
 */

import { matches } from '../hardware/matcher'
import { matchKey } from '../hardware/names'
import type { HardwareDevice } from '../hardware/types'
import { view } from '../schema/normalizer'
import type { BenchmarkView, RawBenchmarkPayload, RunRecord } from '../schema/types'

/**
 * Whether a run belongs to a device.
 *
 * CPU devices take runs tagged `cpu` and runs of tools that do not tag
 * devices at all. A run that names a device without a class goes to a CPU
 * only when it names that CPU. GPU devices take runs whose device slug
 * equals the device id or whose device name matches; a run with neither is
 * never attributed to a GPU.
 */
export function belongsTo(run: RunRecord, device: HardwareDevice): boolean {
  if (device.type === 'cpu') {
    if (run.deviceClass === 'cpu') return true
    if (run.deviceClass !== null) return false
    if (run.deviceName === null && run.hwId === null) return true
    if (run.deviceSlug !== null && run.deviceSlug === device.id) return true
    return run.deviceName !== null && matchKey(run.deviceName) === matchKey(device.name)
  }
  if (run.deviceClass === 'cpu') return false
  if (run.deviceSlug !== null && run.deviceSlug === device.id) return true
  return run.deviceName !== null && matches(run.deviceName, device.name)
}

export function filterView(payloadView: BenchmarkView, device: HardwareDevice): RunRecord[] {
  return payloadView.runs.filter((run) => belongsTo(run, device))
}

/**
 * Runs of a stored payload that belong to the device.
 *
 * @example
 * ```typescript
 * const runs = filterRuns(payload, { id: 'nvidia-geforce-rtx-3090', name: 'NVIDIA GeForce RTX 3090', type: 'gpu', manufacturer: 'NVIDIA' })
 * ```
 */
export function filterRuns(payload: RawBenchmarkPayload, device: HardwareDevice): RunRecord[] {
  return filterView(view(payload.benchmark, payload.document), device)
}

/**
 * Whether a payload holds any run of the device.
 */
export function containsDevice(payload: RawBenchmarkPayload, device: HardwareDevice): boolean {
  return filterRuns(payload, device).length > 0
}
