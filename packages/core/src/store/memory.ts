import type { HardwareDevice } from '../hardware/types'
import type { BenchmarkType, RawBenchmarkPayload } from '../schema/types'
import { comparePayloads, reconcileDevice } from './reconcile'
import type { BenchStore } from './types'

/**
 * In-process store. Every read and write goes through `structuredClone`.
 *
 * @example
 * ```typescript
 * const engine = new BenchEngine({ store: new MemoryStore() })
 * ```
 */
export class MemoryStore implements BenchStore {
  private devices = new Map<string, HardwareDevice>()
  private payloads = new Map<string, RawBenchmarkPayload[]>()

  async getById(id: string): Promise<HardwareDevice | null> {
    const device = this.devices.get(id)
    return device ? structuredClone(device) : null
  }

  async upsert(device: HardwareDevice): Promise<HardwareDevice> {
    const stored = reconcileDevice(this.devices.get(device.id), device)
    this.devices.set(device.id, stored)
    return structuredClone(stored)
  }

  async listAll(): Promise<HardwareDevice[]> {
    return [...this.devices.values()].map((device) => structuredClone(device))
  }

  async append(deviceId: string, payload: RawBenchmarkPayload): Promise<void> {
    const history = this.payloads.get(deviceId) ?? []
    const duplicate = history.some(
      (existing) => existing.uploadId === payload.uploadId && existing.benchmark === payload.benchmark,
    )
    if (duplicate) return
    history.push(structuredClone(payload))
    this.payloads.set(deviceId, history)
  }

  async listPayloads(deviceId: string, benchmark: BenchmarkType): Promise<RawBenchmarkPayload[]> {
    return (this.payloads.get(deviceId) ?? [])
      .filter((payload) => payload.benchmark === benchmark)
      .sort(comparePayloads)
      .map((payload) => structuredClone(payload))
  }
}
