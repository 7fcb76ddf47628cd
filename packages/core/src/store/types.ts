/**
 * Store Types
 *
 * Persistence seams of the engine. Implementations hand out copies: a caller
 * mutating a returned object never changes what is stored.
 *
 * @module store/types
 */

import type { HardwareDevice } from '../hardware/types'
import type { BenchmarkType, RawBenchmarkPayload } from '../schema/types'

export interface DeviceStore {
  getById(id: string): Promise<HardwareDevice | null>
  /**
   * Insert the device, or, when its id exists, replace only the stored name
   * and only with a more specific one. Returns the stored record. Must be
   * atomic per id as seen by concurrent callers.
   */
  upsert(device: HardwareDevice): Promise<HardwareDevice>
  listAll(): Promise<HardwareDevice[]>
}

export interface PayloadHistoryStore {
  /**
   * Record a payload as containing data for a device. Appending the same
   * upload and benchmark twice for a device keeps one copy.
   */
  append(deviceId: string, payload: RawBenchmarkPayload): Promise<void>
  /**
   * Payloads of a device and benchmark, oldest first.
   */
  listPayloads(deviceId: string, benchmark: BenchmarkType): Promise<RawBenchmarkPayload[]>
}

export interface BenchStore extends DeviceStore, PayloadHistoryStore {}
