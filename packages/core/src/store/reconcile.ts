import { isMoreSpecific } from '../hardware/matcher'
import type { HardwareDevice } from '../hardware/types'
import type { RawBenchmarkPayload } from '../schema/types'

/**
 * Stored record after an upsert of `incoming`: the existing record with its
 * name replaced when the incoming name is strictly more specific. Names are
 * never downgraded and no other field changes.
 */
export function reconcileDevice(existing: HardwareDevice | undefined, incoming: HardwareDevice): HardwareDevice {
  if (!existing) return structuredClone(incoming)
  if (!isMoreSpecific(incoming.name, existing.name)) return structuredClone(existing)
  return { ...structuredClone(existing), name: incoming.name }
}

export function comparePayloads(a: RawBenchmarkPayload, b: RawBenchmarkPayload): number {
  if (a.storedAt !== b.storedAt) return a.storedAt < b.storedAt ? -1 : 1
  if (a.uploadId === b.uploadId) return 0
  return a.uploadId < b.uploadId ? -1 : 1
}
