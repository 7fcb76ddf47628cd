/**
 * Store Module
 *
 * Device records and payload history.
 */

export { FileStore, StoreError } from './file'
export { MemoryStore } from './memory'
export { comparePayloads, reconcileDevice } from './reconcile'
export type { BenchStore, DeviceStore, PayloadHistoryStore } from './types'
export { createUploadId, isUploadId, uploadIdTime } from './upload-id'
