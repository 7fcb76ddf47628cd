/**
 * Hardware Types
 *
 * Canonical device identities and the inputs used to discover them.
 *
 * @module hardware/types
 */

export const DEVICE_CLASSES = ['cpu', 'gpu'] as const

export type DeviceClass = (typeof DEVICE_CLASSES)[number]

/**
 * Vendor names used by the default pattern tables. Configuration may add
 * further vendors, so stored records carry a plain string.
 */
export type KnownManufacturer = 'Intel' | 'AMD' | 'NVIDIA' | 'Apple' | 'Qualcomm' | 'ARM' | 'Unknown'

export const FRAMEWORKS = ['CUDA', 'HIP', 'VULKAN', 'METAL', 'OPENCL', 'OPTIX', 'ONEAPI', 'SYCL'] as const

export type Framework = (typeof FRAMEWORKS)[number]

/**
 * One physical CPU or GPU.
 *
 * @example
 * ```typescript
 * const gpu: HardwareDevice = {
 *   id: 'nvidia-geforce-rtx-3090',
 *   name: 'NVIDIA GeForce RTX 3090',
 *   type: 'gpu',
 *   manufacturer: 'NVIDIA',
 *   framework: 'VULKAN',
 * }
 * ```
 */
export interface HardwareDevice {
  /** Slug of the normalized name the device was first seen under */
  id: string
  /** Most specific display name observed so far */
  name: string
  type: DeviceClass
  manufacturer: string
  /** CPU only */
  cores?: number
  /** CPU only */
  threads?: number
  /** GPU only: compute backend */
  framework?: Framework
}

/**
 * Free-text hardware description supplied next to an upload.
 *
 * `cpu` and `gpu` are taken as-is for their class; `description` is a
 * comma-separated list whose elements are classified by name.
 */
export interface HardwareHint {
  cpu?: string
  gpu?: string
  description?: string
}

/**
 * A provisional identity pulled from one payload, before deduplication.
 */
export interface DeviceCandidate {
  name: string
  /** Class the source field implies, if it implies one */
  classHint?: DeviceClass
  manufacturer?: string
  cores?: number
  threads?: number
  framework?: Framework
  /** Where the candidate came from, for diagnostics (e.g. `llama:inventory`) */
  source: string
}

export type ClassificationRule =
  | 'cpu-hint'
  | 'cpu-family'
  | 'gpu-family'
  | 'generic-gpu'
  | 'cpu-vendor'
  | 'call-site-hint'
  | 'default'

export interface Classification {
  manufacturer: string
  deviceClass: DeviceClass
  /** Which rule decided the class */
  rule: ClassificationRule
}
