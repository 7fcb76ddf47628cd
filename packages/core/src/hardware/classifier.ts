/**
 * Manufacturer Classifier
 *
 * Decides whether a device name denotes a CPU or a GPU and which vendor
 * made it. All heuristics live in the pattern tables; this class only
 * applies them in a fixed order.
 *
 * @module hardware/classifier
 */

import { isPlaceholderName, normalizeName } from './names'
import { DEFAULT_PATTERN_TABLES, type PatternTables, type VendorPattern } from './patterns'
import type { Classification, DeviceClass } from './types'

export interface ClassifierOptions {
  tables?: PatternTables
  /** Class used when no rule and no call-site hint decides */
  defaultClass?: DeviceClass
}

const INTEGRATED_GPU_PATTERN = /\b(?:w\/|with)\s+((?:amd\s+|intel\s+)?(?:radeon|iris|uhd|arc|intel)\b[^,]*)$/i
const VENDOR_PREFIX_PATTERN = /^(?:amd|intel|nvidia)\b/i

/**
 * Classifies names by ordered rules:
 *
 * 1. explicit `cpu` hint
 * 2. CPU-only product family (`Ryzen`, `Xeon`, `Core i7`, ...)
 * 3. GPU-only product family (`GeForce`, `Radeon`, `RX 7900`, ...)
 * 4. generic `graphics` / `gpu`
 * 5. explicit `gpu` hint
 * 6. CPU vendor or generic CPU word (`Intel`, `AMD`, `CPU`)
 * 7. the configured default class
 *
 * A CPU family wins over GPU words so that `Ryzen 7 w/ Radeon Graphics`
 * stays a CPU. A bare vendor word never overrides a `gpu` hint, so a
 * device typed as a GPU named `Apple M1 Max` stays a GPU.
 *
 * @example
 * ```typescript
 * const classifier = new ManufacturerClassifier()
 * classifier.classify('NVIDIA GeForce RTX 3090')
 * // { manufacturer: 'NVIDIA', deviceClass: 'gpu', rule: 'gpu-family' }
 * ```
 */
export class ManufacturerClassifier {
  readonly tables: PatternTables
  readonly defaultClass: DeviceClass

  constructor(options: ClassifierOptions = {}) {
    this.tables = options.tables ?? DEFAULT_PATTERN_TABLES
    this.defaultClass = options.defaultClass ?? 'gpu'
  }

  classify(name: string, hint?: DeviceClass): Classification {
    const normalized = normalizeName(name)
    const { deviceClass, rule } = this.resolveClass(normalized, hint)
    return {
      manufacturer: this.manufacturerOf(normalized, deviceClass),
      deviceClass,
      rule,
    }
  }

  /**
   * Vendor lookup against the table for the given class. First pattern wins.
   */
  manufacturerOf(name: string, deviceClass: DeviceClass): string {
    const table: readonly VendorPattern[] = deviceClass === 'cpu' ? this.tables.cpuVendors : this.tables.gpuVendors
    const normalized = normalizeName(name)
    return table.find(({ pattern }) => pattern.test(normalized))?.manufacturer ?? 'Unknown'
  }

  isPlaceholder(name: string): boolean {
    return isPlaceholderName(name, this.tables.placeholders)
  }

  /**
   * Name of the integrated GPU embedded in a CPU string, with the CPU
   * vendor prepended when the embedded part has none.
   *
   * @example
   * classifier.integratedGpuName('AMD Ryzen 7 8845HS w/ Radeon 780M Graphics')
   * // 'AMD Radeon 780M Graphics'
   */
  integratedGpuName(cpuName: string): string | undefined {
    const normalized = normalizeName(cpuName)
    const match = INTEGRATED_GPU_PATTERN.exec(normalized)
    const embedded = match?.[1]?.trim()
    if (!embedded) return undefined
    if (VENDOR_PREFIX_PATTERN.test(embedded)) return embedded

    const vendor = this.manufacturerOf(normalized, 'cpu')
    return vendor === 'Unknown' ? embedded : `${vendor} ${embedded}`
  }

  private resolveClass(name: string, hint?: DeviceClass): Pick<Classification, 'deviceClass' | 'rule'> {
    const { tables } = this
    const test = (patterns: readonly RegExp[]) => patterns.some((pattern) => pattern.test(name))

    if (hint === 'cpu') return { deviceClass: 'cpu', rule: 'cpu-hint' }
    if (test(tables.cpuFamilies)) return { deviceClass: 'cpu', rule: 'cpu-family' }
    if (test(tables.gpuFamilies)) return { deviceClass: 'gpu', rule: 'gpu-family' }
    if (test(tables.genericGpu)) return { deviceClass: 'gpu', rule: 'generic-gpu' }
    if (hint === 'gpu') return { deviceClass: 'gpu', rule: 'call-site-hint' }
    if (test(tables.cpuFallback)) return { deviceClass: 'cpu', rule: 'cpu-vendor' }
    return { deviceClass: this.defaultClass, rule: 'default' }
  }
}
