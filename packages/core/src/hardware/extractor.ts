/**
 * Hardware Extractor
 *
 * Turns the payloads of one upload into the canonical devices to persist.
 *
 * @packageDocumentation
 * @module hardware/extractor
 */

import { view } from '../schema/normalizer'
import { BENCHMARK_TYPES, type BenchmarkType, type BenchmarkView } from '../schema/types'
import { createLogger, type Logger } from '../utils/logger'
import { ManufacturerClassifier } from './classifier'
import { consolidate, matches, mergeDevices } from './matcher'
import { deviceId, isCompositeName, matchKey, normalizeName, splitCompositeName } from './names'
import type { DeviceCandidate, DeviceClass, HardwareDevice, HardwareHint } from './types'

/**
 * Raw payloads of one upload, keyed by benchmark type.
 */
export type PayloadSet = Partial<Record<BenchmarkType, unknown>>

export interface ExtractorOptions {
  classifier?: ManufacturerClassifier
  logger?: Logger
}

/**
 * Raised when an upload names no usable device and no hint was supplied.
 */
export class NoDeviceError extends Error {
  constructor(message = 'No CPU or GPU could be determined from the upload and no hardware hint was supplied') {
    super(message)
    this.name = 'NoDeviceError'
  }
}

const CPU_ONLY_BENCHMARKS: readonly BenchmarkType[] = ['reversan', 'sevenzip']

/**
 * Discovers devices across all payloads of an upload.
 *
 * Candidates come from inventories, system-info blocks, GPU selection
 * lists, renderer device listings and run device names. GPUs are merged
 * with {@link consolidate}; CPUs only when their match keys are equal.
 * The hint fills in a class a benchmark needs but no payload named.
 *
 * @example
 * ```typescript
 * const extractor = new HardwareExtractor()
 * const devices = extractor.extract({ llama: payload })
 * // [{ id: 'amd-ryzen-7-5800x-8-core-processor', type: 'cpu', ... },
 * //  { id: 'nvidia-geforce-rtx-3090', type: 'gpu', ... }]
 * ```
 */
export class HardwareExtractor {
  private classifier: ManufacturerClassifier
  private log: Logger

  constructor(options: ExtractorOptions = {}) {
    this.classifier = options.classifier ?? new ManufacturerClassifier()
    this.log = options.logger ?? createLogger('rigbench:hardware')
  }

  extract(payloads: PayloadSet, hint?: HardwareHint): HardwareDevice[] {
    const views = BENCHMARK_TYPES.filter((benchmark) => payloads[benchmark] !== undefined).map((benchmark) =>
      view(benchmark, payloads[benchmark]),
    )

    const composites: string[] = []
    const devices: HardwareDevice[] = []
    for (const candidate of views.flatMap((payloadView) => this.candidatesOf(payloadView))) {
      if (isCompositeName(candidate.name)) {
        composites.push(candidate.name)
        continue
      }
      const device = this.resolve(candidate)
      if (device) devices.push(device)
    }

    let cpus = dedupeCpus(devices.filter((device) => device.type === 'cpu'))
    let gpus = consolidate(devices.filter((device) => device.type === 'gpu'))
    this.reportComposites(composites, gpus)

    const needed = neededClasses(views)
    const nothingFound = cpus.length === 0 && gpus.length === 0
    if (hint && (nothingFound || (needed.has('cpu') && cpus.length === 0))) {
      cpus = dedupeCpus(this.fromHint(hint, 'cpu'))
    }
    if (hint && (nothingFound || (needed.has('gpu') && gpus.length === 0))) {
      gpus = consolidate(this.fromHint(hint, 'gpu'))
    }

    if (cpus.length === 0 && gpus.length === 0) {
      throw new NoDeviceError()
    }
    this.log.debug(`extracted ${cpus.length} cpu, ${gpus.length} gpu`)
    return [...cpus, ...gpus]
  }

  /**
   * Device candidates of one payload, before classification.
   */
  candidatesOf(payloadView: BenchmarkView): DeviceCandidate[] {
    const { benchmark } = payloadView
    const candidates: DeviceCandidate[] = []

    for (const entry of payloadView.inventory) {
      candidates.push({
        name: entry.name,
        classHint: entry.type,
        manufacturer: entry.manufacturer,
        cores: entry.cores,
        threads: entry.threads,
        framework: entry.framework,
        source: `${benchmark}:inventory`,
      })
    }
    candidates.push(...payloadView.listedDevices)

    for (const run of payloadView.runs) {
      if (!run.deviceName) continue
      candidates.push({
        name: run.deviceName,
        classHint: run.deviceClass ?? undefined,
        framework: run.benchmark === 'blender' ? (run.framework ?? undefined) : undefined,
        source: `${benchmark}:runs`,
      })
    }
    return candidates
  }

  private resolve(candidate: DeviceCandidate): HardwareDevice | undefined {
    const name = normalizeName(candidate.name)
    if (this.classifier.isPlaceholder(name)) {
      this.log.debug(`dropped placeholder "${candidate.name}" from ${candidate.source}`)
      return undefined
    }

    const classification = this.classifier.classify(name, candidate.classHint)
    if (candidate.classHint === 'gpu' && classification.rule === 'cpu-family') {
      const integrated = this.classifier.integratedGpuName(name)
      if (!integrated) {
        this.log.debug(`dropped CPU name "${name}" found in a GPU field of ${candidate.source}`)
        return undefined
      }
      return this.resolve({ ...candidate, name: integrated, manufacturer: undefined })
    }

    const manufacturer =
      classification.manufacturer !== 'Unknown' ? classification.manufacturer : (candidate.manufacturer ?? 'Unknown')
    const device: HardwareDevice = { id: deviceId(name), name, type: classification.deviceClass, manufacturer }
    if (device.type === 'cpu') {
      if (candidate.cores !== undefined) device.cores = candidate.cores
      if (candidate.threads !== undefined) device.threads = candidate.threads
    } else if (candidate.framework !== undefined) {
      device.framework = candidate.framework
    }
    return device
  }

  private fromHint(hint: HardwareHint, deviceClass: DeviceClass): HardwareDevice[] {
    const candidates: DeviceCandidate[] = []
    const direct = deviceClass === 'cpu' ? hint.cpu : hint.gpu
    if (direct?.trim()) {
      candidates.push({ name: direct, classHint: deviceClass, source: 'hint' })
    }
    for (const element of splitCompositeName(hint.description ?? '')) {
      candidates.push({ name: element, source: 'hint:description' })
    }

    const devices = candidates
      .map((candidate) => this.resolve(candidate))
      .filter((device): device is HardwareDevice => device?.type === deviceClass)
    if (devices.length > 0) this.log.debug(`using hint for ${deviceClass}: ${devices.map((d) => d.name).join(', ')}`)
    return devices
  }

  private reportComposites(composites: string[], gpus: HardwareDevice[]): void {
    for (const composite of new Set(composites)) {
      const covered = gpus.find((gpu) => matches(composite, gpu.name))
      if (covered) {
        this.log.debug(`ignored combined device "${composite}", covered by "${covered.name}"`)
      } else {
        this.log.debug(`dropped ambiguous combined device "${composite}"`)
      }
    }
  }
}

/**
 * CPUs are singular per machine: only identical match keys are merged.
 */
function dedupeCpus(cpus: HardwareDevice[]): HardwareDevice[] {
  const byKey = new Map<string, HardwareDevice>()
  for (const cpu of cpus) {
    const key = matchKey(cpu.name)
    const existing = byKey.get(key)
    byKey.set(key, existing ? mergeDevices(existing, cpu) : { ...cpu })
  }
  return [...byKey.values()]
}

function neededClasses(views: BenchmarkView[]): Set<DeviceClass> {
  const needed = new Set<DeviceClass>()
  for (const payloadView of views) {
    if (CPU_ONLY_BENCHMARKS.includes(payloadView.benchmark)) needed.add('cpu')
    for (const run of payloadView.runs) {
      needed.add(run.deviceClass ?? 'cpu')
    }
  }
  return needed
}

/**
 * Extract devices with a one-off extractor.
 */
export function extractHardware(payloads: PayloadSet, hint?: HardwareHint, options?: ExtractorOptions): HardwareDevice[] {
  return new HardwareExtractor(options).extract(payloads, hint)
}
