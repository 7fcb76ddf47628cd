/**
 * Bench Engine
 *
 * Orchestrates extraction, device reconciliation, payload history and
 * aggregation over a store. Holds no state between calls besides its
 * configuration; every operation reads what it needs from the store.
 *
 * @packageDocumentation
 * @module engine/BenchEngine
 */

import { aggregate, aggregatePayloads } from '../aggregation/engine'
import { median } from '../aggregation/median'
import type { AggregationResult } from '../aggregation/types'
import { DEFAULT_CONFIG } from '../config/types'
import { ManufacturerClassifier } from '../hardware/classifier'
import { HardwareExtractor, type PayloadSet } from '../hardware/extractor'
import { buildPatternTables } from '../hardware/patterns'
import type { HardwareDevice, HardwareHint } from '../hardware/types'
import { containsDevice, filterRuns } from '../runs/filter'
import { isJsonObject, view } from '../schema/normalizer'
import { BENCHMARK_TYPES, type BenchmarkType, type RawBenchmarkPayload, type RunRecord } from '../schema/types'
import { createUploadId } from '../store/upload-id'
import { createLogger, type Logger } from '../utils/logger'
import type {
  BenchEngineConfig,
  BenchmarkReport,
  DeviceChange,
  DeviceReport,
  DeviceSummary,
  IngestResult,
  Upload,
} from './types'

/**
 * Raised when a report is requested for an id the store does not know.
 */
export class DeviceNotFoundError extends Error {
  constructor(public readonly deviceId: string) {
    super(`Device not found: ${deviceId}`)
    this.name = 'DeviceNotFoundError'
  }
}

/**
 * Bench Engine
 *
 * @example
 * ```typescript
 * const engine = new BenchEngine({ store: new MemoryStore() })
 *
 * const { devices } = await engine.ingest({ payloads: { llama: document } })
 * const report = await engine.report('nvidia-geforce-rtx-3090')
 * ```
 */
export class BenchEngine {
  private config: BenchEngineConfig
  private extractor: HardwareExtractor
  private log: Logger

  constructor(config: Partial<BenchEngineConfig> & Pick<BenchEngineConfig, 'store'>) {
    this.config = { classification: DEFAULT_CONFIG.classification, ...config }
    this.log = config.logger ?? createLogger('rigbench:engine')
    this.extractor = this.buildExtractor()
  }

  private buildExtractor(): HardwareExtractor {
    const { classification } = this.config
    const classifier = new ManufacturerClassifier({
      defaultClass: classification.defaultClass,
      tables: buildPatternTables({
        cpuVendors: classification.cpuVendors,
        gpuVendors: classification.gpuVendors,
        placeholders: classification.placeholders,
      }),
    })
    return new HardwareExtractor({ classifier, logger: this.log.child('hardware') })
  }

  /**
   * Get current configuration
   */
  getConfig(): BenchEngineConfig {
    return { ...this.config }
  }

  /**
   * Update configuration
   */
  setConfig(config: Partial<BenchEngineConfig>): void {
    this.config = { ...this.config, ...config }
    if (config.logger) this.log = config.logger
    this.extractor = this.buildExtractor()
  }

  extractHardware(payloads: PayloadSet, hint?: HardwareHint): HardwareDevice[] {
    return this.extractor.extract(payloads, hint)
  }

  filterRuns(payload: RawBenchmarkPayload, device: HardwareDevice): RunRecord[] {
    return filterRuns(payload, device)
  }

  aggregate(benchmark: BenchmarkType, device: HardwareDevice, runs: readonly RunRecord[]): AggregationResult {
    return aggregate(benchmark, device, runs)
  }

  /**
   * Extract the upload's devices, reconcile them with the store and record
   * each payload under every device it holds runs for.
   *
   * @throws {NoDeviceError} when the upload names no device and has no usable hint
   */
  async ingest(upload: Upload): Promise<IngestResult> {
    const { store } = this.config
    const now = this.config.now?.() ?? new Date()
    const uploadId = upload.uploadId ?? createUploadId(now)
    const storedAt = now.toISOString()

    const extracted = this.extractHardware(upload.payloads, upload.hint)
    const result: IngestResult = { uploadId, devices: [], stored: [] }

    for (const device of extracted) {
      const existing = await store.getById(device.id)
      const stored = await store.upsert(device)
      const change: DeviceChange = !existing ? 'created' : existing.name !== stored.name ? 'renamed' : 'unchanged'
      if (change !== 'unchanged') {
        this.log.info(`${change} ${stored.type}`, { id: stored.id, name: stored.name, upload: uploadId })
      }
      result.devices.push({ device: stored, change })
    }

    for (const benchmark of BENCHMARK_TYPES) {
      const document = upload.payloads[benchmark]
      if (document === undefined) continue
      if (!isJsonObject(document)) {
        this.log.warn('payload is not a JSON object, not stored', { upload: uploadId, benchmark })
        continue
      }
      const payload: RawBenchmarkPayload = { uploadId, benchmark, storedAt, document }
      for (const device of extracted) {
        if (!containsDevice(payload, device)) continue
        await store.append(device.id, payload)
        result.stored.push({ deviceId: device.id, benchmark })
      }
    }

    this.log.debug('ingested', { upload: uploadId, devices: result.devices.length, stored: result.stored.length })
    return result
  }

  /**
   * Aggregated statistics of every benchmark stored for a device.
   *
   * @throws {DeviceNotFoundError} for an unknown id
   */
  async report(deviceId: string): Promise<DeviceReport> {
    const device = await this.config.store.getById(deviceId)
    if (!device) throw new DeviceNotFoundError(deviceId)

    const benchmarks: BenchmarkReport[] = []
    for (const benchmark of BENCHMARK_TYPES) {
      const payloads = await this.config.store.listPayloads(device.id, benchmark)
      if (payloads.length === 0) continue
      benchmarks.push({
        benchmark,
        payloadCount: payloads.length,
        buildSeconds: median(payloads.map((payload) => view(benchmark, payload.document).compileSeconds)),
        aggregation: aggregatePayloads(benchmark, device, payloads),
      })
    }
    return { device, benchmarks }
  }

  /**
   * All stored devices with payload counts, CPUs first, then by name.
   */
  async listDevices(): Promise<DeviceSummary[]> {
    const devices = await this.config.store.listAll()
    const summaries: DeviceSummary[] = []

    for (const device of devices) {
      const payloadCounts: Record<BenchmarkType, number> = { llama: 0, reversan: 0, sevenzip: 0, blender: 0 }
      let lastUploadAt: string | null = null
      for (const benchmark of BENCHMARK_TYPES) {
        const payloads = await this.config.store.listPayloads(device.id, benchmark)
        payloadCounts[benchmark] = payloads.length
        for (const payload of payloads) {
          if (lastUploadAt === null || payload.storedAt > lastUploadAt) lastUploadAt = payload.storedAt
        }
      }
      summaries.push({ device, payloadCounts, lastUploadAt })
    }

    return summaries.sort((a, b) => {
      if (a.device.type !== b.device.type) return a.device.type === 'cpu' ? -1 : 1
      return a.device.name < b.device.name ? -1 : a.device.name > b.device.name ? 1 : 0
    })
  }
}
