/**
 * Schema Normalizer
 *
 * Projects raw payloads of every known shape onto {@link BenchmarkView}.
 * Never throws and never mutates its input: a malformed field reads as
 * absent, a malformed list element is skipped and counted.
 *
 * @packageDocumentation
 * @module schema/normalizer
 */

import type { z } from 'zod'
import { deviceId } from '../hardware/names'
import { normalizeFramework } from '../hardware/patterns'
import type { DeviceClass, Framework } from '../hardware/types'
import { createLogger } from '../utils/logger'
import {
  blenderDeviceRunSchema,
  blenderPayloadSchema,
  blenderRawResultSchema,
  blenderUnifiedGpuSchema,
  type BuildInput,
  envelopeSchema,
  inventoryEntrySchema,
  llamaDeviceRunsSchema,
  type LlamaLegacyRunInput,
  llamaLegacyRunSchema,
  llamaPayloadSchema,
  llamaUnifiedRunSchema,
  namedDeviceSchema,
  reversanLegacyRunSchema,
  reversanPayloadSchema,
  reversanUnifiedRunSchema,
  sevenzipLegacyRunSchema,
  sevenzipPayloadSchema,
  type SystemInfoInput,
} from './payloads'
import type {
  BenchmarkType,
  BenchmarkView,
  BlenderRun,
  DeviceTag,
  InventoryEntry,
  JsonObject,
  ListedDevice,
  LlamaRun,
  PayloadFormat,
  ReversanRun,
  SevenzipRun,
} from './types'

const log = createLogger('rigbench:schema')

const GIB = 1024 ** 3
const RENDERER_GPU_TYPES = new Set(['CUDA', 'HIP', 'OPENCL', 'OPTIX', 'METAL', 'ONEAPI'])
const UNTAGGED: DeviceTag = { deviceClass: null, deviceName: null, hwId: null, deviceSlug: null }

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Strip `results` envelopes. Returns the innermost object reached through
 * `results` keys, the payload itself when there is none. Idempotent; the
 * input is not modified.
 */
export function unwrap(payload: JsonObject): JsonObject {
  let current = payload
  let inner = current.results
  while (isJsonObject(inner)) {
    current = inner
    inner = current.results
  }
  return current
}

/**
 * Parse a benchmark type name as used by tools and file names.
 */
export function parseBenchmarkType(name: string): BenchmarkType | null {
  switch (name.trim().toLowerCase()) {
    case 'llama':
      return 'llama'
    case 'reversan':
      return 'reversan'
    case '7zip':
    case 'sevenzip':
      return 'sevenzip'
    case 'blender':
      return 'blender'
    default:
      return null
  }
}

/**
 * Guess the benchmark type of a single payload from `meta.benchmark_name`
 * or, failing that, from keys only one tool writes.
 */
export function detectBenchmarkType(document: JsonObject): BenchmarkType | null {
  const envelope = envelopeSchema.safeParse(document)
  const named = envelope.success ? envelope.data.meta?.benchmark_name : undefined
  const fromName = named ? parseBenchmarkType(named) : null
  if (fromName) return fromName

  const body = unwrap(document)
  const has = (...keys: string[]) => keys.some((key) => body[key] !== undefined)

  if (has('runs_cpu', 'runs_gpu', 'cpu_benchmark', 'gpu_benchmarks', 'gpu_selection')) return 'llama'
  if (has('runs_depth', 'runs_threads', 'depth_benchmarks', 'thread_benchmarks')) return 'reversan'
  if (has('ru_mips', 'total_mips')) return 'sevenzip'
  if (has('gpus', 'benchmark_results', 'scenes_tested')) return 'blender'

  const deviceRuns = body.device_runs
  if (Array.isArray(deviceRuns)) {
    const first: unknown = deviceRuns[0]
    if (isJsonObject(first) && first.device_framework !== undefined) return 'blender'
    if (isJsonObject(first) && first.device_type !== undefined) return 'llama'
  }
  const runs = body.runs
  if (Array.isArray(runs) && runs.some((run) => isJsonObject(run) && run.compression_speed_mb_s !== undefined)) {
    return 'sevenzip'
  }
  return null
}

/**
 * Split a unified multi-benchmark upload into one payload per benchmark.
 * Each payload is a new object with its own copy of `meta` (tagged with the
 * benchmark name) and the section under `results`.
 *
 * @example
 * ```typescript
 * splitUnifiedDocument({ meta: { hardware }, llama: { compile_time: 81 } })
 * // { llama: { meta: { hardware, benchmark_name: 'llama' }, results: { compile_time: 81 } } }
 * ```
 */
export function splitUnifiedDocument(document: JsonObject): Partial<Record<BenchmarkType, JsonObject>> {
  const meta = isJsonObject(document.meta) ? document.meta : {}
  const payloads: Partial<Record<BenchmarkType, JsonObject>> = {}

  for (const [key, section] of Object.entries(document)) {
    if (key === 'meta' || !isJsonObject(section)) continue
    const benchmark = parseBenchmarkType(key)
    if (!benchmark) continue
    payloads[benchmark] = {
      meta: { ...structuredClone(meta), benchmark_name: benchmark },
      results: structuredClone(section),
    }
  }
  return payloads
}

/**
 * Whether a document is a unified multi-benchmark upload rather than a
 * single-tool payload.
 */
export function isUnifiedDocument(document: JsonObject): boolean {
  if (!isJsonObject(document.meta) || !isJsonObject(document.meta.hardware)) return false
  return Object.entries(document).some(([key, value]) => parseBenchmarkType(key) !== null && isJsonObject(value))
}

/**
 * Canonical view of a payload. Unwraps first, then reads whichever shapes
 * are present.
 */
export function view<B extends BenchmarkType>(benchmark: B, payload: unknown): BenchmarkView<B>
export function view(benchmark: BenchmarkType, payload: unknown): BenchmarkView {
  if (!isJsonObject(payload)) {
    log.debug(`${benchmark}: payload is not an object`)
    return emptyView(benchmark)
  }

  const context = new ViewContext(payload)
  switch (benchmark) {
    case 'llama':
      return context.finish(benchmark, readLlama(context))
    case 'reversan':
      return context.finish(benchmark, readReversan(context))
    case 'sevenzip':
      return context.finish(benchmark, readSevenzip(context))
    case 'blender':
      return context.finish(benchmark, readBlender(context))
  }
}

function emptyView<B extends BenchmarkType>(benchmark: B): BenchmarkView<B> {
  return { benchmark, format: 'empty', inventory: [], listedDevices: [], compileSeconds: null, runs: [], skipped: 0 }
}

interface Readout<R> {
  format: PayloadFormat
  compileSeconds: number | null
  runs: R[]
}

/**
 * Per-payload parsing state: the unwrapped body, the inventory, listed
 * devices and the count of skipped elements.
 */
class ViewContext {
  readonly body: JsonObject
  readonly inventory: InventoryEntry[]
  readonly listed: ListedDevice[] = []
  skipped = 0

  constructor(payload: JsonObject) {
    this.body = unwrap(payload)
    this.inventory = this.readInventory(payload)
  }

  /**
   * Parse each element of a list, skipping and counting the ones that fail.
   */
  each<S extends z.ZodTypeAny>(items: unknown[] | undefined, schema: S, label: string): z.infer<S>[] {
    if (!items) return []
    const parsed: z.infer<S>[] = []
    items.forEach((item, index) => {
      const result = schema.safeParse(item)
      if (result.success) {
        parsed.push(result.data)
      } else {
        this.skipped += 1
        log.debug(`skipped malformed ${label}[${index}]`)
      }
    })
    return parsed
  }

  list(device: ListedDevice): void {
    if (device.name.trim()) this.listed.push(device)
  }

  listSystemInfo(info: SystemInfoInput, source: string): void {
    if (!info) return
    const { cpu } = info
    if (typeof cpu === 'string') {
      this.list({ name: cpu, classHint: 'cpu', source })
    } else if (cpu) {
      const name = cpu.name ?? cpu.model
      if (name) this.list({ name, classHint: 'cpu', cores: cpu.cores, threads: cpu.threads, source })
    }
    for (const device of this.each(info.cuda_devices, namedDeviceSchema, `${source}.cuda_devices`)) {
      this.list({ name: device.name, classHint: 'gpu', framework: 'CUDA', source })
    }
    for (const device of this.each(info.rocm_devices, namedDeviceSchema, `${source}.rocm_devices`)) {
      this.list({ name: device.name, classHint: 'gpu', framework: 'HIP', source })
    }
  }

  /**
   * Tag for a unified-format `hw_id`. The class falls back to the id prefix
   * (`cpu-0`, `gpu-1`) when the inventory has no entry.
   */
  tagForHwId(hwId: string | undefined, fallbackClass: DeviceClass | null = null): DeviceTag {
    if (!hwId) return { ...UNTAGGED, deviceClass: fallbackClass }
    const entry = this.inventory.find((candidate) => candidate.hwId === hwId)
    const prefixClass: DeviceClass | null = hwId.startsWith('cpu') ? 'cpu' : hwId.startsWith('gpu') ? 'gpu' : null
    return {
      deviceClass: entry?.type ?? prefixClass ?? fallbackClass,
      deviceName: entry?.name ?? null,
      hwId,
      deviceSlug: entry ? deviceId(entry.name) : null,
    }
  }

  /**
   * Tag for the inventory's CPU, used by unified sections that do not
   * reference an `hw_id` for their CPU results.
   */
  cpuTag(): DeviceTag {
    const cpu = this.inventory.find((entry) => entry.type === 'cpu')
    return cpu ? this.tagForHwId(cpu.hwId, 'cpu') : { ...UNTAGGED, deviceClass: 'cpu' }
  }

  finish<B extends BenchmarkType>(benchmark: B, readout: Readout<BenchmarkView<B>['runs'][number]>): BenchmarkView<B> {
    return {
      benchmark,
      format: readout.format,
      inventory: this.inventory,
      listedDevices: this.listed,
      compileSeconds: readout.compileSeconds,
      runs: readout.runs,
      skipped: this.skipped,
    }
  }

  private readInventory(payload: JsonObject): InventoryEntry[] {
    const sources = [this.body, payload]
    for (const source of sources) {
      const envelope = envelopeSchema.safeParse(source)
      if (!envelope.success) continue
      const hardware = envelope.data.meta?.hardware ?? envelope.data.hardware
      if (hardware) return this.parseInventory(hardware)
    }
    return []
  }

  private parseInventory(hardware: Record<string, unknown>): InventoryEntry[] {
    const entries: InventoryEntry[] = []
    for (const [key, value] of Object.entries(hardware)) {
      const result = inventoryEntrySchema.safeParse(value)
      if (!result.success) {
        this.skipped += 1
        log.debug(`skipped malformed hardware entry ${key}`)
        continue
      }
      const raw = result.data
      const type = raw.type?.toLowerCase()
      const entry: InventoryEntry = { hwId: raw.hw_id ?? key, name: raw.name }
      if (type === 'cpu' || type === 'gpu') entry.type = type
      if (raw.manufacturer) entry.manufacturer = raw.manufacturer
      if (raw.cores !== undefined) entry.cores = raw.cores
      if (raw.threads !== undefined) entry.threads = raw.threads
      const framework = normalizeFramework(raw.framework)
      if (framework) entry.framework = framework
      if (raw.driver_version) entry.driverVersion = raw.driver_version
      if (raw.memory_mb !== undefined) entry.memoryMb = raw.memory_mb
      entries.push(entry)
    }
    return entries
  }
}

function positive(value: number | undefined): number | null {
  return value !== undefined && value > 0 ? value : null
}

function firstDefined(...values: (number | undefined)[]): number | null {
  return values.find((value) => value !== undefined) ?? null
}

function buildSeconds(compileTime: number | undefined, build: BuildInput): number | null {
  return positive(
    compileTime ??
      build?.compile_time_seconds ??
      build?.cpu_build_timing?.build_time_seconds ??
      build?.cpu_build_timing?.total_time_seconds ??
      build?.build_time_seconds ??
      build?.total_time_seconds,
  )
}

function failed(run: { returncode?: number; success?: boolean }): boolean {
  return run.success === false || (run.returncode !== undefined && run.returncode !== 0)
}

function tagForName(name: string | undefined, deviceClass: DeviceClass | null): DeviceTag {
  const trimmed = name?.trim()
  if (!trimmed) return { ...UNTAGGED, deviceClass }
  return { deviceClass, deviceName: trimmed, hwId: null, deviceSlug: deviceId(trimmed) }
}

function classOf(value: string | undefined): DeviceClass | null {
  const lowered = value?.toLowerCase()
  return lowered === 'cpu' || lowered === 'gpu' ? lowered : null
}

// llama

function modelBucket(modelType: string | undefined, modelSize: number | undefined): string | null {
  if (modelType?.trim()) return modelType.trim()
  if (modelSize !== undefined && modelSize > 0) return `${(modelSize / GIB).toFixed(1)} GiB`
  return null
}

function llamaLegacyRecord(run: LlamaLegacyRunInput, tag: DeviceTag): LlamaRun {
  const metrics = run.metrics
  const info = metrics?.system_info
  return {
    benchmark: 'llama',
    ...tag,
    modelBucket: modelBucket(info?.model_type, info?.model_size),
    threads: info?.n_threads ?? null,
    tokensPerSecond: firstDefined(metrics?.generation?.avg_tokens_per_sec, metrics?.tokens_per_second),
    promptTokensPerSecond: metrics?.prompt_processing?.avg_tokens_per_sec ?? null,
    elapsedSeconds: run.elapsed_seconds ?? null,
  }
}

function readLlama(context: ViewContext): Readout<LlamaRun> {
  const parsed = llamaPayloadSchema.safeParse(context.body)
  if (!parsed.success) return { format: 'empty', compileSeconds: null, runs: [] }
  const data = parsed.data
  const runs: LlamaRun[] = []
  let format: PayloadFormat = 'empty'

  context.listSystemInfo(data.system_info, 'llama:system-info')

  const selection = context.each(data.gpu_selection?.available_gpus, namedDeviceSchema, 'llama.gpu_selection')
  for (const gpu of selection) {
    context.list({ name: gpu.name, classHint: 'gpu', source: 'llama:gpu-selection' })
  }
  const selectedIndex = data.gpu_selection?.device_index
  const selectedGpu = selection.find((gpu) => gpu.index === selectedIndex)?.name

  // unified
  if (data.cpu_benchmark !== undefined || data.gpu_benchmarks !== undefined) {
    format = 'unified'
    const cpuRuns = data.cpu_benchmark === undefined ? [] : [data.cpu_benchmark]
    for (const run of context.each(cpuRuns, llamaUnifiedRunSchema, 'llama.cpu_benchmark')) {
      runs.push(llamaUnifiedRecord(run, context.tagForHwId(run.hw_id, 'cpu')))
    }
    for (const run of context.each(data.gpu_benchmarks, llamaUnifiedRunSchema, 'llama.gpu_benchmarks')) {
      runs.push(llamaUnifiedRecord(run, context.tagForHwId(run.hw_id, 'gpu')))
    }
  }

  // device-grouped runs
  if (data.device_runs !== undefined) {
    if (format === 'empty') format = 'device-runs'
    for (const group of context.each(data.device_runs, llamaDeviceRunsSchema, 'llama.device_runs')) {
      const deviceClass = classOf(group.device_type)
      const groupRuns = context.each(group.runs, llamaLegacyRunSchema, 'llama.device_runs.runs')
      const backends = groupRuns[0]?.metrics?.system_info?.backends
      if (group.device_name) {
        context.list({
          name: group.device_name,
          classHint: deviceClass ?? undefined,
          framework: deviceClass === 'gpu' ? normalizeFramework(backends) : undefined,
          threads: deviceClass === 'cpu' ? groupRuns[0]?.metrics?.system_info?.n_threads : undefined,
          source: 'llama:device-runs',
        })
      }
      for (const run of groupRuns) {
        if (!failed(run)) runs.push(llamaLegacyRecord(run, tagForName(group.device_name, deviceClass)))
      }
    }
  }

  // legacy cpu/gpu run lists
  if (data.runs_cpu !== undefined || data.runs_gpu !== undefined) {
    if (format === 'empty') format = 'legacy'
    for (const run of context.each(data.runs_cpu, llamaLegacyRunSchema, 'llama.runs_cpu')) {
      const info = run.metrics?.system_info
      if (info?.cpu_info) {
        context.list({ name: info.cpu_info, classHint: 'cpu', threads: info.n_threads, source: 'llama:runs' })
      }
      if (!failed(run)) runs.push(llamaLegacyRecord(run, tagForName(info?.cpu_info, 'cpu')))
    }
    for (const run of context.each(data.runs_gpu, llamaLegacyRunSchema, 'llama.runs_gpu')) {
      const info = run.metrics?.system_info
      const name = run.gpu_device?.name ?? selectedGpu ?? info?.gpu_info
      if (name) {
        context.list({ name, classHint: 'gpu', framework: normalizeFramework(info?.backends), source: 'llama:runs' })
      }
      if (!failed(run)) runs.push(llamaLegacyRecord(run, tagForName(name, 'gpu')))
    }
  }

  return { format, compileSeconds: buildSeconds(data.compile_time, data.build), runs }
}

function llamaUnifiedRecord(run: z.infer<typeof llamaUnifiedRunSchema>, tag: DeviceTag): LlamaRun {
  return {
    benchmark: 'llama',
    ...tag,
    modelBucket: run.model?.trim() || null,
    threads: run.threads ?? null,
    tokensPerSecond: firstDefined(run.generation_speed, run.tokens_per_second),
    promptTokensPerSecond: run.prompt_speed ?? null,
    elapsedSeconds: null,
  }
}

// reversan

function readReversan(context: ViewContext): Readout<ReversanRun> {
  const parsed = reversanPayloadSchema.safeParse(context.body)
  if (!parsed.success) return { format: 'empty', compileSeconds: null, runs: [] }
  const data = parsed.data
  const runs: ReversanRun[] = []
  let format: PayloadFormat = 'empty'

  context.listSystemInfo(data.system_info, 'reversan:system-info')

  if (data.depth_benchmarks !== undefined || data.thread_benchmarks !== undefined) {
    format = 'unified'
    const series: [ReversanRun['series'], unknown[] | undefined][] = [
      ['depth', data.depth_benchmarks],
      ['threads', data.thread_benchmarks],
    ]
    for (const [name, items] of series) {
      for (const run of context.each(items, reversanUnifiedRunSchema, `reversan.${name}_benchmarks`)) {
        runs.push({
          benchmark: 'reversan',
          ...UNTAGGED,
          series: name,
          depth: run.depth ?? null,
          threads: run.threads ?? null,
          elapsedSeconds: run.time_seconds ?? null,
          maxRssKb: run.memory_kb ?? null,
        })
      }
    }
  }

  if (data.runs_depth !== undefined || data.runs_threads !== undefined) {
    if (format === 'empty') format = 'legacy'
    const series: [ReversanRun['series'], unknown[] | undefined][] = [
      ['depth', data.runs_depth],
      ['threads', data.runs_threads],
    ]
    for (const [name, items] of series) {
      for (const run of context.each(items, reversanLegacyRunSchema, `reversan.runs_${name}`)) {
        if (failed(run)) continue
        const metrics = run.average_metrics ?? run.metrics
        runs.push({
          benchmark: 'reversan',
          ...UNTAGGED,
          series: name,
          depth: run.depth ?? null,
          threads: run.threads ?? run.config?.threads ?? null,
          elapsedSeconds: firstDefined(metrics?.elapsed_seconds, run.elapsed_seconds, run.elapsed_time),
          maxRssKb: metrics?.max_rss_kb ?? null,
        })
      }
    }
  }

  return { format, compileSeconds: buildSeconds(data.compile_time, data.build), runs }
}

// sevenzip

function readSevenzip(context: ViewContext): Readout<SevenzipRun> {
  const parsed = sevenzipPayloadSchema.safeParse(context.body)
  if (!parsed.success) return { format: 'empty', compileSeconds: null, runs: [] }
  const data = parsed.data
  const runs: SevenzipRun[] = []
  let format: PayloadFormat = 'empty'

  context.listSystemInfo(data.system_info, 'sevenzip:system-info')

  if (data.usage_percent !== undefined || data.ru_mips !== undefined || data.total_mips !== undefined) {
    format = 'unified'
    runs.push({
      benchmark: 'sevenzip',
      ...UNTAGGED,
      threads: null,
      compressionSpeedMbS: null,
      elapsedSeconds: null,
      compressionRatio: null,
      totalMips: data.total_mips ?? null,
      ruMips: data.ru_mips ?? null,
      usagePercent: data.usage_percent ?? null,
    })
  }

  if (data.runs !== undefined) {
    if (format === 'empty') format = 'legacy'
    for (const run of context.each(data.runs, sevenzipLegacyRunSchema, 'sevenzip.runs')) {
      if (failed(run)) continue
      runs.push({
        benchmark: 'sevenzip',
        ...UNTAGGED,
        threads: run.threads ?? null,
        compressionSpeedMbS: run.compression_speed_mb_s ?? null,
        elapsedSeconds: run.elapsed_seconds ?? null,
        compressionRatio: run.compression_ratio ?? null,
        totalMips: null,
        ruMips: null,
        usagePercent: null,
      })
    }
  }

  return { format, compileSeconds: buildSeconds(data.compile_time, data.build), runs }
}

// blender

function sceneScore(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (isJsonObject(value)) {
    const score = value.samples_per_minute
    return typeof score === 'number' && Number.isFinite(score) ? score : null
  }
  return null
}

function sceneRecords(scenes: Record<string, unknown> | undefined, tag: DeviceTag, framework: Framework | null) {
  const records: BlenderRun[] = []
  for (const [scene, value] of Object.entries(scenes ?? {})) {
    records.push({
      benchmark: 'blender',
      ...tag,
      scene,
      framework,
      samplesPerMinute: sceneScore(value),
      renderSeconds: null,
      peakMemory: null,
    })
  }
  return records
}

function readBlender(context: ViewContext): Readout<BlenderRun> {
  const parsed = blenderPayloadSchema.safeParse(context.body)
  if (!parsed.success) return { format: 'empty', compileSeconds: null, runs: [] }
  const data = parsed.data
  const runs: BlenderRun[] = []
  let format: PayloadFormat = 'empty'

  context.listSystemInfo(data.system_info, 'blender:system-info')

  if (data.cpu !== undefined || data.gpus !== undefined) {
    format = 'unified'
    runs.push(...sceneRecords(data.cpu, context.cpuTag(), null))
    for (const gpu of context.each(data.gpus, blenderUnifiedGpuSchema, 'blender.gpus')) {
      const tag = context.tagForHwId(gpu.hw_id, 'gpu')
      const framework = context.inventory.find((entry) => entry.hwId === gpu.hw_id)?.framework ?? null
      runs.push(...sceneRecords(gpu.scenes, tag, framework))
    }
  }

  const deviceRuns = data.device_runs ?? data.benchmark_results
  if (deviceRuns !== undefined) {
    if (format === 'empty') format = 'legacy'
    for (const deviceRun of context.each(deviceRuns, blenderDeviceRunSchema, 'blender.device_runs')) {
      runs.push(...readBlenderDeviceRun(context, deviceRun))
    }
  }

  return { format, compileSeconds: buildSeconds(data.compile_time, data.build), runs }
}

function readBlenderDeviceRun(context: ViewContext, deviceRun: z.infer<typeof blenderDeviceRunSchema>): BlenderRun[] {
  const frameworkName = deviceRun.device_framework?.toUpperCase()
  const deviceClass: DeviceClass | null = frameworkName === undefined ? null : frameworkName === 'CPU' ? 'cpu' : 'gpu'
  const framework = deviceClass === 'gpu' ? normalizeFramework(frameworkName) ?? null : null
  const results = context.each(deviceRun.raw_json, blenderRawResultSchema, 'blender.device_runs.raw_json')

  for (const result of results) {
    const info = result.system_info
    for (const device of context.each(info?.devices, namedDeviceSchema, 'blender.system_info.devices')) {
      const type = device.type?.toUpperCase()
      if (type === 'CPU') {
        context.list({
          name: device.name,
          classHint: 'cpu',
          cores: info?.num_cpu_cores,
          threads: info?.num_cpu_threads,
          source: 'blender:system-info',
        })
      } else if (type && RENDERER_GPU_TYPES.has(type)) {
        context.list({ name: device.name, classHint: 'gpu', framework: normalizeFramework(type), source: 'blender:system-info' })
      }
    }
  }

  const computeDevice = results
    .flatMap((result) => context.each(result.device_info?.compute_devices, namedDeviceSchema, 'blender.compute_devices'))
    .at(0)?.name
  const deviceName = deviceRun.device_name ?? computeDevice
  if (deviceName && deviceClass) {
    context.list({ name: deviceName, classHint: deviceClass, framework: framework ?? undefined, source: 'blender:device-runs' })
  }

  if (failed(deviceRun)) return []

  const tag = tagForName(deviceName, deviceClass)
  const records: BlenderRun[] = []
  for (const result of results) {
    const scene = result.scene?.label
    if (!scene) continue
    records.push({
      benchmark: 'blender',
      ...tag,
      scene,
      framework,
      samplesPerMinute: result.stats?.samples_per_minute ?? null,
      renderSeconds: result.stats?.total_render_time ?? null,
      peakMemory: result.stats?.device_peak_memory ?? null,
    })
  }
  return records.length > 0 ? records : sceneRecords(deviceRun.scene_results, tag, framework)
}

/**
 * Payloads of one uploaded document: every section of a unified upload, or
 * the document itself under its detected (or the given fallback) type.
 */
export function payloadsFromDocument(
  document: JsonObject,
  fallback?: BenchmarkType,
): Partial<Record<BenchmarkType, JsonObject>> {
  if (isUnifiedDocument(document)) return splitUnifiedDocument(document)
  const payloads: Partial<Record<BenchmarkType, JsonObject>> = {}
  const benchmark = detectBenchmarkType(document) ?? fallback
  if (benchmark) payloads[benchmark] = document
  return payloads
}
