/**
 * Schema normalizer tests
 */

import { describe, expect, test } from 'vitest'
import {
  detectBenchmarkType,
  isUnifiedDocument,
  parseBenchmarkType,
  payloadsFromDocument,
  splitUnifiedDocument,
  unwrap,
  view,
} from '../schema/normalizer'
import {
  legacyBlenderPayload,
  legacyLlamaPayload,
  legacyReversanPayload,
  RTX_3090,
  RYZEN_5800X,
  unifiedHardware,
  unifiedUpload,
} from './fixtures'

const UNTAGGED = { deviceClass: null, deviceName: null, hwId: null, deviceSlug: null }

describe('unwrap', () => {
  test('returns the results envelope contents', () => {
    expect(unwrap({ results: { a: 1 }, meta: {} })).toEqual({ a: 1 })
  })

  test('returns the payload itself without an envelope', () => {
    const payload = { results: [1, 2], a: 1 }
    expect(unwrap(payload)).toBe(payload)
  })

  test('is idempotent', () => {
    const payloads = [{ results: { results: { a: 1 } } }, { a: 1 }, { results: { b: 2 } }]
    for (const payload of payloads) {
      expect(unwrap(unwrap(payload))).toEqual(unwrap(payload))
    }
  })
})

describe('benchmark type detection', () => {
  test('parses tool names', () => {
    expect(parseBenchmarkType('7zip')).toBe('sevenzip')
    expect(parseBenchmarkType(' Llama ')).toBe('llama')
    expect(parseBenchmarkType('meta')).toBeNull()
  })

  test('prefers meta.benchmark_name', () => {
    expect(detectBenchmarkType({ meta: { benchmark_name: '7zip' }, runs_cpu: [] })).toBe('sevenzip')
  })

  test('falls back to tool-specific keys', () => {
    expect(detectBenchmarkType(legacyLlamaPayload())).toBe('llama')
    expect(detectBenchmarkType(legacyReversanPayload())).toBe('reversan')
    expect(detectBenchmarkType({ results: { ru_mips: 5600 } })).toBe('sevenzip')
    expect(detectBenchmarkType(legacyBlenderPayload())).toBe('blender')
    expect(detectBenchmarkType({})).toBeNull()
  })
})

describe('unified documents', () => {
  test('recognizes multi-benchmark uploads', () => {
    expect(isUnifiedDocument(unifiedUpload())).toBe(true)
    expect(isUnifiedDocument(legacyLlamaPayload())).toBe(false)
  })

  test('splits into one payload per benchmark without touching the input', () => {
    const document = unifiedUpload()
    const payloads = splitUnifiedDocument(document)

    expect(Object.keys(payloads)).toEqual(['llama'])
    expect(payloads.llama?.meta).toEqual({
      host: 'bench-box',
      hardware: unifiedHardware(),
      benchmark_name: 'llama',
    })
    expect(payloads.llama?.results).toEqual(unifiedUpload().llama)
    expect(document).toEqual(unifiedUpload())
  })

  test('payloadsFromDocument keeps single-tool payloads whole', () => {
    const document = legacyReversanPayload()
    expect(payloadsFromDocument(document)).toEqual({ reversan: document })
    expect(payloadsFromDocument({ unrelated: true }, 'sevenzip')).toEqual({ sevenzip: { unrelated: true } })
    expect(payloadsFromDocument({ unrelated: true })).toEqual({})
  })
})

describe('view', () => {
  describe('llama', () => {
    test('unified format', () => {
      const llama = view('llama', splitUnifiedDocument(unifiedUpload()).llama)

      expect(llama.format).toBe('unified')
      expect(llama.compileSeconds).toBe(81)
      expect(llama.inventory).toEqual([
        { hwId: 'cpu-0', name: RYZEN_5800X, type: 'cpu', manufacturer: 'AMD', cores: 8, threads: 16 },
        { hwId: 'gpu-0', name: RTX_3090, type: 'gpu', manufacturer: 'NVIDIA', framework: 'VULKAN' },
      ])
      expect(llama.runs).toEqual([
        {
          benchmark: 'llama',
          deviceClass: 'cpu',
          deviceName: RYZEN_5800X,
          hwId: 'cpu-0',
          deviceSlug: 'amd-ryzen-7-5800x-8-core-processor',
          modelBucket: null,
          threads: null,
          tokensPerSecond: 16.8,
          promptTokensPerSecond: 106.5,
          elapsedSeconds: null,
        },
        {
          benchmark: 'llama',
          deviceClass: 'gpu',
          deviceName: RTX_3090,
          hwId: 'gpu-0',
          deviceSlug: 'nvidia-geforce-rtx-3090',
          modelBucket: null,
          threads: null,
          tokensPerSecond: 194.5,
          promptTokensPerSecond: 6221.2,
          elapsedSeconds: null,
        },
      ])
    })

    test('legacy run lists skip failed runs and count malformed ones', () => {
      const llama = view('llama', legacyLlamaPayload())

      expect(llama.format).toBe('legacy')
      expect(llama.compileSeconds).toBe(95.5)
      expect(llama.skipped).toBe(1)
      expect(llama.runs).toHaveLength(2)
      expect(llama.runs[0]).toEqual({
        benchmark: 'llama',
        deviceClass: 'cpu',
        deviceName: 'Intel Core i7-12700K',
        hwId: null,
        deviceSlug: 'intel-core-i7-12700k',
        modelBucket: 'llama 7B Q4_0',
        threads: 8,
        tokensPerSecond: 12,
        promptTokensPerSecond: 60,
        elapsedSeconds: null,
      })
      expect(llama.runs[1]?.deviceName).toBe('NVIDIA GeForce RTX 3060')
      expect(llama.runs[1]?.tokensPerSecond).toBe(70)
      expect(llama.listedDevices[2]).toEqual({
        name: 'NVIDIA GeForce RTX 3060',
        classHint: 'gpu',
        framework: 'CUDA',
        source: 'llama:runs',
      })
    })

    test('reads through a results envelope', () => {
      const llama = view('llama', { results: legacyLlamaPayload() })
      expect(llama.runs.map((run) => run.tokensPerSecond)).toEqual([12, 70])
    })

    test('buckets models by size when the type is missing', () => {
      const llama = view('llama', {
        runs_cpu: [
          {
            metrics: {
              system_info: { cpu_info: 'Intel Core i5-12400', model_size: 3.5 * 1024 ** 3 },
              generation: { avg_tokens_per_sec: 5 },
            },
          },
        ],
      })
      expect(llama.runs[0]?.modelBucket).toBe('3.5 GiB')
    })

    test('malformed fields read as absent', () => {
      const llama = view('llama', {
        compile_time: 'fast',
        cpu_benchmark: { generation_speed: 'quick', prompt_speed: 10 },
        gpu_benchmarks: 'oops',
      })

      expect(llama.compileSeconds).toBeNull()
      expect(llama.runs).toEqual([
        {
          benchmark: 'llama',
          ...UNTAGGED,
          deviceClass: 'cpu',
          modelBucket: null,
          threads: null,
          tokensPerSecond: null,
          promptTokensPerSecond: 10,
          elapsedSeconds: null,
        },
      ])
    })

    test('non-positive build times are absent', () => {
      expect(view('llama', { compile_time: 0, runs_cpu: [] }).compileSeconds).toBeNull()
      expect(view('llama', { build: { build_time_seconds: -3 }, runs_cpu: [] }).compileSeconds).toBeNull()
    })

    test('non-objects give an empty view', () => {
      expect(view('llama', 'nope')).toEqual({
        benchmark: 'llama',
        format: 'empty',
        inventory: [],
        listedDevices: [],
        compileSeconds: null,
        runs: [],
        skipped: 0,
      })
    })
  })

  describe('reversan', () => {
    test('legacy series', () => {
      const reversan = view('reversan', legacyReversanPayload())

      expect(reversan.format).toBe('legacy')
      expect(reversan.runs).toEqual([
        {
          benchmark: 'reversan',
          ...UNTAGGED,
          series: 'depth',
          depth: 6,
          threads: null,
          elapsedSeconds: 1.5,
          maxRssKb: 2048,
        },
        {
          benchmark: 'reversan',
          ...UNTAGGED,
          series: 'depth',
          depth: 6,
          threads: null,
          elapsedSeconds: 2.5,
          maxRssKb: null,
        },
        {
          benchmark: 'reversan',
          ...UNTAGGED,
          series: 'threads',
          depth: null,
          threads: 4,
          elapsedSeconds: 3.25,
          maxRssKb: null,
        },
      ])
    })

    test('unified series', () => {
      const reversan = view('reversan', {
        depth_benchmarks: [{ depth: 4, time_seconds: 0.5, memory_kb: 100 }],
        thread_benchmarks: [{ threads: 2, time_seconds: 1 }, 7],
      })

      expect(reversan.format).toBe('unified')
      expect(reversan.skipped).toBe(1)
      expect(reversan.runs.map((run) => [run.series, run.depth, run.threads, run.elapsedSeconds])).toEqual([
        ['depth', 4, null, 0.5],
        ['threads', null, 2, 1],
      ])
    })
  })

  describe('sevenzip', () => {
    test('unified summary is one run', () => {
      const sevenzip = view('sevenzip', { usage_percent: 850, ru_mips: 5600, total_mips: 48000 })

      expect(sevenzip.format).toBe('unified')
      expect(sevenzip.runs).toEqual([
        {
          benchmark: 'sevenzip',
          ...UNTAGGED,
          threads: null,
          compressionSpeedMbS: null,
          elapsedSeconds: null,
          compressionRatio: null,
          totalMips: 48000,
          ruMips: 5600,
          usagePercent: 850,
        },
      ])
    })

    test('legacy runs skip failures', () => {
      const sevenzip = view('sevenzip', {
        runs: [
          { threads: 8, compression_speed_mb_s: 120, elapsed_seconds: 10, compression_ratio: 3.1 },
          { threads: 16, returncode: 2 },
        ],
      })

      expect(sevenzip.format).toBe('legacy')
      expect(sevenzip.runs).toHaveLength(1)
      expect(sevenzip.runs[0]?.compressionSpeedMbS).toBe(120)
    })
  })

  describe('blender', () => {
    test('legacy device runs', () => {
      const blender = view('blender', legacyBlenderPayload())

      expect(blender.format).toBe('legacy')
      expect(blender.runs).toHaveLength(3)
      expect(blender.runs[0]).toEqual({
        benchmark: 'blender',
        deviceClass: 'gpu',
        deviceName: 'NVIDIA GeForce RTX 4090',
        hwId: null,
        deviceSlug: 'nvidia-geforce-rtx-4090',
        scene: 'monster',
        framework: 'OPTIX',
        samplesPerMinute: 5000,
        renderSeconds: 30,
        peakMemory: null,
      })
      expect(blender.runs[2]?.deviceClass).toBe('cpu')
      expect(blender.runs[2]?.framework).toBeNull()
      expect(blender.runs[2]?.samplesPerMinute).toBe(150)
      expect(blender.listedDevices[0]).toEqual({
        name: 'AMD Ryzen 9 7950X 16-Core Processor',
        classHint: 'cpu',
        cores: 16,
        threads: 32,
        source: 'blender:system-info',
      })
    })

    test('unified scene maps', () => {
      const blender = view('blender', {
        meta: {
          hardware: {
            'cpu-0': { name: 'AMD Ryzen 9 7950X 16-Core Processor', type: 'cpu' },
            'gpu-0': { name: 'AMD Radeon RX 7900 XTX', type: 'gpu', framework: 'HIP' },
          },
        },
        results: {
          cpu: { monster: 180, classroom: { samples_per_minute: 90 } },
          gpus: [{ hw_id: 'gpu-0', scenes: { monster: 2400 } }],
        },
      })

      expect(blender.format).toBe('unified')
      expect(blender.runs.map((run) => [run.deviceSlug, run.scene, run.framework, run.samplesPerMinute])).toEqual([
        ['amd-ryzen-9-7950x-16-core-processor', 'monster', null, 180],
        ['amd-ryzen-9-7950x-16-core-processor', 'classroom', null, 90],
        ['amd-radeon-rx-7900-xtx', 'monster', 'HIP', 2400],
      ])
    })
  })
})
