import type { HardwareDevice } from '../hardware/types'
import type { JsonObject, LlamaRun, RawBenchmarkPayload } from '../schema/types'

export const RYZEN_5800X = 'AMD Ryzen 7 5800X 8-Core Processor'
export const RTX_3090 = 'NVIDIA GeForce RTX 3090'

export const CPU_DEVICE: HardwareDevice = {
  id: 'amd-ryzen-7-5800x-8-core-processor',
  name: RYZEN_5800X,
  type: 'cpu',
  manufacturer: 'AMD',
  cores: 8,
  threads: 16,
}

export const GPU_DEVICE: HardwareDevice = {
  id: 'nvidia-geforce-rtx-3090',
  name: RTX_3090,
  type: 'gpu',
  manufacturer: 'NVIDIA',
  framework: 'VULKAN',
}

export function unifiedHardware(): JsonObject {
  return {
    'cpu-0': { hw_id: 'cpu-0', name: RYZEN_5800X, type: 'cpu', manufacturer: 'AMD', cores: 8, threads: 16 },
    'gpu-0': { hw_id: 'gpu-0', name: RTX_3090, type: 'gpu', manufacturer: 'NVIDIA', framework: 'VULKAN' },
  }
}

/**
 * Multi-benchmark upload with a hardware inventory and one llama section.
 */
export function unifiedUpload(generationSpeed = 194.5): JsonObject {
  return {
    meta: { host: 'bench-box', hardware: unifiedHardware() },
    llama: {
      compile_time: 81,
      cpu_benchmark: { prompt_speed: 106.5, generation_speed: 16.8, hw_id: 'cpu-0' },
      gpu_benchmarks: [{ prompt_speed: 6221.2, generation_speed: generationSpeed, hw_id: 'gpu-0' }],
    },
  }
}

export function legacyLlamaPayload(): JsonObject {
  return {
    build: { compile_time_seconds: 95.5 },
    runs_cpu: [
      {
        returncode: 0,
        metrics: {
          system_info: { cpu_info: 'Intel Core i7-12700K', model_type: 'llama 7B Q4_0', n_threads: 8 },
          generation: { avg_tokens_per_sec: 12 },
          prompt_processing: { avg_tokens_per_sec: 60 },
        },
      },
      { returncode: 1, metrics: { system_info: { cpu_info: 'Intel Core i7-12700K', n_threads: 8 } } },
      'not a run',
    ],
    runs_gpu: [
      {
        returncode: 0,
        gpu_device: { name: 'NVIDIA GeForce RTX 3060' },
        metrics: {
          system_info: { backends: 'CUDA', model_type: 'llama 7B Q4_0', n_threads: 8 },
          generation: { avg_tokens_per_sec: 70 },
        },
      },
    ],
  }
}

export function legacyReversanPayload(): JsonObject {
  return {
    runs_depth: [
      { depth: 6, returncode: 0, average_metrics: { elapsed_seconds: 1.5, max_rss_kb: 2048 } },
      { depth: 6, elapsed_seconds: 2.5 },
      { depth: 8, success: false, elapsed_seconds: 9 },
    ],
    runs_threads: [{ config: { threads: 4 }, elapsed_time: 3.25 }],
  }
}

export function legacyBlenderPayload(): JsonObject {
  return {
    device_runs: [
      {
        device_framework: 'OPTIX',
        device_name: 'NVIDIA GeForce RTX 4090',
        raw_json: [
          {
            scene: { label: 'monster' },
            stats: { samples_per_minute: 5000, total_render_time: 30 },
            system_info: {
              devices: [
                { name: 'AMD Ryzen 9 7950X 16-Core Processor', type: 'CPU' },
                { name: 'NVIDIA GeForce RTX 4090', type: 'OPTIX' },
              ],
              num_cpu_cores: 16,
              num_cpu_threads: 32,
            },
          },
          { scene: { label: 'junkshop' }, stats: { samples_per_minute: 2500 } },
        ],
      },
      {
        device_framework: 'CPU',
        device_name: 'AMD Ryzen 9 7950X 16-Core Processor',
        raw_json: [{ scene: { label: 'monster' }, stats: { samples_per_minute: 150 } }],
      },
    ],
  }
}

export function storedPayload(
  document: JsonObject,
  overrides: Partial<Omit<RawBenchmarkPayload, 'document'>> = {},
): RawBenchmarkPayload {
  return {
    uploadId: 'upload-1',
    benchmark: 'llama',
    storedAt: '2026-01-02T03:04:05.000Z',
    document,
    ...overrides,
  }
}

export function llamaRun(overrides: Partial<LlamaRun> = {}): LlamaRun {
  return {
    benchmark: 'llama',
    deviceClass: 'gpu',
    deviceName: RTX_3090,
    hwId: null,
    deviceSlug: 'nvidia-geforce-rtx-3090',
    modelBucket: 'llama 7B Q4_0',
    threads: 8,
    tokensPerSecond: null,
    promptTokensPerSecond: null,
    elapsedSeconds: null,
    ...overrides,
  }
}
