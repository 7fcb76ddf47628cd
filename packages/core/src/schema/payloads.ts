/**
 * Payload Schemas
 *
 * Lenient zod schemas for every known payload shape. Scalar fields use
 * `.catch(undefined)` so a field of the wrong type reads as absent instead
 * of failing the whole record. Lists are kept as `unknown[]` and parsed one
 * element at a time by the normalizer, which counts the elements it skips.
 *
 * @module schema/payloads
 */

import { z } from 'zod'

export const optNumber = z.number().finite().optional().catch(undefined)
export const optString = z.string().optional().catch(undefined)
export const optBoolean = z.boolean().optional().catch(undefined)
export const rawList = z.array(z.unknown()).optional().catch(undefined)
export const rawRecord = z.record(z.unknown()).optional().catch(undefined)

function lenient<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape).optional().catch(undefined)
}

// Shared

export const inventoryEntrySchema = z.object({
  hw_id: optString,
  name: z.string().min(1),
  type: optString,
  manufacturer: optString,
  cores: optNumber,
  threads: optNumber,
  framework: optString,
  driver_version: optString,
  memory_mb: optNumber,
})

export const metaSchema = z.object({
  benchmark_name: optString,
  host: optString,
  platform: optString,
  timestamp: optNumber,
  cpu_only: optBoolean,
  hardware: rawRecord,
})

export const envelopeSchema = z.object({
  meta: lenient(metaSchema.shape),
  hardware: rawRecord,
})

export const buildSchema = lenient({
  compile_time_seconds: optNumber,
  build_time_seconds: optNumber,
  total_time_seconds: optNumber,
  cpu_build_timing: lenient({
    build_time_seconds: optNumber,
    total_time_seconds: optNumber,
  }),
})

export const namedDeviceSchema = z.object({
  name: z.string(),
  index: optNumber,
  type: optString,
  driver: optString,
})

export const systemInfoSchema = lenient({
  cpu: z
    .union([
      z.string(),
      z.object({
        name: optString,
        model: optString,
        cores: optNumber,
        threads: optNumber,
      }),
    ])
    .optional()
    .catch(undefined),
  cuda_devices: rawList,
  rocm_devices: rawList,
})

const outcome = {
  returncode: optNumber,
  success: optBoolean,
}

// llama

const throughputSchema = lenient({ avg_tokens_per_sec: optNumber })

export const llamaLegacyRunSchema = z.object({
  ...outcome,
  type: optString,
  elapsed_seconds: optNumber,
  metrics: lenient({
    system_info: lenient({
      cpu_info: optString,
      gpu_info: optString,
      backends: optString,
      model_type: optString,
      model_size: optNumber,
      n_threads: optNumber,
    }),
    generation: throughputSchema,
    prompt_processing: throughputSchema,
    tokens_per_second: optNumber,
  }),
  gpu_device: lenient({ name: optString, index: optNumber }),
})

export const llamaUnifiedRunSchema = z.object({
  hw_id: optString,
  prompt_speed: optNumber,
  generation_speed: optNumber,
  tokens_per_second: optNumber,
  threads: optNumber,
  model: optString,
})

export const llamaDeviceRunsSchema = z.object({
  device_type: optString,
  device_name: optString,
  runs: rawList,
})

export const llamaPayloadSchema = z.object({
  compile_time: optNumber,
  build: buildSchema,
  system_info: systemInfoSchema,
  cpu_benchmark: z.unknown().optional(),
  gpu_benchmarks: rawList,
  runs_cpu: rawList,
  runs_gpu: rawList,
  device_runs: rawList,
  gpu_selection: lenient({
    device_index: optNumber,
    available_gpus: rawList,
  }),
})

// reversan

const reversanMetricsSchema = lenient({
  elapsed_seconds: optNumber,
  max_rss_kb: optNumber,
})

export const reversanLegacyRunSchema = z.object({
  ...outcome,
  depth: optNumber,
  threads: optNumber,
  config: lenient({ threads: optNumber }),
  elapsed_seconds: optNumber,
  elapsed_time: optNumber,
  metrics: reversanMetricsSchema,
  average_metrics: reversanMetricsSchema,
})

export const reversanUnifiedRunSchema = z.object({
  depth: optNumber,
  threads: optNumber,
  time_seconds: optNumber,
  memory_kb: optNumber,
})

export const reversanPayloadSchema = z.object({
  compile_time: optNumber,
  build: buildSchema,
  system_info: systemInfoSchema,
  depth_benchmarks: rawList,
  thread_benchmarks: rawList,
  runs_depth: rawList,
  runs_threads: rawList,
})

// sevenzip

export const sevenzipLegacyRunSchema = z.object({
  ...outcome,
  threads: optNumber,
  elapsed_seconds: optNumber,
  compression_speed_mb_s: optNumber,
  compression_ratio: optNumber,
})

export const sevenzipPayloadSchema = z.object({
  compile_time: optNumber,
  build: buildSchema,
  system_info: systemInfoSchema,
  usage_percent: optNumber,
  ru_mips: optNumber,
  total_mips: optNumber,
  runs: rawList,
})

// blender

const blenderDeviceListSchema = z.array(z.unknown()).optional().catch(undefined)

export const blenderRawResultSchema = z.object({
  scene: lenient({ label: optString }),
  stats: lenient({
    samples_per_minute: optNumber,
    device_peak_memory: optNumber,
    total_render_time: optNumber,
  }),
  device_info: lenient({ compute_devices: blenderDeviceListSchema }),
  system_info: lenient({
    devices: blenderDeviceListSchema,
    num_cpu_cores: optNumber,
    num_cpu_threads: optNumber,
  }),
})

export const blenderDeviceRunSchema = z.object({
  ...outcome,
  device_framework: optString,
  device_name: optString,
  elapsed_seconds: optNumber,
  scene_results: rawRecord,
  raw_json: rawList,
})

export const blenderUnifiedGpuSchema = z.object({
  hw_id: optString,
  scenes: rawRecord,
})

export const blenderPayloadSchema = z.object({
  compile_time: optNumber,
  build: buildSchema,
  system_info: systemInfoSchema,
  cpu: rawRecord,
  gpus: rawList,
  device_runs: rawList,
  benchmark_results: rawList,
})

export type InventoryEntryInput = z.infer<typeof inventoryEntrySchema>
export type BuildInput = z.infer<typeof buildSchema>
export type SystemInfoInput = z.infer<typeof systemInfoSchema>
export type LlamaLegacyRunInput = z.infer<typeof llamaLegacyRunSchema>
export type ReversanLegacyRunInput = z.infer<typeof reversanLegacyRunSchema>
export type BlenderDeviceRunInput = z.infer<typeof blenderDeviceRunSchema>
