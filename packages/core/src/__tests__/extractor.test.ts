/**
 * HardwareExtractor Tests
 */

import { describe, expect, test } from 'vitest'
import { ManufacturerClassifier } from '../hardware/classifier'
import { extractHardware, HardwareExtractor, NoDeviceError } from '../hardware/extractor'
import { buildPatternTables } from '../hardware/patterns'
import { splitUnifiedDocument, view } from '../schema/normalizer'
import {
  CPU_DEVICE,
  GPU_DEVICE,
  legacyBlenderPayload,
  legacyLlamaPayload,
  legacyReversanPayload,
  RYZEN_5800X,
  unifiedUpload,
} from './fixtures'

const RYZEN_8845HS = 'AMD Ryzen 7 8845HS w/ Radeon 780M Graphics'

function compositeLlamaPayload(withSelection = false) {
  return {
    ...(withSelection
      ? { gpu_selection: { device_index: 0, available_gpus: [{ name: 'NVIDIA GeForce RTX 4090', index: 0 }] } }
      : {}),
    runs_cpu: [{ metrics: { system_info: { cpu_info: 'Intel Core i9-13900K' }, generation: { avg_tokens_per_sec: 10 } } }],
    runs_gpu: [
      {
        gpu_device: { name: 'NVIDIA GeForce RTX 4090, NVIDIA GeForce RTX 3090' },
        metrics: { generation: { avg_tokens_per_sec: 90 } },
      },
    ],
  }
}

const I9_13900K = { id: 'intel-core-i9-13900k', name: 'Intel Core i9-13900K', type: 'cpu', manufacturer: 'Intel' }
const RTX_4090 = { id: 'nvidia-geforce-rtx-4090', name: 'NVIDIA GeForce RTX 4090', type: 'gpu', manufacturer: 'NVIDIA' }

describe('HardwareExtractor', () => {
  describe('extract', () => {
    test('reads the inventory of a unified upload', () => {
      expect(extractHardware(splitUnifiedDocument(unifiedUpload()))).toEqual([CPU_DEVICE, GPU_DEVICE])
    })

    test('reads legacy llama run metadata', () => {
      expect(extractHardware({ llama: legacyLlamaPayload() })).toEqual([
        { id: 'intel-core-i7-12700k', name: 'Intel Core i7-12700K', type: 'cpu', manufacturer: 'Intel', threads: 8 },
        { id: 'nvidia-geforce-rtx-3060', name: 'NVIDIA GeForce RTX 3060', type: 'gpu', manufacturer: 'NVIDIA', framework: 'CUDA' },
      ])
    })

    test('reads renderer device listings', () => {
      expect(extractHardware({ blender: legacyBlenderPayload() })).toEqual([
        {
          id: 'amd-ryzen-9-7950x-16-core-processor',
          name: 'AMD Ryzen 9 7950X 16-Core Processor',
          type: 'cpu',
          manufacturer: 'AMD',
          cores: 16,
          threads: 32,
        },
        { ...RTX_4090, framework: 'OPTIX' },
      ])
    })

    test('merges devices across payloads of one upload', () => {
      const devices = extractHardware({
        ...splitUnifiedDocument(unifiedUpload()),
        blender: legacyBlenderPayload(),
      })
      expect(devices.map((device) => device.id)).toEqual([
        'amd-ryzen-7-5800x-8-core-processor',
        'amd-ryzen-9-7950x-16-core-processor',
        'nvidia-geforce-rtx-3090',
        'nvidia-geforce-rtx-4090',
      ])
    })

    test('never emits a composite device', () => {
      expect(extractHardware({ llama: compositeLlamaPayload() })).toEqual([I9_13900K])
    })

    test('a composite covered by a named GPU leaves only that GPU', () => {
      expect(extractHardware({ llama: compositeLlamaPayload(true) })).toEqual([I9_13900K, RTX_4090])
    })

    test('fills a missing GPU from the hint', () => {
      expect(extractHardware({ llama: compositeLlamaPayload() }, { gpu: 'NVIDIA GeForce RTX 4090' })).toEqual([
        I9_13900K,
        RTX_4090,
      ])
    })

    test('ignores the hint when the payloads name every needed device', () => {
      const devices = extractHardware(splitUnifiedDocument(unifiedUpload()), { cpu: 'Intel Core i5-12400' })
      expect(devices).toEqual([CPU_DEVICE, GPU_DEVICE])
    })

    test('falls back to the hint for tools that name no device', () => {
      expect(extractHardware({ reversan: legacyReversanPayload() }, { cpu: 'AMD Ryzen 5 5600X 6-Core Processor' })).toEqual([
        {
          id: 'amd-ryzen-5-5600x-6-core-processor',
          name: 'AMD Ryzen 5 5600X 6-Core Processor',
          type: 'cpu',
          manufacturer: 'AMD',
        },
      ])
    })

    test('classifies the elements of a hint description', () => {
      expect(extractHardware({}, { description: 'Intel Core i5-12400, NVIDIA GeForce RTX 3060' })).toEqual([
        { id: 'intel-core-i5-12400', name: 'Intel Core i5-12400', type: 'cpu', manufacturer: 'Intel' },
        { id: 'nvidia-geforce-rtx-3060', name: 'NVIDIA GeForce RTX 3060', type: 'gpu', manufacturer: 'NVIDIA' },
      ])
    })

    test('throws NoDeviceError without devices or hint', () => {
      expect(() => extractHardware({ reversan: legacyReversanPayload() })).toThrow(NoDeviceError)
      expect(() => extractHardware({})).toThrow(NoDeviceError)
      expect(() => extractHardware({ llama: 'not an object' })).toThrow(NoDeviceError)
    })

    test('turns a CPU string in a GPU field into its integrated GPU', () => {
      const payload = {
        runs_cpu: [{ metrics: { system_info: { cpu_info: RYZEN_8845HS } } }],
        runs_gpu: [{ gpu_device: { name: RYZEN_8845HS } }],
      }
      expect(extractHardware({ llama: payload })).toEqual([
        { id: 'amd-ryzen-7-8845hs-w-radeon-780m-graphics', name: RYZEN_8845HS, type: 'cpu', manufacturer: 'AMD' },
        { id: 'amd-radeon-780m-graphics', name: 'AMD Radeon 780M Graphics', type: 'gpu', manufacturer: 'AMD' },
      ])
    })

    test('keeps renderer devices typed as GPUs even when named by a CPU vendor', () => {
      const payload = {
        device_runs: [
          {
            device_framework: 'METAL',
            device_name: 'Apple M1 Max',
            raw_json: [
              {
                scene: { label: 'monster' },
                stats: { samples_per_minute: 900 },
                system_info: {
                  devices: [
                    { name: 'Apple M1 Max', type: 'METAL' },
                    { name: 'Intel Xeon W-3245', type: 'CPU' },
                  ],
                },
              },
            ],
          },
          {
            device_framework: 'CPU',
            device_name: 'Intel Xeon W-3245',
            raw_json: [{ scene: { label: 'monster' }, stats: { samples_per_minute: 120 } }],
          },
        ],
      }

      expect(extractHardware({ blender: payload })).toEqual([
        { id: 'intel-xeon-w-3245', name: 'Intel Xeon W-3245', type: 'cpu', manufacturer: 'Intel' },
        { id: 'apple-m1-max', name: 'Apple M1 Max', type: 'gpu', manufacturer: 'Apple', framework: 'METAL' },
      ])
    })

    test('keeps inventory GPUs named by a CPU vendor', () => {
      const payload = {
        meta: { hardware: { 'gpu-0': { hw_id: 'gpu-0', name: 'Intel Iris Xe', type: 'gpu' } } },
      }
      expect(extractHardware({ llama: payload })).toEqual([
        { id: 'intel-iris-xe', name: 'Intel Iris Xe', type: 'gpu', manufacturer: 'Intel' },
      ])
    })

    test('drops placeholder names', () => {
      const payload = {
        meta: {
          hardware: {
            'cpu-0': { name: RYZEN_5800X, type: 'cpu' },
            'gpu-0': { name: 'Unknown', type: 'gpu' },
          },
        },
        results: { cpu_benchmark: { generation_speed: 1, hw_id: 'cpu-0' } },
      }
      expect(extractHardware({ llama: payload })).toEqual([
        { id: 'amd-ryzen-7-5800x-8-core-processor', name: RYZEN_5800X, type: 'cpu', manufacturer: 'AMD' },
      ])
    })

    test('drops configured placeholder names', () => {
      const extractor = new HardwareExtractor({
        classifier: new ManufacturerClassifier({ tables: buildPatternTables({ placeholders: ['^virtual display$'] }) }),
      })
      const devices = extractor.extract({ llama: legacyLlamaPayload() }, { gpu: 'Virtual Display' })
      expect(devices.map((device) => device.name)).toEqual(['Intel Core i7-12700K', 'NVIDIA GeForce RTX 3060'])
      expect(() => extractor.extract({}, { gpu: 'Virtual Display' })).toThrow(NoDeviceError)
    })
  })

  describe('candidatesOf', () => {
    test('lists inventory entries before run devices', () => {
      const extractor = new HardwareExtractor()
      const candidates = extractor.candidatesOf(view('llama', splitUnifiedDocument(unifiedUpload()).llama))

      expect(candidates.map((candidate) => [candidate.name, candidate.classHint, candidate.source])).toEqual([
        [RYZEN_5800X, 'cpu', 'llama:inventory'],
        ['NVIDIA GeForce RTX 3090', 'gpu', 'llama:inventory'],
        [RYZEN_5800X, 'cpu', 'llama:runs'],
        ['NVIDIA GeForce RTX 3090', 'gpu', 'llama:runs'],
      ])
    })
  })
})
