/**
 * BenchEngine Tests
 */

import { describe, expect, test } from 'vitest'
import { DEFAULT_CONFIG } from '../config/types'
import { BenchEngine, DeviceNotFoundError } from '../engine/BenchEngine'
import { NoDeviceError } from '../hardware/extractor'
import { splitUnifiedDocument } from '../schema/normalizer'
import { MemoryStore } from '../store/memory'
import { uploadIdTime } from '../store/upload-id'
import { createLogger } from '../utils/logger'
import { CPU_DEVICE, GPU_DEVICE, legacyReversanPayload, unifiedUpload } from './fixtures'

const NOW = new Date('2026-01-02T03:04:05.000Z')

function createEngine(lines: string[] = []) {
  const logger = createLogger('test', { debug: false, sink: (_level, line) => lines.push(line) })
  return new BenchEngine({ store: new MemoryStore(), now: () => NOW, logger })
}

describe('BenchEngine', () => {
  describe('constructor', () => {
    test('creates with default classification', () => {
      const engine = createEngine()
      expect(engine.getConfig().classification).toEqual(DEFAULT_CONFIG.classification)
    })

    test('getConfig returns copy of config', () => {
      const engine = createEngine()
      expect(engine.getConfig()).not.toBe(engine.getConfig())
    })
  })

  describe('setConfig', () => {
    test('rebuilds classification', () => {
      const engine = createEngine()
      const hint = { description: 'Mystery Accelerator 9000' }

      expect(engine.extractHardware({}, hint)[0]?.type).toBe('gpu')

      engine.setConfig({ classification: { ...DEFAULT_CONFIG.classification, defaultClass: 'cpu' } })

      expect(engine.getConfig().classification.defaultClass).toBe('cpu')
      expect(engine.extractHardware({}, hint)[0]?.type).toBe('cpu')
    })
  })

  describe('ingest', () => {
    test('creates devices and stores the payload under each', async () => {
      const engine = createEngine()
      const result = await engine.ingest({ payloads: splitUnifiedDocument(unifiedUpload()), uploadId: 'upload-1' })

      expect(result).toEqual({
        uploadId: 'upload-1',
        devices: [
          { device: CPU_DEVICE, change: 'created' },
          { device: GPU_DEVICE, change: 'created' },
        ],
        stored: [
          { deviceId: CPU_DEVICE.id, benchmark: 'llama' },
          { deviceId: GPU_DEVICE.id, benchmark: 'llama' },
        ],
      })
    })

    test('logs created devices', async () => {
      const lines: string[] = []
      await createEngine(lines).ingest({ payloads: splitUnifiedDocument(unifiedUpload()), uploadId: 'upload-1' })

      expect(lines).toEqual([
        '[test] created cpu id=amd-ryzen-7-5800x-8-core-processor name="AMD Ryzen 7 5800X 8-Core Processor" upload=upload-1',
        '[test] created gpu id=nvidia-geforce-rtx-3090 name="NVIDIA GeForce RTX 3090" upload=upload-1',
      ])
    })

    test('reuses known devices', async () => {
      const engine = createEngine()
      await engine.ingest({ payloads: splitUnifiedDocument(unifiedUpload()), uploadId: 'upload-1' })
      const result = await engine.ingest({ payloads: splitUnifiedDocument(unifiedUpload(200)), uploadId: 'upload-2' })

      expect(result.devices.map((entry) => entry.change)).toEqual(['unchanged', 'unchanged'])
    })

    test('generates an upload id', async () => {
      const engine = createEngine()
      const result = await engine.ingest({ payloads: splitUnifiedDocument(unifiedUpload()) })
      expect(uploadIdTime(result.uploadId)).toEqual(NOW)
    })

    test('stores CPU-only payloads under the hinted CPU', async () => {
      const engine = createEngine()
      const result = await engine.ingest({
        payloads: { reversan: legacyReversanPayload() },
        hint: { cpu: 'AMD Ryzen 5 5600X 6-Core Processor' },
        uploadId: 'upload-1',
      })

      expect(result.stored).toEqual([{ deviceId: 'amd-ryzen-5-5600x-6-core-processor', benchmark: 'reversan' }])
    })

    test('rejects uploads without any device', async () => {
      const engine = createEngine()
      await expect(engine.ingest({ payloads: { reversan: legacyReversanPayload() } })).rejects.toThrow(NoDeviceError)
      expect(await engine.listDevices()).toEqual([])
    })
  })

  describe('report', () => {
    test('aggregates the runs of one device', async () => {
      const engine = createEngine()
      await engine.ingest({ payloads: splitUnifiedDocument(unifiedUpload()), uploadId: 'upload-1' })

      const report = await engine.report(GPU_DEVICE.id)

      expect(report.device).toEqual(GPU_DEVICE)
      expect(report.benchmarks).toEqual([
        {
          benchmark: 'llama',
          payloadCount: 1,
          buildSeconds: 81,
          aggregation: {
            status: 'ok',
            benchmark: 'llama',
            deviceId: GPU_DEVICE.id,
            groups: [
              {
                dimension: 'model-threads',
                key: { model: null, threads: null },
                label: 'unknown model @ ? threads',
                runCount: 1,
                medians: { tokensPerSecond: 194.5, promptTokensPerSecond: 6221.2, elapsedSeconds: null },
                values: { tokensPerSecond: [194.5], promptTokensPerSecond: [6221.2], elapsedSeconds: [] },
              },
            ],
          },
        },
      ])
    })

    test('takes the median across uploads', async () => {
      const engine = createEngine()
      await engine.ingest({ payloads: splitUnifiedDocument(unifiedUpload()), uploadId: 'upload-1' })
      await engine.ingest({ payloads: splitUnifiedDocument(unifiedUpload(200)), uploadId: 'upload-2' })

      const report = await engine.report(GPU_DEVICE.id)
      const aggregation = report.benchmarks[0]?.aggregation

      expect(report.benchmarks[0]?.payloadCount).toBe(2)
      expect(aggregation?.status).toBe('ok')
      if (aggregation?.status === 'ok') {
        expect(aggregation.groups[0]?.runCount).toBe(2)
        expect(aggregation.groups[0]?.medians.tokensPerSecond).toBe(197.25)
      }
    })

    test('re-ingesting an upload does not double count', async () => {
      const engine = createEngine()
      await engine.ingest({ payloads: splitUnifiedDocument(unifiedUpload()), uploadId: 'upload-1' })
      await engine.ingest({ payloads: splitUnifiedDocument(unifiedUpload()), uploadId: 'upload-1' })

      expect((await engine.report(GPU_DEVICE.id)).benchmarks[0]?.payloadCount).toBe(1)
    })

    test('CPU reports see only CPU runs', async () => {
      const engine = createEngine()
      await engine.ingest({ payloads: splitUnifiedDocument(unifiedUpload()), uploadId: 'upload-1' })

      const aggregation = (await engine.report(CPU_DEVICE.id)).benchmarks[0]?.aggregation
      expect(aggregation?.status === 'ok' ? aggregation.groups[0]?.medians.tokensPerSecond : null).toBe(16.8)
    })

    test('throws DeviceNotFoundError for unknown ids', async () => {
      const engine = createEngine()
      await expect(engine.report('nvidia-geforce-rtx-9999')).rejects.toThrow(DeviceNotFoundError)
    })
  })

  describe('listDevices', () => {
    test('lists CPUs first with payload counts', async () => {
      const engine = createEngine()
      await engine.ingest({ payloads: splitUnifiedDocument(unifiedUpload()), uploadId: 'upload-1' })

      expect(await engine.listDevices()).toEqual([
        {
          device: CPU_DEVICE,
          payloadCounts: { llama: 1, reversan: 0, sevenzip: 0, blender: 0 },
          lastUploadAt: '2026-01-02T03:04:05.000Z',
        },
        {
          device: GPU_DEVICE,
          payloadCounts: { llama: 1, reversan: 0, sevenzip: 0, blender: 0 },
          lastUploadAt: '2026-01-02T03:04:05.000Z',
        },
      ])
    })
  })
})
