/**
 * File Store
 *
 * JSON files under a data directory:
 *
 * ```
 * <dataDir>/devices.json
 * <dataDir>/payloads/<deviceId>/<benchmark>/<uploadId>.json
 * ```
 *
 * A missing directory reads as empty. Writes within one process are
 * serialized so get-then-write of `devices.json` is atomic per store.
 *
 * @module store/file
 */

import { mkdir, readdir, readFile, rename, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import { DEVICE_CLASSES, FRAMEWORKS, type HardwareDevice } from '../hardware/types'
import { BENCHMARK_TYPES, type BenchmarkType, type RawBenchmarkPayload } from '../schema/types'
import { comparePayloads, reconcileDevice } from './reconcile'
import type { BenchStore } from './types'

const hardwareDeviceSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  type: z.enum(DEVICE_CLASSES),
  manufacturer: z.string(),
  cores: z.number().optional(),
  threads: z.number().optional(),
  framework: z.enum(FRAMEWORKS).optional(),
})

const payloadSchema = z.object({
  uploadId: z.string().min(1),
  benchmark: z.enum(BENCHMARK_TYPES),
  storedAt: z.string(),
  document: z.record(z.unknown()),
})

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message)
    this.name = 'StoreError'
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function pathSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]/g, '_')
}

async function readJson<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.infer<T> | null> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    if (isNotFound(error)) return null
    throw error
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new StoreError(`Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`, path)
  }
  const result = schema.safeParse(raw)
  if (!result.success) {
    throw new StoreError(`Unexpected content in ${path}: ${result.error.issues[0]?.message ?? 'invalid'}`, path)
  }
  return result.data
}

async function writeJson(path: string, value: unknown): Promise<void> {
  const temporary = `${path}.tmp`
  await writeFile(temporary, `${JSON.stringify(value, null, 2)}\n`, 'utf8')
  await rename(temporary, path)
}

export class FileStore implements BenchStore {
  readonly dataDir: string
  private lock: Promise<void> = Promise.resolve()

  constructor(dataDir: string) {
    this.dataDir = dataDir
  }

  private get devicesPath(): string {
    return join(this.dataDir, 'devices.json')
  }

  private payloadDir(deviceId: string, benchmark: BenchmarkType): string {
    return join(this.dataDir, 'payloads', pathSegment(deviceId), benchmark)
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lock.then(task, task)
    this.lock = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }

  private async readDevices(): Promise<HardwareDevice[]> {
    return (await readJson(this.devicesPath, z.array(hardwareDeviceSchema))) ?? []
  }

  async getById(id: string): Promise<HardwareDevice | null> {
    const devices = await this.readDevices()
    return devices.find((device) => device.id === id) ?? null
  }

  async upsert(device: HardwareDevice): Promise<HardwareDevice> {
    return this.exclusive(async () => {
      const devices = await this.readDevices()
      const index = devices.findIndex((existing) => existing.id === device.id)
      const stored = reconcileDevice(devices[index], device)
      if (index === -1) {
        devices.push(stored)
      } else {
        devices[index] = stored
      }
      await mkdir(this.dataDir, { recursive: true })
      await writeJson(this.devicesPath, devices)
      return stored
    })
  }

  async listAll(): Promise<HardwareDevice[]> {
    return this.readDevices()
  }

  async append(deviceId: string, payload: RawBenchmarkPayload): Promise<void> {
    const dir = this.payloadDir(deviceId, payload.benchmark)
    await this.exclusive(async () => {
      await mkdir(dir, { recursive: true })
      await writeJson(join(dir, `${pathSegment(payload.uploadId)}.json`), payload)
    })
  }

  async listPayloads(deviceId: string, benchmark: BenchmarkType): Promise<RawBenchmarkPayload[]> {
    const dir = this.payloadDir(deviceId, benchmark)
    let files: string[]
    try {
      files = await readdir(dir)
    } catch (error) {
      if (isNotFound(error)) return []
      throw error
    }

    const payloads: RawBenchmarkPayload[] = []
    for (const file of files.filter((name) => name.endsWith('.json')).sort()) {
      const payload = await readJson(join(dir, file), payloadSchema)
      if (payload) payloads.push(payload)
    }
    return payloads.sort(comparePayloads)
  }
}
