/**
 * Shared CLI setup: configuration, store and engine.
 */

import { BenchEngine, FileStore, loadConfig, type RigbenchConfig } from '@rigbench/core'

export interface ContextOptions {
  config?: string
  dataDir?: string
}

// ANSI colors
export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
}

export async function createContext(options: ContextOptions): Promise<{ config: RigbenchConfig; engine: BenchEngine }> {
  const loaded = await loadConfig({ path: options.config ?? process.env.RIGBENCH_CONFIG })
  const config: RigbenchConfig = options.dataDir ? { ...loaded, storage: { dataDir: options.dataDir } } : loaded
  const engine = new BenchEngine({
    store: new FileStore(config.storage.dataDir),
    classification: config.classification,
  })
  return { config, engine }
}

export function formatNumber(value: number | null): string {
  if (value === null) return '-'
  return Number.isInteger(value) ? value.toString() : value.toFixed(2)
}

export function formatDate(iso: string | null): string {
  return iso ? new Date(iso).toLocaleString() : 'never'
}
