/**
 * Configuration Types
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import type { DeviceClass } from '../hardware/types'

export interface RigbenchConfig {
  classification: {
    /** Class for names no rule decides and no call site hints */
    defaultClass: DeviceClass
    /** Extra CPU vendor patterns: vendor name to regular expression sources */
    cpuVendors: Record<string, string[]>
    /** Extra GPU vendor patterns: vendor name to regular expression sources */
    gpuVendors: Record<string, string[]>
    /** Extra placeholder names, as regular expression sources */
    placeholders: string[]
  }
  storage: {
    dataDir: string
  }
}

export interface RigbenchConfigOverrides {
  classification?: Partial<RigbenchConfig['classification']>
  storage?: Partial<RigbenchConfig['storage']>
}

export interface ConfigLoaderOptions {
  path?: string
  env?: Record<string, string | undefined>
}

export const DEFAULT_DATA_DIR = join(homedir(), '.config', 'rigbench', 'data')

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: RigbenchConfig = {
  classification: {
    defaultClass: 'gpu',
    cpuVendors: {},
    gpuVendors: {},
    placeholders: [],
  },
  storage: {
    dataDir: DEFAULT_DATA_DIR,
  },
}
