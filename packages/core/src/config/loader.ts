/**
 * Configuration Loader
 *
 * Loads configuration from YAML files and environment variables.
 * Later sources override earlier ones: defaults, file, environment.
 */

import { readFile } from 'node:fs/promises'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { DEVICE_CLASSES } from '../hardware/types'
import type { ConfigLoaderOptions, RigbenchConfig, RigbenchConfigOverrides } from './types'
import { DEFAULT_CONFIG } from './types'

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

const patternSource = z.string().refine(
  (source) => {
    try {
      new RegExp(source, 'i')
      return true
    } catch {
      return false
    }
  },
  { message: 'not a valid regular expression' },
)

const vendorTable = z.record(z.array(patternSource))

const fileConfigSchema = z
  .object({
    classification: z
      .object({
        default_class: z.enum(DEVICE_CLASSES).optional(),
        cpu_vendors: vendorTable.optional(),
        gpu_vendors: vendorTable.optional(),
        placeholders: z.array(patternSource).optional(),
      })
      .strict()
      .optional(),
    storage: z
      .object({
        data_dir: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

/**
 * Load configuration from a YAML file
 */
export async function loadConfigFromFile(path: string): Promise<RigbenchConfigOverrides> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${path}`)
    }
    throw error
  }

  let raw: unknown
  try {
    raw = parseYaml(content)
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${path}: ${error instanceof Error ? error.message : String(error)}`)
  }

  const result = fileConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${path}: ${describeIssues(result.error)}`)
  }
  return normalizeConfig(result.data)
}

/**
 * Load settings from environment variables
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): RigbenchConfigOverrides {
  const config: RigbenchConfigOverrides = {}

  if (env.RIGBENCH_DATA_DIR) {
    config.storage = { dataDir: env.RIGBENCH_DATA_DIR }
  }

  const rawClass = env.RIGBENCH_DEFAULT_CLASS?.trim().toLowerCase()
  if (rawClass) {
    const defaultClass = DEVICE_CLASSES.find((deviceClass) => deviceClass === rawClass)
    if (!defaultClass) {
      throw new ConfigError(`RIGBENCH_DEFAULT_CLASS must be "cpu" or "gpu", got "${rawClass}"`)
    }
    config.classification = { defaultClass }
  }

  return config
}

/**
 * Load configuration with defaults, file, and environment merging
 */
export async function loadConfig(options: ConfigLoaderOptions = {}): Promise<RigbenchConfig> {
  let config = getDefaultConfig()

  if (options.path) {
    const fileConfig = await loadConfigFromFile(options.path)
    config = mergeConfig(config, fileConfig)
  }

  const envConfig = loadConfigFromEnv(options.env)
  config = mergeConfig(config, envConfig)

  return config
}

/**
 * Get default configuration
 */
export function getDefaultConfig(): RigbenchConfig {
  return structuredClone(DEFAULT_CONFIG)
}

function normalizeConfig(raw: z.infer<typeof fileConfigSchema>): RigbenchConfigOverrides {
  const config: RigbenchConfigOverrides = {}
  const { classification, storage } = raw

  if (classification) {
    config.classification = {}
    if (classification.default_class) config.classification.defaultClass = classification.default_class
    if (classification.cpu_vendors) config.classification.cpuVendors = classification.cpu_vendors
    if (classification.gpu_vendors) config.classification.gpuVendors = classification.gpu_vendors
    if (classification.placeholders) config.classification.placeholders = classification.placeholders
  }

  if (storage?.data_dir) {
    config.storage = { dataDir: storage.data_dir }
  }

  return config
}

/**
 * Merge overrides into a configuration. Vendor tables merge per vendor;
 * placeholder lists are concatenated.
 */
export function mergeConfig(base: RigbenchConfig, override: RigbenchConfigOverrides): RigbenchConfig {
  const classification = override.classification ?? {}
  return {
    classification: {
      defaultClass: classification.defaultClass ?? base.classification.defaultClass,
      cpuVendors: { ...base.classification.cpuVendors, ...classification.cpuVendors },
      gpuVendors: { ...base.classification.gpuVendors, ...classification.gpuVendors },
      placeholders: [...base.classification.placeholders, ...(classification.placeholders ?? [])],
    },
    storage: {
      dataDir: override.storage?.dataDir ?? base.storage.dataDir,
    },
  }
}
