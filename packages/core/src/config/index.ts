/**
 * Config Module
 *
 * Configuration loading and management.
 */

export {
  ConfigError,
  getDefaultConfig,
  loadConfig,
  loadConfigFromEnv,
  loadConfigFromFile,
  mergeConfig,
} from './loader'
export type { ConfigLoaderOptions, RigbenchConfig, RigbenchConfigOverrides } from './types'
export { DEFAULT_CONFIG, DEFAULT_DATA_DIR } from './types'
