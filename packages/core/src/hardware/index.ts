/**
 * Hardware Module
 *
 * Device naming, classification, matching and extraction.
 */

export { type ClassifierOptions, ManufacturerClassifier } from './classifier'
export { type ExtractorOptions, extractHardware, HardwareExtractor, NoDeviceError, type PayloadSet } from './extractor'
export {
  consolidate,
  isGenericName,
  isMoreSpecific,
  matches,
  mergeDevices,
  modelTokens,
  specificity,
} from './matcher'
export {
  deviceId,
  isCompositeName,
  isPlaceholderName,
  matchKey,
  normalizeName,
  slugify,
  splitCompositeName,
} from './names'
export {
  buildPatternTables,
  DEFAULT_PATTERN_TABLES,
  normalizeFramework,
  type PatternOverrides,
  type PatternTables,
  type VendorPattern,
} from './patterns'
export { DEVICE_CLASSES, FRAMEWORKS } from './types'
export type {
  Classification,
  ClassificationRule,
  DeviceCandidate,
  DeviceClass,
  Framework,
  HardwareDevice,
  HardwareHint,
  KnownManufacturer,
} from './types'
