/**
 * Classification pattern tables
 *
 * Built once from the defaults below plus configuration, then frozen and
 * handed to the classifier. Nothing here is mutated at run time.
 */

import type { Framework } from './types'

export interface VendorPattern {
  manufacturer: string
  pattern: RegExp
}

export interface PatternTables {
  /** Product lines that only exist as CPUs (may embed an iGPU name) */
  cpuFamilies: readonly RegExp[]
  /** Consumer/workstation GPU product lines */
  gpuFamilies: readonly RegExp[]
  /** Bare `graphics` / `gpu` */
  genericGpu: readonly RegExp[]
  /** Vendor or generic words that lean CPU when nothing stronger matched */
  cpuFallback: readonly RegExp[]
  cpuVendors: readonly VendorPattern[]
  gpuVendors: readonly VendorPattern[]
  /** Extra names treated as placeholders, matched against the lower-cased name */
  placeholders: readonly RegExp[]
}

/**
 * Table extensions as they appear in configuration: vendor name to a list of
 * regular expression sources (matched case-insensitively against the name).
 */
export interface PatternOverrides {
  cpuVendors?: Record<string, string[]>
  gpuVendors?: Record<string, string[]>
  placeholders?: string[]
}

const DEFAULT_CPU_FAMILIES = [
  /\bryzen\b/i,
  /\bepyc\b/i,
  /\bthreadripper\b/i,
  /\bathlon\b/i,
  /\bxeon\b/i,
  /\bcore\s*(?:i[3579]|ultra)\b/i,
  /\bceleron\b/i,
  /\bpentium\b/i,
  /\bprocessor\b/i,
  /\b\d+-core\b/i,
  /\bsnapdragon\b/i,
  /\bcortex-?[am]\d+/i,
  /\bneoverse\b/i,
]

const DEFAULT_GPU_FAMILIES = [
  /\bgeforce\b/i,
  /\brtx\b/i,
  /\bgtx\b/i,
  /\bquadro\b/i,
  /\btesla\b/i,
  /\bradeon\b/i,
  /\brx\s?\d{3,4}\b/i,
  /\barc\s+[ab]\d{3}\b/i,
  /\binstinct\b/i,
  /\bfirepro\b/i,
  /\bnvidia\b/i,
  /\badreno\b/i,
  /\bmali\b/i,
]

const DEFAULT_GENERIC_GPU = [/\bgraphics\b/i, /\bgpu\b/i]

const DEFAULT_CPU_FALLBACK = [/\bintel\b/i, /\bamd\b/i, /\bcpu\b/i, /\bapple\b/i, /\bcore\b/i, /\barm\b/i]

const DEFAULT_CPU_VENDORS: VendorPattern[] = [
  { manufacturer: 'Intel', pattern: /\bintel\b|\bxeon\b|\bcore\s*(?:i[3579]|ultra)\b|\bceleron\b|\bpentium\b|\batom\b/i },
  { manufacturer: 'AMD', pattern: /\bamd\b|\bryzen\b|\bepyc\b|\bthreadripper\b|\bathlon\b/i },
  { manufacturer: 'Apple', pattern: /\bapple\b|^m[1-4](?:\s+(?:pro|max|ultra))?$/i },
  { manufacturer: 'Qualcomm', pattern: /\bqualcomm\b|\bsnapdragon\b/i },
  { manufacturer: 'ARM', pattern: /\bcortex\b|\bneoverse\b|\barm\b/i },
]

const DEFAULT_GPU_VENDORS: VendorPattern[] = [
  { manufacturer: 'NVIDIA', pattern: /\bnvidia\b|\bgeforce\b|\brtx\b|\bgtx\b|\bquadro\b|\btesla\b|\btitan\b/i },
  { manufacturer: 'AMD', pattern: /\bamd\b|\bradeon\b|\bati\b|\bfirepro\b|\binstinct\b|\brx\s?\d{3,4}\b/i },
  { manufacturer: 'Intel', pattern: /\bintel\b|\barc\b|\biris\b|\buhd\b/i },
  { manufacturer: 'Apple', pattern: /\bapple\b/i },
  { manufacturer: 'Qualcomm', pattern: /\badreno\b|\bqualcomm\b/i },
  { manufacturer: 'ARM', pattern: /\bmali\b/i },
]

function compileVendors(table: Record<string, string[]> | undefined): VendorPattern[] {
  if (!table) return []
  return Object.entries(table).flatMap(([manufacturer, sources]) =>
    sources.map((source) => ({ manufacturer, pattern: new RegExp(source, 'i') })),
  )
}

/**
 * Build the immutable tables. Configured vendor patterns are tried before the
 * defaults so a configuration can claim a name the defaults would misattribute.
 */
export function buildPatternTables(overrides: PatternOverrides = {}): PatternTables {
  const tables: PatternTables = {
    cpuFamilies: Object.freeze([...DEFAULT_CPU_FAMILIES]),
    gpuFamilies: Object.freeze([...DEFAULT_GPU_FAMILIES]),
    genericGpu: Object.freeze([...DEFAULT_GENERIC_GPU]),
    cpuFallback: Object.freeze([...DEFAULT_CPU_FALLBACK]),
    cpuVendors: Object.freeze([...compileVendors(overrides.cpuVendors), ...DEFAULT_CPU_VENDORS]),
    gpuVendors: Object.freeze([...compileVendors(overrides.gpuVendors), ...DEFAULT_GPU_VENDORS]),
    placeholders: Object.freeze((overrides.placeholders ?? []).map((source) => new RegExp(source, 'i'))),
  }
  return Object.freeze(tables)
}

export const DEFAULT_PATTERN_TABLES: PatternTables = buildPatternTables()

const FRAMEWORK_PATTERNS: readonly [Framework, RegExp][] = [
  ['OPTIX', /\boptix\b/i],
  ['CUDA', /\bcuda\b/i],
  ['HIP', /\bhip\b|\brocm\b/i],
  ['VULKAN', /\bvulkan\b/i],
  ['METAL', /\bmetal\b/i],
  ['SYCL', /\bsycl\b/i],
  ['ONEAPI', /\boneapi\b/i],
  ['OPENCL', /\bopencl\b/i],
]

/**
 * Map a backend list (`"CUDA,BLAS"`, `"Vulkan"`) or a renderer device type
 * (`"HIP"`, `"OPTIX"`) to a framework. `CPU`, `BLAS` and unknown values give
 * `undefined`.
 */
export function normalizeFramework(raw: string | undefined | null): Framework | undefined {
  if (!raw) return undefined
  const spaced = raw.replace(/[,;/+_]/g, ' ')
  for (const [framework, pattern] of FRAMEWORK_PATTERNS) {
    if (pattern.test(spaced)) return framework
  }
  return undefined
}
