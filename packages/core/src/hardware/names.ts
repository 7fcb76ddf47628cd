/**
 * Name normalization
 *
 * Pure string helpers shared by classification, matching and identity.
 * Every function accepts any string and never throws.
 */

const TRADEMARK_PATTERN = /\((?:r|tm|c)\)|[®™©]/gi
const MATCH_SUFFIX_PATTERN = /\s+(?:graphics|processor|cpu)$/

const PLACEHOLDER_PATTERNS: readonly RegExp[] = [
  /^$/,
  /^unknown(?:\s+(?:cpu|gpu|device|cuda device|rocm device))?$/,
  /^(?:n\/a|na|none|null|undefined|-)$/,
  /^(?:cpu|gpu)$/,
  /^llvmpipe\b/,
  /^swiftshader\b/,
  /^software rasterizer\b/,
]

/**
 * Collapse whitespace and drop trademark markers. The result is display-safe.
 *
 * @example
 * normalizeName('AMD Ryzen(TM) 7  8845HS') // 'AMD Ryzen 7 8845HS'
 */
export function normalizeName(name: string): string {
  return name.replace(TRADEMARK_PATTERN, ' ').replace(/\s+/g, ' ').trim()
}

/**
 * Comparison form of a name: normalized, lower-cased, with a trailing
 * `Graphics`, `Processor` or `CPU` word removed. Never shown to users.
 */
export function matchKey(name: string): string {
  return normalizeName(name).toLowerCase().replace(MATCH_SUFFIX_PATTERN, '').trim()
}

/**
 * URL/identifier-safe slug. Empty results map to `unknown`.
 *
 * @example
 * slugify('NVIDIA GeForce RTX 3090') // 'nvidia-geforce-rtx-3090'
 */
export function slugify(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
  return slug || 'unknown'
}

/**
 * Stable device id for a name.
 */
export function deviceId(name: string): string {
  return slugify(normalizeName(name))
}

/**
 * Names that identify no particular device (`Unknown`, `GPU`, software rasterisers).
 */
export function isPlaceholderName(name: string, extra: readonly RegExp[] = []): boolean {
  const key = normalizeName(name).toLowerCase()
  return PLACEHOLDER_PATTERNS.some((pattern) => pattern.test(key)) || extra.some((pattern) => pattern.test(key))
}

/**
 * A comma-joined list of several device names.
 */
export function isCompositeName(name: string): boolean {
  return splitCompositeName(name).length > 1
}

export function splitCompositeName(name: string): string[] {
  return name
    .split(',')
    .map((part) => normalizeName(part))
    .filter((part) => part.length > 0)
}
