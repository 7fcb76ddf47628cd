/**
 * GPU Name Matcher
 *
 * Decides whether two GPU names refer to the same device and which of two
 * names is the more specific. Used both for device consolidation during
 * extraction and for attributing runs to a stored device.
 *
 * @module hardware/matcher
 */

import { matchKey, normalizeName, splitCompositeName } from './names'
import type { HardwareDevice } from './types'

const VENDOR_WORDS = new Set(['nvidia', 'amd', 'ati', 'intel'])
const SUFFIX_WORDS = new Set(['ti', 'super', 'xt', 'xtx', 'gre', 'max', 'pro', 'ultra', 'laptop', 'mobile'])
const GENERIC_WORDS = new Set(['graphics', 'gpu', 'integrated', 'generic', 'unknown', 'device', 'adapter'])
const DISCRETE_LINES = new Set(['rx', 'rtx', 'gtx', 'arc', 'quadro'])
const MEMORY_SIZE_PATTERN = /^\d+(?:gb|mb|gib|mib|tb)$/

interface GpuNameParts {
  /** Lower-cased words of the normalized name */
  words: string[]
  /** Comparison form: match key without vendor words and `geforce` */
  key: string
  families: Set<string>
  models: Set<string>
  discrete: boolean
}

function tokenize(name: string): string[] {
  return normalizeName(name)
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 0)
}

function isModelWord(word: string): boolean {
  if (word.length < 3 || MEMORY_SIZE_PATTERN.test(word)) return false
  return (word.match(/\d/g)?.length ?? 0) >= 2
}

/**
 * Model tokens of a name. A suffix word directly after a model token is
 * fused into it, so `RTX 3060 Ti` gives `3060ti`, not `3060`.
 *
 * @example
 * modelTokens('NVIDIA GeForce RTX 3060 Ti 12GB') // ['3060ti']
 */
export function modelTokens(name: string): string[] {
  const words = tokenize(name)
  const tokens: string[] = []
  words.forEach((word, index) => {
    if (!isModelWord(word)) return
    const next = words[index + 1]
    tokens.push(next !== undefined && SUFFIX_WORDS.has(next) ? `${word}${next}` : word)
  })
  return tokens
}

function vendorOf(words: string[]): string | null {
  if (words.includes('nvidia') || words.includes('geforce')) return 'nvidia'
  if (words.includes('amd') || words.includes('ati') || words.includes('radeon')) return 'amd'
  if (words.includes('intel')) return 'intel'
  return null
}

function analyze(name: string): GpuNameParts {
  const words = tokenize(name)
  const vendor = vendorOf(words)
  const families = new Set<string>()

  if (words.includes('radeon')) families.add('radeon')
  if (words.includes('rtx') || words.includes('gtx')) families.add('geforce')
  if (words.includes('arc')) families.add('arc')
  if (words.includes('iris')) families.add('iris')
  if (words.includes('uhd')) families.add('uhd')
  if (words.includes('graphics') && vendor) families.add(`graphics:${vendor}`)

  const key = matchKey(name)
    .split(' ')
    .filter((word) => !VENDOR_WORDS.has(word) && word !== 'geforce')
    .join(' ')

  return {
    words,
    key,
    families,
    models: new Set(modelTokens(name)),
    discrete: words.some((word) => DISCRETE_LINES.has(word)),
  }
}

function sharesFamily(a: GpuNameParts, b: GpuNameParts): boolean {
  for (const family of a.families) {
    if (b.families.has(family)) return true
  }
  return false
}

function genericCovers(generic: GpuNameParts, specific: GpuNameParts): boolean {
  if (generic.models.size > 0 || specific.models.size === 0) return false
  if (specific.key.length <= generic.key.length) return false
  // an integrated placeholder ("AMD Radeon Graphics") never stands for a discrete card
  if (!generic.discrete && specific.discrete) return false
  return true
}

function matchesSingle(a: string, b: string): boolean {
  const left = analyze(a)
  const right = analyze(b)

  if (left.key.length > 0 && left.key === right.key) return true

  for (const token of left.models) {
    if (right.models.has(token)) return true
  }

  if (!sharesFamily(left, right)) return false
  return genericCovers(left, right) || genericCovers(right, left)
}

/**
 * Whether two GPU names refer to the same device. Symmetric. Comma-joined
 * composite names match when any of their elements does.
 *
 * @example
 * matches('NVIDIA GeForce RTX 3090', 'RTX 3090') // true
 * matches('RTX 3060', 'RTX 3060 Ti') // false
 * matches('AMD Radeon Graphics', 'AMD Radeon 780M Graphics') // true
 */
export function matches(a: string, b: string): boolean {
  const left = splitCompositeName(a)
  const right = splitCompositeName(b)
  return left.some((x) => right.some((y) => matchesSingle(x, y)))
}

/**
 * Whether a name carries no model token (`AMD Radeon Graphics`, `Intel Graphics`).
 */
export function isGenericName(name: string): boolean {
  return modelTokens(name).length === 0
}

/**
 * Score how precisely a name identifies one product. Model tokens and suffix
 * words count +10, generic words -10, every word +1.
 */
export function specificity(name: string): number {
  const words = tokenize(name)
  const specific = words.filter((word) => isModelWord(word) || SUFFIX_WORDS.has(word)).length
  const generic = words.filter((word) => GENERIC_WORDS.has(word)).length
  return specific * 10 - generic * 10 + words.length
}

export function isMoreSpecific(a: string, b: string): boolean {
  return specificity(a) > specificity(b)
}

/**
 * Merge GPU devices that name the same hardware. Input order decides which
 * device absorbs a later one; the surviving record takes the more specific
 * name and fills missing attributes from the absorbed one.
 */
export function consolidate(devices: readonly HardwareDevice[]): HardwareDevice[] {
  const accepted: HardwareDevice[] = []

  for (const candidate of devices) {
    const index = accepted.findIndex(
      (existing) => existing.manufacturer === candidate.manufacturer && matches(existing.name, candidate.name),
    )
    const existing = index === -1 ? undefined : accepted[index]
    if (!existing) {
      accepted.push({ ...candidate })
      continue
    }
    accepted[index] = mergeDevices(existing, candidate)
  }

  return accepted
}

/**
 * Combine two records of the same device. The more specific name wins and
 * its id follows it; on a tie the first record is kept.
 */
export function mergeDevices(first: HardwareDevice, second: HardwareDevice): HardwareDevice {
  const [primary, secondary] = isMoreSpecific(second.name, first.name) ? [second, first] : [first, second]
  const merged: HardwareDevice = { ...primary }
  const cores = primary.cores ?? secondary.cores
  const threads = primary.threads ?? secondary.threads
  const framework = primary.framework ?? secondary.framework
  if (cores !== undefined) merged.cores = cores
  if (threads !== undefined) merged.threads = threads
  if (framework !== undefined) merged.framework = framework
  return merged
}
