/**
 * Finite numbers of a list, sorted ascending. `null`, `undefined`, `NaN`
 * and infinities are dropped.
 */
export function finiteSorted(values: readonly (number | null | undefined)[]): number[] {
  return values
    .filter((value): value is number => typeof value === 'number' && Number.isFinite(value))
    .sort((a, b) => a - b)
}

/**
 * Median of the finite values: the middle one for an odd count, the mean of
 * the two middle ones for an even count, `null` when there are none.
 *
 * @example
 * median([3, 1, 2]) // 2
 * median([1, 2, 3, 4]) // 2.5
 * median([null, Number.NaN]) // null
 */
export function median(values: readonly (number | null | undefined)[]): number | null {
  const sorted = finiteSorted(values)
  const middle = Math.floor(sorted.length / 2)
  const upper = sorted[middle]
  if (upper === undefined) return null
  if (sorted.length % 2 === 1) return upper
  const lower = sorted[middle - 1] ?? upper
  return (lower + upper) / 2
}
