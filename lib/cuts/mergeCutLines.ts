/**
 * Collapse nearby candidate positions into single lines. A cluster grows
 * while a value is within `tolerance` of the cluster's FIRST member, so
 * chains of near values cannot drift arbitrarily far.
 *
 * Each cluster becomes the midpoint of its smallest and largest member.
 */
export function mergeCutLines(
  positions: readonly number[],
  tolerance: number,
): number[] {
  const sorted = [...positions].sort((a, b) => a - b)
  const merged: number[] = []

  let first: number | undefined
  let last = 0
  for (const value of sorted) {
    if (first !== undefined && value - first <= tolerance) {
      last = value
      continue
    }
    if (first !== undefined) merged.push((first + last) / 2)
    first = value
    last = value
  }
  if (first !== undefined) merged.push((first + last) / 2)

  return merged
}
