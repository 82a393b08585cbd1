import type { Part, PartOrder } from "../nesting-types"

type PartComparator = (a: Part, b: Part) => number

const PART_COMPARATORS: Record<PartOrder, PartComparator | null> = {
  "height-desc": (a, b) => b.height - a.height || b.width - a.width,
  "area-desc": (a, b) => b.width * b.height - a.width * a.height,
  "longest-side-desc": (a, b) =>
    Math.max(b.width, b.height) - Math.max(a.width, a.height) ||
    Math.min(b.width, b.height) - Math.min(a.width, a.height),
  input: null,
}

/** Stable: parts that compare equal keep their input order. */
export function sortParts(parts: readonly Part[], order: PartOrder): Part[] {
  const comparator = PART_COMPARATORS[order]
  const copy = [...parts]
  return comparator ? copy.sort(comparator) : copy
}
