import type { FreeRect } from "../../nesting-types"
import { containsRect } from "../../utils/nesting-geometry"

/**
 * Drop every free rectangle that lies inside another one. Of two identical
 * rectangles the earlier is kept.
 */
export function pruneContainedFreeRects(freeRects: FreeRect[]): FreeRect[] {
  const kept: FreeRect[] = []
  for (let i = 0; i < freeRects.length; i++) {
    const candidate = freeRects[i]
    if (!candidate) continue
    let contained = false
    for (let j = 0; j < freeRects.length && !contained; j++) {
      const other = freeRects[j]
      if (i === j || !other) continue
      if (!containsRect(other, candidate)) continue
      // identical rectangles contain each other, only the later one goes
      contained = !containsRect(candidate, other) || j < i
    }
    if (!contained) kept.push(candidate)
  }
  return kept
}
