import { midpoint } from "@tscircuit/math-utils"
import RBush from "rbush"
import type { PlacedPart } from "../nesting-types"
import type { RTreeRect } from "../types/spatial-index-types"
import {
  inflateRect,
  intersectRect,
  rectArea,
  rectGap,
} from "../utils/nesting-geometry"
import { placedPartToTree } from "../utils/rectToTree"
import type { QualityIssue } from "./types"

const groupBySheet = (placements: readonly PlacedPart[]) => {
  const bySheet = new Map<number, PlacedPart[]>()
  for (const p of placements) {
    const list = bySheet.get(p.sheetIndex) ?? []
    list.push(p)
    bySheet.set(p.sheetIndex, list)
  }
  return bySheet
}

/**
 * Overlap (CRITICAL) and spacing (WARNING) issues between parts sharing a
 * sheet. Parts are inflated by `margin / 2` for the overlap test, so two
 * parts closer than the margin overlap.
 */
export function checkPairwiseClearance(params: {
  placements: readonly PlacedPart[]
  margin: number
  minSpacing: number
  tolerance: number
}): { overlaps: QualityIssue[]; spacing: QualityIssue[] } {
  const { margin, minSpacing, tolerance } = params
  const inflate = Math.max(margin, 0) / 2
  const overlaps: QualityIssue[] = []
  const spacing: QualityIssue[] = []

  for (const [sheetIndex, onSheet] of groupBySheet(params.placements)) {
    const order = new Map<PlacedPart, number>(onSheet.map((p, i) => [p, i]))
    const tree = new RBush<RTreeRect<PlacedPart>>()
    tree.load(onSheet.map((p) => placedPartToTree(p)))

    onSheet.forEach((a, i) => {
      const reach = Math.max(2 * inflate, minSpacing)
      const candidates = tree
        .search(placedPartToTree(a, reach))
        .map((entry) => entry.item)
        .filter((b) => (order.get(b) ?? -1) > i)
        .sort((x, y) => (order.get(x) ?? 0) - (order.get(y) ?? 0))

      for (const b of candidates) {
        const overlap = intersectRect(
          inflateRect(a, inflate),
          inflateRect(b, inflate),
        )
        if (overlap && rectArea(overlap) > 0) {
          overlaps.push({
            type: "overlap",
            severity: "critical",
            partIds: [a.partId, b.partId],
            sheetIndex,
            description: `Parts ${a.partId} and ${b.partId} overlap by ${rectArea(overlap)} square units`,
            suggestedFix: "Adjust part positions to eliminate overlap",
            coordinates: midpoint(
              { x: overlap.x, y: overlap.y },
              { x: overlap.x + overlap.width, y: overlap.y + overlap.height },
            ),
          })
          continue
        }
        if (minSpacing <= 0) continue
        const gap = rectGap(a, b)
        if (gap < minSpacing - tolerance) {
          spacing.push({
            type: "insufficient_spacing",
            severity: "warning",
            partIds: [a.partId, b.partId],
            sheetIndex,
            description: `Parts ${a.partId} and ${b.partId} are ${gap} apart, below the minimum spacing of ${minSpacing}`,
            suggestedFix: `Increase spacing to at least ${minSpacing}`,
            coordinates: null,
          })
        }
      }
    })
  }

  return { overlaps, spacing }
}
