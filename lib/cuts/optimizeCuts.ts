// lib/cuts/optimizeCuts.ts
import { NESTING_CONFIG } from "../../nesting.config"
import { FlatbushIndex } from "../data-structures/FlatbushIndex"
import type { SheetPlacement } from "../nesting-types"
import { EPS } from "../utils/nesting-geometry"
import { mergeCutLines } from "./mergeCutLines"
import type { Cut, CutPlan, OptimizeCutsInput } from "./types"

const hasEdgeAt = (lo: number, hi: number, position: number, tol: number) =>
  Math.abs(lo - position) <= tol || Math.abs(hi - position) <= tol

/**
 * Derive the physical cut list of one sheet from its placements: rips first
 * (left to right), then crosscuts (bottom to top).
 */
export function optimizeCuts(input: OptimizeCutsInput): CutPlan {
  const { sheetIndex, sheetWidth, sheetHeight, placements } = input
  const margin = input.margin ?? 0
  const tol = input.tolerance ?? NESTING_CONFIG.CUT_MERGE_TOLERANCE

  // Parts widened by the tolerance, so a merged line slightly off an edge
  // still meets the part it came from
  const index = new FlatbushIndex<SheetPlacement>(placements, (p) => ({
    minX: p.x - tol,
    minY: p.y - tol,
    maxX: p.x + p.width + tol,
    maxY: p.y + p.height + tol,
  }))

  const insideSheet = (position: number, extent: number) =>
    position > EPS && position < extent - EPS

  const ripPositions = mergeCutLines(
    placements.flatMap((p) => [p.x, p.x + p.width]),
    tol,
  ).filter((x) => insideSheet(x, sheetWidth))

  const crosscutPositions = mergeCutLines(
    placements.flatMap((p) => [p.y, p.y + p.height]),
    tol,
  ).filter((y) => insideSheet(y, sheetHeight))

  const cuts: Cut[] = []

  for (const x of ripPositions) {
    const met = index.search({
      minX: x,
      maxX: x,
      minY: -Infinity,
      maxY: Infinity,
    })
    if (met.length === 0) continue
    const start = margin
    const end = sheetHeight - margin
    cuts.push({
      id: `R${cuts.length + 1}`,
      kind: "rip",
      position: x,
      start,
      end,
      length: end - start,
      partIds: met
        .filter((p) => hasEdgeAt(p.x, p.x + p.width, x, tol))
        .map((p) => p.partId),
    })
  }

  const ripCount = cuts.length

  for (const y of crosscutPositions) {
    const met = index.search({
      minX: -Infinity,
      maxX: Infinity,
      minY: y,
      maxY: y,
    })
    if (met.length === 0) continue
    const start = Math.min(...met.map((p) => p.x))
    const end = Math.max(...met.map((p) => p.x + p.width))
    cuts.push({
      id: `C${cuts.length - ripCount + 1}`,
      kind: "crosscut",
      position: y,
      start,
      end,
      length: end - start,
      partIds: met
        .filter((p) => hasEdgeAt(p.y, p.y + p.height, y, tol))
        .map((p) => p.partId),
    })
  }

  return {
    sheetIndex,
    cuts,
    ripCount,
    crosscutCount: cuts.length - ripCount,
    totalCutLength: cuts.reduce((sum, c) => sum + c.length, 0),
  }
}
