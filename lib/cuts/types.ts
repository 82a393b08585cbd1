import type { SheetPlacement } from "../nesting-types"

/** `rip`: vertical, full usable height. `crosscut`: horizontal, across a strip. */
export type CutKind = "rip" | "crosscut"

export interface Cut {
  /** `R1`, `R2`, ... for rips, `C1`, `C2`, ... for crosscuts */
  id: string
  kind: CutKind
  /** x for a rip, y for a crosscut */
  position: number
  start: number
  end: number
  length: number
  /** Parts with an edge on this line */
  partIds: string[]
}

export interface CutPlan {
  sheetIndex: number
  cuts: Cut[]
  ripCount: number
  crosscutCount: number
  totalCutLength: number
}

export type OptimizeCutsInput = {
  sheetIndex: number
  sheetWidth: number
  sheetHeight: number
  margin?: number
  placements: readonly SheetPlacement[]
  /** Lines closer than this are one cut */
  tolerance?: number
}
