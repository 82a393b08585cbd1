// lib/strategies/types.ts
import type {
  FreeRect,
  NestingStrategyKind,
  Part,
  PartOrder,
  SheetPlacement,
  XYRect,
} from "../nesting-types"

export type SheetPlacementInput = {
  parts: readonly Part[]
  sheet: { width: number; height: number }
  strategy: NestingStrategyKind
  kerf: number
  margin: number
  partOrder?: PartOrder
  ripAlignmentTolerance?: number
}

type SheetPlacementStateBase = {
  sheet: { width: number; height: number }
  /** Sheet minus margin on every edge */
  usable: XYRect
  /** Clearance between adjacent parts: kerf + margin */
  spacing: number
  /** Input parts, in input order */
  parts: readonly Part[]
  /** Parts in placement order */
  queue: Part[]
  queueIndex: number
  placements: SheetPlacement[]
  deferred: Part[]
}

export type Shelf = {
  /** Bottom edge of the row */
  y: number
  /** Height of the first (tallest) part on the row */
  height: number
  /** Next free x position */
  cursorX: number
}

export type ShelfState = SheetPlacementStateBase & {
  strategy: "shelf"
  shelves: Shelf[]
}

export type GuillotineState = SheetPlacementStateBase & {
  strategy: "guillotine" | "cut_optimized"
  freeRects: FreeRect[]
  /** x-spans of placed parts, the rip lines a cut_optimized sheet builds on */
  ripSpans: Array<[number, number]>
  ripAlignmentTolerance: number
}

export type SheetPlacementState = ShelfState | GuillotineState

export type SheetPlacementResult = {
  placed: SheetPlacement[]
  remaining: Part[]
}
