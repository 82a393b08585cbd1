// lib/nesting-types.ts
export type XYRect = { x: number; y: number; width: number; height: number }

/** A candidate empty region on one sheet. */
export type FreeRect = XYRect

export type RotationDeg = 0 | 90

/** A part row as it arrives from ingestion, before quantity expansion. */
export interface PartSpec {
  id: string
  width: number
  height: number
  rotationAllowed?: boolean
  quantity?: number
}

/** One physical part instance. */
export interface Part {
  id: string
  /** Id of the PartSpec this instance was expanded from. */
  sourceId: string
  width: number
  height: number
  rotationAllowed: boolean
}

export interface SheetDefinition {
  width: number
  height: number
  /** Sheet instances available, defaults to 1 */
  quantity?: number
  label?: string
}

export interface SheetInstance {
  /** 0-based across the whole job */
  sheetIndex: number
  definitionIndex: number
  width: number
  height: number
  label?: string
}

export type NestingStrategyKind = "shelf" | "guillotine" | "cut_optimized"

export type PartOrder =
  | "height-desc"
  | "area-desc"
  | "longest-side-desc"
  | "input"

export type NestingOptions = {
  strategy: NestingStrategyKind
  /** Saw blade width consumed between adjacent parts */
  kerf: number
  /** Clearance kept around every part and along every sheet edge */
  margin: number
  partOrder?: PartOrder
  /** cut_optimized only: window for treating two x-spans as one rip line */
  ripAlignmentTolerance?: number
}

export type Orientation = {
  width: number
  height: number
  rotationDeg: RotationDeg
}

/** A part position on a single sheet, before the scheduler tags the sheet. */
export interface SheetPlacement {
  partId: string
  sourceId: string
  x: number
  y: number
  /** Dimensions after rotation */
  width: number
  height: number
  rotationDeg: RotationDeg
}

export interface PlacedPart extends SheetPlacement {
  sheetIndex: number
  definitionIndex: number
}

export type UnplacedReason =
  | "too_large_for_any_sheet"
  | "sheets_exhausted"
  | "cancelled"

export interface UnplacedPart {
  part: Part
  reason: UnplacedReason
}

export interface SheetUsage {
  sheetIndex: number
  definitionIndex: number
  label?: string
  width: number
  height: number
  partCount: number
  placedArea: number
  sheetArea: number
  /** placedArea / sheetArea, 0..1 */
  utilization: number
}

export interface NestingResult {
  strategy: NestingStrategyKind
  placements: PlacedPart[]
  /** In input part order */
  unplaced: UnplacedPart[]
  /** Consumed sheet instances holding at least one part */
  sheets: SheetUsage[]
  /** Sheet instances the scheduler opened */
  sheetsConsumed: number
  /** Total placed area over the area of `sheets`, 0..1 */
  utilization: number
  /** False when the job was stopped before every part settled */
  completed: boolean
}
