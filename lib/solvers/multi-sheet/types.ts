import type {
  NestingOptions,
  Part,
  PlacedPart,
  SheetDefinition,
  SheetInstance,
} from "../../nesting-types"
import type { SheetPlacementState } from "../../strategies/types"

export type MultiSheetNestingInput = {
  parts: readonly Part[]
  sheets: readonly SheetDefinition[]
  options: NestingOptions
}

export type ActiveSheet = {
  instance: SheetInstance
  placement: SheetPlacementState
}

export type SchedulerPhase = "PLACING" | "DONE"

export type SchedulerState = {
  phase: SchedulerPhase
  options: NestingOptions
  /** Input parts, in input order */
  parts: Part[]
  instances: SheetInstance[]
  /** Index into `instances` of the next sheet to open */
  nextInstance: number
  /** Parts still waiting for a sheet, in input order */
  remaining: Part[]
  /** Ids of parts that fit no sheet definition */
  tooLargeIds: Set<string>
  committed: PlacedPart[]
  active: ActiveSheet | null
  /** Every instance opened so far */
  consumed: SheetInstance[]
}
