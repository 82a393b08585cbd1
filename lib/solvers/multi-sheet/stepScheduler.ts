import type {
  PlacedPart,
  SheetInstance,
  SheetPlacement,
} from "../../nesting-types"
import {
  getUnplacedParts,
  initSheetPlacementState,
  isSheetPlacementDone,
  stepSheetPlacement,
} from "../../strategies/engine"
import type { SchedulerState } from "./types"

export const tagPlacement = (
  placement: SheetPlacement,
  instance: SheetInstance,
): PlacedPart => ({
  ...placement,
  sheetIndex: instance.sheetIndex,
  definitionIndex: instance.definitionIndex,
})

function openNextSheet(state: SchedulerState): boolean {
  const instance = state.instances[state.nextInstance]
  if (!instance || state.remaining.length === 0) {
    state.phase = "DONE"
    return false
  }
  state.nextInstance++
  state.consumed.push(instance)
  state.active = {
    instance,
    placement: initSheetPlacementState({
      parts: state.remaining,
      sheet: instance,
      strategy: state.options.strategy,
      kerf: state.options.kerf,
      margin: state.options.margin,
      partOrder: state.options.partOrder,
      ripAlignmentTolerance: state.options.ripAlignmentTolerance,
    }),
  }
  return true
}

/**
 * One unit of scheduling work: open a sheet, settle one part on the active
 * sheet, or commit the finished sheet.
 * @returns false once the job is done
 */
export function stepScheduler(state: SchedulerState): boolean {
  if (state.phase === "DONE") return false

  const { active } = state
  if (!active) return openNextSheet(state)

  if (!isSheetPlacementDone(active.placement)) {
    stepSheetPlacement(active.placement)
    return true
  }

  for (const p of active.placement.placements) {
    state.committed.push(tagPlacement(p, active.instance))
  }
  state.remaining = getUnplacedParts(active.placement)
  state.active = null
  return true
}

/**
 * Upper bound on scheduler steps: per opened sheet, one open, one step per
 * remaining part and one commit, plus the final step that finds no work.
 */
export function getSchedulerStepBound(
  partCount: number,
  instanceCount: number,
): number {
  return (partCount + 2) * (instanceCount + 1)
}
