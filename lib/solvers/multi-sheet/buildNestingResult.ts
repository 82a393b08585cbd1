import type {
  NestingResult,
  PlacedPart,
  UnplacedPart,
} from "../../nesting-types"
import {
  computeSheetUsage,
  computeTotalUtilization,
} from "../../utils/computeSheetUsage"
import { tagPlacement } from "./stepScheduler"
import type { SchedulerState } from "./types"

/** Committed placements plus whatever the active sheet holds so far. */
export function getCurrentPlacements(state: SchedulerState): PlacedPart[] {
  const placements = state.committed.map((p) => ({ ...p }))
  const { active } = state
  if (active) {
    for (const p of active.placement.placements) {
      placements.push(tagPlacement(p, active.instance))
    }
  }
  return placements
}

/**
 * Snapshot of the job. Before the scheduler is done every part without a
 * placement is reported as cancelled.
 */
export function buildNestingResult(state: SchedulerState): NestingResult {
  const completed = state.phase === "DONE"
  const placements = getCurrentPlacements(state)
  const placedIds = new Set(placements.map((p) => p.partId))

  const unplaced: UnplacedPart[] = []
  for (const part of state.parts) {
    if (state.tooLargeIds.has(part.id)) {
      unplaced.push({ part: { ...part }, reason: "too_large_for_any_sheet" })
    } else if (!placedIds.has(part.id)) {
      unplaced.push({
        part: { ...part },
        reason: completed ? "sheets_exhausted" : "cancelled",
      })
    }
  }

  const sheets = computeSheetUsage(placements, state.consumed)
  return {
    strategy: state.options.strategy,
    placements,
    unplaced,
    sheets,
    sheetsConsumed: state.consumed.length,
    utilization: computeTotalUtilization(sheets),
    completed,
  }
}

export function computeSchedulerProgress(state: SchedulerState): number {
  if (state.phase === "DONE" || state.parts.length === 0) return 1
  const settled =
    state.tooLargeIds.size +
    state.committed.length +
    (state.active?.placement.placements.length ?? 0)
  return settled / state.parts.length
}
