// lib/strategies/engine.ts
import type { Part, SheetPlacement } from "../nesting-types"
import { validateNestingInput } from "../utils/validateNestingInput"
import { initGuillotineState } from "./guillotine/initGuillotineState"
import { stepGuillotine } from "./guillotine/stepGuillotine"
import { initShelfState } from "./shelf/initShelfState"
import { stepShelf } from "./shelf/stepShelf"
import type {
  SheetPlacementInput,
  SheetPlacementResult,
  SheetPlacementState,
} from "./types"

export function initSheetPlacementState(
  input: SheetPlacementInput,
): SheetPlacementState {
  const { strategy } = input
  switch (strategy) {
    case "shelf":
      return initShelfState(input)
    case "guillotine":
    case "cut_optimized":
      return initGuillotineState({ ...input, strategy })
    default: {
      const unreachable: never = strategy
      throw new Error(`Unknown nesting strategy: ${String(unreachable)}`)
    }
  }
}

/**
 * Settle exactly ONE part: place it or defer it.
 * @returns false when no queued part was left to handle
 */
export function stepSheetPlacement(state: SheetPlacementState): boolean {
  switch (state.strategy) {
    case "shelf":
      return stepShelf(state)
    case "guillotine":
    case "cut_optimized":
      return stepGuillotine(state)
  }
}

export function isSheetPlacementDone(state: SheetPlacementState): boolean {
  return state.queueIndex >= state.queue.length
}

/** Parts not placed (yet), in input order. */
export function getUnplacedParts(state: SheetPlacementState): Part[] {
  const placedIds = new Set(state.placements.map((p) => p.partId))
  return state.parts.filter((p) => !placedIds.has(p.id))
}

export function getSheetPlacementResult(
  state: SheetPlacementState,
): SheetPlacementResult {
  return {
    placed: state.placements.map((p): SheetPlacement => ({ ...p })),
    remaining: getUnplacedParts(state),
  }
}

/**
 * Place as many parts as possible on one sheet. Pure: the free-space state
 * lives and dies inside this call.
 * @throws InvalidInputError for non-positive dimensions or negative spacing
 */
export function placeOnSheet(input: SheetPlacementInput): SheetPlacementResult {
  validateNestingInput(input.parts, [input.sheet], input)
  const state = initSheetPlacementState(input)
  while (!isSheetPlacementDone(state)) {
    stepSheetPlacement(state)
  }
  return getSheetPlacementResult(state)
}
