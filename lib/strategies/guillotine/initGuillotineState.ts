import { NESTING_CONFIG } from "../../../nesting.config"
import { getUsableRect } from "../../utils/sheet-fit"
import { sortParts } from "../../utils/sortParts"
import type { GuillotineState, SheetPlacementInput } from "../types"

export function initGuillotineState(
  input: SheetPlacementInput & { strategy: GuillotineState["strategy"] },
): GuillotineState {
  const usable = getUsableRect(input.sheet, input.margin)
  return {
    strategy: input.strategy,
    sheet: input.sheet,
    usable,
    spacing: input.kerf + input.margin,
    parts: input.parts,
    queue: sortParts(
      input.parts,
      input.partOrder ?? NESTING_CONFIG.DEFAULT_PART_ORDER[input.strategy],
    ),
    queueIndex: 0,
    placements: [],
    deferred: [],
    freeRects: [{ ...usable }],
    ripSpans: [],
    ripAlignmentTolerance:
      input.ripAlignmentTolerance ?? NESTING_CONFIG.CUT_MERGE_TOLERANCE,
  }
}
