import { NESTING_CONFIG } from "../../../nesting.config"
import { getUsableRect } from "../../utils/sheet-fit"
import { sortParts } from "../../utils/sortParts"
import type { SheetPlacementInput, ShelfState } from "../types"

export function initShelfState(input: SheetPlacementInput): ShelfState {
  return {
    strategy: "shelf",
    sheet: input.sheet,
    usable: getUsableRect(input.sheet, input.margin),
    spacing: input.kerf + input.margin,
    parts: input.parts,
    queue: sortParts(
      input.parts,
      input.partOrder ?? NESTING_CONFIG.DEFAULT_PART_ORDER.shelf,
    ),
    queueIndex: 0,
    placements: [],
    deferred: [],
    shelves: [],
  }
}
