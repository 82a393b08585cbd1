import { expandSheetInstances } from "../../utils/expandSheetInstances"
import { getUsableSheetArea, partFitsSheet } from "../../utils/sheet-fit"
import { validateNestingInput } from "../../utils/validateNestingInput"
import type { MultiSheetNestingInput, SchedulerState } from "./types"

/**
 * Validate the job, expand sheet instances and set aside the parts that fit
 * no sheet definition at all.
 * @throws InvalidInputError
 */
export function initSchedulerState(
  input: MultiSheetNestingInput,
): SchedulerState {
  const { options } = input
  validateNestingInput(input.parts, input.sheets, options)

  const parts = input.parts.map((p) => ({ ...p }))
  const usableAreas = input.sheets.map((s) =>
    getUsableSheetArea(s, options.margin),
  )
  const tooLargeIds = new Set<string>()
  for (const part of parts) {
    if (!usableAreas.some((usable) => partFitsSheet(part, usable))) {
      tooLargeIds.add(part.id)
    }
  }

  return {
    phase: "PLACING",
    options: { ...options },
    parts,
    instances: expandSheetInstances(input.sheets.map((s) => ({ ...s }))),
    nextInstance: 0,
    remaining: parts.filter((p) => !tooLargeIds.has(p.id)),
    tooLargeIds,
    committed: [],
    active: null,
    consumed: [],
  }
}
