import type { GraphicsObject } from "graphics-debug"
import type { CutPlan } from "../cuts/types"
import type { SheetInstance } from "../nesting-types"
import { computeSheetOffsets } from "./buildSheetGraphics"

/** Cut lines drawn in the same side-by-side frame as `buildSheetGraphics`. */
export function buildCutLineGraphics(
  sheets: readonly SheetInstance[],
  plans: readonly CutPlan[],
): NonNullable<GraphicsObject["lines"]> {
  const offsets = computeSheetOffsets(sheets)
  const lines: NonNullable<GraphicsObject["lines"]> = []
  for (const plan of plans) {
    const dx = offsets.get(plan.sheetIndex) ?? 0
    for (const cut of plan.cuts) {
      lines.push({
        points:
          cut.kind === "rip"
            ? [
                { x: dx + cut.position, y: cut.start },
                { x: dx + cut.position, y: cut.end },
              ]
            : [
                { x: dx + cut.start, y: cut.position },
                { x: dx + cut.end, y: cut.position },
              ],
        strokeColor: cut.kind === "rip" ? "#dc2626" : "#2563eb",
        strokeDash: cut.kind === "rip" ? undefined : "4 2",
        label: `${cut.id} @ ${cut.position}`,
      })
    }
  }
  return lines
}
