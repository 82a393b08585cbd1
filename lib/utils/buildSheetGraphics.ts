import type { GraphicsObject } from "graphics-debug"
import type {
  FreeRect,
  PlacedPart,
  SheetInstance,
  XYRect,
} from "../nesting-types"
import { rectCenter } from "./nesting-geometry"
import { getColorForPart } from "./getColorForPart"

export type BuildSheetGraphicsParams = {
  title: string
  sheets: readonly SheetInstance[]
  placements: readonly PlacedPart[]
  margin: number
  /** Free space of the sheet currently being filled */
  freeRects?: { sheetIndex: number; rects: readonly FreeRect[] }
}

/**
 * Sheets are laid out left to right with a gap of a tenth of the widest
 * sheet, so each sheet keeps its own cartesian frame shifted along x.
 */
export const computeSheetOffsets = (
  sheets: readonly SheetInstance[],
): Map<number, number> => {
  const gap = Math.max(0, ...sheets.map((s) => s.width)) * 0.1
  const offsets = new Map<number, number>()
  let x = 0
  for (const sheet of sheets) {
    offsets.set(sheet.sheetIndex, x)
    x += sheet.width + gap
  }
  return offsets
}

const shiftedRect = (rect: XYRect, dx: number) => ({
  center: { x: rectCenter(rect).x + dx, y: rectCenter(rect).y },
  width: rect.width,
  height: rect.height,
})

export const buildSheetGraphics = ({
  title,
  sheets,
  placements,
  margin,
  freeRects,
}: BuildSheetGraphicsParams): GraphicsObject => {
  const rects: NonNullable<GraphicsObject["rects"]> = []
  const lines: NonNullable<GraphicsObject["lines"]> = []
  const offsets = computeSheetOffsets(sheets)

  for (const sheet of sheets) {
    const dx = offsets.get(sheet.sheetIndex) ?? 0
    rects.push({
      ...shiftedRect(
        { x: 0, y: 0, width: sheet.width, height: sheet.height },
        dx,
      ),
      fill: "#f3f4f6",
      stroke: "#111827",
      label: `sheet ${sheet.sheetIndex}${sheet.label ? ` (${sheet.label})` : ""}`,
    })
    if (margin > 0) {
      lines.push({
        points: [
          { x: dx + margin, y: margin },
          { x: dx + sheet.width - margin, y: margin },
          { x: dx + sheet.width - margin, y: sheet.height - margin },
          { x: dx + margin, y: sheet.height - margin },
          { x: dx + margin, y: margin },
        ],
        strokeColor: "#9ca3af",
        label: "margin",
      })
    }
  }

  for (const p of placements) {
    const dx = offsets.get(p.sheetIndex) ?? 0
    const colors = getColorForPart(p.sourceId)
    rects.push({
      ...shiftedRect(p, dx),
      fill: colors.fill,
      stroke: colors.stroke,
      label: [
        p.partId,
        `${p.width} x ${p.height}${p.rotationDeg ? " (rotated)" : ""}`,
      ].join("\n"),
    })
  }

  if (freeRects) {
    const dx = offsets.get(freeRects.sheetIndex) ?? 0
    for (const fr of freeRects.rects) {
      rects.push({
        ...shiftedRect(fr, dx),
        fill: "rgba(0, 200, 0, 0.15)",
        stroke: "rgba(0, 128, 0, 0.6)",
        label: "free",
      })
    }
  }

  return {
    title,
    coordinateSystem: "cartesian",
    rects,
    lines,
  }
}
