import type { Orientation, Part, XYRect } from "../nesting-types"
import { lte } from "./nesting-geometry"

export function getUsableSheetArea(
  sheet: { width: number; height: number },
  margin: number,
): { width: number; height: number } {
  const m = Math.max(margin, 0)
  return {
    width: Math.max(0, sheet.width - 2 * m),
    height: Math.max(0, sheet.height - 2 * m),
  }
}

/** The region parts may occupy: the sheet shrunk by `margin` on every edge. */
export function getUsableRect(
  sheet: { width: number; height: number },
  margin: number,
): XYRect {
  const usable = getUsableSheetArea(sheet, margin)
  return { x: margin, y: margin, width: usable.width, height: usable.height }
}

/** Unrotated first, then the 90° turn when allowed and it differs. */
export function getOrientations(part: Part): Orientation[] {
  const orientations: Orientation[] = [
    { width: part.width, height: part.height, rotationDeg: 0 },
  ]
  if (part.rotationAllowed && part.width !== part.height) {
    orientations.push({
      width: part.height,
      height: part.width,
      rotationDeg: 90,
    })
  }
  return orientations
}

export function partFitsSheet(
  part: Part,
  usable: { width: number; height: number },
): boolean {
  return getOrientations(part).some(
    (o) => lte(o.width, usable.width) && lte(o.height, usable.height),
  )
}
