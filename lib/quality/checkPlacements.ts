import type { Part, PlacedPart, SheetInstance } from "../nesting-types"
import { rectCenter } from "../utils/nesting-geometry"
import type { QualityIssue } from "./types"

const LEGAL_ROTATIONS: readonly number[] = [0, 90]

export function checkBounds(params: {
  placements: readonly PlacedPart[]
  instances: readonly SheetInstance[]
  margin: number
  tolerance: number
}): QualityIssue[] {
  const { margin, tolerance } = params
  const bySheet = new Map<number, SheetInstance>(
    params.instances.map((s) => [s.sheetIndex, s]),
  )
  const issues: QualityIssue[] = []

  for (const p of params.placements) {
    const sheet = bySheet.get(p.sheetIndex)
    if (!sheet) {
      issues.push({
        type: "unknown_sheet",
        severity: "critical",
        partIds: [p.partId],
        sheetIndex: p.sheetIndex,
        description: `Part ${p.partId} is placed on sheet ${p.sheetIndex}, which does not exist`,
        suggestedFix: "Place the part on an available sheet",
        coordinates: rectCenter(p),
      })
      continue
    }
    const outside =
      p.x < margin - tolerance ||
      p.y < margin - tolerance ||
      p.x + p.width > sheet.width - margin + tolerance ||
      p.y + p.height > sheet.height - margin + tolerance
    if (outside) {
      issues.push({
        type: "out_of_bounds",
        severity: "critical",
        partIds: [p.partId],
        sheetIndex: p.sheetIndex,
        description: `Part ${p.partId} at (${p.x}, ${p.y}) size ${p.width} x ${p.height} extends beyond the usable area of sheet ${p.sheetIndex}`,
        suggestedFix: "Resize part or use larger sheet",
        coordinates: rectCenter(p),
      })
    }
  }
  return issues
}

/** Placed size, turned back to the unrotated frame, must match the source part. */
export function checkDimensions(params: {
  placements: readonly PlacedPart[]
  partsById: ReadonlyMap<string, Part>
  tolerance: number
}): QualityIssue[] {
  const { tolerance } = params
  const issues: QualityIssue[] = []

  for (const p of params.placements) {
    const part = params.partsById.get(p.partId)
    if (!part) {
      issues.push({
        type: "unknown_part",
        severity: "critical",
        partIds: [p.partId],
        sheetIndex: p.sheetIndex,
        description: `Placed part ${p.partId} is not in the input part list`,
        suggestedFix: "Remove the placement or add the part to the input",
        coordinates: rectCenter(p),
      })
      continue
    }
    const [width, height] =
      p.rotationDeg === 90 ? [p.height, p.width] : [p.width, p.height]
    if (
      Math.abs(width - part.width) > tolerance ||
      Math.abs(height - part.height) > tolerance
    ) {
      issues.push({
        type: "dimension_mismatch",
        severity: "critical",
        partIds: [p.partId],
        sheetIndex: p.sheetIndex,
        description: `Part ${p.partId} is placed as ${width} x ${height} but is ${part.width} x ${part.height}`,
        suggestedFix: "Verify part dimensions and rotation",
        coordinates: rectCenter(p),
      })
    }
  }
  return issues
}

export function checkRotations(params: {
  placements: readonly PlacedPart[]
  partsById: ReadonlyMap<string, Part>
}): QualityIssue[] {
  const issues: QualityIssue[] = []
  for (const p of params.placements) {
    const part = params.partsById.get(p.partId)
    if (!LEGAL_ROTATIONS.includes(p.rotationDeg)) {
      issues.push({
        type: "invalid_rotation",
        severity: "critical",
        partIds: [p.partId],
        sheetIndex: p.sheetIndex,
        description: `Part ${p.partId} has rotation ${p.rotationDeg}°, only 0° and 90° are supported`,
        suggestedFix: "Use 0° or 90°",
        coordinates: rectCenter(p),
      })
    } else if (part && p.rotationDeg !== 0 && !part.rotationAllowed) {
      issues.push({
        type: "invalid_rotation",
        severity: "critical",
        partIds: [p.partId],
        sheetIndex: p.sheetIndex,
        description: `Part ${p.partId} is rotated but may not rotate`,
        suggestedFix: "Place the part unrotated",
        coordinates: rectCenter(p),
      })
    }
  }
  return issues
}
