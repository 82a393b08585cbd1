import type { PlacedPart, SheetInstance, SheetUsage } from "../nesting-types"

/**
 * Per-sheet area statistics for every instance that holds at least one part,
 * ordered by sheet index.
 */
export function computeSheetUsage(
  placements: readonly PlacedPart[],
  instances: readonly SheetInstance[],
): SheetUsage[] {
  const bySheet = new Map<number, PlacedPart[]>()
  for (const p of placements) {
    const list = bySheet.get(p.sheetIndex) ?? []
    list.push(p)
    bySheet.set(p.sheetIndex, list)
  }

  const usage: SheetUsage[] = []
  for (const instance of instances) {
    const onSheet = bySheet.get(instance.sheetIndex)
    if (!onSheet) continue
    const placedArea = onSheet.reduce((sum, p) => sum + p.width * p.height, 0)
    const sheetArea = instance.width * instance.height
    usage.push({
      sheetIndex: instance.sheetIndex,
      definitionIndex: instance.definitionIndex,
      label: instance.label,
      width: instance.width,
      height: instance.height,
      partCount: onSheet.length,
      placedArea,
      sheetArea,
      utilization: sheetArea > 0 ? placedArea / sheetArea : 0,
    })
  }
  return usage
}

/** Placed area over the area of the used sheets, 0 when none were used. */
export function computeTotalUtilization(usage: readonly SheetUsage[]): number {
  const sheetArea = usage.reduce((sum, u) => sum + u.sheetArea, 0)
  const placedArea = usage.reduce((sum, u) => sum + u.placedArea, 0)
  return sheetArea > 0 ? placedArea / sheetArea : 0
}
