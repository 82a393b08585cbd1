import type { SheetDefinition, SheetInstance } from "../nesting-types"

/**
 * Flatten sheet definitions into the ordered instance stack: every instance
 * of a definition comes before the next definition.
 */
export function expandSheetInstances(
  sheets: SheetDefinition[],
): SheetInstance[] {
  const instances: SheetInstance[] = []
  sheets.forEach((sheet, definitionIndex) => {
    const quantity = sheet.quantity ?? 1
    for (let n = 0; n < quantity; n++) {
      instances.push({
        sheetIndex: instances.length,
        definitionIndex,
        width: sheet.width,
        height: sheet.height,
        label: sheet.label,
      })
    }
  })
  return instances
}
