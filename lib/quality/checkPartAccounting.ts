import type { NestingResult, Part } from "../nesting-types"
import type { QualityIssue } from "./types"

/** Every input part appears exactly once across placements and unplaced. */
export function checkPartAccounting(
  result: NestingResult,
  originalParts: readonly Part[],
): QualityIssue[] {
  const seen = new Map<string, number>()
  const bump = (id: string) => seen.set(id, (seen.get(id) ?? 0) + 1)
  for (const p of result.placements) bump(p.partId)
  for (const u of result.unplaced) bump(u.part.id)

  const issues: QualityIssue[] = []
  for (const part of originalParts) {
    const count = seen.get(part.id) ?? 0
    if (count === 0) {
      issues.push({
        type: "missing_part",
        severity: "critical",
        partIds: [part.id],
        sheetIndex: null,
        description: `Part ${part.id} is neither placed nor reported unplaced`,
        suggestedFix: "Report the part as placed or unplaced",
        coordinates: null,
      })
    } else if (count > 1) {
      issues.push({
        type: "duplicate_part",
        severity: "critical",
        partIds: [part.id],
        sheetIndex: null,
        description: `Part ${part.id} appears ${count} times`,
        suggestedFix: "Keep a single placement or unplaced entry per part",
        coordinates: null,
      })
    }
  }
  return issues
}
