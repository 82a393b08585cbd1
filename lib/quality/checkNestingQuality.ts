// lib/quality/checkNestingQuality.ts
import { NESTING_CONFIG } from "../../nesting.config"
import type { Part } from "../nesting-types"
import { expandSheetInstances } from "../utils/expandSheetInstances"
import { checkPairwiseClearance } from "./checkPairwiseClearance"
import { checkPartAccounting } from "./checkPartAccounting"
import { checkBounds, checkDimensions, checkRotations } from "./checkPlacements"
import type {
  CheckNestingQualityInput,
  QualityCheckName,
  QualityIssue,
  QualityMetrics,
  QualityReport,
} from "./types"

/**
 * Audit a finished (or partial) nesting result. Problems are reported as
 * issues, never thrown, and the result is left untouched.
 */
export function checkNestingQuality(
  input: CheckNestingQualityInput,
): QualityReport {
  const { result, margin } = input
  const minSpacing = input.minSpacing ?? 0
  const tolerance = input.tolerance ?? NESTING_CONFIG.QUALITY_TOLERANCE
  const instances = expandSheetInstances([...input.sheets])
  const partsById = new Map<string, Part>(
    input.originalParts.map((p) => [p.id, p]),
  )
  const placements = result.placements

  const clearance = checkPairwiseClearance({
    placements,
    margin,
    minSpacing,
    tolerance,
  })

  const checks: Array<[QualityCheckName, QualityIssue[]]> = [
    ["overlap_detection", clearance.overlaps],
    [
      "bounds_compliance",
      checkBounds({ placements, instances, margin, tolerance }),
    ],
    [
      "dimension_consistency",
      checkDimensions({ placements, partsById, tolerance }),
    ],
    ["rotation_consistency", checkRotations({ placements, partsById })],
    ["spacing_requirements", clearance.spacing],
    ["part_accounting", checkPartAccounting(result, input.originalParts)],
  ]

  const issues = checks.flatMap(([, found]) => found)
  const passedChecks = checks
    .filter(([, found]) => found.length === 0)
    .map(([name]) => name)
  const failedChecks = checks
    .filter(([, found]) => found.length > 0)
    .map(([name]) => name)

  const usedSheetIndexes = new Set(placements.map((p) => p.sheetIndex))
  const sheetArea = instances
    .filter((s) => usedSheetIndexes.has(s.sheetIndex))
    .reduce((sum, s) => sum + s.width * s.height, 0)
  const placedArea = placements.reduce((sum, p) => sum + p.width * p.height, 0)
  const pairCount = (placements.length * (placements.length - 1)) / 2

  const count = (severity: QualityIssue["severity"]) =>
    issues.filter((i) => i.severity === severity).length

  const metrics: QualityMetrics = {
    criticalIssues: count("critical"),
    warningIssues: count("warning"),
    infoIssues: count("info"),
    totalIssues: issues.length,
    materialUtilization: sheetArea > 0 ? (placedArea / sheetArea) * 100 : 0,
    sheetsUsed: usedSheetIndexes.size,
    partsPlaced: placements.length,
    spacingComplianceRate:
      pairCount > 0
        ? ((pairCount - clearance.spacing.length) / pairCount) * 100
        : 100,
  }

  const penalty = issues.reduce(
    (sum, i) => sum + NESTING_CONFIG.QUALITY_PENALTY[i.severity],
    0,
  )

  return {
    score: Math.min(100, Math.max(0, 100 - penalty)),
    issues,
    passedChecks,
    failedChecks,
    metrics,
  }
}
