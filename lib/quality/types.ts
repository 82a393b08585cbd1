import type {
  NestingResult,
  Part,
  SheetDefinition,
} from "../nesting-types"

export type QualitySeverity = "critical" | "warning" | "info"

export type QualityIssueType =
  | "overlap"
  | "out_of_bounds"
  | "unknown_sheet"
  | "dimension_mismatch"
  | "unknown_part"
  | "invalid_rotation"
  | "insufficient_spacing"
  | "duplicate_part"
  | "missing_part"

export type QualityCheckName =
  | "overlap_detection"
  | "bounds_compliance"
  | "dimension_consistency"
  | "rotation_consistency"
  | "spacing_requirements"
  | "part_accounting"

export interface QualityIssue {
  type: QualityIssueType
  severity: QualitySeverity
  partIds: string[]
  /** null when the issue is not tied to one sheet */
  sheetIndex: number | null
  description: string
  suggestedFix: string
  coordinates: { x: number; y: number } | null
}

export interface QualityMetrics {
  criticalIssues: number
  warningIssues: number
  infoIssues: number
  totalIssues: number
  /** Percent, 0..100 */
  materialUtilization: number
  sheetsUsed: number
  partsPlaced: number
  /** Percent of placed pairs without a spacing warning, 0..100 */
  spacingComplianceRate: number
}

export interface QualityReport {
  /** 0..100 */
  score: number
  issues: QualityIssue[]
  passedChecks: QualityCheckName[]
  failedChecks: QualityCheckName[]
  metrics: QualityMetrics
}

export type CheckNestingQualityInput = {
  result: NestingResult
  sheets: readonly SheetDefinition[]
  margin: number
  originalParts: readonly Part[]
  /** Minimum edge clearance between parts, 0 disables the check */
  minSpacing?: number
  tolerance?: number
}
