import type { QualityReport, QualitySeverity } from "./types"

const SEVERITY_HEADINGS: Array<[QualitySeverity, string]> = [
  ["critical", "CRITICAL"],
  ["warning", "WARNINGS"],
  ["info", "INFO"],
]

/** Plain-text summary of a quality report, one line per entry. */
export function formatQualityReport(report: QualityReport): string {
  const lines = [
    "Nesting Quality Report",
    `Overall Score: ${report.score.toFixed(1)}/100`,
    "",
    `Parts Placed: ${report.metrics.partsPlaced}`,
    `Sheets Used: ${report.metrics.sheetsUsed}`,
    `Material Utilization: ${report.metrics.materialUtilization.toFixed(1)}%`,
    "",
    `Passed checks: ${report.passedChecks.join(", ") || "none"}`,
    `Failed checks: ${report.failedChecks.join(", ") || "none"}`,
  ]

  if (report.issues.length === 0) {
    lines.push("", "No issues found")
    return lines.join("\n")
  }

  lines.push("", `Issues Found (${report.issues.length} total):`)
  for (const [severity, heading] of SEVERITY_HEADINGS) {
    const group = report.issues.filter((i) => i.severity === severity)
    if (group.length === 0) continue
    lines.push(`  ${heading} (${group.length}):`)
    for (const issue of group) {
      lines.push(`    - ${issue.description}`)
      if (issue.suggestedFix) lines.push(`      Fix: ${issue.suggestedFix}`)
    }
  }
  return lines.join("\n")
}
