// lib/solvers/QualityCheckSolver.ts
import { BaseSolver } from "@tscircuit/solver-utils"
import type { GraphicsObject } from "graphics-debug"
import { checkNestingQuality } from "../quality/checkNestingQuality"
import type {
  CheckNestingQualityInput,
  QualityReport,
} from "../quality/types"
import { expandSheetInstances } from "../utils/expandSheetInstances"
import {
  buildSheetGraphics,
  computeSheetOffsets,
} from "../utils/buildSheetGraphics"

/** Runs the whole quality audit in a single step. */
export class QualityCheckSolver extends BaseSolver {
  private input: CheckNestingQualityInput
  private report: QualityReport | null = null

  constructor(input: CheckNestingQualityInput) {
    super()
    this.input = input
  }

  override _setup() {
    this.stats = { score: null, issues: 0 }
  }

  override _step() {
    this.report = checkNestingQuality(this.input)
    this.stats.score = this.report.score
    this.stats.issues = this.report.issues.length
    this.solved = true
  }

  override getOutput(): { quality: QualityReport | null } {
    return { quality: this.report }
  }

  override visualize(): GraphicsObject {
    const usedSheetIndexes = new Set(
      this.input.result.sheets.map((s) => s.sheetIndex),
    )
    const sheets = expandSheetInstances([...this.input.sheets]).filter((s) =>
      usedSheetIndexes.has(s.sheetIndex),
    )
    const graphics = buildSheetGraphics({
      title: `QualityCheckSolver${this.report ? ` (score ${this.report.score})` : ""}`,
      sheets,
      placements: this.input.result.placements,
      margin: this.input.margin,
    })
    const offsets = computeSheetOffsets(sheets)
    const points: NonNullable<GraphicsObject["points"]> = []
    for (const issue of this.report?.issues ?? []) {
      if (!issue.coordinates) continue
      const dx =
        issue.sheetIndex === null ? 0 : (offsets.get(issue.sheetIndex) ?? 0)
      points.push({
        x: issue.coordinates.x + dx,
        y: issue.coordinates.y,
        color: issue.severity === "critical" ? "red" : "orange",
        label: issue.description,
      })
    }
    return { ...graphics, points }
  }
}
