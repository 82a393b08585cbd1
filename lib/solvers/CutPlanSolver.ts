// lib/solvers/CutPlanSolver.ts
import { BaseSolver } from "@tscircuit/solver-utils"
import type { GraphicsObject } from "graphics-debug"
import type { CutPlan } from "../cuts/types"
import { optimizeCuts } from "../cuts/optimizeCuts"
import type { NestingResult, SheetInstance } from "../nesting-types"
import { buildCutLineGraphics } from "../utils/buildCutLineGraphics"
import { buildSheetGraphics } from "../utils/buildSheetGraphics"

export type CutPlanSolverInput = {
  result: NestingResult
  margin: number
  tolerance?: number
}

/**
 * Builds one cut plan per used sheet, one sheet per step. Shelf layouts are
 * not guillotine-planned and yield no plans.
 */
export class CutPlanSolver extends BaseSolver {
  private input: CutPlanSolverInput
  private sheetCursor = 0
  private plans: CutPlan[] = []

  constructor(input: CutPlanSolverInput) {
    super()
    this.input = input
  }

  private get sheetsToPlan() {
    return this.input.result.strategy === "shelf" ? [] : this.input.result.sheets
  }

  override _setup() {
    this.stats = {
      sheetsPlanned: 0,
      sheetsTotal: this.sheetsToPlan.length,
    }
  }

  override _step() {
    const sheet = this.sheetsToPlan[this.sheetCursor]
    if (!sheet) {
      this.solved = true
      return
    }
    this.plans.push(
      optimizeCuts({
        sheetIndex: sheet.sheetIndex,
        sheetWidth: sheet.width,
        sheetHeight: sheet.height,
        margin: this.input.margin,
        placements: this.input.result.placements.filter(
          (p) => p.sheetIndex === sheet.sheetIndex,
        ),
        tolerance: this.input.tolerance,
      }),
    )
    this.sheetCursor++
    this.stats.sheetsPlanned = this.plans.length
  }

  computeProgress(): number {
    const total = this.sheetsToPlan.length
    return total === 0 ? 1 : this.plans.length / total
  }

  override getOutput(): { cutPlans: CutPlan[] } {
    return { cutPlans: this.plans }
  }

  override visualize(): GraphicsObject {
    const sheets: SheetInstance[] = this.input.result.sheets.map((s) => ({
      sheetIndex: s.sheetIndex,
      definitionIndex: s.definitionIndex,
      width: s.width,
      height: s.height,
      label: s.label,
    }))
    const graphics = buildSheetGraphics({
      title: "CutPlanSolver",
      sheets,
      placements: this.input.result.placements,
      margin: this.input.margin,
    })
    return {
      ...graphics,
      lines: [
        ...(graphics.lines ?? []),
        ...buildCutLineGraphics(sheets, this.plans),
      ],
    }
  }
}
