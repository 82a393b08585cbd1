import {
  BasePipelineSolver,
  definePipelineStep,
  type PipelineStep,
} from "@tscircuit/solver-utils"
import type { GraphicsObject } from "graphics-debug"
import type { CutPlan } from "./cuts/types"
import type {
  NestingOptions,
  NestingResult,
  Part,
  SheetDefinition,
  SheetInstance,
} from "./nesting-types"
import type { QualityReport } from "./quality/types"
import { runSolverUntilDone, type RunControl } from "./runNesting"
import { CutPlanSolver } from "./solvers/CutPlanSolver"
import { MultiSheetNestingSolver } from "./solvers/MultiSheetNestingSolver"
import { getSchedulerStepBound } from "./solvers/multi-sheet/stepScheduler"
import { QualityCheckSolver } from "./solvers/QualityCheckSolver"
import { buildCutLineGraphics } from "./utils/buildCutLineGraphics"
import { buildSheetGraphics } from "./utils/buildSheetGraphics"
import { expandSheetInstances } from "./utils/expandSheetInstances"
import { validateNestingInput } from "./utils/validateNestingInput"

export interface NestingJobInput {
  parts: readonly Part[]
  sheets: readonly SheetDefinition[]
  options: NestingOptions
  /** Forwarded to the quality check */
  minSpacing?: number
  cutTolerance?: number
}

export interface NestingJobOutput {
  result: NestingResult
  cutPlans: CutPlan[]
  /** null when the job stopped before the quality check ran */
  quality: QualityReport | null
}

export class NestingPipeline extends BasePipelineSolver<NestingJobInput> {
  multiSheetNestingSolver?: MultiSheetNestingSolver
  cutPlanSolver?: CutPlanSolver
  qualityCheckSolver?: QualityCheckSolver

  override pipelineDef: PipelineStep<any>[] = [
    definePipelineStep(
      "multiSheetNestingSolver",
      MultiSheetNestingSolver,
      (pipeline: NestingPipeline) => [
        {
          parts: pipeline.inputProblem.parts,
          sheets: pipeline.inputProblem.sheets,
          options: pipeline.inputProblem.options,
        },
      ],
    ),
    definePipelineStep(
      "cutPlanSolver",
      CutPlanSolver,
      (pipeline: NestingPipeline) => [
        {
          result: pipeline.getNestingResult(),
          margin: pipeline.inputProblem.options.margin,
          tolerance: pipeline.inputProblem.cutTolerance,
        },
      ],
    ),
    definePipelineStep(
      "qualityCheckSolver",
      QualityCheckSolver,
      (pipeline: NestingPipeline) => [
        {
          result: pipeline.getNestingResult(),
          sheets: pipeline.inputProblem.sheets,
          margin: pipeline.inputProblem.options.margin,
          originalParts: pipeline.inputProblem.parts,
          minSpacing: pipeline.inputProblem.minSpacing,
        },
      ],
    ),
  ]

  constructor(input: NestingJobInput) {
    super(input)
    const instanceCount = expandSheetInstances([...input.sheets]).length
    // nesting steps, one cut plan per sheet, the audit, and step transitions
    this.MAX_ITERATIONS =
      getSchedulerStepBound(input.parts.length, instanceCount) +
      instanceCount +
      4 * this.pipelineDef.length +
      2
  }

  override getConstructorParams() {
    return [this.inputProblem]
  }

  /**
   * Result of the nesting step; before it starts, a result holding every
   * part as cancelled (or too large).
   */
  getNestingResult(): NestingResult {
    const solver =
      this.multiSheetNestingSolver ??
      new MultiSheetNestingSolver({
        parts: this.inputProblem.parts,
        sheets: this.inputProblem.sheets,
        options: this.inputProblem.options,
      })
    return solver.getOutput()
  }

  override getOutput(): NestingJobOutput {
    return {
      result: this.getNestingResult(),
      cutPlans: this.cutPlanSolver?.getOutput().cutPlans ?? [],
      quality: this.qualityCheckSolver?.getOutput().quality ?? null,
    }
  }

  private getUsedSheets(result: NestingResult): SheetInstance[] {
    return result.sheets.map((s) => ({
      sheetIndex: s.sheetIndex,
      definitionIndex: s.definitionIndex,
      width: s.width,
      height: s.height,
      label: s.label,
    }))
  }

  override initialVisualize(): GraphicsObject {
    return buildSheetGraphics({
      title: "NestingPipeline - Initial",
      sheets: this.inputProblem.sheets.map((s, i) => ({
        sheetIndex: i,
        definitionIndex: i,
        width: s.width,
        height: s.height,
        label: s.label,
      })),
      placements: [],
      margin: this.inputProblem.options.margin,
    })
  }

  override finalVisualize(): GraphicsObject {
    const { result, cutPlans, quality } = this.getOutput()
    const sheets = this.getUsedSheets(result)
    const graphics = buildSheetGraphics({
      title: `NestingPipeline - Final${quality ? ` (score ${quality.score})` : ""}`,
      sheets,
      placements: result.placements,
      margin: this.inputProblem.options.margin,
    })
    return {
      ...graphics,
      lines: [
        ...(graphics.lines ?? []),
        ...buildCutLineGraphics(sheets, cutPlans),
      ],
    }
  }
}

/**
 * Nest, plan cuts and audit in one call.
 * @throws InvalidInputError for a malformed job
 */
export function runNestingJob(
  input: NestingJobInput,
  control: RunControl = {},
): NestingJobOutput {
  validateNestingInput(input.parts, input.sheets, input.options)
  const pipeline = new NestingPipeline(input)
  runSolverUntilDone(pipeline, control)
  return pipeline.getOutput()
}
