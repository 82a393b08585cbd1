// lib/solvers/MultiSheetNestingSolver.ts
import { BaseSolver } from "@tscircuit/solver-utils"
import type { GraphicsObject } from "graphics-debug"
import type { NestingResult } from "../nesting-types"
import { buildSheetGraphics } from "../utils/buildSheetGraphics"
import {
  buildNestingResult,
  computeSchedulerProgress,
  getCurrentPlacements,
} from "./multi-sheet/buildNestingResult"
import { initSchedulerState } from "./multi-sheet/initSchedulerState"
import {
  getSchedulerStepBound,
  stepScheduler,
} from "./multi-sheet/stepScheduler"
import type {
  MultiSheetNestingInput,
  SchedulerState,
} from "./multi-sheet/types"

/**
 * Fills sheet instances in declaration order, one part per step, until every
 * part is placed or the sheets run out.
 */
export class MultiSheetNestingSolver extends BaseSolver {
  private state: SchedulerState

  /** @throws InvalidInputError before any step runs */
  constructor(input: MultiSheetNestingInput) {
    super()
    this.state = initSchedulerState(input)
    this.MAX_ITERATIONS = getSchedulerStepBound(
      this.state.remaining.length,
      this.state.instances.length,
    )
  }

  override _setup() {
    this.stats = {
      sheetIndex: null,
      placed: 0,
      remaining: this.state.remaining.length,
      tooLarge: this.state.tooLargeIds.size,
    }
  }

  /** Open a sheet, settle ONE part, or commit the active sheet. */
  override _step() {
    const didWork = stepScheduler(this.state)

    this.stats.sheetIndex = this.state.active?.instance.sheetIndex ?? null
    this.stats.placed =
      this.state.committed.length +
      (this.state.active?.placement.placements.length ?? 0)
    this.stats.remaining = this.state.remaining.length
    this.stats.sheetsConsumed = this.state.consumed.length

    if (!didWork) {
      this.solved = true
    }
  }

  computeProgress(): number {
    return computeSchedulerProgress(this.state)
  }

  override getOutput(): NestingResult {
    return buildNestingResult(this.state)
  }

  override visualize(): GraphicsObject {
    const { active } = this.state
    return buildSheetGraphics({
      title: `MultiSheetNestingSolver (${this.state.options.strategy})`,
      sheets: this.state.consumed,
      placements: getCurrentPlacements(this.state),
      margin: this.state.options.margin,
      freeRects:
        active && active.placement.strategy !== "shelf"
          ? {
              sheetIndex: active.instance.sheetIndex,
              rects: active.placement.freeRects,
            }
          : undefined,
    })
  }
}
