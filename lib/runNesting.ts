import type {
  NestingOptions,
  NestingResult,
  Part,
  SheetDefinition,
} from "./nesting-types"
import { MultiSheetNestingSolver } from "./solvers/MultiSheetNestingSolver"

export type RunControl = {
  /** Checked before every solver step */
  signal?: AbortSignal
}

type SteppableSolver = {
  solved: boolean
  failed: boolean
  error?: string | null
  setup(): void
  step(): void
}

/**
 * Step a solver to completion, stopping early when the signal aborts.
 * @returns false when the run was stopped before the solver finished
 */
export function runSolverUntilDone(
  solver: SteppableSolver,
  { signal }: RunControl = {},
): boolean {
  solver.setup()
  while (!solver.solved) {
    if (signal?.aborted) return false
    solver.step()
    if (solver.failed) {
      throw new Error(solver.error ?? "solver failed without an error message")
    }
  }
  return true
}

/**
 * Nest `parts` onto the sheet stack and return the placements.
 * @throws InvalidInputError for a malformed job
 */
export function runNesting(
  parts: readonly Part[],
  sheets: readonly SheetDefinition[],
  options: NestingOptions,
  control: RunControl = {},
): NestingResult {
  const solver = new MultiSheetNestingSolver({ parts, sheets, options })
  runSolverUntilDone(solver, control)
  return solver.getOutput()
}
