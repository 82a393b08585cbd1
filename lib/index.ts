export type * from "./nesting-types"
export { InvalidInputError } from "./errors"

export { expandPartSpecs } from "./utils/expandPartSpecs"
export { expandSheetInstances } from "./utils/expandSheetInstances"
export {
  getOrientations,
  getUsableSheetArea,
  partFitsSheet,
} from "./utils/sheet-fit"
export { sortParts } from "./utils/sortParts"
export { validateNestingInput } from "./utils/validateNestingInput"

export {
  getSheetPlacementResult,
  initSheetPlacementState,
  isSheetPlacementDone,
  placeOnSheet,
  stepSheetPlacement,
} from "./strategies/engine"
export type {
  SheetPlacementInput,
  SheetPlacementResult,
  SheetPlacementState,
} from "./strategies/types"

export { MultiSheetNestingSolver } from "./solvers/MultiSheetNestingSolver"
export type { MultiSheetNestingInput } from "./solvers/multi-sheet/types"
export { runNesting, type RunControl } from "./runNesting"

export { optimizeCuts } from "./cuts/optimizeCuts"
export type { Cut, CutKind, CutPlan, OptimizeCutsInput } from "./cuts/types"
export { CutPlanSolver, type CutPlanSolverInput } from "./solvers/CutPlanSolver"

export { checkNestingQuality } from "./quality/checkNestingQuality"
export { formatQualityReport } from "./quality/formatQualityReport"
export type * from "./quality/types"
export { QualityCheckSolver } from "./solvers/QualityCheckSolver"

export {
  NestingPipeline,
  runNestingJob,
  type NestingJobInput,
  type NestingJobOutput,
} from "./NestingPipeline"
export { NESTING_CONFIG } from "../nesting.config"
