import type {
  NestingOptions,
  NestingStrategyKind,
  Part,
  SheetDefinition,
} from "../nesting-types"
import { InvalidInputError } from "../errors"

export const NESTING_STRATEGIES: readonly NestingStrategyKind[] = [
  "shelf",
  "guillotine",
  "cut_optimized",
]

const isPositive = (v: number) => Number.isFinite(v) && v > 0
const isNonNegative = (v: number) => Number.isFinite(v) && v >= 0

export function collectPartProblems(parts: readonly Part[]): string[] {
  const problems: string[] = []
  const seen = new Set<string>()
  for (const part of parts) {
    if (!isPositive(part.width) || !isPositive(part.height)) {
      problems.push(
        `part "${part.id}" must have positive dimensions, got ${part.width} x ${part.height}`,
      )
    }
    if (seen.has(part.id)) {
      problems.push(`part id "${part.id}" is used more than once`)
    }
    seen.add(part.id)
  }
  return problems
}

export function collectSpacingProblems(
  options: Pick<NestingOptions, "strategy" | "kerf" | "margin">,
): string[] {
  const problems: string[] = []
  if (!NESTING_STRATEGIES.includes(options.strategy)) {
    problems.push(`unknown strategy "${String(options.strategy)}"`)
  }
  if (!isNonNegative(options.kerf)) {
    problems.push(`kerf must be zero or positive, got ${options.kerf}`)
  }
  if (!isNonNegative(options.margin)) {
    problems.push(`margin must be zero or positive, got ${options.margin}`)
  }
  return problems
}

export function collectSheetProblems(
  sheets: ReadonlyArray<{ width: number; height: number; quantity?: number }>,
  margin: number,
): string[] {
  const problems: string[] = []
  sheets.forEach((sheet, i) => {
    if (!isPositive(sheet.width) || !isPositive(sheet.height)) {
      problems.push(
        `sheet ${i} must have positive dimensions, got ${sheet.width} x ${sheet.height}`,
      )
      return
    }
    const quantity = sheet.quantity ?? 1
    if (!Number.isInteger(quantity) || quantity < 1) {
      problems.push(`sheet ${i} has invalid quantity ${quantity}`)
    }
    if (
      isNonNegative(margin) &&
      (sheet.width <= 2 * margin || sheet.height <= 2 * margin)
    ) {
      problems.push(
        `margin ${margin} leaves no usable area on sheet ${i} (${sheet.width} x ${sheet.height})`,
      )
    }
  })
  return problems
}

/**
 * Reject a malformed job before any strategy runs.
 * @throws InvalidInputError listing every problem found
 */
export function validateNestingInput(
  parts: readonly Part[],
  sheets: readonly SheetDefinition[],
  options: Pick<NestingOptions, "strategy" | "kerf" | "margin">,
): void {
  const problems = [
    ...collectSpacingProblems(options),
    ...(sheets.length === 0 ? ["at least one sheet definition is required"] : []),
    ...collectSheetProblems(sheets, options.margin),
    ...collectPartProblems(parts),
  ]
  if (problems.length > 0) throw new InvalidInputError(problems)
}
