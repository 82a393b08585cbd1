import type { FreeRect, Orientation } from "../../nesting-types"
import { EPS } from "../../utils/nesting-geometry"
import type { GuillotineState } from "../types"

/**
 * Lexicographic placement score, lower is better:
 * [rip-line penalty, short side leftover, long side leftover]
 */
export type CandidateScore = [number, number, number]

export function scoreBestShortSideFit(
  fr: FreeRect,
  o: Orientation,
): CandidateScore {
  const leftoverW = fr.width - o.width
  const leftoverH = fr.height - o.height
  return [
    0,
    Math.min(leftoverW, leftoverH),
    Math.max(leftoverW, leftoverH),
  ]
}

/** True when a part at `x` with this width continues an existing rip line. */
export function continuesRipLine(
  state: GuillotineState,
  x: number,
  width: number,
): boolean {
  const tol = state.ripAlignmentTolerance
  return state.ripSpans.some(
    ([start, end]) =>
      Math.abs(start - x) <= tol && Math.abs(end - (x + width)) <= tol,
  )
}

export function scoreCandidate(
  state: GuillotineState,
  fr: FreeRect,
  o: Orientation,
): CandidateScore {
  const score = scoreBestShortSideFit(fr, o)
  if (state.strategy === "cut_optimized") {
    score[0] = continuesRipLine(state, fr.x, o.width) ? 0 : 1
  }
  return score
}

export function compareScores(a: CandidateScore, b: CandidateScore): number {
  for (let i = 0; i < a.length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0)
    if (Math.abs(diff) > EPS) return diff
  }
  return 0
}
