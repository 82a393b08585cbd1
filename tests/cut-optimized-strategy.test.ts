import { expect, test } from "vitest"
import { initGuillotineState } from "lib/strategies/guillotine/initGuillotineState"
import { stepGuillotine } from "lib/strategies/guillotine/stepGuillotine"
import {
  continuesRipLine,
  scoreCandidate,
} from "lib/strategies/guillotine/scoreCandidate"
import type { GuillotineState } from "lib/strategies/types"
import { makePart } from "tests/fixtures/makePart"

/**
 * One placed part spans x 0..40. A loose free rect sits on that rip line,
 * a snug one sits off it.
 */
const makeState = (
  strategy: GuillotineState["strategy"],
  ripAlignmentTolerance?: number,
): GuillotineState => {
  const state = initGuillotineState({
    parts: [makePart("b", 40, 30)],
    sheet: { width: 200, height: 100 },
    strategy,
    kerf: 0,
    margin: 0,
    ripAlignmentTolerance,
  })
  state.ripSpans = [[0, 43]]
  state.freeRects = [
    { x: 0, y: 50, width: 100, height: 50 },
    { x: 60, y: 0, width: 45, height: 35 },
  ]
  return state
}

test("continuesRipLine matches both span ends within the tolerance", () => {
  const state = makeState("cut_optimized")
  expect(state.ripAlignmentTolerance).toBe(4)
  expect(continuesRipLine(state, 0, 40)).toBe(true)
  expect(continuesRipLine(state, 0, 38)).toBe(false)
  expect(continuesRipLine(state, 60, 40)).toBe(false)
})

test("cut_optimized scores off-line candidates behind on-line ones", () => {
  const state = makeState("cut_optimized")
  const orientation = { width: 40, height: 30, rotationDeg: 0 as const }
  const [onLine, offLine] = state.freeRects
  if (!onLine || !offLine) throw new Error("expected two free rects")

  expect(scoreCandidate(state, onLine, orientation)).toEqual([0, 20, 60])
  expect(scoreCandidate(state, offLine, orientation)).toEqual([1, 5, 5])
})

test("cut_optimized continues the rip line where guillotine takes the snug fit", () => {
  const optimized = makeState("cut_optimized")
  stepGuillotine(optimized)
  expect(optimized.placements[0]).toMatchObject({ partId: "b", x: 0, y: 50 })

  const plain = makeState("guillotine")
  stepGuillotine(plain)
  expect(plain.placements[0]).toMatchObject({ partId: "b", x: 60, y: 0 })
})

test("a tighter alignment window falls back to the best short side fit", () => {
  const state = makeState("cut_optimized", 2)
  stepGuillotine(state)
  expect(state.placements[0]).toMatchObject({ x: 60, y: 0 })
})
