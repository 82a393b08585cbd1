import type { Orientation } from "../../nesting-types"
import { gt } from "../../utils/nesting-geometry"
import { getOrientations } from "../../utils/sheet-fit"
import type { GuillotineState } from "../types"
import { pruneContainedFreeRects } from "./pruneContainedFreeRects"
import {
  compareScores,
  scoreCandidate,
  type CandidateScore,
} from "./scoreCandidate"
import { splitFreeRect } from "./splitFreeRect"

type Candidate = {
  freeRectIndex: number
  orientation: Orientation
  score: CandidateScore
}

/**
 * Place exactly one queued part into its best free rectangle, or defer it.
 * @returns false once the queue is empty
 */
export function stepGuillotine(state: GuillotineState): boolean {
  const part = state.queue[state.queueIndex]
  if (!part) return false
  state.queueIndex += 1

  const orientations = getOrientations(part)
  let best: Candidate | null = null

  for (let i = 0; i < state.freeRects.length; i++) {
    const fr = state.freeRects[i]
    if (!fr) continue
    for (const orientation of orientations) {
      if (gt(orientation.width, fr.width) || gt(orientation.height, fr.height))
        continue
      const score = scoreCandidate(state, fr, orientation)
      if (!best || compareScores(score, best.score) < 0) {
        best = { freeRectIndex: i, orientation, score }
      }
    }
  }

  const fr = best ? state.freeRects[best.freeRectIndex] : undefined
  if (!best || !fr) {
    state.deferred.push(part)
    return true
  }

  const { orientation } = best
  state.placements.push({
    partId: part.id,
    sourceId: part.sourceId,
    x: fr.x,
    y: fr.y,
    width: orientation.width,
    height: orientation.height,
    rotationDeg: orientation.rotationDeg,
  })
  state.ripSpans.push([fr.x, fr.x + orientation.width])

  const children = splitFreeRect(fr, orientation, state.spacing)
  state.freeRects.splice(best.freeRectIndex, 1)
  state.freeRects.push(...children)
  state.freeRects = pruneContainedFreeRects(state.freeRects)

  return true
}
