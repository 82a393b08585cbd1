import type { Orientation, Part } from "../../nesting-types"
import { gt, lt } from "../../utils/nesting-geometry"
import { getOrientations } from "../../utils/sheet-fit"
import type { Shelf, ShelfState } from "../types"

/**
 * Pick the orientation that fits under the shelf and wastes the least shelf
 * height, i.e. the tallest one. Earlier orientations win ties, so unrotated
 * beats rotated.
 */
function pickShelfOrientation(
  state: ShelfState,
  shelf: Shelf,
  orientations: Orientation[],
): Orientation | null {
  const right = state.usable.x + state.usable.width
  let best: Orientation | null = null
  for (const o of orientations) {
    if (gt(shelf.cursorX + o.width, right)) continue
    if (gt(o.height, shelf.height)) continue
    if (!best || gt(o.height, best.height)) best = o
  }
  return best
}

/** Orientation for a part opening a new shelf at `y`: the lower one wins. */
function pickNewShelfOrientation(
  state: ShelfState,
  y: number,
  orientations: Orientation[],
): Orientation | null {
  const top = state.usable.y + state.usable.height
  let best: Orientation | null = null
  for (const o of orientations) {
    if (gt(o.width, state.usable.width)) continue
    if (gt(y + o.height, top)) continue
    if (!best || lt(o.height, best.height)) best = o
  }
  return best
}

function place(
  state: ShelfState,
  part: Part,
  x: number,
  y: number,
  o: Orientation,
) {
  state.placements.push({
    partId: part.id,
    sourceId: part.sourceId,
    x,
    y,
    width: o.width,
    height: o.height,
    rotationDeg: o.rotationDeg,
  })
}

/**
 * Handle exactly one queued part: first shelf that takes it, otherwise a new
 * shelf above the last one, otherwise defer it.
 * @returns false once the queue is empty
 */
export function stepShelf(state: ShelfState): boolean {
  const part = state.queue[state.queueIndex]
  if (!part) return false
  state.queueIndex += 1

  const orientations = getOrientations(part)

  for (const shelf of state.shelves) {
    const o = pickShelfOrientation(state, shelf, orientations)
    if (!o) continue
    place(state, part, shelf.cursorX, shelf.y, o)
    shelf.cursorX += o.width + state.spacing
    return true
  }

  const last = state.shelves[state.shelves.length - 1]
  const y = last ? last.y + last.height + state.spacing : state.usable.y
  const o = pickNewShelfOrientation(state, y, orientations)
  if (!o) {
    state.deferred.push(part)
    return true
  }

  state.shelves.push({
    y,
    height: o.height,
    cursorX: state.usable.x + o.width + state.spacing,
  })
  place(state, part, state.usable.x, y, o)
  return true
}
