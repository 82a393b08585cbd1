import type { XYRect } from "../nesting-types"

export const EPS = 1e-9
export const gt = (a: number, b: number) => a > b + EPS
export const gte = (a: number, b: number) => a > b - EPS
export const lt = (a: number, b: number) => a < b - EPS
export const lte = (a: number, b: number) => a < b + EPS

export const rectArea = (r: XYRect) => r.width * r.height

/** Find the intersection of two 1D intervals, or null if they don't overlap. */
export function intersect1D(r1: [number, number], r2: [number, number]) {
  const lo = Math.max(r1[0], r2[0])
  const hi = Math.min(r1[1], r2[1])
  return hi > lo + EPS ? ([lo, hi] as const) : null
}

/** Intersection rectangle of A and B, or null when they only touch. */
export function intersectRect(a: XYRect, b: XYRect): XYRect | null {
  const xi = intersect1D([a.x, a.x + a.width], [b.x, b.x + b.width])
  const yi = intersect1D([a.y, a.y + a.height], [b.y, b.y + b.height])
  if (!xi || !yi) return null
  return { x: xi[0], y: yi[0], width: xi[1] - xi[0], height: yi[1] - yi[0] }
}

/** True when `inner` lies completely inside `outer`. */
export function containsRect(outer: XYRect, inner: XYRect) {
  return (
    gte(inner.x, outer.x) &&
    gte(inner.y, outer.y) &&
    lte(inner.x + inner.width, outer.x + outer.width) &&
    lte(inner.y + inner.height, outer.y + outer.height)
  )
}

/**
 * Euclidean clearance between two rectangles. Touching or overlapping
 * rectangles are at distance 0.
 */
export function rectGap(a: XYRect, b: XYRect) {
  const dx = Math.max(0, b.x - (a.x + a.width), a.x - (b.x + b.width))
  const dy = Math.max(0, b.y - (a.y + a.height), a.y - (b.y + b.height))
  return Math.hypot(dx, dy)
}

export const rectCenter = (r: XYRect) => ({
  x: r.x + r.width / 2,
  y: r.y + r.height / 2,
})

/** Grow `r` by `by` on every side; a non-positive amount returns a copy. */
export const inflateRect = (r: XYRect, by: number): XYRect => {
  const d = Math.max(by, 0)
  return {
    x: r.x - d,
    y: r.y - d,
    width: r.width + 2 * d,
    height: r.height + 2 * d,
  }
}
