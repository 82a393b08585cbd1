import type { FreeRect, Orientation } from "../../nesting-types"
import { EPS, rectArea } from "../../utils/nesting-geometry"

/**
 * Guillotine-split the free rectangle left around a part placed in its
 * bottom-left corner. Both children keep `spacing` clear of the part.
 *
 *   horizontal cut            vertical cut
 *   +-----------+             +---+-------+
 *   |    top    |             |top|       |
 *   +---+-------+             +---+ right |
 *   | P | right |             | P |       |
 *   +---+-------+             +---+-------+
 *
 * The cut runs along whichever axis leaves the larger single child; ties go
 * to the horizontal cut. Empty children are dropped.
 */
export function splitFreeRect(
  fr: FreeRect,
  placed: Orientation,
  spacing: number,
): FreeRect[] {
  const rightX = fr.x + placed.width + spacing
  const rightW = fr.x + fr.width - rightX
  const topY = fr.y + placed.height + spacing
  const topH = fr.y + fr.height - topY

  const horizontal: FreeRect[] = [
    { x: fr.x, y: topY, width: fr.width, height: topH },
    { x: rightX, y: fr.y, width: rightW, height: placed.height },
  ]
  const vertical: FreeRect[] = [
    { x: rightX, y: fr.y, width: rightW, height: fr.height },
    { x: fr.x, y: topY, width: placed.width, height: topH },
  ]

  const largest = (rects: FreeRect[]) =>
    Math.max(
      0,
      ...rects.filter((r) => r.width > EPS && r.height > EPS).map(rectArea),
    )

  const chosen =
    largest(vertical) > largest(horizontal) + EPS ? vertical : horizontal
  return chosen.filter((r) => r.width > EPS && r.height > EPS)
}
