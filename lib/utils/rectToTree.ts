import type { PlacedPart } from "lib/nesting-types"
import type { RTreeRect } from "lib/types/spatial-index-types"

export const placedPartToTree = (
  placement: PlacedPart,
  clearance = 0,
): RTreeRect<PlacedPart> => ({
  minX: placement.x - clearance,
  minY: placement.y - clearance,
  maxX: placement.x + placement.width + clearance,
  maxY: placement.y + placement.height + clearance,
  item: placement,
})
