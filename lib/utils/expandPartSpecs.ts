import type { Part, PartSpec } from "../nesting-types"
import { InvalidInputError } from "../errors"

/**
 * Expand every spec into `quantity` part instances so downstream code never
 * deals with quantities. A single-quantity spec keeps its id, otherwise the
 * instances are numbered `${id}-1`, `${id}-2`, ...
 */
export function expandPartSpecs(specs: PartSpec[]): Part[] {
  const parts: Part[] = []
  const problems: string[] = []

  for (const spec of specs) {
    const quantity = spec.quantity ?? 1
    if (!Number.isInteger(quantity) || quantity < 1) {
      problems.push(`part "${spec.id}" has invalid quantity ${quantity}`)
      continue
    }
    for (let n = 1; n <= quantity; n++) {
      parts.push({
        id: quantity === 1 ? spec.id : `${spec.id}-${n}`,
        sourceId: spec.id,
        width: spec.width,
        height: spec.height,
        rotationAllowed: spec.rotationAllowed ?? false,
      })
    }
  }

  if (problems.length > 0) throw new InvalidInputError(problems)
  return parts
}
