import type { Bounds } from "@tscircuit/math-utils"

/** Entry stored in an RBush tree; `item` is the indexed value. */
export type RTreeRect<T> = Bounds & {
  item: T
}
