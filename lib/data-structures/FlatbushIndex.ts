import Flatbush from "flatbush"
import type { Bounds } from "@tscircuit/math-utils"

/**
 * Static box index over a fixed item list. Built once in the constructor, then
 * queried; an empty list yields an index that finds nothing.
 */
export class FlatbushIndex<T> {
  private index: Flatbush | null
  private items: T[]

  constructor(items: readonly T[], getBounds: (item: T) => Bounds) {
    this.items = [...items]
    if (this.items.length === 0) {
      this.index = null
      return
    }
    this.index = new Flatbush(this.items.length)
    for (const item of this.items) {
      const b = getBounds(item)
      this.index.add(b.minX, b.minY, b.maxX, b.maxY)
    }
    this.index.finish()
  }

  /** Items whose box touches the query box, in insertion order. */
  search(query: Bounds): T[] {
    if (!this.index) return []
    const ids = this.index.search(
      query.minX,
      query.minY,
      query.maxX,
      query.maxY,
    )
    return ids
      .sort((a, b) => a - b)
      .flatMap((id) => {
        const item = this.items[id]
        return item === undefined ? [] : [item]
      })
  }
}
