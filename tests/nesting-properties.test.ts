import { expect, test } from "vitest"
import type { NestingStrategyKind } from "lib/nesting-types"
import { checkNestingQuality } from "lib/quality/checkNestingQuality"
import { runNesting } from "lib/runNesting"
import { generateParts } from "tests/fixtures/generateParts"

const STRATEGIES: NestingStrategyKind[] = [
  "shelf",
  "guillotine",
  "cut_optimized",
]
const SEEDS = [1, 2, 3, 42]

for (const strategy of STRATEGIES) {
  test(`${strategy} layouts pass every quality check`, () => {
    for (const seed of SEEDS) {
      const parts = generateParts({
        seed,
        count: 40,
        minSize: 40,
        maxSize: 700,
      })
      const sheets = [
        { width: 1220, height: 2440, quantity: 2 },
        { width: 600, height: 600, quantity: 2 },
      ]
      const margin = 2
      const result = runNesting(parts, sheets, {
        strategy,
        kerf: 3,
        margin,
      })

      const report = checkNestingQuality({
        result,
        sheets,
        margin,
        originalParts: parts,
      })
      expect(report.issues).toEqual([])
      expect(result.placements.length + result.unplaced.length).toBe(
        parts.length,
      )

      const rotatable = new Map<string, boolean>(
        parts.map((p) => [p.id, p.rotationAllowed]),
      )
      for (const p of result.placements) {
        if (!rotatable.get(p.partId)) expect(p.rotationDeg).toBe(0)
      }
      for (const u of result.unplaced) {
        expect(u.reason).toBe("sheets_exhausted")
      }
      expect(result.utilization).toBeGreaterThan(0)
      expect(result.utilization).toBeLessThanOrEqual(1)
    }
  })
}
