import { expect, test } from "vitest"
import { MultiSheetNestingSolver } from "lib/solvers/MultiSheetNestingSolver"
import { makePart } from "tests/fixtures/makePart"

const fiveSquares = () =>
  ["p1", "p2", "p3", "p4", "p5"].map((id) => makePart(id, 500, 500))

test("MultiSheetNestingSolver supports incremental stepping", () => {
  const solver = new MultiSheetNestingSolver({
    parts: fiveSquares(),
    sheets: [{ width: 600, height: 600 }],
    options: { strategy: "shelf", kerf: 0, margin: 0 },
  })

  solver.setup()
  expect(solver.solved).toBe(false)
  expect(solver.stats.remaining).toBe(5)

  // open the sheet, settle five parts, commit, then find no sheet left
  let stepCount = 0
  while (!solver.solved && stepCount < 100) {
    solver.step()
    stepCount++
  }

  expect(stepCount).toBe(8)
  expect(solver.computeProgress()).toBe(1)

  const result = solver.getOutput()
  expect(result.completed).toBe(true)
  expect(result.placements.map((p) => [p.partId, p.sheetIndex])).toEqual([
    ["p1", 0],
  ])
  expect(result.unplaced.map((u) => [u.part.id, u.reason])).toEqual([
    ["p2", "sheets_exhausted"],
    ["p3", "sheets_exhausted"],
    ["p4", "sheets_exhausted"],
    ["p5", "sheets_exhausted"],
  ])
  expect(result.sheetsConsumed).toBe(1)
})

test("a solver stopped mid-sheet reports a consistent partial result", () => {
  const solver = new MultiSheetNestingSolver({
    parts: fiveSquares(),
    sheets: [{ width: 600, height: 600 }],
    options: { strategy: "shelf", kerf: 0, margin: 0 },
  })
  solver.setup()
  solver.step() // open sheet 0
  solver.step() // p1 placed
  solver.step() // p2 deferred

  expect(solver.stats.sheetIndex).toBe(0)
  expect(solver.computeProgress()).toBeCloseTo(1 / 5)

  const result = solver.getOutput()
  expect(result.completed).toBe(false)
  expect(result.placements.map((p) => p.partId)).toEqual(["p1"])
  expect(result.unplaced.map((u) => [u.part.id, u.reason])).toEqual([
    ["p2", "cancelled"],
    ["p3", "cancelled"],
    ["p4", "cancelled"],
    ["p5", "cancelled"],
  ])
  expect(result.sheetsConsumed).toBe(1)
  expect(result.sheets.map((s) => [s.sheetIndex, s.partCount])).toEqual([
    [0, 1],
  ])
})

test("parts that fit no sheet are never attempted", () => {
  const solver = new MultiSheetNestingSolver({
    parts: [makePart("giant", 3000, 3000, true)],
    sheets: [
      { width: 2440, height: 1220 },
      { width: 1220, height: 2440, quantity: 4 },
    ],
    options: { strategy: "guillotine", kerf: 3, margin: 0 },
  })
  solver.solve()

  const result = solver.getOutput()
  expect(result.placements).toEqual([])
  expect(result.unplaced).toEqual([
    {
      part: {
        id: "giant",
        sourceId: "giant",
        width: 3000,
        height: 3000,
        rotationAllowed: true,
      },
      reason: "too_large_for_any_sheet",
    },
  ])
  expect(result.sheetsConsumed).toBe(0)
  expect(result.sheets).toEqual([])
  expect(result.utilization).toBe(0)
})

test("sheets are consumed in order and only while parts remain", () => {
  const solver = new MultiSheetNestingSolver({
    parts: [makePart("a", 500, 500), makePart("b", 500, 500)],
    sheets: [
      { width: 300, height: 300, label: "offcut" },
      { width: 600, height: 600, quantity: 5, label: "full" },
    ],
    options: { strategy: "guillotine", kerf: 3, margin: 0 },
  })
  solver.solve()

  const result = solver.getOutput()
  expect(
    result.placements.map((p) => [p.partId, p.sheetIndex, p.definitionIndex]),
  ).toEqual([
    ["a", 1, 1],
    ["b", 2, 1],
  ])
  // the offcut was opened and stayed empty
  expect(result.sheetsConsumed).toBe(3)
  expect(result.sheets.map((s) => [s.sheetIndex, s.label])).toEqual([
    [1, "full"],
    [2, "full"],
  ])
  expect(result.sheets[0]?.utilization).toBeCloseTo(250000 / 360000)
  expect(result.utilization).toBeCloseTo(500000 / 720000)
})

test("visualize draws opened sheets and placed parts", () => {
  const solver = new MultiSheetNestingSolver({
    parts: fiveSquares(),
    sheets: [{ width: 600, height: 600 }],
    options: { strategy: "shelf", kerf: 0, margin: 0 },
  })
  solver.solve()

  const graphics = solver.visualize()
  expect(graphics.title).toBe("MultiSheetNestingSolver (shelf)")
  expect(graphics.coordinateSystem).toBe("cartesian")
  expect(graphics.rects?.map((r) => r.label)).toEqual([
    "sheet 0",
    "p1\n500 x 500",
  ])
  expect(graphics.lines).toEqual([])
})

test("the constructor rejects invalid input", () => {
  expect(
    () =>
      new MultiSheetNestingSolver({
        parts: [makePart("a", 10, 10)],
        sheets: [],
        options: { strategy: "shelf", kerf: 0, margin: 0 },
      }),
  ).toThrow("Invalid nesting input: at least one sheet definition is required")
})
