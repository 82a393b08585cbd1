import { expect, test } from "vitest"
import { placeOnSheet } from "lib/strategies/engine"
import { makePart } from "tests/fixtures/makePart"

test("shelf fills rows left to right, then opens a row above", () => {
  const { placed, remaining } = placeOnSheet({
    parts: [
      makePart("c", 40, 20),
      makePart("a", 40, 30),
      makePart("d", 10, 10),
      makePart("b", 40, 30),
    ],
    sheet: { width: 100, height: 100 },
    strategy: "shelf",
    kerf: 2,
    margin: 0,
  })

  expect(remaining).toEqual([])
  expect(placed.map((p) => [p.partId, p.x, p.y])).toEqual([
    ["a", 0, 0],
    ["b", 42, 0],
    ["c", 0, 32],
    ["d", 84, 0],
  ])
})

test("shelf opens a new row with the lower orientation", () => {
  const { placed } = placeOnSheet({
    parts: [makePart("tall", 20, 60, true)],
    sheet: { width: 100, height: 100 },
    strategy: "shelf",
    kerf: 0,
    margin: 0,
  })

  expect(placed).toEqual([
    {
      partId: "tall",
      sourceId: "tall",
      x: 0,
      y: 0,
      width: 60,
      height: 20,
      rotationDeg: 90,
    },
  ])
})

test("a part exactly the size of the usable area fits against the margin", () => {
  const { placed, remaining } = placeOnSheet({
    parts: [makePart("panel", 90, 40)],
    sheet: { width: 100, height: 50 },
    strategy: "shelf",
    kerf: 3,
    margin: 5,
  })

  expect(remaining).toEqual([])
  expect(placed[0]).toMatchObject({ x: 5, y: 5, width: 90, height: 40 })
})

test("shelf defers parts that do not fit and keeps going", () => {
  const { placed, remaining } = placeOnSheet({
    parts: [
      makePart("huge", 150, 10),
      makePart("ok", 50, 50),
      makePart("too-tall", 50, 60),
      makePart("late", 60, 50),
    ],
    sheet: { width: 100, height: 100 },
    strategy: "shelf",
    kerf: 0,
    margin: 0,
  })

  expect(placed.map((p) => [p.partId, p.x, p.y])).toEqual([
    ["too-tall", 0, 0],
    ["ok", 50, 0],
  ])
  expect(remaining.map((p) => p.id)).toEqual(["huge", "late"])
})

test("a rotatable part joins a shelf in the orientation that fills its height", () => {
  const { placed, remaining } = placeOnSheet({
    parts: [makePart("panel", 400, 300), makePart("board", 250, 100, true)],
    sheet: { width: 1000, height: 1000 },
    strategy: "shelf",
    kerf: 0,
    margin: 0,
  })

  expect(remaining).toEqual([])
  expect(placed[1]).toEqual({
    partId: "board",
    sourceId: "board",
    x: 400,
    y: 0,
    width: 100,
    height: 250,
    rotationDeg: 90,
  })
})
