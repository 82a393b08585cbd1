import { expect, test } from "vitest"
import { InvalidInputError } from "lib/errors"
import { expandPartSpecs } from "lib/utils/expandPartSpecs"
import { expandSheetInstances } from "lib/utils/expandSheetInstances"
import { getUsableSheetArea, partFitsSheet } from "lib/utils/sheet-fit"
import { sortParts } from "lib/utils/sortParts"
import { validateNestingInput } from "lib/utils/validateNestingInput"
import { makePart } from "tests/fixtures/makePart"

test("expandPartSpecs numbers instances of multi-quantity specs", () => {
  const parts = expandPartSpecs([
    { id: "shelf", width: 300, height: 200, quantity: 3 },
    { id: "door", width: 400, height: 700, rotationAllowed: true },
  ])

  expect(parts.map((p) => p.id)).toEqual([
    "shelf-1",
    "shelf-2",
    "shelf-3",
    "door",
  ])
  expect(parts[0]).toEqual({
    id: "shelf-1",
    sourceId: "shelf",
    width: 300,
    height: 200,
    rotationAllowed: false,
  })
  expect(parts[3]?.rotationAllowed).toBe(true)
})

test("expandPartSpecs rejects a zero quantity", () => {
  expect(() =>
    expandPartSpecs([{ id: "x", width: 10, height: 10, quantity: 0 }]),
  ).toThrow('Invalid nesting input: part "x" has invalid quantity 0')
})

test("expandSheetInstances numbers sheets across definitions", () => {
  const instances = expandSheetInstances([
    { width: 100, height: 100, quantity: 2, label: "A" },
    { width: 50, height: 50 },
  ])

  expect(
    instances.map((s) => [s.sheetIndex, s.definitionIndex, s.label]),
  ).toEqual([
    [0, 0, "A"],
    [1, 0, "A"],
    [2, 1, undefined],
  ])
})

test("getUsableSheetArea clamps at zero", () => {
  expect(getUsableSheetArea({ width: 100, height: 50 }, 5)).toEqual({
    width: 90,
    height: 40,
  })
  expect(getUsableSheetArea({ width: 100, height: 50 }, 30)).toEqual({
    width: 40,
    height: 0,
  })
})

test("partFitsSheet only turns parts that may rotate", () => {
  const usable = { width: 60, height: 40 }
  expect(partFitsSheet(makePart("a", 30, 60, true), usable)).toBe(true)
  expect(partFitsSheet(makePart("b", 30, 60, false), usable)).toBe(false)
  expect(partFitsSheet(makePart("c", 60, 40), usable)).toBe(true)
})

test("sortParts keeps input order among equal keys", () => {
  const parts = [
    makePart("small", 10, 10),
    makePart("wide", 40, 10),
    makePart("tall", 10, 40),
    makePart("big", 30, 30),
  ]

  expect(sortParts(parts, "area-desc").map((p) => p.id)).toEqual([
    "big",
    "wide",
    "tall",
    "small",
  ])
  expect(sortParts(parts, "height-desc").map((p) => p.id)).toEqual([
    "tall",
    "big",
    "wide",
    "small",
  ])
  expect(sortParts(parts, "input").map((p) => p.id)).toEqual([
    "small",
    "wide",
    "tall",
    "big",
  ])
})

test("validateNestingInput reports every problem at once", () => {
  let error: unknown
  try {
    validateNestingInput(
      [makePart("a", 10, 10), makePart("a", 10, 10)],
      [{ width: 100, height: 100 }],
      { strategy: "shelf", kerf: -1, margin: 0 },
    )
  } catch (e) {
    error = e
  }

  expect(error).toBeInstanceOf(InvalidInputError)
  if (!(error instanceof InvalidInputError)) return
  expect(error.issues).toEqual([
    "kerf must be zero or positive, got -1",
    'part id "a" is used more than once',
  ])
  expect(error.message).toBe(
    'Invalid nesting input (2 problems): kerf must be zero or positive, got -1; part id "a" is used more than once',
  )
})

test("validateNestingInput rejects sheets the margin swallows", () => {
  expect(() =>
    validateNestingInput([], [{ width: 40, height: 100 }], {
      strategy: "guillotine",
      kerf: 0,
      margin: 20,
    }),
  ).toThrow(
    "Invalid nesting input: margin 20 leaves no usable area on sheet 0 (40 x 100)",
  )
})

test("validateNestingInput requires a sheet and a known strategy", () => {
  expect(() =>
    validateNestingInput([], [], { strategy: "shelf", kerf: 0, margin: 0 }),
  ).toThrow("Invalid nesting input: at least one sheet definition is required")
  expect(() =>
    validateNestingInput(
      [makePart("a", 0, 10)],
      [{ width: 10, height: 10, quantity: 1.5 }],
      { strategy: "shelf", kerf: 0, margin: 0 },
    ),
  ).toThrow(
    'Invalid nesting input (2 problems): sheet 0 has invalid quantity 1.5; part "a" must have positive dimensions, got 0 x 10',
  )
})
