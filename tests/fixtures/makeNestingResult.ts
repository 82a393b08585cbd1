import type {
  NestingResult,
  PlacedPart,
  UnplacedPart,
} from "lib/nesting-types"

export const makePlacedPart = (
  partId: string,
  x: number,
  y: number,
  width: number,
  height: number,
  overrides: Partial<PlacedPart> = {},
): PlacedPart => ({
  partId,
  sourceId: partId,
  x,
  y,
  width,
  height,
  rotationDeg: 0,
  sheetIndex: 0,
  definitionIndex: 0,
  ...overrides,
})

/** Hand-built result for auditing; sheet usage is left empty. */
export const makeNestingResult = (
  placements: PlacedPart[],
  unplaced: UnplacedPart[] = [],
): NestingResult => ({
  strategy: "guillotine",
  placements,
  unplaced,
  sheets: [],
  sheetsConsumed: 1,
  utilization: 0,
  completed: true,
})
