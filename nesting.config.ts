// nesting.config.ts
/**
 * Tuning constants for the nesting engine, cut planning and quality checks.
 * Exposed at the top level so heuristics can be adjusted in one place.
 */

export const NESTING_CONFIG = {
  /**
   * Candidate cut lines closer than this are merged into one physical cut.
   * Also the default alignment window for the cut-optimized strategy.
   *
   * Should be at least the saw kerf, otherwise both faces of one saw pass
   * are reported as two separate cuts.
   */
  CUT_MERGE_TOLERANCE: 4,

  /** Part ordering applied before placement when none is requested. */
  DEFAULT_PART_ORDER: {
    shelf: "height-desc",
    guillotine: "area-desc",
    cut_optimized: "area-desc",
  },

  /** Floating tolerance for bounds and dimension checks. */
  QUALITY_TOLERANCE: 1e-6,

  /** Score deducted from 100 for each issue of a given severity. */
  QUALITY_PENALTY: {
    critical: 25,
    warning: 5,
    info: 1,
  },
} as const
