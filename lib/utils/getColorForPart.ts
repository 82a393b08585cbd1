const PART_COLORS = [
  { fill: "#dbeafe", stroke: "#3b82f6" },
  { fill: "#fef3c7", stroke: "#f59e0b" },
  { fill: "#d1fae5", stroke: "#10b981" },
  { fill: "#e9d5ff", stroke: "#a855f7" },
  { fill: "#fed7aa", stroke: "#f97316" },
  { fill: "#fecaca", stroke: "#ef4444" },
] as const

/** Stable color per source part, so all instances of one spec match. */
export const getColorForPart = (
  sourceId: string,
): { fill: string; stroke: string } => {
  let hash = 0
  for (let i = 0; i < sourceId.length; i++) {
    hash = (hash * 31 + sourceId.charCodeAt(i)) >>> 0
  }
  return PART_COLORS[hash % PART_COLORS.length] ?? PART_COLORS[0]
}
