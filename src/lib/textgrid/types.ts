/**
 * TextGrid document model
 *
 * Tiers are a tagged union so callers can switch on `_tag`. Item arrays are
 * frozen when a tier is built and keep file declaration order.
 */

export type TextGridDialect = "full" | "minimal"

export const TEXTGRID_DIALECTS: readonly TextGridDialect[] = ["full", "minimal"]

export function isTextGridDialect(value: unknown): value is TextGridDialect {
  return value === "full" || value === "minimal"
}

/** A labeled time span */
export interface Interval {
  readonly start: number
  readonly end: number
  readonly text: string
}

/** A labeled instant */
export interface Point {
  readonly number: number
  readonly mark: string
}

export interface IntervalTier {
  readonly _tag: "IntervalTier"
  readonly name: string
  readonly intervals: ReadonlyArray<Interval>
}

export interface TextTier {
  readonly _tag: "TextTier"
  readonly name: string
  readonly points: ReadonlyArray<Point>
}

export type Tier = IntervalTier | TextTier

export interface TierBounds {
  readonly xmin: number
  readonly xmax: number
}

export function makeIntervalTier(name: string, intervals: ReadonlyArray<Interval>): IntervalTier {
  return { _tag: "IntervalTier", name, intervals: Object.freeze([...intervals]) }
}

export function makeTextTier(name: string, points: ReadonlyArray<Point>): TextTier {
  return { _tag: "TextTier", name, points: Object.freeze([...points]) }
}

export function isIntervalTier(tier: Tier): tier is IntervalTier {
  return tier._tag === "IntervalTier"
}

export function isTextTier(tier: Tier): tier is TextTier {
  return tier._tag === "TextTier"
}

export function tierItemCount(tier: Tier): number {
  switch (tier._tag) {
    case "IntervalTier":
      return tier.intervals.length
    case "TextTier":
      return tier.points.length
  }
}

/**
 * Time span covered by a tier's items.
 *
 * Intervals contribute min(start) and max(end), points min/max(number).
 * Returns undefined for a tier without items.
 */
export function tierBounds(tier: Tier): TierBounds | undefined {
  const spans =
    tier._tag === "IntervalTier"
      ? tier.intervals.map(interval => [interval.start, interval.end] as const)
      : tier.points.map(point => [point.number, point.number] as const)

  const first = spans[0]
  if (!first) return undefined

  let xmin = first[0]
  let xmax = first[1]
  for (const [start, end] of spans) {
    if (start < xmin) xmin = start
    if (end > xmax) xmax = end
  }

  return { xmin, xmax }
}

// ============================================================================
// Transient headers (only live between parsing and validation)
// ============================================================================

/**
 * Document-level header. Fields are optional because the full dialect
 * declares them as free keyed properties.
 */
export interface TextGridHeader {
  readonly size?: number | undefined
  readonly xmin?: number | undefined
  readonly xmax?: number | undefined
  readonly hasTiers?: boolean | undefined
}

export interface TierHeader {
  readonly name: string
  readonly xmin: number
  readonly xmax: number
  readonly size: number
}

/**
 * Output of either dialect grammar: built tiers plus the headers needed to
 * validate them. `tierHeaders[i]` describes `tiers[i]`.
 */
export interface ParsedTextGrid {
  readonly header: TextGridHeader
  readonly tiers: ReadonlyArray<Tier>
  readonly tierHeaders: ReadonlyArray<TierHeader>
}
