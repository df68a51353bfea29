/**
 * Consistency checks between declared header metadata and parsed content.
 *
 * Runs in a fixed order and stops at the first violation:
 * 1. document tier count
 * 2. tier bounds against the document xmin/xmax
 * 3. item count per tier
 * 4. tier bounds against the tier header xmin/xmax
 *
 * Tiers without items have no bounds and skip 2 and 4.
 */

import { Effect } from "effect"
import { TextGridConsistencyError } from "./textgrid-errors"
import {
  type ParsedTextGrid,
  type Tier,
  type TierBounds,
  type TierHeader,
  tierBounds,
  tierItemCount,
} from "./types"

type CheckEffect = Effect.Effect<void, TextGridConsistencyError>

function missingHeaderField(
  check: "tierCount" | "documentBounds",
  field: "size" | "xmin" | "xmax",
) {
  return new TextGridConsistencyError({
    check,
    field,
    message: `Missing ${field} in TextGrid header.`,
  })
}

const checkTierCount = (declared: number | undefined, found: number): CheckEffect => {
  if (declared === undefined) return Effect.fail(missingHeaderField("tierCount", "size"))
  if (declared === found) return Effect.void

  return Effect.fail(
    new TextGridConsistencyError({
      check: "tierCount",
      field: "size",
      declared,
      found,
      message: `Inconsistent number of tiers: ${declared} declared in TextGrid header, found ${found} in file.`,
    }),
  )
}

/**
 * Bounds of a tier must lie inside [declaredXmin, declaredXmax].
 * `scope` names where the limits were declared, for the message.
 */
const checkBoundsWithin = (
  check: "documentBounds" | "tierBounds",
  scope: string,
  tierName: string,
  bounds: TierBounds,
  declaredXmin: number,
  declaredXmax: number,
): CheckEffect => {
  if (bounds.xmin < declaredXmin) {
    return Effect.fail(
      new TextGridConsistencyError({
        check,
        tierName,
        field: "xmin",
        declared: declaredXmin,
        found: bounds.xmin,
        message: `Inconsistent xmin in tier ${tierName}: starts at ${bounds.xmin}, before the ${scope} xmin ${declaredXmin}.`,
      }),
    )
  }

  if (bounds.xmax > declaredXmax) {
    return Effect.fail(
      new TextGridConsistencyError({
        check,
        tierName,
        field: "xmax",
        declared: declaredXmax,
        found: bounds.xmax,
        message: `Inconsistent xmax in tier ${tierName}: ends at ${bounds.xmax}, after the ${scope} xmax ${declaredXmax}.`,
      }),
    )
  }

  return Effect.void
}

const checkItemCount = (tier: Tier, header: TierHeader): CheckEffect => {
  const found = tierItemCount(tier)
  if (header.size === found) return Effect.void

  return Effect.fail(
    new TextGridConsistencyError({
      check: "itemCount",
      tierName: tier.name,
      field: "size",
      declared: header.size,
      found,
      message: `Inconsistent number of items in tier ${tier.name}: ${header.size} declared in tier header, found ${found} in file.`,
    }),
  )
}

/**
 * Validate a parsed document. Fails with the first TextGridConsistencyError.
 */
export const checkConsistency = (parsed: ParsedTextGrid): CheckEffect =>
  Effect.gen(function* () {
    const { header, tiers, tierHeaders } = parsed

    yield* checkTierCount(header.size, tiers.length)

    const bounded = tiers.flatMap(tier => {
      const bounds = tierBounds(tier)
      return bounds ? [{ tier, bounds }] : []
    })

    if (bounded.length > 0) {
      if (header.xmin === undefined) {
        return yield* Effect.fail(missingHeaderField("documentBounds", "xmin"))
      }
      if (header.xmax === undefined) {
        return yield* Effect.fail(missingHeaderField("documentBounds", "xmax"))
      }
      for (const { tier, bounds } of bounded) {
        yield* checkBoundsWithin(
          "documentBounds",
          "TextGrid",
          tier.name,
          bounds,
          header.xmin,
          header.xmax,
        )
      }
    }

    for (const [index, tier] of tiers.entries()) {
      const tierHeader = tierHeaders[index]
      if (tierHeader) yield* checkItemCount(tier, tierHeader)
    }

    for (const [index, tier] of tiers.entries()) {
      const tierHeader = tierHeaders[index]
      const bounds = tierBounds(tier)
      if (tierHeader && bounds) {
        yield* checkBoundsWithin(
          "tierBounds",
          "tier header",
          tier.name,
          bounds,
          tierHeader.xmin,
          tierHeader.xmax,
        )
      }
    }
  })
