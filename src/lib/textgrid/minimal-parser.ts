/**
 * Minimal-dialect TextGrid grammar
 *
 * Praat's "short text file": the same document with every key dropped, so
 * each field is known only by its position.
 *
 *   File type = "ooTextFile"
 *   Object class = "TextGrid"
 *   0
 *   2.3
 *   <exists>
 *   1
 *   "IntervalTier"
 *   "sentence"
 *   0
 *   2.3
 *   1
 *   0
 *   2.3
 *   "hello"
 */

import { Effect } from "effect"
import type { Token } from "./lexer"
import type { TextGridSyntaxError } from "./textgrid-errors"
import { TokenCursor } from "./token-cursor"
import {
  type Interval,
  type ParsedTextGrid,
  type Point,
  type TextGridHeader,
  type Tier,
  type TierHeader,
  makeIntervalTier,
  makeTextTier,
} from "./types"

type ParseEffect<A> = Effect.Effect<A, TextGridSyntaxError>

/** (IDENT '=' value)* number number '<' IDENT '>' INT */
const parseTextGridHeader = (cursor: TokenCursor): ParseEffect<TextGridHeader> =>
  Effect.gen(function* () {
    // Leading "File type" / "Object class" lines carry nothing we keep
    while (cursor.peekIs("IDENTIFIER")) {
      yield* cursor.next()
      yield* cursor.expect("=")
      yield* cursor.expectString()
    }

    const xmin = yield* cursor.expectNumber()
    const xmax = yield* cursor.expectNumber()
    yield* cursor.expect("<")
    const flag = yield* cursor.expect("IDENTIFIER")
    yield* cursor.expect(">")
    const size = yield* cursor.expectInteger()

    return { xmin, xmax, hasTiers: flag.value === "exists", size }
  })

/** string number number INT, after the tier tag */
const parseTierHeader = (cursor: TokenCursor): ParseEffect<TierHeader> =>
  Effect.gen(function* () {
    const name = yield* cursor.expectString()
    const xmin = yield* cursor.expectNumber()
    const xmax = yield* cursor.expectNumber()
    const size = yield* cursor.expectInteger()
    return { name, xmin, xmax, size }
  })

const parseInterval = (cursor: TokenCursor): ParseEffect<Interval> =>
  Effect.gen(function* () {
    const start = yield* cursor.expectNumber()
    const end = yield* cursor.expectNumber()
    const text = yield* cursor.expectString()
    return { start, end, text }
  })

const parsePoint = (cursor: TokenCursor): ParseEffect<Point> =>
  Effect.gen(function* () {
    const number = yield* cursor.expectNumber()
    const mark = yield* cursor.expectString()
    return { number, mark }
  })

const parseTier = (cursor: TokenCursor): ParseEffect<readonly [Tier, TierHeader]> =>
  Effect.gen(function* () {
    const tag = yield* cursor.expect("TAG_INTERVAL", "TAG_TEXT")
    const header = yield* parseTierHeader(cursor)

    if (tag.type === "TAG_INTERVAL") {
      const intervals: Interval[] = []
      while (cursor.peekIsNumber()) {
        intervals.push(yield* parseInterval(cursor))
      }
      return [makeIntervalTier(header.name, intervals), header] as const
    }

    const points: Point[] = []
    while (cursor.peekIsNumber()) {
      points.push(yield* parsePoint(cursor))
    }
    return [makeTextTier(header.name, points), header] as const
  })

/**
 * Parse minimal-dialect tokens into tiers and the headers that describe them.
 */
export const parseMinimalTextGrid = (tokens: ReadonlyArray<Token>): ParseEffect<ParsedTextGrid> =>
  Effect.gen(function* () {
    const cursor = new TokenCursor(tokens)
    const header = yield* parseTextGridHeader(cursor)

    const tiers: Tier[] = []
    const tierHeaders: TierHeader[] = []
    while (cursor.peekIs("TAG_INTERVAL", "TAG_TEXT")) {
      const [tier, tierHeader] = yield* parseTier(cursor)
      tiers.push(tier)
      tierHeaders.push(tierHeader)
    }

    yield* cursor.expectEnd()

    return { header, tiers, tierHeaders }
  })
