/**
 * Full-dialect TextGrid grammar
 *
 * The verbose format Praat writes by default:
 *
 *   xmin = 0
 *   xmax = 2.3
 *   tiers? <exists>
 *   size = 1
 *   item []:
 *       item [1]:
 *           class = "IntervalTier"
 *           name = "sentence"
 *           xmin = 0
 *           xmax = 2.3
 *           intervals: size = 1
 *           intervals [1]:
 *               xmin = 0
 *               xmax = 2.3
 *               text = "hello"
 *
 * One parsing function per nonterminal, each picked by its leading keyword.
 * Property groups (tier header, interval, point) are read by key, so their
 * lines may come in any order.
 */

import { Effect } from "effect"
import type { Token } from "./lexer"
import { makeSyntaxError, type TextGridSyntaxError } from "./textgrid-errors"
import { TokenCursor, isNumberToken, isStringToken } from "./token-cursor"
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

/**
 * Keyed properties collected from one block. `end` is the token that closed
 * the block and locates "missing property" errors.
 */
interface PropertyGroup {
  readonly context: string
  readonly properties: ReadonlyMap<string, Token>
  readonly end: Token | undefined
}

const VALUE_TYPES = ["STRING", "INT", "FLOAT", "TAG_INTERVAL", "TAG_TEXT"] as const

// ============================================================================
// Values
// ============================================================================

function numberValue(token: Token, key: string): ParseEffect<number> {
  if (!isNumberToken(token)) {
    return Effect.fail(makeSyntaxError(token, `a number for "${key}"`))
  }
  return Effect.succeed(Number.parseFloat(token.value))
}

function stringValue(token: Token, key: string): ParseEffect<string> {
  if (!isStringToken(token)) {
    return Effect.fail(makeSyntaxError(token, `a string for "${key}"`))
  }
  return Effect.succeed(token.value)
}

function requireProperty(group: PropertyGroup, key: string): ParseEffect<Token> {
  const token = group.properties.get(key)
  if (!token) {
    return Effect.fail(makeSyntaxError(group.end, `property "${key}" in ${group.context}`))
  }
  return Effect.succeed(token)
}

const numberProperty = (group: PropertyGroup, key: string): ParseEffect<number> =>
  requireProperty(group, key).pipe(Effect.flatMap(token => numberValue(token, key)))

const stringProperty = (group: PropertyGroup, key: string): ParseEffect<string> =>
  requireProperty(group, key).pipe(Effect.flatMap(token => stringValue(token, key)))

// ============================================================================
// Properties
// ============================================================================

/** IDENT '=' value */
const parseProperty = (cursor: TokenCursor): ParseEffect<readonly [string, Token]> =>
  Effect.gen(function* () {
    const key = yield* cursor.expect("IDENTIFIER")
    yield* cursor.expect("=")
    const value = yield* cursor.expect(...VALUE_TYPES)
    return [key.value, value] as const
  })

const parsePropertyGroup = (cursor: TokenCursor, context: string): ParseEffect<PropertyGroup> =>
  Effect.gen(function* () {
    const properties = new Map<string, Token>()
    while (cursor.peekIs("IDENTIFIER")) {
      const [key, value] = yield* parseProperty(cursor)
      properties.set(key, value)
    }
    return { context, properties, end: cursor.peek() }
  })

/** keyword '[' INT ']' ':' */
const parseIndexedHeader = (
  cursor: TokenCursor,
  keyword: "ITEM" | "INTERVALS" | "POINTS",
): ParseEffect<void> =>
  Effect.gen(function* () {
    yield* cursor.expect(keyword)
    yield* cursor.expect("[")
    // The index is structural only, never checked against the position
    yield* cursor.expectInteger()
    yield* cursor.expect("]")
    yield* cursor.expect(":")
  })

// ============================================================================
// Document header
// ============================================================================

const parseTextGridHeader = (cursor: TokenCursor): ParseEffect<TextGridHeader> =>
  Effect.gen(function* () {
    let size: number | undefined
    let xmin: number | undefined
    let xmax: number | undefined
    let hasTiers: boolean | undefined

    for (;;) {
      if (cursor.peekIs("IDENTIFIER")) {
        const [key, value] = yield* parseProperty(cursor)
        if (key === "xmin") xmin = yield* numberValue(value, key)
        if (key === "xmax") xmax = yield* numberValue(value, key)
      } else if (cursor.peekIs("SIZE")) {
        yield* cursor.next()
        yield* cursor.expect("=")
        size = yield* cursor.expectInteger()
      } else if (cursor.peekIs("TIERS_EXIST")) {
        yield* cursor.next()
        yield* cursor.expect("<")
        const flag = yield* cursor.expect("IDENTIFIER")
        yield* cursor.expect(">")
        hasTiers = flag.value === "exists"
      } else {
        break
      }
    }

    return { size, xmin, xmax, hasTiers }
  })

// ============================================================================
// Tiers
// ============================================================================

const parseInterval = (cursor: TokenCursor): ParseEffect<Interval> =>
  Effect.gen(function* () {
    yield* parseIndexedHeader(cursor, "INTERVALS")
    const group = yield* parsePropertyGroup(cursor, "interval")
    const start = yield* numberProperty(group, "xmin")
    const end = yield* numberProperty(group, "xmax")
    const text = yield* stringProperty(group, "text")
    return { start, end, text }
  })

const parsePoint = (cursor: TokenCursor): ParseEffect<Point> =>
  Effect.gen(function* () {
    yield* parseIndexedHeader(cursor, "POINTS")
    const group = yield* parsePropertyGroup(cursor, "point")
    const number = yield* numberProperty(group, "number")
    const mark = yield* stringProperty(group, "mark")
    return { number, mark }
  })

/**
 * name/xmin/xmax as a keyed group, closed by the fixed
 * `intervals: size = N` (or `points: size = N`) line.
 */
const parseTierHeader = (
  cursor: TokenCursor,
  itemKeyword: "INTERVALS" | "POINTS",
): ParseEffect<TierHeader> =>
  Effect.gen(function* () {
    const group = yield* parsePropertyGroup(cursor, "tier header")
    const name = yield* stringProperty(group, "name")
    const xmin = yield* numberProperty(group, "xmin")
    const xmax = yield* numberProperty(group, "xmax")

    yield* cursor.expect(itemKeyword)
    yield* cursor.expect(":")
    yield* cursor.expect("SIZE")
    yield* cursor.expect("=")
    const size = yield* cursor.expectInteger()

    return { name, xmin, xmax, size }
  })

const parseTier = (cursor: TokenCursor): ParseEffect<readonly [Tier, TierHeader]> =>
  Effect.gen(function* () {
    yield* parseIndexedHeader(cursor, "ITEM")
    yield* cursor.expect("CLASS")
    yield* cursor.expect("=")
    const tag = yield* cursor.expect("TAG_INTERVAL", "TAG_TEXT")

    if (tag.type === "TAG_INTERVAL") {
      const header = yield* parseTierHeader(cursor, "INTERVALS")
      const intervals: Interval[] = []
      while (cursor.peekIs("INTERVALS")) {
        intervals.push(yield* parseInterval(cursor))
      }
      return [makeIntervalTier(header.name, intervals), header] as const
    }

    const header = yield* parseTierHeader(cursor, "POINTS")
    const points: Point[] = []
    while (cursor.peekIs("POINTS")) {
      points.push(yield* parsePoint(cursor))
    }
    return [makeTextTier(header.name, points), header] as const
  })

// ============================================================================
// Document
// ============================================================================

/**
 * Parse full-dialect tokens into tiers and the headers that describe them.
 */
export const parseFullTextGrid = (tokens: ReadonlyArray<Token>): ParseEffect<ParsedTextGrid> =>
  Effect.gen(function* () {
    const cursor = new TokenCursor(tokens)
    const header = yield* parseTextGridHeader(cursor)

    yield* cursor.expect("ITEM")
    yield* cursor.expect("[")
    yield* cursor.expect("]")
    yield* cursor.expect(":")

    const tiers: Tier[] = []
    const tierHeaders: TierHeader[] = []
    while (cursor.peekIs("ITEM")) {
      const [tier, tierHeader] = yield* parseTier(cursor)
      tiers.push(tier)
      tierHeaders.push(tierHeader)
    }

    yield* cursor.expectEnd()

    return { header, tiers, tierHeaders }
  })
