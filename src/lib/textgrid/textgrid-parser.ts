/**
 * TextGrid parsing entry points
 *
 * Pipeline: resolve input -> read text -> tokenize -> dialect grammar ->
 * optional consistency check -> tiers in file order.
 *
 * ## Usage
 *
 * ```ts
 * const tiers = yield* parseTextGrid(TextGridInput.Path({ path: "speech.TextGrid" }))
 * const quick = yield* parseTextGridText(source, { dialect: "minimal", checkConsistency: false })
 * ```
 *
 * Options are passed per call; nothing is kept between calls.
 */

import { TextGridConfig } from "@/services/textgrid-config"
import { Effect } from "effect"
import { checkConsistency } from "./consistency"
import { parseFullTextGrid } from "./full-parser"
import { type Token, tokenize } from "./lexer"
import { parseMinimalTextGrid } from "./minimal-parser"
import {
  type TextGridError,
  type TextGridParseError,
  type TextGridSyntaxError,
  type TextGridUnsupportedDialectError,
  makeUnsupportedDialectError,
} from "./textgrid-errors"
import { formatErrorForLog, textgridLog, textgridWarn } from "./textgrid-log"
import { type TextGridInput, readTextGridSource, resolveTextGridInput } from "./textgrid-source"
import { type ParsedTextGrid, type TextGridDialect, type Tier, isTextGridDialect } from "./types"

export interface ParseTextGridOptions {
  /** Encoding of the document, "full" when omitted */
  readonly dialect?: TextGridDialect | undefined
  /** Validate header metadata against the parsed tiers, on when omitted */
  readonly checkConsistency?: boolean | undefined
}

const DEFAULT_DIALECT: TextGridDialect = "full"

const grammars: Record<
  TextGridDialect,
  (tokens: ReadonlyArray<Token>) => Effect.Effect<ParsedTextGrid, TextGridSyntaxError>
> = {
  full: parseFullTextGrid,
  minimal: parseMinimalTextGrid,
}

/** Options may come from untyped callers, so the dialect is checked at runtime */
const resolveDialect = (
  dialect: unknown,
): Effect.Effect<TextGridDialect, TextGridUnsupportedDialectError> =>
  isTextGridDialect(dialect)
    ? Effect.succeed(dialect)
    : Effect.fail(makeUnsupportedDialectError(String(dialect)))

const warnOnAbsentTiers = (parsed: ParsedTextGrid): Effect.Effect<void> =>
  Effect.sync(() => {
    if (parsed.header.hasTiers === false && parsed.tiers.length > 0) {
      textgridWarn("header", "Header declares no tiers but the file contains some", {
        tiers: parsed.tiers.length,
      })
    }
  })

/**
 * Parse a TextGrid document held in a string.
 */
export const parseTextGridText = (
  text: string,
  options: ParseTextGridOptions = {},
): Effect.Effect<ReadonlyArray<Tier>, TextGridParseError | TextGridUnsupportedDialectError> =>
  Effect.gen(function* () {
    const dialect = yield* resolveDialect(options.dialect ?? DEFAULT_DIALECT)
    const shouldCheck = options.checkConsistency ?? true

    const tokens = yield* tokenize(text, dialect)
    const parsed = yield* grammars[dialect](tokens)
    yield* warnOnAbsentTiers(parsed)

    if (shouldCheck) {
      yield* checkConsistency(parsed)
    }

    yield* Effect.sync(() =>
      textgridLog("parse", `Parsed ${parsed.tiers.length} tiers`, {
        dialect,
        checkConsistency: shouldCheck,
        tokens: tokens.length,
      }),
    )

    return parsed.tiers
  })

/**
 * Parse a TextGrid from a path, stream, bytes or string.
 *
 * The input representation and the dialect are validated before anything is
 * read. A bare string is the document itself, not a path.
 */
export const parseTextGrid = (
  input: TextGridInput | string,
  options: ParseTextGridOptions = {},
): Effect.Effect<ReadonlyArray<Tier>, TextGridError> =>
  Effect.gen(function* () {
    const source = yield* resolveTextGridInput(input)
    const dialect = yield* resolveDialect(options.dialect ?? DEFAULT_DIALECT)
    const text = yield* readTextGridSource(source)
    return yield* parseTextGridText(text, { ...options, dialect })
  }).pipe(
    Effect.tapError(error =>
      Effect.sync(() => textgridLog("parse", `Failed: ${formatErrorForLog(error)}`)),
    ),
  )

/**
 * Same as parseTextGrid, with dialect and checking defaults taken from
 * TextGridConfig instead of the built-in ones.
 */
export const parseTextGridWithConfig = (
  input: TextGridInput | string,
  overrides: ParseTextGridOptions = {},
): Effect.Effect<ReadonlyArray<Tier>, TextGridError, TextGridConfig> =>
  Effect.gen(function* () {
    const config = yield* TextGridConfig
    return yield* parseTextGrid(input, {
      dialect: overrides.dialect ?? config.dialect,
      checkConsistency: overrides.checkConsistency ?? config.checkConsistency,
    })
  })

export async function parseTextGridAsync(
  input: TextGridInput | string,
  options: ParseTextGridOptions = {},
): Promise<ReadonlyArray<Tier>> {
  return Effect.runPromise(parseTextGrid(input, options))
}
