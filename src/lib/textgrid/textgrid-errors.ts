/**
 * TextGrid error types using Effect.ts tagged errors
 *
 * Every error carries structured fields for programmatic handling plus a
 * readable `message`. Build them through the `make*` helpers so the message
 * always matches the fields.
 */

import { Data } from "effect"
import type { Token } from "./lexer"

export class TextGridLexicalError extends Data.TaggedError("TextGridLexicalError")<{
  readonly character: string
  readonly offset: number
  readonly line: number
  readonly message: string
}> {}

export class TextGridSyntaxError extends Data.TaggedError("TextGridSyntaxError")<{
  /** Token found where `expected` was required; undefined at end of input */
  readonly token: Token | undefined
  readonly expected: string
  readonly message: string
}> {}

export type ConsistencyCheck = "tierCount" | "documentBounds" | "itemCount" | "tierBounds"

export class TextGridConsistencyError extends Data.TaggedError("TextGridConsistencyError")<{
  readonly check: ConsistencyCheck
  readonly tierName?: string | undefined
  readonly field: "size" | "xmin" | "xmax"
  readonly declared?: number | undefined
  readonly found?: number | undefined
  readonly message: string
}> {}

export class TextGridUnsupportedInputError extends Data.TaggedError(
  "TextGridUnsupportedInputError",
)<{
  readonly received: string
  readonly message: string
}> {}

export class TextGridUnsupportedDialectError extends Data.TaggedError(
  "TextGridUnsupportedDialectError",
)<{
  readonly dialect: string
  readonly message: string
}> {}

export class TextGridReadError extends Data.TaggedError("TextGridReadError")<{
  readonly source: string
  readonly cause: unknown
  readonly message: string
}> {}

export type TextGridParseError =
  | TextGridLexicalError
  | TextGridSyntaxError
  | TextGridConsistencyError

export type TextGridError =
  | TextGridParseError
  | TextGridUnsupportedInputError
  | TextGridUnsupportedDialectError
  | TextGridReadError

// ============================================================================
// Constructors
// ============================================================================

export function makeLexicalError(character: string, offset: number, line: number) {
  return new TextGridLexicalError({
    character,
    offset,
    line,
    message: `Illegal character ${JSON.stringify(character)} at line ${line}, offset ${offset}`,
  })
}

export function describeToken(token: Token): string {
  return `${token.type} ${JSON.stringify(token.value)} at line ${token.line}, offset ${token.offset}`
}

export function makeSyntaxError(token: Token | undefined, expected: string) {
  const found = token ? `Unexpected ${describeToken(token)}` : "Unexpected end of input"
  return new TextGridSyntaxError({
    token,
    expected,
    message: `${found}: expected ${expected}`,
  })
}

export function makeUnsupportedInputError(received: string) {
  return new TextGridUnsupportedInputError({
    received,
    message: `Unsupported TextGrid input: ${received}`,
  })
}

export function makeUnsupportedDialectError(dialect: string) {
  return new TextGridUnsupportedDialectError({
    dialect,
    message: `Unsupported TextGrid dialect ${JSON.stringify(dialect)}: expected "full" or "minimal"`,
  })
}

export function makeReadError(source: string, cause: unknown) {
  const reason = cause instanceof Error ? cause.message : String(cause)
  return new TextGridReadError({
    source,
    cause,
    message: `Could not read TextGrid from ${source}: ${reason}`,
  })
}
