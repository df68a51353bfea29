/**
 * TextGrid lexer
 *
 * Turns a decoded TextGrid document into positioned tokens. Both dialects
 * share the numeric, string and structural rules; only the full dialect maps
 * identifiers to keywords.
 */

import { Effect } from "effect"
import { makeLexicalError, type TextGridLexicalError } from "./textgrid-errors"
import type { TextGridDialect } from "./types"

export type KeywordType = "SIZE" | "INTERVALS" | "POINTS" | "CLASS" | "ITEM" | "TIERS_EXIST"

export type StructuralType = "=" | ":" | "[" | "]" | "<" | ">"

export type TokenType =
  | "FLOAT"
  | "INT"
  | "STRING"
  | "IDENTIFIER"
  | "TAG_INTERVAL"
  | "TAG_TEXT"
  | KeywordType
  | StructuralType

export interface Token {
  readonly type: TokenType
  /** Source text of the token: quotes stripped for strings, trimmed for identifiers */
  readonly value: string
  /** Byte offset of the token in the UTF-8 encoding of the document */
  readonly offset: number
  /** 1-based line number */
  readonly line: number
}

/**
 * Identifier spellings that the full dialect treats as keywords.
 * Anything else stays an IDENTIFIER.
 */
export const FULL_KEYWORDS: ReadonlyMap<string, KeywordType> = new Map<string, KeywordType>([
  ["size", "SIZE"],
  ["intervals", "INTERVALS"],
  ["points", "POINTS"],
  ["class", "CLASS"],
  ["item", "ITEM"],
  ["tiers?", "TIERS_EXIST"],
])

const TIER_TAGS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
  ["IntervalTier", "TAG_INTERVAL"],
  ["TextTier", "TAG_TEXT"],
])

const STRUCTURAL: ReadonlyArray<StructuralType> = ["=", ":", "[", "]", "<", ">"]

function isStructural(char: string): char is StructuralType {
  return STRUCTURAL.some(literal => literal === char)
}

const NEWLINES = /(?:\r\n|\r|\n)+/y
const LINE_BREAK = /\r\n|\r|\n/g
const WHITESPACE = /[ \t\f\v\uFEFF]+/y
// FLOAT is tried before INT so "2.3" never splits into INT "2" and garbage
const FLOAT = /-?\d+(?:\.\d+(?:[eE][-+]?\d+)?|[eE][-+]?\d+)/y
const INT = /-?\d+/y
const STRING = /"([^"]*)"/y
const IDENTIFIER = /\p{L}[\p{L} ]*\??/uy

function matchAt(pattern: RegExp, text: string, offset: number): RegExpExecArray | null {
  pattern.lastIndex = offset
  return pattern.exec(text)
}

function countLineBreaks(text: string): number {
  return text.match(LINE_BREAK)?.length ?? 0
}

/** The whole code point at index, so astral characters are not split */
function codePointAt(text: string, index: number): string {
  const codePoint = text.codePointAt(index)
  return codePoint === undefined ? "" : String.fromCodePoint(codePoint)
}

function identifierType(word: string, dialect: TextGridDialect): TokenType {
  if (dialect === "minimal") return "IDENTIFIER"
  return FULL_KEYWORDS.get(word) ?? "IDENTIFIER"
}

/**
 * Tokenize a whole TextGrid document.
 *
 * Fails with TextGridLexicalError on the first character no rule accepts.
 */
export const tokenize = (
  text: string,
  dialect: TextGridDialect,
): Effect.Effect<ReadonlyArray<Token>, TextGridLexicalError> =>
  Effect.suspend(() => {
    const tokens: Token[] = []
    // index walks the string; offset counts UTF-8 bytes for positions
    let index = 0
    let offset = 0
    let line = 1

    const push = (type: TokenType, value: string) => {
      tokens.push({ type, value, offset, line })
    }

    const advance = (lexeme: string) => {
      index += lexeme.length
      offset += Buffer.byteLength(lexeme, "utf8")
    }

    while (index < text.length) {
      const newlines = matchAt(NEWLINES, text, index)
      if (newlines) {
        line += countLineBreaks(newlines[0])
        advance(newlines[0])
        continue
      }

      const whitespace = matchAt(WHITESPACE, text, index)
      if (whitespace) {
        advance(whitespace[0])
        continue
      }

      const float = matchAt(FLOAT, text, index)
      if (float) {
        push("FLOAT", float[0])
        advance(float[0])
        continue
      }

      const int = matchAt(INT, text, index)
      if (int) {
        push("INT", int[0])
        advance(int[0])
        continue
      }

      const string = matchAt(STRING, text, index)
      if (string) {
        const content = string[1] ?? ""
        push(TIER_TAGS.get(content) ?? "STRING", content)
        line += countLineBreaks(content)
        advance(string[0])
        continue
      }

      const char = text.charAt(index)
      if (isStructural(char)) {
        push(char, char)
        advance(char)
        continue
      }

      const identifier = matchAt(IDENTIFIER, text, index)
      if (identifier) {
        const word = identifier[0].trim()
        push(identifierType(word, dialect), word)
        advance(identifier[0])
        continue
      }

      return Effect.fail(makeLexicalError(codePointAt(text, index), offset, line))
    }

    return Effect.succeed(tokens)
  })
