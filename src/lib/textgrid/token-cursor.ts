import { Effect } from "effect"
import type { Token, TokenType } from "./lexer"
import { makeSyntaxError, type TextGridSyntaxError } from "./textgrid-errors"

const NUMBER_TYPES: ReadonlyArray<TokenType> = ["INT", "FLOAT"]
const STRING_TYPES: ReadonlyArray<TokenType> = ["STRING", "TAG_INTERVAL", "TAG_TEXT"]

function describeExpected(types: ReadonlyArray<TokenType>): string {
  return types.join(" or ")
}

/**
 * Read position over a token stream.
 *
 * One cursor per parse call. The effects it returns advance the position when
 * they run, not when they are created.
 */
export class TokenCursor {
  private index = 0

  constructor(private readonly tokens: ReadonlyArray<Token>) {}

  peek(): Token | undefined {
    return this.tokens[this.index]
  }

  peekIs(...types: ReadonlyArray<TokenType>): boolean {
    const token = this.peek()
    return token !== undefined && types.includes(token.type)
  }

  /** True when the next token is an INT or FLOAT */
  peekIsNumber(): boolean {
    return this.peekIs(...NUMBER_TYPES)
  }

  /** Consume the next token, whatever its type */
  next(): Effect.Effect<Token, TextGridSyntaxError> {
    return Effect.suspend(() => {
      const token = this.peek()
      if (!token) return Effect.fail(makeSyntaxError(undefined, "more input"))
      this.index++
      return Effect.succeed(token)
    })
  }

  /** Consume the next token if it has one of `types`, fail otherwise */
  expect(...types: ReadonlyArray<TokenType>): Effect.Effect<Token, TextGridSyntaxError> {
    return Effect.suspend(() => {
      const token = this.peek()
      if (!token || !types.includes(token.type)) {
        return Effect.fail(makeSyntaxError(token, describeExpected(types)))
      }
      this.index++
      return Effect.succeed(token)
    })
  }

  /** Consume an INT or FLOAT and widen it to a float */
  expectNumber(): Effect.Effect<number, TextGridSyntaxError> {
    return this.expect(...NUMBER_TYPES).pipe(Effect.map(token => Number.parseFloat(token.value)))
  }

  /** Consume an INT */
  expectInteger(): Effect.Effect<number, TextGridSyntaxError> {
    return this.expect("INT").pipe(Effect.map(token => Number.parseInt(token.value, 10)))
  }

  /** Consume a string literal; tier tags count as their string value */
  expectString(): Effect.Effect<string, TextGridSyntaxError> {
    return this.expect(...STRING_TYPES).pipe(Effect.map(token => token.value))
  }

  expectEnd(): Effect.Effect<void, TextGridSyntaxError> {
    return Effect.suspend(() => {
      const token = this.peek()
      return token ? Effect.fail(makeSyntaxError(token, "end of input")) : Effect.void
    })
  }
}

export function isNumberToken(token: Token): boolean {
  return NUMBER_TYPES.includes(token.type)
}

export function isStringToken(token: Token): boolean {
  return STRING_TYPES.includes(token.type)
}
