/**
 * Praat TextGrid parsing: full and minimal dialects, optional consistency
 * checking of header metadata.
 */

// Types
export type {
  Interval,
  IntervalTier,
  ParsedTextGrid,
  Point,
  TextGridDialect,
  TextGridHeader,
  TextTier,
  Tier,
  TierBounds,
  TierHeader,
} from "./types"

export {
  TEXTGRID_DIALECTS,
  isIntervalTier,
  isTextGridDialect,
  isTextTier,
  makeIntervalTier,
  makeTextTier,
  tierBounds,
  tierItemCount,
} from "./types"

// Errors
export type { ConsistencyCheck, TextGridError, TextGridParseError } from "./textgrid-errors"

export {
  TextGridConsistencyError,
  TextGridLexicalError,
  TextGridReadError,
  TextGridSyntaxError,
  TextGridUnsupportedDialectError,
  TextGridUnsupportedInputError,
} from "./textgrid-errors"

// Pipeline stages
export type { KeywordType, Token, TokenType } from "./lexer"
export { FULL_KEYWORDS, tokenize } from "./lexer"
export { TokenCursor } from "./token-cursor"
export { parseFullTextGrid } from "./full-parser"
export { parseMinimalTextGrid } from "./minimal-parser"
export { checkConsistency } from "./consistency"

// Sources
export {
  TextGridInput,
  decodeTextGridBytes,
  readTextGridSource,
  resolveTextGridInput,
} from "./textgrid-source"

// Entry points
export type { ParseTextGridOptions } from "./textgrid-parser"
export {
  parseTextGrid,
  parseTextGridAsync,
  parseTextGridText,
  parseTextGridWithConfig,
} from "./textgrid-parser"
