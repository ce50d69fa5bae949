/**
 * Lexer module: turns IDL source text into a flat token stream.
 */
export { IdlLexer, tokenize, type LexResult } from './lexer.js';
export {
  IdlTokenType,
  IDL_KEYWORDS,
  PUNCTUATION,
  isKeywordToken,
  type Token,
} from './tokens.js';
