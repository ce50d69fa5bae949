/**
 * Parser module: one recursive-descent parser per file, built as a chain
 * (base → types → services → structs and enums → file).
 */
import { IdlLexer } from '../lexer/index.js';
import { IdlParser } from './parser.js';
import type { IdGenerator } from '../ast/arena.js';
import type { SourceFile } from '../ast/nodes.js';
import type { LexerError, ParseError } from '../errors/index.js';

export { IdlParser, type ParseResult } from './parser.js';
export type { ParserOptions } from './base.js';

export interface SourceParseResult {
  file: SourceFile;
  /** Lexer errors first, then parser errors */
  errors: Array<LexerError | ParseError>;
}

/**
 * Lex and parse one source text
 */
export function parse(source: string, filePath?: string, ids?: IdGenerator): SourceParseResult {
  const lexed = new IdlLexer(source, filePath).tokenize();
  const parsed = new IdlParser(lexed.tokens, { filePath, source, ids }).parse();
  return { file: parsed.file, errors: [...lexed.errors, ...parsed.errors] };
}
