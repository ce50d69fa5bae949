import { IdlTokenType, isKeywordToken, type Token } from '../lexer/tokens.js';
import { ParseError, type ErrorContext } from '../errors/index.js';
import { IdGenerator } from '../ast/arena.js';
import type { NodeId, Position } from '../ast/nodes.js';

export interface ParserOptions {
  filePath?: string;
  source?: string;
  /** Shared id generator; pass the same one for every file of a program */
  ids?: IdGenerator;
}

export class IdlParserBase {
  protected tokens: Token[];
  protected pos = 0;
  protected source?: string;
  protected filePath?: string;
  protected ids: IdGenerator;
  /** Id of the file being parsed, owner of its top-level declarations */
  protected readonly fileId: NodeId;
  protected errors: ParseError[] = [];

  private comments: Token[];
  private codeLines: Set<number>;

  constructor(tokens: Token[], options: ParserOptions = {}) {
    this.comments = tokens.filter((t) => t.type === IdlTokenType.COMMENT);
    this.tokens = tokens.filter((t) => t.type !== IdlTokenType.COMMENT);

    const last = this.tokens[this.tokens.length - 1];
    if (!last || last.type !== IdlTokenType.EOF) {
      this.tokens.push({
        type: IdlTokenType.EOF,
        value: '',
        line: last?.line ?? 1,
        column: last ? last.column + last.value.length : 1,
      });
    }

    this.codeLines = new Set(
      this.tokens.filter((t) => t.type !== IdlTokenType.EOF).map((t) => t.line)
    );
    this.source = options.source;
    this.filePath = options.filePath;
    this.ids = options.ids ?? new IdGenerator();
    this.fileId = this.ids.next();
  }

  protected peek(): Token {
    return this.tokens[this.pos];
  }

  protected peekNext(): Token {
    return this.tokens[Math.min(this.pos + 1, this.tokens.length - 1)];
  }

  protected check(type: IdlTokenType): boolean {
    return !this.isAtEnd() && this.peek().type === type;
  }

  protected checkAny(...types: IdlTokenType[]): boolean {
    return types.some((t) => this.check(t));
  }

  protected match(type: IdlTokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  protected advance(): Token {
    if (!this.isAtEnd()) this.pos++;
    return this.tokens[this.pos - 1];
  }

  protected consume(type: IdlTokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw this.error(message);
  }

  /**
   * Consume a name. Keywords are accepted so that naming rules can report
   * them as reserved words instead of failing with a syntax error.
   */
  protected consumeWord(message: string): Token {
    if (this.checkWord()) return this.advance();
    throw this.error(message);
  }

  protected checkWord(): boolean {
    const type = this.peek().type;
    return type === IdlTokenType.IDENTIFIER || isKeywordToken(type);
  }

  protected isAtEnd(): boolean {
    return this.peek().type === IdlTokenType.EOF;
  }

  protected position(token: Token): Position {
    return { line: token.line, column: token.column };
  }

  protected error(message: string, token: Token = this.peek()): ParseError {
    const context: ErrorContext = { source: this.source, filePath: this.filePath };
    const found = token.type === IdlTokenType.EOF ? 'end of file' : token.value;
    return new ParseError(message, { line: token.line, column: token.column }, context, found);
  }

  /**
   * Record an error without unwinding the current production
   */
  protected report(error: ParseError): void {
    this.errors.push(error);
  }

  /**
   * Record a thrown parse error and skip ahead to a point where parsing can
   * resume. `start` is the position the failed production began at; if the
   * skip made no progress one token is dropped so the caller's loop advances.
   */
  protected recover(err: unknown, start: number): void {
    if (!(err instanceof ParseError)) throw err;
    this.report(err);
    this.synchronize(start);
    if (this.pos === start && !this.isAtEnd()) {
      this.advance();
    }
  }

  /**
   * Panic-mode skip: stop after the next ';', before a '}', or at the first
   * token on a later line. The line is that of the last token the failed
   * production consumed, so a statement that already starts on the next line
   * is left for the caller.
   */
  protected synchronize(start: number = this.pos): void {
    const line = this.pos > start ? this.tokens[this.pos - 1].line : this.peek().line;
    while (!this.isAtEnd() && this.peek().line === line) {
      if (this.check(IdlTokenType.SEMICOLON)) {
        this.advance();
        return;
      }
      if (this.check(IdlTokenType.RBRACE)) return;
      this.advance();
    }
  }

  /**
   * Comment lines immediately above `token`: a contiguous run with no blank
   * line in between, each comment alone on its line.
   */
  protected docComments(token: Token): string[] {
    const lines: string[] = [];
    let expected = token.line - 1;

    for (let i = this.comments.length - 1; i >= 0; i--) {
      const comment = this.comments[i];
      if (comment.line > expected) continue;
      if (comment.line < expected || this.codeLines.has(comment.line)) break;
      lines.unshift(comment.value.replace(/^ /, ''));
      expected--;
    }

    return lines;
  }

  /**
   * Close a `{ ... }` body. A missing brace is reported rather than thrown so
   * the declaration parsed so far is kept.
   */
  protected closeBlock(what: string): void {
    if (!this.match(IdlTokenType.RBRACE)) {
      this.report(this.error(`Expected '}' to close ${what}`));
    }
  }
}
