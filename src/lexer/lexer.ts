import { LexerError } from '../errors/index.js';
import { IDL_KEYWORDS, IdlTokenType, PUNCTUATION, type Token } from './tokens.js';

export interface LexResult {
  tokens: Token[];
  errors: LexerError[];
}

/**
 * Hand-written scanner for IDL source text.
 *
 * The lexer never throws on bad input: unexpected characters are reported
 * and skipped, unterminated strings run to end of input, and malformed
 * numbers are reported with the longest valid prefix kept as the token.
 */
export class IdlLexer {
  private source: string;
  private filePath?: string;
  private pos = 0;
  private line = 1;
  private column = 1;
  private tokens: Token[] = [];
  private errors: LexerError[] = [];

  constructor(source: string, filePath?: string) {
    this.source = source;
    this.filePath = filePath;
  }

  tokenize(): LexResult {
    this.pos = 0;
    this.line = 1;
    this.column = 1;
    this.tokens = [];
    this.errors = [];

    while (!this.isAtEnd()) {
      this.scanToken();
    }

    this.tokens.push({ type: IdlTokenType.EOF, value: '', line: this.line, column: this.column });
    return { tokens: this.tokens, errors: this.errors };
  }

  private scanToken(): void {
    const char = this.peek();

    if (char === ' ' || char === '\t' || char === '\r' || char === '\n') {
      this.advance();
      return;
    }

    if (char === '#') {
      this.readComment();
      return;
    }

    if (char === '"' || char === "'") {
      this.readString(char);
      return;
    }

    if (char === '-') {
      this.readArrow();
      return;
    }

    if (this.isDigit(char)) {
      this.readNumber();
      return;
    }

    if (this.isAlpha(char)) {
      this.readIdentifier();
      return;
    }

    const punctuation = PUNCTUATION[char];
    if (punctuation) {
      this.push(punctuation, char, this.line, this.column);
      this.advance();
      return;
    }

    this.error(`Unexpected character '${char}'`, this.line, this.column);
    this.advance();
  }

  private readComment(): void {
    const line = this.line;
    const column = this.column;
    this.advance(); // consume '#'

    let value = '';
    while (!this.isAtEnd() && this.peek() !== '\n') {
      value += this.advance();
    }

    this.push(IdlTokenType.COMMENT, value.replace(/\r$/, ''), line, column);
  }

  private readString(quote: string): void {
    const line = this.line;
    const column = this.column;
    this.advance(); // consume opening quote

    let value = '';
    let terminated = false;

    while (!this.isAtEnd()) {
      const char = this.peek();

      if (char === quote) {
        this.advance();
        terminated = true;
        break;
      }

      if (char === '\n') {
        this.error('Invalid line break in string', this.line, this.column);
        this.advance();
        continue;
      }

      if (char === '\\') {
        this.advance();
        if (this.isAtEnd()) break;
        const escaped = this.advance();
        switch (escaped) {
          case 'n':
            value += '\n';
            break;
          case 't':
            value += '\t';
            break;
          default:
            // Covers \\, \" and \' as well as unknown escapes
            value += escaped;
        }
        continue;
      }

      value += this.advance();
    }

    if (!terminated) {
      this.error('Unterminated string', line, column);
    }

    this.push(IdlTokenType.STRING, value, line, column);
  }

  private readArrow(): void {
    const line = this.line;
    const column = this.column;
    this.advance(); // consume '-'

    if (this.peek() === '>') {
      this.advance();
      this.push(IdlTokenType.ARROW, '->', line, column);
      return;
    }

    this.error("Unexpected character '-'", line, column);
  }

  private readNumber(): void {
    const line = this.line;
    const column = this.column;
    let value = '';

    if (this.peek() === '0' && (this.peekNext() === 'x' || this.peekNext() === 'X')) {
      value += this.advance();
      value += this.advance();
      let digits = '';
      while (this.isHexDigit(this.peek())) {
        digits += this.advance();
      }

      if (digits === '') {
        this.error(`Malformed hex literal '${value}'`, line, column);
        this.push(IdlTokenType.NUMBER, '0', line, column);
        return;
      }
      value += digits;
    } else {
      while (this.isDigit(this.peek())) {
        value += this.advance();
      }
    }

    if (this.isAlpha(this.peek())) {
      let rest = '';
      while (this.isAlphaNumeric(this.peek())) {
        rest += this.advance();
      }
      this.error(`Malformed number literal '${value}${rest}'`, line, column);
    }

    this.push(IdlTokenType.NUMBER, value, line, column);
  }

  private readIdentifier(): void {
    const line = this.line;
    const column = this.column;
    let value = '';

    while (this.isAlphaNumeric(this.peek())) {
      value += this.advance();
    }

    const type = Object.prototype.hasOwnProperty.call(IDL_KEYWORDS, value)
      ? IDL_KEYWORDS[value]
      : IdlTokenType.IDENTIFIER;
    this.push(type, value, line, column);
  }

  private push(type: IdlTokenType, value: string, line: number, column: number): void {
    this.tokens.push({ type, value, line, column });
  }

  private error(message: string, line: number, column: number): void {
    this.errors.push(new LexerError(message, { line, column }, { source: this.source, filePath: this.filePath }));
  }

  // Characters are read by code point, so columns count characters rather
  // than UTF-16 units.
  private peek(): string {
    return this.charAt(this.pos);
  }

  private peekNext(): string {
    return this.charAt(this.pos + this.peek().length);
  }

  private charAt(pos: number): string {
    const code = this.source.codePointAt(pos);
    return code === undefined ? '\0' : String.fromCodePoint(code);
  }

  private advance(): string {
    const char = this.peek();
    this.pos += char.length;
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isHexDigit(char: string): boolean {
    return this.isDigit(char) || (char >= 'a' && char <= 'f') || (char >= 'A' && char <= 'F');
  }

  private isAlpha(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_';
  }

  private isAlphaNumeric(char: string): boolean {
    return this.isAlpha(char) || this.isDigit(char);
  }
}

export function tokenize(source: string, filePath?: string): LexResult {
  return new IdlLexer(source, filePath).tokenize();
}
