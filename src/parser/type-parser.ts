import { IdlTokenType, type Token } from '../lexer/tokens.js';
import { IdlParserBase } from './base.js';
import { COMPILER_DEFAULTS, isPrimitiveName, isReservedWord } from '../config/constants.js';
import type { Annotation, TypeExpr } from '../ast/nodes.js';

/**
 * Type expressions, annotations and the small literal productions shared by
 * every declaration parser.
 */
export class TypeParser extends IdlParserBase {
  // ============================================
  // Types
  // ============================================

  protected isTypeStart(token: Token = this.peek()): boolean {
    return (
      token.type === IdlTokenType.IDENTIFIER ||
      token.type === IdlTokenType.MAP ||
      token.type === IdlTokenType.ARRAY ||
      token.type === IdlTokenType.OPTIONAL
    );
  }

  protected parseType(): TypeExpr {
    const start = this.peek();
    const position = this.position(start);

    if (this.check(IdlTokenType.STREAM)) {
      throw this.error('Streaming types are only allowed as method parameters or return values');
    }

    if (this.match(IdlTokenType.MAP)) {
      this.consume(IdlTokenType.LT, "Expected '<' after 'map'");
      const key = this.parseType();
      this.consume(IdlTokenType.COMMA, "Expected ',' between map key and value types");
      const value = this.parseType();
      this.consume(IdlTokenType.GT, "Expected '>' to close map type");
      return { kind: 'map', key, value, position };
    }

    if (this.match(IdlTokenType.ARRAY)) {
      this.consume(IdlTokenType.LT, "Expected '<' after 'array'");
      const element = this.parseType();
      this.consume(IdlTokenType.GT, "Expected '>' to close array type");
      return { kind: 'array', element, position };
    }

    if (this.match(IdlTokenType.OPTIONAL)) {
      this.consume(IdlTokenType.LT, "Expected '<' after 'optional'");
      const inner = this.parseType();
      this.consume(IdlTokenType.GT, "Expected '>' to close optional type");
      return { kind: 'optional', inner, position };
    }

    const first = this.consume(IdlTokenType.IDENTIFIER, 'Expected a type');

    if (isPrimitiveName(first.value) && !this.check(IdlTokenType.DOT)) {
      return { kind: 'primitive', name: first.value, position };
    }

    const components = [first.value];
    while (this.match(IdlTokenType.DOT)) {
      components.push(this.consume(IdlTokenType.IDENTIFIER, "Expected a name after '.'").value);
    }

    const name = components.join('.');
    if (components.length === 1) {
      return { kind: 'simpleUser', id: this.ids.next(), name, position };
    }
    return { kind: 'qualifiedUser', id: this.ids.next(), name, components, position };
  }

  /**
   * `stream T` or a plain type, for method parameters and return values
   */
  protected parseSignatureType(): TypeExpr {
    if (this.check(IdlTokenType.STREAM)) {
      const streamToken = this.advance();
      const inner = this.parseType();
      return { kind: 'streaming', inner, position: this.position(streamToken) };
    }
    return this.parseType();
  }

  // ============================================
  // Annotations
  // ============================================

  protected parseAnnotations(): Annotation[] {
    const annotations: Annotation[] = [];
    while (this.check(IdlTokenType.AT)) {
      annotations.push(this.parseAnnotation());
    }
    return annotations;
  }

  private parseAnnotation(): Annotation {
    const at = this.consume(IdlTokenType.AT, "Expected '@'");
    const name = this.consumeWord("Expected annotation name after '@'").value;
    const args: Array<string | number> = [];

    if (this.match(IdlTokenType.LPAREN)) {
      if (!this.check(IdlTokenType.RPAREN)) {
        do {
          args.push(this.parseAnnotationArgument());
        } while (this.match(IdlTokenType.COMMA));
      }
      this.consume(IdlTokenType.RPAREN, "Expected ')' after annotation arguments");
    }

    return { name, arguments: args, position: this.position(at) };
  }

  private parseAnnotationArgument(): string | number {
    if (this.check(IdlTokenType.STRING)) {
      return this.advance().value;
    }
    if (this.check(IdlTokenType.NUMBER)) {
      return this.parseInteger('annotation argument');
    }
    throw this.error('Annotation arguments must be string or number literals');
  }

  // ============================================
  // Literals and names
  // ============================================

  /**
   * Decimal or hex literal as a signed 32-bit integer
   */
  protected parseInteger(what: string): number {
    const token = this.consume(IdlTokenType.NUMBER, `Expected ${what}`);
    const value = Number(token.value);

    if (!Number.isSafeInteger(value) || value > COMPILER_DEFAULTS.MAX_INDEX) {
      throw this.error(`${capitalize(what)} '${token.value}' is out of range for a 32-bit integer`, token);
    }
    return value;
  }

  /**
   * Field, union member and enum option names. A reserved word is reported
   * but the name is still returned so the production can finish.
   */
  protected consumeName(what: string): Token {
    const token = this.consumeWord(`Expected ${what} name`);
    if (isReservedWord(token.value)) {
      this.report(
        this.error(`'${token.value}' is a reserved keyword and cannot be used as a ${what} name`, token)
      );
    }
    return token;
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
