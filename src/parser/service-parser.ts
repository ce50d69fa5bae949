import { IdlTokenType } from '../lexer/tokens.js';
import { TypeParser } from './type-parser.js';
import type {
  Annotation,
  MethodDeclaration,
  MethodParam,
  MethodReturn,
  NodeId,
  Position,
  ServiceDeclaration,
} from '../ast/nodes.js';

export class ServiceParser extends TypeParser {
  // ============================================
  // Service definition
  // ============================================

  protected parseService(annotations: Annotation[], comments: string[]): ServiceDeclaration {
    const keyword = this.consume(IdlTokenType.SERVICE, "Expected 'service'");
    const name = this.consumeWord('Expected service name').value;
    const id = this.ids.next();
    const position = this.position(keyword);

    this.consume(IdlTokenType.LBRACE, `Expected '{' after service '${name}'`);

    const methods: MethodDeclaration[] = [];
    while (!this.check(IdlTokenType.RBRACE) && !this.isAtEnd()) {
      const start = this.pos;
      try {
        methods.push(this.parseMethod(id, position));
      } catch (err) {
        this.recover(err, start);
      }
    }

    this.closeBlock(`service '${name}'`);

    return {
      type: 'Service',
      id,
      name,
      methods,
      position,
      blocks: [position],
      fileId: this.fileId,
      annotations,
      comments,
    };
  }

  // ============================================
  // Methods
  // ============================================

  private parseMethod(serviceId: NodeId, blockPosition: Position): MethodDeclaration {
    const first = this.peek();
    const annotations = this.parseAnnotations();
    const comments = this.docComments(first);

    const nameToken = this.consumeWord('Expected method name');
    this.consume(IdlTokenType.LPAREN, `Expected '(' after method name '${nameToken.value}'`);

    const params: MethodParam[] = [];
    if (!this.check(IdlTokenType.RPAREN)) {
      do {
        params.push(this.parseParam());
      } while (this.match(IdlTokenType.COMMA));
    }
    this.consume(IdlTokenType.RPAREN, "Expected ')' after method parameters");

    const returns: MethodReturn[] = [];
    if (this.match(IdlTokenType.ARROW)) {
      if (this.match(IdlTokenType.LPAREN)) {
        do {
          returns.push(this.parseReturn());
        } while (this.match(IdlTokenType.COMMA));
        this.consume(IdlTokenType.RPAREN, "Expected ')' after return types");
      } else {
        returns.push(this.parseReturn());
      }
    }

    this.consume(IdlTokenType.SEMICOLON, "Expected ';' after method signature");

    return {
      type: 'Method',
      id: this.ids.next(),
      name: nameToken.value,
      params,
      returns,
      position: this.position(nameToken),
      serviceId,
      blockPosition,
      annotations,
      comments,
    };
  }

  /**
   * `stream T`, `name T` or a bare `T`. An identifier followed by another
   * type-starting token is a parameter name.
   */
  private parseParam(): MethodParam {
    const start = this.peek();
    const position = this.position(start);

    if (this.check(IdlTokenType.IDENTIFIER) && this.isTypeStart(this.peekNext())) {
      const name = this.advance().value;
      return { name, valueType: this.parseType(), position };
    }

    return { valueType: this.parseSignatureType(), position };
  }

  private parseReturn(): MethodReturn {
    const start = this.peek();

    if (this.check(IdlTokenType.IDENTIFIER) && this.isTypeStart(this.peekNext())) {
      this.report(this.error('Method return values cannot be named', start));
      this.advance();
    }

    return { valueType: this.parseSignatureType(), position: this.position(start) };
  }
}
