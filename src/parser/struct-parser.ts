import { IdlTokenType } from '../lexer/tokens.js';
import { ServiceParser } from './service-parser.js';
import type {
  Annotation,
  EnumDeclaration,
  EnumOption,
  Field,
  NodeId,
  PlainField,
  StructDeclaration,
  UnionField,
} from '../ast/nodes.js';

export class StructParser extends ServiceParser {
  // ============================================
  // Structs
  // ============================================

  protected parseStruct(
    annotations: Annotation[],
    comments: string[],
    parentId?: NodeId
  ): StructDeclaration {
    const keyword = this.consume(IdlTokenType.STRUCT, "Expected 'struct'");
    const name = this.consumeWord('Expected struct name').value;
    this.consume(IdlTokenType.LBRACE, `Expected '{' after struct '${name}'`);

    const struct: StructDeclaration = {
      type: 'Struct',
      id: this.ids.next(),
      name,
      fields: [],
      structs: [],
      enums: [],
      position: this.position(keyword),
      parentId,
      fileId: this.fileId,
      annotations,
      comments,
    };

    while (!this.check(IdlTokenType.RBRACE) && !this.isAtEnd()) {
      const start = this.pos;
      try {
        this.parseStructMember(struct);
      } catch (err) {
        this.recover(err, start);
      }
    }

    this.closeBlock(`struct '${name}'`);
    return struct;
  }

  private parseStructMember(struct: StructDeclaration): void {
    const first = this.peek();
    const annotations = this.parseAnnotations();
    const comments = this.docComments(first);

    if (this.check(IdlTokenType.STRUCT)) {
      struct.structs.push(this.parseStruct(annotations, comments, struct.id));
    } else if (this.check(IdlTokenType.ENUM)) {
      struct.enums.push(this.parseEnum(annotations, comments, struct.id));
    } else if (this.check(IdlTokenType.UNION)) {
      struct.fields.push(this.parseUnion(annotations, comments, struct.id));
    } else if (this.check(IdlTokenType.SERVICE)) {
      this.report(this.error('Services cannot be declared inside a struct'));
      this.parseService([], []);
    } else {
      struct.fields.push(this.parsePlainField(annotations, comments, struct.id));
    }
  }

  // name Type = index;
  private parsePlainField(annotations: Annotation[], comments: string[], parentId: NodeId): PlainField {
    const nameToken = this.consumeName('field');
    const valueType = this.parseType();
    this.consume(IdlTokenType.EQUALS, `Expected '=' and an index after field '${nameToken.value}'`);
    const index = this.parseInteger('field index');
    this.consume(IdlTokenType.SEMICOLON, "Expected ';' after field declaration");

    return {
      type: 'PlainField',
      id: this.ids.next(),
      name: nameToken.value,
      valueType,
      index,
      position: this.position(nameToken),
      parentId,
      annotations,
      comments,
    };
  }

  // ============================================
  // Unions
  // ============================================

  private parseUnion(annotations: Annotation[], comments: string[], parentId: NodeId): UnionField {
    const keyword = this.consume(IdlTokenType.UNION, "Expected 'union'");
    const name = this.consumeName('union').value;
    this.consume(IdlTokenType.LBRACE, `Expected '{' after union '${name}'`);

    const members: PlainField[] = [];
    while (!this.check(IdlTokenType.RBRACE) && !this.isAtEnd()) {
      const start = this.pos;
      try {
        const first = this.peek();
        const memberAnnotations = this.parseAnnotations();
        const memberComments = this.docComments(first);

        if (this.isDeclarationStart()) {
          this.report(this.error(`Union '${name}' may only contain plain fields`));
          this.discardDeclaration();
        } else {
          members.push(this.parsePlainField(memberAnnotations, memberComments, parentId));
        }
      } catch (err) {
        this.recover(err, start);
      }
    }

    this.closeBlock(`union '${name}'`);

    return {
      type: 'UnionField',
      id: this.ids.next(),
      name,
      members,
      position: this.position(keyword),
      parentId,
      annotations,
      comments,
    };
  }

  // ============================================
  // Enums
  // ============================================

  protected parseEnum(annotations: Annotation[], comments: string[], parentId?: NodeId): EnumDeclaration {
    const keyword = this.consume(IdlTokenType.ENUM, "Expected 'enum'");
    const name = this.consumeWord('Expected enum name').value;
    this.consume(IdlTokenType.LBRACE, `Expected '{' after enum '${name}'`);

    const options: EnumOption[] = [];
    while (!this.check(IdlTokenType.RBRACE) && !this.isAtEnd()) {
      const start = this.pos;
      try {
        const first = this.peek();
        const optionAnnotations = this.parseAnnotations();
        const optionComments = this.docComments(first);

        if (this.isDeclarationStart()) {
          this.report(this.error(`Enum '${name}' cannot contain nested declarations`));
          this.discardDeclaration();
        } else {
          options.push(this.parseEnumOption(optionAnnotations, optionComments));
        }
      } catch (err) {
        this.recover(err, start);
      }
    }

    this.closeBlock(`enum '${name}'`);

    return {
      type: 'Enum',
      id: this.ids.next(),
      name,
      options,
      position: this.position(keyword),
      parentId,
      fileId: this.fileId,
      annotations,
      comments,
    };
  }

  // NAME = value;
  private parseEnumOption(annotations: Annotation[], comments: string[]): EnumOption {
    const nameToken = this.consumeName('enum option');
    this.consume(IdlTokenType.EQUALS, `Expected '=' and a value after enum option '${nameToken.value}'`);
    const value = this.parseInteger('enum value');
    this.consume(IdlTokenType.SEMICOLON, "Expected ';' after enum option");

    return {
      type: 'EnumOption',
      name: nameToken.value,
      value,
      position: this.position(nameToken),
      annotations,
      comments,
    };
  }

  // ============================================
  // Misplaced declarations
  // ============================================

  private isDeclarationStart(): boolean {
    return this.checkAny(IdlTokenType.STRUCT, IdlTokenType.ENUM, IdlTokenType.UNION, IdlTokenType.SERVICE);
  }

  /**
   * Parse a declaration that is not allowed where it appears and drop it,
   * so errors inside it are still reported and parsing resumes after it.
   */
  private discardDeclaration(): void {
    if (this.check(IdlTokenType.STRUCT)) {
      this.parseStruct([], []);
    } else if (this.check(IdlTokenType.ENUM)) {
      this.parseEnum([], []);
    } else if (this.check(IdlTokenType.UNION)) {
      // Members need an owner id; a throwaway one keeps them out of any struct
      this.parseUnion([], [], this.ids.next());
    } else {
      this.parseService([], []);
    }
  }
}
