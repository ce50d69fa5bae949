import { IdlTokenType, type Token } from '../lexer/tokens.js';
import { StructParser } from './struct-parser.js';
import type { ParserOptions } from './base.js';
import type { ParseError } from '../errors/index.js';
import type {
  ImportDeclaration,
  PackageDeclaration,
  Position,
  ServiceDeclaration,
  SourceFile,
} from '../ast/nodes.js';

export interface ParseResult {
  file: SourceFile;
  errors: ParseError[];
}

/**
 * Recursive-descent parser for one IDL file. Syntax errors are collected
 * rather than thrown; the returned file holds whatever could be recovered.
 */
export class IdlParser extends StructParser {
  constructor(tokens: Token[], options: ParserOptions = {}) {
    super(tokens, options);
  }

  parse(): ParseResult {
    const file: SourceFile = {
      type: 'File',
      id: this.fileId,
      path: this.filePath ?? '',
      imports: [],
      structs: [],
      enums: [],
      services: [],
    };

    file.package = this.parsePackageClause();

    while (this.check(IdlTokenType.IMPORT)) {
      const start = this.pos;
      try {
        file.imports.push(this.parseImport());
      } catch (err) {
        this.recover(err, start);
      }
    }

    while (!this.isAtEnd()) {
      const start = this.pos;
      try {
        this.parseTopLevel(file);
      } catch (err) {
        this.recover(err, start);
      }
    }

    return { file, errors: this.errors };
  }

  // ============================================
  // Package and imports
  // ============================================

  private parsePackageClause(): PackageDeclaration | undefined {
    if (!this.check(IdlTokenType.PACKAGE)) {
      this.report(this.error("File must start with a 'package' declaration"));
      return undefined;
    }

    const start = this.pos;
    try {
      return this.parsePackage();
    } catch (err) {
      this.recover(err, start);
      return undefined;
    }
  }

  // package org.example.geo;
  private parsePackage(): PackageDeclaration {
    const keyword = this.consume(IdlTokenType.PACKAGE, "Expected 'package'");
    const components = [this.consumeWord('Expected package name').value];
    while (this.match(IdlTokenType.DOT)) {
      components.push(this.consumeWord("Expected package name component after '.'").value);
    }
    this.consume(IdlTokenType.SEMICOLON, "Expected ';' after package declaration");

    return {
      type: 'Package',
      name: components.join('.'),
      components,
      position: this.position(keyword),
    };
  }

  // import "common/types" as types;
  private parseImport(): ImportDeclaration {
    const keyword = this.consume(IdlTokenType.IMPORT, "Expected 'import'");
    const path = this.consume(IdlTokenType.STRING, 'Expected import path string').value;

    let alias: string | undefined;
    let aliasPosition: Position | undefined;
    if (this.match(IdlTokenType.AS)) {
      const aliasToken = this.consumeWord("Expected import alias after 'as'");
      alias = aliasToken.value;
      aliasPosition = this.position(aliasToken);
    }

    this.consume(IdlTokenType.SEMICOLON, "Expected ';' after import");

    return {
      type: 'Import',
      id: this.ids.next(),
      path,
      alias,
      aliasPosition,
      position: this.position(keyword),
    };
  }

  // ============================================
  // Top-level declarations
  // ============================================

  private parseTopLevel(file: SourceFile): void {
    const first = this.peek();
    const annotations = this.parseAnnotations();
    const comments = this.docComments(first);

    if (this.check(IdlTokenType.STRUCT)) {
      file.structs.push(this.parseStruct(annotations, comments));
    } else if (this.check(IdlTokenType.ENUM)) {
      file.enums.push(this.parseEnum(annotations, comments));
    } else if (this.check(IdlTokenType.SERVICE)) {
      this.addService(file, this.parseService(annotations, comments));
    } else if (this.check(IdlTokenType.IMPORT)) {
      this.report(this.error('Imports must appear before any declaration'));
      this.parseImport();
    } else if (this.check(IdlTokenType.PACKAGE)) {
      this.report(this.error("Duplicate 'package' declaration"));
      this.parsePackage();
    } else {
      throw this.error("Expected 'struct', 'enum', or 'service'");
    }
  }

  /**
   * A service name seen again in the same file reopens the first block:
   * its methods are appended there.
   */
  private addService(file: SourceFile, service: ServiceDeclaration): void {
    const existing = file.services.find((s) => s.name === service.name);
    if (!existing) {
      file.services.push(service);
      return;
    }

    for (const method of service.methods) {
      existing.methods.push({ ...method, serviceId: existing.id });
    }
    existing.blocks.push(...service.blocks);
    existing.annotations.push(...service.annotations);
  }
}
