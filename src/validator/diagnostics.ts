import {
  ImportError,
  SemanticError,
  type IdlError,
  type RelatedLocation,
} from '../errors/index.js';
import { NAMING_LABELS, NAMING_PATTERNS, isReservedWord, type NamingConvention } from '../config/constants.js';
import type { ProgramIndex } from '../resolver/index.js';
import type { Position, SourceFile } from '../ast/nodes.js';

/**
 * Error sink shared by the validation phases
 */
export class Diagnostics {
  readonly errors: IdlError[] = [];

  constructor(private index: ProgramIndex) {}

  add(error: IdlError): void {
    this.errors.push(error);
  }

  semantic(message: string, file: SourceFile, position: Position, related?: RelatedLocation): void {
    this.errors.push(new SemanticError(message, position, this.index.contextOf(file), related));
  }

  importError(message: string, file: SourceFile, position: Position, importPath: string): void {
    this.errors.push(new ImportError(message, position, this.index.contextOf(file), importPath));
  }

  /**
   * Reserved words are rejected outright; anything else must match the
   * naming convention. At most one error per name.
   */
  checkName(
    name: string,
    what: string,
    convention: NamingConvention,
    file: SourceFile,
    position: Position
  ): void {
    if (isReservedWord(name)) {
      this.semantic(`'${name}' is a reserved keyword and cannot be used as a ${what} name`, file, position);
    } else if (!NAMING_PATTERNS[convention].test(name)) {
      this.semantic(
        `${capitalize(what)} name '${name}' must be ${NAMING_LABELS[convention]}`,
        file,
        position
      );
    }
  }

  get count(): number {
    return this.errors.length;
  }
}

export function relatedTo(file: SourceFile, position: Position): RelatedLocation {
  return { filePath: file.path, line: position.line, column: position.column };
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
