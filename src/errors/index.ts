export interface SourceLocation {
  line: number;
  column: number;
  /** End column (optional, for ranges) */
  endColumn?: number;
}

export interface ErrorContext {
  /** The source code being compiled */
  source?: string;
  /** File path if available */
  filePath?: string;
}

/** A second location an error refers to, e.g. the first of two clashing declarations */
export interface RelatedLocation extends SourceLocation {
  filePath?: string;
}

export type CompilationStage = 'parse' | 'phase1' | 'phase2' | 'phase3';

/**
 * Base class for compiler errors with source location info
 */
export class IdlError extends Error {
  readonly location: SourceLocation;
  readonly context?: ErrorContext;

  constructor(message: string, location: SourceLocation, context?: ErrorContext) {
    super(message);
    this.name = 'IdlError';
    this.location = location;
    this.context = context;
  }

  get filePath(): string | undefined {
    return this.context?.filePath;
  }

  /**
   * Single-line rendering: `path:line:column: message`
   */
  toDiagnostic(): string {
    const path = this.context?.filePath ?? '<unknown>';
    return `${path}:${this.location.line}:${this.location.column}: ${this.message}`;
  }

  /**
   * Format the error with source context for display
   */
  format(): string {
    const lines: string[] = [];

    const fileInfo = this.context?.filePath ? `${this.context.filePath}:` : '';
    lines.push(`${this.name}: ${this.message}`);
    lines.push(`  --> ${fileInfo}${this.location.line}:${this.location.column}`);

    if (this.context?.source) {
      const errorLine = getSourceLine(this.context.source, this.location.line);

      if (errorLine !== undefined) {
        const lineNum = this.location.line.toString();
        const padding = ' '.repeat(lineNum.length);

        lines.push(`${padding} |`);
        lines.push(`${lineNum} | ${errorLine}`);

        // Underline the error position
        const underlineStart = this.location.column - 1;
        const underlineLength = this.location.endColumn
          ? this.location.endColumn - this.location.column
          : 1;
        const underline = ' '.repeat(underlineStart) + '^'.repeat(Math.max(1, underlineLength));
        lines.push(`${padding} | ${underline}`);
      }
    }

    return lines.join('\n');
  }

  toString(): string {
    return this.format();
  }
}

/**
 * Error during lexical analysis: unrecognized characters, unterminated strings
 * and malformed numeric literals.
 */
export class LexerError extends IdlError {
  constructor(message: string, location: SourceLocation, context?: ErrorContext) {
    super(message, location, context);
    this.name = 'SyntaxError';
  }
}

/**
 * Error during parsing
 */
export class ParseError extends IdlError {
  /** The token value that caused the error */
  readonly tokenValue?: string;

  constructor(
    message: string,
    location: SourceLocation,
    context?: ErrorContext,
    tokenValue?: string
  ) {
    super(message, location, context);
    this.name = 'ParseError';
    this.tokenValue = tokenValue;
  }

  format(): string {
    const base = super.format();
    if (this.tokenValue) {
      return `${base}\n  found: '${this.tokenValue}'`;
    }
    return base;
  }
}

/**
 * Error while binding a type reference: undefined types, names that do not
 * denote a struct or enum, illegal map keys and non-message RPC signatures.
 */
export class ResolutionError extends IdlError {
  /** The type name as written in the source */
  readonly typeName?: string;

  constructor(
    message: string,
    location: SourceLocation,
    context?: ErrorContext,
    typeName?: string
  ) {
    super(message, location, context);
    this.name = 'ResolutionError';
    this.typeName = typeName;
  }
}

/**
 * Violation of a declaration rule: clashes, duplicates, naming, nesting,
 * streaming placement, cycles and divergent service reopening.
 */
export class SemanticError extends IdlError {
  readonly related?: RelatedLocation;

  constructor(
    message: string,
    location: SourceLocation,
    context?: ErrorContext,
    related?: RelatedLocation
  ) {
    super(message, location, context);
    this.name = 'SemanticError';
    this.related = related;
  }

  format(): string {
    const base = super.format();
    if (this.related) {
      const fileInfo = this.related.filePath ? `${this.related.filePath}:` : '';
      return `${base}\n  note: previously defined at ${fileInfo}${this.related.line}:${this.related.column}`;
    }
    return base;
  }
}

/**
 * Unresolvable, missing or unreadable import target, or a duplicate alias
 */
export class ImportError extends IdlError {
  /** The import literal as written */
  readonly importPath?: string;

  constructor(
    message: string,
    location: SourceLocation,
    context?: ErrorContext,
    importPath?: string
  ) {
    super(message, location, context);
    this.name = 'ImportError';
    this.importPath = importPath;
  }
}

/**
 * Aggregate thrown by compile(): every diagnostic of the first failing stage
 */
export class CompilationError extends Error {
  readonly stage: CompilationStage;
  readonly diagnostics: readonly IdlError[];

  constructor(stage: CompilationStage, diagnostics: readonly IdlError[]) {
    super(diagnostics.map((d) => d.toDiagnostic()).join('\n'));
    this.name = 'CompilationError';
    this.stage = stage;
    this.diagnostics = diagnostics;
  }

  format(): string {
    return formatErrors(this.diagnostics);
  }
}

/**
 * Format multiple errors for display
 */
export function formatErrors(errors: readonly IdlError[]): string {
  return errors.map((e) => e.format()).join('\n\n');
}

/**
 * Render errors as newline-joined `path:line:column: message` lines
 */
export function formatDiagnostics(errors: readonly IdlError[]): string {
  return errors.map((e) => e.toDiagnostic()).join('\n');
}

/**
 * Get the source line at a given line number
 */
export function getSourceLine(source: string, lineNumber: number): string | undefined {
  const lines = source.split('\n');
  return lines[lineNumber - 1];
}
