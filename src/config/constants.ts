/**
 * Centralized Configuration Constants
 *
 * Default values and lookup tables used throughout the compiler. The keyword
 * and primitive tables are fixed at compile time and never mutated.
 */

// ============================================
// Compiler Configuration
// ============================================

/**
 * Default compiler configuration
 */
export const COMPILER_DEFAULTS = {
  /** Extension appended to import paths that lack one */
  FILE_EXTENSION: '.idl',
  /** Largest value accepted for a field index or enum option value */
  MAX_INDEX: 2147483647,
  /** Virtual path used by compileSource() when none is given */
  VIRTUAL_ENTRYPOINT: '<input>.idl',
  /** Prefix used by the CLI logger */
  LOG_PREFIX: 'idlc',
} as const;

/**
 * Environment variables read by resolveCompilerConfig()
 */
export const ENV_KEYS = {
  EXTENSION: 'IDLC_EXTENSION',
  VERBOSE: 'IDLC_VERBOSE',
} as const;

// ============================================
// Language Tables
// ============================================

export const PRIMITIVE_TYPES = [
  'int8',
  'int16',
  'int32',
  'int64',
  'uint8',
  'uint16',
  'uint32',
  'uint64',
  'float32',
  'float64',
  'bool',
  'string',
  'bytes',
  'timestamp',
] as const;

export type PrimitiveName = (typeof PRIMITIVE_TYPES)[number];

const PRIMITIVE_SET: ReadonlySet<string> = new Set(PRIMITIVE_TYPES);

export function isPrimitiveName(name: string): name is PrimitiveName {
  return PRIMITIVE_SET.has(name);
}

/**
 * Language keywords. Together with the primitive names these form the
 * reserved word table: no declared name may equal one of them.
 */
export const LANGUAGE_KEYWORDS = [
  'package',
  'import',
  'as',
  'struct',
  'enum',
  'union',
  'service',
  'stream',
  'map',
  'array',
  'optional',
] as const;

export const RESERVED_WORDS: ReadonlySet<string> = new Set<string>([
  ...LANGUAGE_KEYWORDS,
  ...PRIMITIVE_TYPES,
]);

export function isReservedWord(name: string): boolean {
  return RESERVED_WORDS.has(name);
}

// ============================================
// Naming Conventions
// ============================================

export const NAMING_PATTERNS = {
  /** Struct, enum and service names */
  CAMEL_CASE: /^[A-Z][a-zA-Z0-9]*$/,
  /** Method names accept both camelCase and CamelCase */
  METHOD_CASE: /^[a-zA-Z][a-zA-Z0-9]*$/,
  /** Fields, parameters, package components and import aliases */
  SNAKE_CASE: /^[a-z][a-z0-9]*(_[a-z0-9]+)*$/,
  /** Enum options */
  SCREAMING_SNAKE_CASE: /^[A-Z][A-Z0-9]*(_[A-Z0-9]+)*$/,
} as const;

export type NamingConvention = keyof typeof NAMING_PATTERNS;

export const NAMING_LABELS: Record<NamingConvention, string> = {
  CAMEL_CASE: 'CamelCase',
  METHOD_CASE: 'camelCase or CamelCase',
  SNAKE_CASE: 'snake_case',
  SCREAMING_SNAKE_CASE: 'SCREAMING_SNAKE_CASE',
};

// ============================================
// Type Definitions for Configuration
// ============================================

export type CompilerConfig = {
  extension?: string;
  verbose?: boolean;
};
