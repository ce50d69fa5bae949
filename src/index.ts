export { IdlLexer, IdlTokenType, IDL_KEYWORDS, tokenize, type Token, type LexResult } from './lexer/index.js';
export { IdlParser, parse, type ParseResult, type ParserOptions, type SourceParseResult } from './parser/index.js';
export * from './ast/index.js';
export {
  ProgramIndex,
  SymbolResolver,
  ResolutionTable,
  type Resolution,
  type ResolutionScope,
  type ResolveOutcome,
  type ImportAlias,
} from './resolver/index.js';
export { runPhase1, runPhase2, runPhase3, type Phase3Result } from './validator/index.js';
export {
  loadProgram,
  NodeSourceHost,
  MemorySourceHost,
  type SourceHost,
  type ReadResult,
  type LoadOptions,
  type LoadedProgram,
} from './loader/index.js';
export {
  compile,
  compileSource,
  analyze,
  type CompiledTree,
  type CompileOptions,
  type CompileSourceOptions,
} from './compiler/index.js';
export {
  IdlError,
  LexerError,
  ParseError,
  ResolutionError,
  SemanticError,
  ImportError,
  CompilationError,
  formatErrors,
  formatDiagnostics,
  getSourceLine,
  type SourceLocation,
  type ErrorContext,
  type RelatedLocation,
  type CompilationStage,
} from './errors/index.js';
export {
  COMPILER_DEFAULTS,
  PRIMITIVE_TYPES,
  RESERVED_WORDS,
  isPrimitiveName,
  isReservedWord,
  type PrimitiveName,
  type CompilerConfig,
} from './config/constants.js';
export { loadEnv, resolveCompilerConfig, type EnvOptions, type LoadEnvResult } from './config/env.js';
export { ConsoleLogger, SilentLogger, createLogger, type Logger, type LogLevel } from './utils/index.js';
