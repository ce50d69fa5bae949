import { loadProgram, MemorySourceHost, type LoadOptions, type LoadedProgram } from '../loader/index.js';
import { ProgramIndex, SymbolResolver, type ResolutionTable } from '../resolver/index.js';
import { runPhase1, runPhase2, runPhase3 } from '../validator/index.js';
import { groupByPackage, type PackageTree } from '../ast/tree.js';
import { CompilationError, type CompilationStage, type IdlError } from '../errors/index.js';
import { COMPILER_DEFAULTS } from '../config/constants.js';
import { SilentLogger, type Logger } from '../utils/logger.js';
import type { DeclarationArena } from '../ast/arena.js';
import type { NodeId, ServiceDeclaration, SourceFile } from '../ast/nodes.js';

export type CompileOptions = LoadOptions;

export interface CompileSourceOptions extends Omit<LoadOptions, 'host'> {
  /** Path of the source text (default: '<input>.idl') */
  path?: string;
  /** Further in-memory files the source may import, by path */
  files?: Record<string, string>;
}

/**
 * Validated program, keyed by package
 */
export interface CompiledTree {
  entrypoint: string;
  files: SourceFile[];
  packages: Map<string, PackageTree>;
  /** One service per FQN with reopened blocks merged */
  services: ServiceDeclaration[];
  arena: DeclarationArena;
  resolutions: ResolutionTable;
  importTargets: ReadonlyMap<NodeId, string>;
}

/**
 * Load, parse and validate a program starting at `entrypoint`.
 *
 * Throws a CompilationError carrying every diagnostic of the first failing
 * stage: parsing (lexer, parser and import errors from all files), then
 * validation phases 1 to 3.
 */
export async function compile(entrypoint: string, options: CompileOptions = {}): Promise<CompiledTree> {
  const logger = options.logger ?? new SilentLogger();
  const program = await loadProgram(entrypoint, { ...options, logger });
  return analyze(program, logger);
}

/**
 * Compile a single in-memory source text
 */
export async function compileSource(source: string, options: CompileSourceOptions = {}): Promise<CompiledTree> {
  const path = options.path ?? COMPILER_DEFAULTS.VIRTUAL_ENTRYPOINT;
  const host = new MemorySourceHost({ ...options.files, [path]: source }, options.extension);
  return compile(path, { ...options, host });
}

/**
 * Validate an already loaded program
 */
export function analyze(program: LoadedProgram, logger: Logger = new SilentLogger()): CompiledTree {
  failOn('parse', program.errors, logger);

  const index = new ProgramIndex(program.files, {
    importTargets: program.importTargets,
    sources: program.sources,
  });

  failOn('phase1', runPhase1(index), logger);

  const resolver = new SymbolResolver(index);
  failOn('phase2', runPhase2(index, resolver), logger);

  const { errors, services } = runPhase3(index, resolver.table);
  failOn('phase3', errors, logger);

  const packages = groupByPackage(program.files, services);
  logger.info(`Compiled ${program.files.length} file(s) into ${packages.size} package(s)`);

  return {
    entrypoint: program.entrypoint,
    files: program.files,
    packages,
    services,
    arena: index.arena,
    resolutions: resolver.table,
    importTargets: program.importTargets,
  };
}

function failOn(stage: CompilationStage, errors: readonly IdlError[], logger: Logger): void {
  if (errors.length > 0) {
    logger.debug(`${stage}: ${errors.length} error(s)`);
    throw new CompilationError(stage, errors);
  }
  logger.debug(`${stage}: ok`);
}
