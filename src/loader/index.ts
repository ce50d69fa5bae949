import { parse } from '../parser/index.js';
import { IdGenerator } from '../ast/arena.js';
import { ImportError, type IdlError } from '../errors/index.js';
import { SilentLogger, type Logger } from '../utils/logger.js';
import { NodeSourceHost, type SourceHost } from './source-host.js';
import type { NodeId, SourceFile } from '../ast/nodes.js';

export { NodeSourceHost, MemorySourceHost, type SourceHost, type ReadResult } from './source-host.js';

export interface LoadOptions {
  /** File access; defaults to the local file system */
  host?: SourceHost;
  /** Extension for the default host to append to import paths (default: '.idl') */
  extension?: string;
  logger?: Logger;
  ids?: IdGenerator;
}

export interface LoadedProgram {
  /** Resolved path of the entry file */
  entrypoint: string;
  /** Every loaded file, entry file first, in depth-first import order */
  files: SourceFile[];
  /** Resolved path of each import, keyed by import node id */
  importTargets: Map<NodeId, string>;
  /** Source text by resolved path */
  sources: Map<string, string>;
  /** Lexer, parser and import errors from every file */
  errors: IdlError[];
}

/**
 * Load an entry file and everything it imports, transitively.
 *
 * Imports are followed depth-first. A path already loaded is not read again,
 * so diamond-shaped and cyclic import graphs terminate without error.
 */
export async function loadProgram(entrypoint: string, options: LoadOptions = {}): Promise<LoadedProgram> {
  const host = options.host ?? new NodeSourceHost(options.extension);
  const logger = options.logger ?? new SilentLogger();
  const ids = options.ids ?? new IdGenerator();

  const program: LoadedProgram = {
    entrypoint: host.resolveEntrypoint(entrypoint),
    files: [],
    importTargets: new Map(),
    sources: new Map(),
    errors: [],
  };
  const visited = new Set<string>();

  const visit = async (path: string, source: string): Promise<void> => {
    visited.add(path);
    program.sources.set(path, source);

    const { file, errors } = parse(source, path, ids);
    program.files.push(file);
    program.errors.push(...errors);
    logger.debug(`Parsed ${path} (${errors.length} error(s))`);

    for (const declaration of file.imports) {
      const target = host.resolveImport(declaration.path, path);
      if (visited.has(target)) {
        program.importTargets.set(declaration.id, target);
        continue;
      }

      const read = await host.readSource(target);
      if (read.kind !== 'ok') {
        program.errors.push(
          new ImportError(
            `Cannot import "${declaration.path}": ${read.reason}`,
            declaration.position,
            { filePath: path, source },
            declaration.path
          )
        );
        continue;
      }

      program.importTargets.set(declaration.id, target);
      await visit(target, read.content);
    }
  };

  const entry = await host.readSource(program.entrypoint);
  if (entry.kind !== 'ok') {
    program.errors.push(
      new ImportError(
        `Cannot load entry file: ${entry.reason}`,
        { line: 1, column: 1 },
        { filePath: program.entrypoint },
        entrypoint
      )
    );
    return program;
  }

  await visit(program.entrypoint, entry.content);
  logger.debug(`Loaded ${program.files.length} file(s) from ${program.entrypoint}`);
  return program;
}
