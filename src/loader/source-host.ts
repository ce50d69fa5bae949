import { readFile, stat } from 'node:fs/promises';
import { dirname, isAbsolute, posix, resolve } from 'node:path';
import { COMPILER_DEFAULTS } from '../config/constants.js';

export type ReadResult =
  | { kind: 'ok'; content: string }
  | { kind: 'missing' | 'directory' | 'unreadable'; reason: string };

/**
 * File access used by the loader. Paths returned by the resolve methods are
 * the identities of loaded files: a path is read at most once.
 */
export interface SourceHost {
  resolveEntrypoint(path: string): string;
  /** Map an import literal to a path, relative to the importing file */
  resolveImport(specifier: string, importerPath: string): string;
  readSource(path: string): Promise<ReadResult>;
}

function withExtension(path: string, extension: string): string {
  return path.endsWith(extension) ? path : path + extension;
}

/**
 * Reads sources from disk
 */
export class NodeSourceHost implements SourceHost {
  constructor(private extension: string = COMPILER_DEFAULTS.FILE_EXTENSION) {}

  resolveEntrypoint(path: string): string {
    return resolve(path);
  }

  resolveImport(specifier: string, importerPath: string): string {
    const target = isAbsolute(specifier) ? specifier : resolve(dirname(importerPath), specifier);
    return withExtension(target, this.extension);
  }

  async readSource(path: string): Promise<ReadResult> {
    try {
      const stats = await stat(path);
      if (stats.isDirectory()) {
        return { kind: 'directory', reason: `${path} is a directory` };
      }
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return { kind: 'missing', reason: `${path} does not exist` };
      }
      return { kind: 'unreadable', reason: errorMessage(err) };
    }

    try {
      return { kind: 'ok', content: await readFile(path, 'utf-8') };
    } catch (err) {
      return { kind: 'unreadable', reason: errorMessage(err) };
    }
  }
}

/**
 * In-memory sources keyed by POSIX path, for tests and embedding tools
 */
export class MemorySourceHost implements SourceHost {
  private files: Map<string, string>;

  constructor(
    files: Record<string, string> | Map<string, string> = {},
    private extension: string = COMPILER_DEFAULTS.FILE_EXTENSION
  ) {
    const entries = files instanceof Map ? Array.from(files) : Object.entries(files);
    this.files = new Map(entries.map(([path, content]) => [posix.normalize(path), content]));
  }

  set(path: string, content: string): void {
    this.files.set(posix.normalize(path), content);
  }

  resolveEntrypoint(path: string): string {
    return posix.normalize(path);
  }

  resolveImport(specifier: string, importerPath: string): string {
    const target = posix.isAbsolute(specifier)
      ? posix.normalize(specifier)
      : posix.join(posix.dirname(importerPath), specifier);
    return withExtension(target, this.extension);
  }

  async readSource(path: string): Promise<ReadResult> {
    const content = this.files.get(path);
    if (content !== undefined) {
      return { kind: 'ok', content };
    }

    const prefix = path.endsWith('/') ? path : `${path}/`;
    for (const known of this.files.keys()) {
      if (known.startsWith(prefix)) {
        return { kind: 'directory', reason: `${path} is a directory` };
      }
    }
    return { kind: 'missing', reason: `${path} does not exist` };
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
