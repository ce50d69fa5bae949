import { DeclarationArena } from '../ast/arena.js';
import type {
  Declaration,
  EnumDeclaration,
  ImportDeclaration,
  NodeId,
  SourceFile,
  StructDeclaration,
} from '../ast/nodes.js';
import type { ErrorContext } from '../errors/index.js';

export interface ProgramIndexOptions {
  /** Resolved absolute path of each import, keyed by import node id */
  importTargets?: ReadonlyMap<NodeId, string>;
  /** Source text by file path, used for code frames in diagnostics */
  sources?: ReadonlyMap<string, string>;
}

export interface ImportAlias {
  alias: string;
  packageName: string;
  /** Written with `as`, rather than taken from the imported package */
  explicit: boolean;
  declaration: ImportDeclaration;
}

/**
 * Read-only view of a whole parsed program: files grouped by package,
 * top-level declarations by name, and per-file import aliases.
 */
export class ProgramIndex {
  readonly arena: DeclarationArena;
  readonly files: readonly SourceFile[];

  private importTargets: ReadonlyMap<NodeId, string>;
  private sources: ReadonlyMap<string, string>;
  private filesByPath = new Map<string, SourceFile>();
  private packages = new Map<string, SourceFile[]>();
  private topLevel = new Map<string, Map<string, Declaration>>();
  private aliasCache = new Map<NodeId, ImportAlias[]>();

  constructor(files: readonly SourceFile[], options: ProgramIndexOptions = {}) {
    this.files = files;
    this.arena = DeclarationArena.fromFiles(files);
    this.importTargets = options.importTargets ?? new Map();
    this.sources = options.sources ?? new Map();

    for (const file of files) {
      this.filesByPath.set(file.path, file);

      const packageName = packageOf(file);
      const members = this.packages.get(packageName) ?? [];
      members.push(file);
      this.packages.set(packageName, members);

      let names = this.topLevel.get(packageName);
      if (!names) {
        names = new Map();
        this.topLevel.set(packageName, names);
      }
      for (const declaration of [...file.structs, ...file.enums, ...file.services]) {
        if (!names.has(declaration.name)) names.set(declaration.name, declaration);
      }
    }
  }

  hasPackage(name: string): boolean {
    return this.packages.has(name);
  }

  packageNames(): string[] {
    return Array.from(this.packages.keys());
  }

  filesOf(packageName: string): readonly SourceFile[] {
    return this.packages.get(packageName) ?? [];
  }

  fileAt(path: string): SourceFile | undefined {
    return this.filesByPath.get(path);
  }

  importTarget(declaration: ImportDeclaration): SourceFile | undefined {
    const path = this.importTargets.get(declaration.id);
    return path === undefined ? undefined : this.filesByPath.get(path);
  }

  /**
   * First top-level struct, enum or service called `name` in a package
   */
  topLevelDeclaration(packageName: string, name: string): Declaration | undefined {
    return this.topLevel.get(packageName)?.get(name);
  }

  nestedDeclaration(struct: StructDeclaration, name: string): StructDeclaration | EnumDeclaration | undefined {
    return struct.structs.find((s) => s.name === name) ?? struct.enums.find((e) => e.name === name);
  }

  /**
   * Aliases of a file's imports, in declaration order. The alias is the
   * explicit one, or the last component of the imported file's package.
   * Imports whose target was not loaded are left out.
   */
  aliasesOf(file: SourceFile): ImportAlias[] {
    const cached = this.aliasCache.get(file.id);
    if (cached) return cached;

    const aliases: ImportAlias[] = [];
    for (const declaration of file.imports) {
      const target = this.importTarget(declaration);
      const targetPackage = target?.package;
      if (!targetPackage) continue;

      const components = targetPackage.components;
      aliases.push({
        alias: declaration.alias ?? components[components.length - 1],
        packageName: targetPackage.name,
        explicit: declaration.alias !== undefined,
        declaration,
      });
    }

    this.aliasCache.set(file.id, aliases);
    return aliases;
  }

  /**
   * Package named by an alias in `file`; the first import wins on duplicates
   */
  aliasTarget(file: SourceFile, alias: string): string | undefined {
    return this.aliasesOf(file).find((a) => a.alias === alias)?.packageName;
  }

  contextOf(file: SourceFile): ErrorContext {
    return { filePath: file.path, source: this.sources.get(file.path) };
  }
}

export function packageOf(file: SourceFile): string {
  return file.package?.name ?? '';
}
