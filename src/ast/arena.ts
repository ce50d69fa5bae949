import type {
  Declaration,
  EnumDeclaration,
  NodeId,
  ServiceDeclaration,
  SourceFile,
  StructDeclaration,
} from './nodes.js';

/**
 * Hands out program-unique node ids. One generator is shared by every file
 * parsed for a compilation so ids never collide across files.
 */
export class IdGenerator {
  private current = 0;

  next(): NodeId {
    this.current += 1;
    return this.current;
  }
}

interface ArenaEntry {
  declaration: Declaration;
  file: SourceFile;
}

/**
 * Index of every struct, enum and service in a program, keyed by node id.
 * Parent relationships are followed through `parentId`, so FQN computation
 * is a walk up the id chain.
 */
export class DeclarationArena {
  private entries = new Map<NodeId, ArenaEntry>();

  static fromFiles(files: Iterable<SourceFile>): DeclarationArena {
    const arena = new DeclarationArena();
    for (const file of files) {
      arena.addFile(file);
    }
    return arena;
  }

  addFile(file: SourceFile): void {
    for (const struct of file.structs) this.addStruct(struct, file);
    for (const enumDecl of file.enums) this.entries.set(enumDecl.id, { declaration: enumDecl, file });
    for (const service of file.services) this.entries.set(service.id, { declaration: service, file });
  }

  private addStruct(struct: StructDeclaration, file: SourceFile): void {
    this.entries.set(struct.id, { declaration: struct, file });
    for (const nested of struct.structs) this.addStruct(nested, file);
    for (const enumDecl of struct.enums) this.entries.set(enumDecl.id, { declaration: enumDecl, file });
  }

  get(id: NodeId): Declaration | undefined {
    return this.entries.get(id)?.declaration;
  }

  getStruct(id: NodeId): StructDeclaration | undefined {
    const declaration = this.get(id);
    return declaration?.type === 'Struct' ? declaration : undefined;
  }

  getEnum(id: NodeId): EnumDeclaration | undefined {
    const declaration = this.get(id);
    return declaration?.type === 'Enum' ? declaration : undefined;
  }

  fileOf(id: NodeId): SourceFile | undefined {
    return this.entries.get(id)?.file;
  }

  parentOf(id: NodeId): StructDeclaration | undefined {
    const declaration = this.get(id);
    if (!declaration || declaration.type === 'Service' || declaration.parentId === undefined) {
      return undefined;
    }
    return this.getStruct(declaration.parentId);
  }

  /**
   * Names from the outermost enclosing struct down to the declaration itself
   */
  namePath(id: NodeId): string[] {
    const names: string[] = [];
    let current = this.get(id);
    while (current) {
      names.unshift(current.name);
      current = current.type === 'Service' ? undefined : this.parentOf(current.id);
    }
    return names;
  }

  /**
   * Fully-qualified name: package, enclosing structs, then the name
   */
  fqn(id: NodeId): string {
    const file = this.fileOf(id);
    if (!file) {
      throw new Error(`Unknown declaration id ${id}`);
    }
    const pkg = file.package?.name;
    const path = this.namePath(id).join('.');
    return pkg ? `${pkg}.${path}` : path;
  }

  structs(): StructDeclaration[] {
    return this.all().filter((d): d is StructDeclaration => d.type === 'Struct');
  }

  enums(): EnumDeclaration[] {
    return this.all().filter((d): d is EnumDeclaration => d.type === 'Enum');
  }

  services(): ServiceDeclaration[] {
    return this.all().filter((d): d is ServiceDeclaration => d.type === 'Service');
  }

  private all(): Declaration[] {
    return Array.from(this.entries.values(), (entry) => entry.declaration);
  }
}
