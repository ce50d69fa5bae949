import { ResolutionError } from '../errors/index.js';
import { assertNever, describeType } from '../ast/types.js';
import { ResolutionTable, type Resolution } from './resolution-table.js';
import { packageOf, type ProgramIndex } from './program-index.js';
import type {
  Declaration,
  EnumDeclaration,
  NodeId,
  ServiceDeclaration,
  SourceFile,
  StructDeclaration,
  TypeExpr,
  UserTypeRef,
} from '../ast/nodes.js';

/**
 * Where a reference was written: the file, and the innermost struct around
 * it when it is a field type.
 */
export interface ResolutionScope {
  file: SourceFile;
  containerId?: NodeId;
}

export type ResolveOutcome =
  | { ok: true; resolution: Resolution }
  | { ok: false; error: ResolutionError };

type Lookup =
  | { kind: 'type'; declaration: StructDeclaration | EnumDeclaration }
  | { kind: 'service'; declaration: ServiceDeclaration }
  | { kind: 'package'; name: string };

/**
 * Binds user type references to struct and enum declarations.
 *
 * A reference is tried, in order: with a leading import alias replaced by
 * its package; as a name qualified by the file's own package; against the
 * enclosing structs from the innermost outwards and then the package's
 * top-level declarations; and finally as a fully-qualified name.
 */
export class SymbolResolver {
  readonly table: ResolutionTable;

  constructor(
    private index: ProgramIndex,
    table: ResolutionTable = new ResolutionTable()
  ) {
    this.table = table;
  }

  resolve(ref: UserTypeRef, scope: ResolutionScope): ResolveOutcome {
    const existing = this.table.get(ref.id);
    if (existing) {
      return { ok: true, resolution: existing };
    }

    const components = ref.kind === 'qualifiedUser' ? ref.components : [ref.name];
    const found = this.lookup(components, scope);

    if (!found) {
      return { ok: false, error: this.error(`Undefined type '${ref.name}'`, ref, scope) };
    }

    if (found.kind === 'service') {
      const fqn = this.index.arena.fqn(found.declaration.id);
      return { ok: false, error: this.error(`Cannot use service '${fqn}' as a type`, ref, scope) };
    }

    if (found.kind === 'package') {
      return { ok: false, error: this.error(`Cannot use package '${found.name}' as a type`, ref, scope) };
    }

    const declaration = found.declaration;
    const resolution: Resolution = {
      declarationId: declaration.id,
      kind: declaration.type === 'Struct' ? 'struct' : 'enum',
      fqn: this.index.arena.fqn(declaration.id),
    };
    this.table.record(ref.id, resolution);
    return { ok: true, resolution };
  }

  /**
   * Resolve every user type inside a type expression, then check map keys.
   * Returns one error per failed reference or illegal key.
   */
  resolveType(type: TypeExpr, scope: ResolutionScope): ResolutionError[] {
    switch (type.kind) {
      case 'primitive':
        return [];
      case 'array':
        return this.resolveType(type.element, scope);
      case 'optional':
      case 'streaming':
        return this.resolveType(type.inner, scope);
      case 'map': {
        const errors = this.resolveType(type.key, scope);
        if (errors.length === 0 && !this.isLegalMapKey(type.key)) {
          errors.push(
            new ResolutionError(
              `Illegal map key type '${describeType(type.key)}'`,
              type.key.position,
              this.index.contextOf(scope.file),
              describeType(type.key)
            )
          );
        }
        return [...errors, ...this.resolveType(type.value, scope)];
      }
      case 'simpleUser':
      case 'qualifiedUser': {
        const outcome = this.resolve(type, scope);
        return outcome.ok ? [] : [outcome.error];
      }
      default:
        return assertNever(type);
    }
  }

  /**
   * Map keys are primitives other than bytes, enums or structs
   */
  private isLegalMapKey(key: TypeExpr): boolean {
    switch (key.kind) {
      case 'primitive':
        return key.name !== 'bytes';
      case 'simpleUser':
      case 'qualifiedUser':
        return this.table.has(key.id);
      case 'array':
      case 'map':
      case 'optional':
      case 'streaming':
        return false;
      default:
        return assertNever(key);
    }
  }

  // ============================================
  // Lookup
  // ============================================

  private lookup(components: string[], scope: ResolutionScope): Lookup | undefined {
    const [head, ...rest] = components;

    const aliased = this.index.aliasTarget(scope.file, head);
    if (aliased !== undefined) {
      if (rest.length === 0) return { kind: 'package', name: aliased };
      const found = this.qualified([...aliased.split('.'), ...rest]);
      if (found) return found;
    }

    const ownPackage = scope.file.package;
    if (ownPackage && rest.length > 0 && head === ownPackage.components[0]) {
      const found = this.qualified(components);
      if (found) return found;
    }

    const first = this.inScope(head, scope);
    if (first) {
      const found = this.descend(first, rest);
      if (found) return found;
    }

    return this.qualified(components);
  }

  /**
   * Innermost enclosing struct outwards, then the package's top level
   */
  private inScope(name: string, scope: ResolutionScope): Declaration | undefined {
    let containerId = scope.containerId;
    while (containerId !== undefined) {
      const container = this.index.arena.getStruct(containerId);
      if (!container) break;

      const nested = this.index.nestedDeclaration(container, name);
      if (nested) return nested;
      containerId = container.parentId;
    }

    return this.index.topLevelDeclaration(packageOf(scope.file), name);
  }

  /**
   * Longest known package prefix first, then nested struct names
   */
  private qualified(components: string[]): Lookup | undefined {
    for (let split = components.length - 1; split >= 1; split--) {
      const packageName = components.slice(0, split).join('.');
      if (!this.index.hasPackage(packageName)) continue;

      const top = this.index.topLevelDeclaration(packageName, components[split]);
      if (!top) continue;

      const found = this.descend(top, components.slice(split + 1));
      if (found) return found;
    }

    const whole = components.join('.');
    if (this.index.hasPackage(whole)) {
      return { kind: 'package', name: whole };
    }
    return undefined;
  }

  private descend(start: Declaration, names: string[]): Lookup | undefined {
    let current: Declaration = start;
    for (const name of names) {
      if (current.type !== 'Struct') return undefined;
      const next = this.index.nestedDeclaration(current, name);
      if (!next) return undefined;
      current = next;
    }

    if (current.type === 'Service') {
      return { kind: 'service', declaration: current };
    }
    return { kind: 'type', declaration: current };
  }

  private error(message: string, ref: UserTypeRef, scope: ResolutionScope): ResolutionError {
    return new ResolutionError(message, ref.position, this.index.contextOf(scope.file), ref.name);
  }
}
