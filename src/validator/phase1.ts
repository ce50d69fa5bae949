import { Diagnostics, relatedTo } from './diagnostics.js';
import { isStreaming } from '../ast/types.js';
import type { ImportAlias, ProgramIndex } from '../resolver/index.js';
import type { IdlError } from '../errors/index.js';
import type {
  Declaration,
  EnumDeclaration,
  MethodDeclaration,
  MethodParam,
  MethodReturn,
  PlainField,
  Position,
  ServiceDeclaration,
  SourceFile,
  StructDeclaration,
} from '../ast/nodes.js';

/**
 * Phase 1: local well-formedness. Import aliases, program-wide name clashes,
 * duplicate members, naming conventions and streaming placement.
 */
export function runPhase1(index: ProgramIndex): IdlError[] {
  return new LocalChecks(index).run();
}

class LocalChecks {
  private diagnostics: Diagnostics;

  constructor(private index: ProgramIndex) {
    this.diagnostics = new Diagnostics(index);
  }

  run(): IdlError[] {
    for (const file of this.index.files) {
      this.checkPackage(file);
      this.checkImports(file);
    }

    this.checkNameClashes();

    for (const file of this.index.files) {
      for (const struct of file.structs) this.checkStruct(struct, file);
      for (const enumDecl of file.enums) this.checkEnum(enumDecl, file);
      for (const service of file.services) this.checkService(service, file);
    }

    return this.diagnostics.errors;
  }

  // ============================================
  // Files
  // ============================================

  private checkPackage(file: SourceFile): void {
    const pkg = file.package;
    if (!pkg) return;
    for (const component of pkg.components) {
      this.diagnostics.checkName(component, 'package', 'SNAKE_CASE', file, pkg.position);
    }
  }

  private checkImports(file: SourceFile): void {
    const seen = new Map<string, ImportAlias>();

    for (const entry of this.index.aliasesOf(file)) {
      const { declaration } = entry;
      if (entry.explicit) {
        this.diagnostics.checkName(
          entry.alias,
          'import alias',
          'SNAKE_CASE',
          file,
          declaration.aliasPosition ?? declaration.position
        );
      }

      const first = seen.get(entry.alias);
      if (first) {
        this.diagnostics.importError(
          `Duplicate import alias '${entry.alias}' (already used by import "${first.declaration.path}")`,
          file,
          declaration.position,
          declaration.path
        );
      } else {
        seen.set(entry.alias, entry);
      }
    }
  }

  /**
   * Every struct, enum and service FQN must be unique across the program.
   * Services are the exception: a second block with the same FQN reopens
   * the service.
   */
  private checkNameClashes(): void {
    const registry = new Map<string, { declaration: Declaration; file: SourceFile }>();

    for (const file of this.index.files) {
      for (const declaration of declarationsOf(file)) {
        const fqn = this.index.arena.fqn(declaration.id);
        const first = registry.get(fqn);

        if (!first) {
          registry.set(fqn, { declaration, file });
        } else if (first.declaration.type !== 'Service' || declaration.type !== 'Service') {
          this.diagnostics.semantic(
            `Name clash: '${fqn}' is already declared`,
            file,
            declaration.position,
            relatedTo(first.file, first.declaration.position)
          );
        }
      }
    }
  }

  // ============================================
  // Structs and enums
  // ============================================

  private checkStruct(struct: StructDeclaration, file: SourceFile): void {
    this.diagnostics.checkName(struct.name, 'struct', 'CAMEL_CASE', file, struct.position);

    // Union members share the struct's field names and indices
    const names = new Map<string, Position>();
    const indices = new Map<number, PlainField>();

    const claimName = (name: string, position: Position): void => {
      const first = names.get(name);
      if (first) {
        this.diagnostics.semantic(
          `Duplicate field name '${name}' in struct '${struct.name}'`,
          file,
          position,
          relatedTo(file, first)
        );
      } else {
        names.set(name, position);
      }
    };

    const checkField = (field: PlainField): void => {
      this.diagnostics.checkName(field.name, 'field', 'SNAKE_CASE', file, field.position);
      claimName(field.name, field.position);

      const first = indices.get(field.index);
      if (first) {
        this.diagnostics.semantic(
          `Duplicate field index ${field.index} in struct '${struct.name}' (already used by '${first.name}')`,
          file,
          field.position,
          relatedTo(file, first.position)
        );
      } else {
        indices.set(field.index, field);
      }
    };

    for (const field of struct.fields) {
      if (field.type === 'PlainField') {
        checkField(field);
        continue;
      }

      this.diagnostics.checkName(field.name, 'union', 'SNAKE_CASE', file, field.position);
      claimName(field.name, field.position);

      for (const member of field.members) {
        const kind = member.valueType.kind;
        if (kind === 'optional' || kind === 'array') {
          this.diagnostics.semantic(
            `Union member '${member.name}' cannot be ${kind}`,
            file,
            member.valueType.position
          );
        }
        checkField(member);
      }
    }

    for (const nested of struct.structs) this.checkStruct(nested, file);
    for (const nested of struct.enums) this.checkEnum(nested, file);
  }

  private checkEnum(enumDecl: EnumDeclaration, file: SourceFile): void {
    this.diagnostics.checkName(enumDecl.name, 'enum', 'CAMEL_CASE', file, enumDecl.position);

    if (enumDecl.options.length === 0) {
      this.diagnostics.semantic(`Enum '${enumDecl.name}' must have at least one option`, file, enumDecl.position);
    }

    // Values may repeat (aliases); names may not
    const names = new Map<string, Position>();
    for (const option of enumDecl.options) {
      this.diagnostics.checkName(option.name, 'enum option', 'SCREAMING_SNAKE_CASE', file, option.position);

      const first = names.get(option.name);
      if (first) {
        this.diagnostics.semantic(
          `Duplicate option '${option.name}' in enum '${enumDecl.name}'`,
          file,
          option.position,
          relatedTo(file, first)
        );
      } else {
        names.set(option.name, option.position);
      }
    }
  }

  // ============================================
  // Services
  // ============================================

  private checkService(service: ServiceDeclaration, file: SourceFile): void {
    this.diagnostics.checkName(service.name, 'service', 'CAMEL_CASE', file, service.position);
    for (const method of service.methods) {
      this.checkMethod(method, file);
    }
  }

  private checkMethod(method: MethodDeclaration, file: SourceFile): void {
    this.diagnostics.checkName(method.name, 'method', 'METHOD_CASE', file, method.position);

    const names = new Map<string, Position>();
    for (const param of method.params) {
      if (param.name === undefined) continue;
      this.diagnostics.checkName(param.name, 'parameter', 'SNAKE_CASE', file, param.position);

      const first = names.get(param.name);
      if (first) {
        this.diagnostics.semantic(
          `Duplicate parameter '${param.name}' in method '${method.name}'`,
          file,
          param.position,
          relatedTo(file, first)
        );
      } else {
        names.set(param.name, param.position);
      }
    }

    // The streaming parameter is never named, so it does not count here
    const plain = method.params.filter((p) => !isStreaming(p.valueType));
    const named = plain.filter((p) => p.name !== undefined).length;
    if (named > 0 && named < plain.length) {
      this.diagnostics.semantic(
        `Method '${method.name}' must name all of its parameters or none of them`,
        file,
        method.position
      );
    }

    this.checkStreaming(method, method.params, 'parameter', file);
    this.checkStreaming(method, method.returns, 'return value', file);
  }

  /**
   * At most one streaming entry, and only in last position
   */
  private checkStreaming(
    method: MethodDeclaration,
    entries: ReadonlyArray<MethodParam | MethodReturn>,
    what: string,
    file: SourceFile
  ): void {
    const streaming = entries.filter((e) => isStreaming(e.valueType));

    if (streaming.length > 1) {
      for (const extra of streaming.slice(1)) {
        this.diagnostics.semantic(
          `Method '${method.name}' has more than one streaming ${what}`,
          file,
          extra.position
        );
      }
    } else if (streaming.length === 1 && entries[entries.length - 1] !== streaming[0]) {
      this.diagnostics.semantic(
        `Streaming ${what} of method '${method.name}' must be the last ${what}`,
        file,
        streaming[0].position
      );
    }
  }
}

function declarationsOf(file: SourceFile): Declaration[] {
  const declarations: Declaration[] = [];
  const addStruct = (struct: StructDeclaration): void => {
    declarations.push(struct);
    for (const nested of struct.structs) addStruct(nested);
    declarations.push(...struct.enums);
  };

  for (const struct of file.structs) addStruct(struct);
  declarations.push(...file.enums, ...file.services);
  return declarations;
}
