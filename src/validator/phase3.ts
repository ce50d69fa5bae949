import { Diagnostics, relatedTo } from './diagnostics.js';
import { isUserType, typesEqual } from '../ast/types.js';
import type { ProgramIndex, ResolutionTable } from '../resolver/index.js';
import type { IdlError } from '../errors/index.js';
import type {
  MethodDeclaration,
  MethodParam,
  MethodReturn,
  NodeId,
  PlainField,
  ServiceDeclaration,
  SourceFile,
  StructDeclaration,
  UnionField,
} from '../ast/nodes.js';

export interface Phase3Result {
  errors: IdlError[];
  /** One service per FQN, every block merged and repeated methods dropped */
  services: ServiceDeclaration[];
}

interface Located<T> {
  node: T;
  file: SourceFile;
}

interface StructEdge {
  target: NodeId;
  field: PlainField | UnionField;
}

/**
 * Phase 3: whole-program consistency. Reopened services must agree on every
 * repeated method, and no struct may reach itself through direct fields.
 */
export function runPhase3(index: ProgramIndex, table: ResolutionTable): Phase3Result {
  const diagnostics = new Diagnostics(index);
  const services = mergeServices(index, table, diagnostics);
  detectCycles(index, table, diagnostics);
  return { errors: diagnostics.errors, services };
}

// ============================================
// Service reopening
// ============================================

function mergeServices(
  index: ProgramIndex,
  table: ResolutionTable,
  diagnostics: Diagnostics
): ServiceDeclaration[] {
  const groups = new Map<string, Array<Located<ServiceDeclaration>>>();
  for (const file of index.files) {
    for (const service of file.services) {
      const fqn = index.arena.fqn(service.id);
      const group = groups.get(fqn) ?? [];
      group.push({ node: service, file });
      groups.set(fqn, group);
    }
  }

  const resolve = (id: NodeId): string | undefined => table.fqnOf(id);
  const merged: ServiceDeclaration[] = [];

  for (const [fqn, group] of groups) {
    const primary = group[0].node;
    const methods: MethodDeclaration[] = [];
    const byName = new Map<string, Located<MethodDeclaration>>();

    for (const { node: service, file } of group) {
      for (const method of service.methods) {
        const first = byName.get(method.name);
        if (!first) {
          byName.set(method.name, { node: method, file });
          methods.push(method.serviceId === primary.id ? method : { ...method, serviceId: primary.id });
        } else if (!sameSignature(first.node, method, resolve)) {
          diagnostics.semantic(
            `Method '${method.name}' of service '${fqn}' is redeclared with a different signature`,
            file,
            method.position,
            relatedTo(first.file, first.node.position)
          );
        }
      }
    }

    merged.push({
      ...primary,
      methods,
      blocks: group.flatMap((g) => g.node.blocks),
      annotations: group.flatMap((g) => g.node.annotations),
    });
  }

  return merged;
}

function sameSignature(
  a: MethodDeclaration,
  b: MethodDeclaration,
  resolve: (id: NodeId) => string | undefined
): boolean {
  const sameEntries = (
    left: ReadonlyArray<MethodParam | MethodReturn>,
    right: ReadonlyArray<MethodParam | MethodReturn>
  ): boolean =>
    left.length === right.length &&
    left.every((entry, i) => {
      const other = right[i];
      const leftName = 'name' in entry ? entry.name : undefined;
      const rightName = 'name' in other ? other.name : undefined;
      return leftName === rightName && typesEqual(entry.valueType, other.valueType, resolve);
    });

  return sameEntries(a.params, b.params) && sameEntries(a.returns, b.returns);
}

// ============================================
// Cycles
// ============================================

/**
 * Depth-first search over struct-to-struct edges formed by plain fields
 * whose type is the struct itself, with no optional, array or map around it.
 * A union is an edge only when every member names the same struct directly.
 */
function detectCycles(index: ProgramIndex, table: ResolutionTable, diagnostics: Diagnostics): void {
  const structs = new Map<NodeId, Located<StructDeclaration>>();
  const collect = (struct: StructDeclaration, file: SourceFile): void => {
    structs.set(struct.id, { node: struct, file });
    for (const nested of struct.structs) collect(nested, file);
  };
  for (const file of index.files) {
    for (const struct of file.structs) collect(struct, file);
  }

  const directTarget = (field: PlainField): NodeId | undefined => {
    if (!isUserType(field.valueType)) return undefined;
    const resolution = table.get(field.valueType.id);
    return resolution?.kind === 'struct' ? resolution.declarationId : undefined;
  };

  const edgesOf = (struct: StructDeclaration): StructEdge[] => {
    const edges: StructEdge[] = [];
    for (const field of struct.fields) {
      if (field.type === 'PlainField') {
        const target = directTarget(field);
        if (target !== undefined) edges.push({ target, field });
        continue;
      }

      const targets = new Set(field.members.map(directTarget));
      const [target] = targets;
      if (targets.size === 1 && target !== undefined) {
        edges.push({ target, field });
      }
    }
    return edges;
  };

  const state = new Map<NodeId, 'active' | 'done'>();
  const stack: NodeId[] = [];

  const visit = (id: NodeId): void => {
    const entry = structs.get(id);
    if (!entry) return;

    state.set(id, 'active');
    stack.push(id);

    for (const edge of edgesOf(entry.node)) {
      if (edge.target === id) {
        diagnostics.semantic(
          `Struct '${index.arena.fqn(id)}' references itself through field '${edge.field.name}'`,
          entry.file,
          edge.field.position
        );
      } else if (state.get(edge.target) === 'active') {
        const cycle = [...stack.slice(stack.indexOf(edge.target)), edge.target];
        diagnostics.semantic(
          `Cyclic struct reference: ${cycle.map((n) => index.arena.fqn(n)).join(' -> ')}`,
          entry.file,
          edge.field.position
        );
      } else if (!state.has(edge.target)) {
        visit(edge.target);
      }
    }

    stack.pop();
    state.set(id, 'done');
  };

  for (const id of structs.keys()) {
    if (!state.has(id)) visit(id);
  }
}
