/**
 * Helpers over the closed TypeExpr union. Every switch here is exhaustive;
 * adding a variant fails compilation until each helper handles it.
 */
import type { NodeId, TypeExpr, UserTypeRef } from './nodes.js';

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

export function isUserType(type: TypeExpr): type is UserTypeRef {
  return type.kind === 'simpleUser' || type.kind === 'qualifiedUser';
}

export function isStreaming(type: TypeExpr): boolean {
  return type.kind === 'streaming';
}

export function unwrapStreaming(type: TypeExpr): TypeExpr {
  return type.kind === 'streaming' ? type.inner : type;
}

/**
 * Render a type the way it is written in source
 */
export function describeType(type: TypeExpr): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'array':
      return `array<${describeType(type.element)}>`;
    case 'map':
      return `map<${describeType(type.key)}, ${describeType(type.value)}>`;
    case 'optional':
      return `optional<${describeType(type.inner)}>`;
    case 'streaming':
      return `stream ${describeType(type.inner)}`;
    case 'simpleUser':
    case 'qualifiedUser':
      return type.name;
    default:
      return assertNever(type);
  }
}

/**
 * Short label for diagnostics ("optional", "map", "bytes", ...)
 */
export function typeKindLabel(type: TypeExpr): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'array':
    case 'map':
    case 'optional':
      return type.kind;
    case 'streaming':
      return 'stream';
    case 'simpleUser':
    case 'qualifiedUser':
      return `type ${type.name}`;
    default:
      return assertNever(type);
  }
}

/**
 * Every user type reference inside a type expression, outermost first
 */
export function collectUserTypes(type: TypeExpr): UserTypeRef[] {
  switch (type.kind) {
    case 'primitive':
      return [];
    case 'array':
      return collectUserTypes(type.element);
    case 'map':
      return [...collectUserTypes(type.key), ...collectUserTypes(type.value)];
    case 'optional':
    case 'streaming':
      return collectUserTypes(type.inner);
    case 'simpleUser':
    case 'qualifiedUser':
      return [type];
    default:
      return assertNever(type);
  }
}

/**
 * Structural equality of two type expressions. User types compare by the
 * FQN `resolve` returns for them, falling back to their written name.
 */
export function typesEqual(
  a: TypeExpr,
  b: TypeExpr,
  resolve: (id: NodeId) => string | undefined
): boolean {
  switch (a.kind) {
    case 'primitive':
      return b.kind === 'primitive' && a.name === b.name;
    case 'array':
      return b.kind === 'array' && typesEqual(a.element, b.element, resolve);
    case 'map':
      return b.kind === 'map' && typesEqual(a.key, b.key, resolve) && typesEqual(a.value, b.value, resolve);
    case 'optional':
      return b.kind === 'optional' && typesEqual(a.inner, b.inner, resolve);
    case 'streaming':
      return b.kind === 'streaming' && typesEqual(a.inner, b.inner, resolve);
    case 'simpleUser':
    case 'qualifiedUser': {
      if (!isUserType(b)) return false;
      const left = resolve(a.id) ?? a.name;
      const right = resolve(b.id) ?? b.name;
      return left === right;
    }
    default:
      return assertNever(a);
  }
}
