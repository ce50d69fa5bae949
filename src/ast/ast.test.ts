import { describe, it, expect } from 'vitest';
import { parse } from '../parser/index.js';
import { DeclarationArena } from './arena.js';
import {
  collectUserTypes,
  describeType,
  isStreaming,
  isUserType,
  typeKindLabel,
  typesEqual,
  unwrapStreaming,
} from './types.js';
import type { StructDeclaration, TypeExpr } from './nodes.js';

const SOURCE = `package org.geo;
struct Outer {
  struct Inner {
    enum Kind { A = 1; }
  }
  tags map<string, array<Inner>> = 1;
  maybe optional<geo.Point> = 2;
  count int32 = 3;
}
service Tracker {
  watch(stream Inner) -> stream Outer;
}
`;

function load() {
  const { file, errors } = parse(SOURCE, 'geo.idl');
  expect(errors).toEqual([]);
  return file;
}

function fieldType(struct: StructDeclaration, name: string): TypeExpr {
  for (const field of struct.fields) {
    if (field.type === 'PlainField' && field.name === name) return field.valueType;
  }
  throw new Error(`No plain field '${name}'`);
}

describe('type helpers', () => {
  it('renders types as written', () => {
    const [outer] = load().structs;

    expect(describeType(fieldType(outer, 'tags'))).toBe('map<string, array<Inner>>');
    expect(describeType(fieldType(outer, 'maybe'))).toBe('optional<geo.Point>');
    expect(describeType(fieldType(outer, 'count'))).toBe('int32');
  });

  it('labels types by kind', () => {
    const [outer] = load().structs;

    expect(typeKindLabel(fieldType(outer, 'tags'))).toBe('map');
    expect(typeKindLabel(fieldType(outer, 'count'))).toBe('int32');
  });

  it('collects nested user type references', () => {
    const [outer] = load().structs;

    expect(collectUserTypes(fieldType(outer, 'tags')).map((t) => t.name)).toEqual(['Inner']);
    expect(collectUserTypes(fieldType(outer, 'maybe')).map((t) => t.kind)).toEqual(['qualifiedUser']);
    expect(collectUserTypes(fieldType(outer, 'count'))).toEqual([]);
  });

  it('unwraps streaming signature types', () => {
    const [method] = load().services[0].methods;
    const param = method.params[0].valueType;

    expect(isStreaming(param)).toBe(true);
    expect(describeType(param)).toBe('stream Inner');
    expect(isUserType(unwrapStreaming(param))).toBe(true);
    expect(describeType(method.returns[0].valueType)).toBe('stream Outer');
  });

  it('compares types structurally', () => {
    const [outer] = load().structs;
    const tags = fieldType(outer, 'tags');
    const none = () => undefined;

    expect(typesEqual(tags, tags, none)).toBe(true);
    expect(typesEqual(tags, fieldType(outer, 'count'), none)).toBe(false);
  });

  it('compares user types by resolved name', () => {
    const [method] = load().services[0].methods;
    const inner = unwrapStreaming(method.params[0].valueType);
    const outer = unwrapStreaming(method.returns[0].valueType);

    expect(typesEqual(inner, outer, () => 'org.geo.Outer')).toBe(true);
    expect(typesEqual(inner, outer, () => undefined)).toBe(false);
  });
});

describe('DeclarationArena', () => {
  it('derives fully-qualified names through parent ids', () => {
    const file = load();
    const arena = DeclarationArena.fromFiles([file]);
    const [outer] = file.structs;
    const [inner] = outer.structs;
    const [kind] = inner.enums;

    expect(arena.fqn(kind.id)).toBe('org.geo.Outer.Inner.Kind');
    expect(arena.namePath(kind.id)).toEqual(['Outer', 'Inner', 'Kind']);
    expect(arena.parentOf(inner.id)?.name).toBe('Outer');
    expect(arena.parentOf(outer.id)).toBeUndefined();
    expect(arena.fqn(file.services[0].id)).toBe('org.geo.Tracker');
  });

  it('looks declarations up by kind', () => {
    const file = load();
    const arena = DeclarationArena.fromFiles([file]);
    const [outer] = file.structs;

    expect(arena.structs().map((s) => s.name)).toEqual(['Outer', 'Inner']);
    expect(arena.enums().map((e) => e.name)).toEqual(['Kind']);
    expect(arena.services().map((s) => s.name)).toEqual(['Tracker']);
    expect(arena.getStruct(outer.id)?.name).toBe('Outer');
    expect(arena.getEnum(outer.id)).toBeUndefined();
    expect(arena.fileOf(outer.id)?.path).toBe('geo.idl');
  });

  it('rejects unknown ids', () => {
    expect(() => new DeclarationArena().fqn(999)).toThrow('Unknown declaration id 999');
  });
});
