import { describe, it, expect } from 'vitest';
import { parse } from '../parser/index.js';
import { IdGenerator } from '../ast/arena.js';
import { ProgramIndex, SymbolResolver } from './index.js';
import type { NodeId, SourceFile, StructDeclaration, TypeExpr, UserTypeRef } from '../ast/nodes.js';

/**
 * Parse each [path, source] pair; import literals are used verbatim as the
 * target paths.
 */
function program(...sources: Array<[string, string]>): { files: SourceFile[]; index: ProgramIndex } {
  const ids = new IdGenerator();
  const files = sources.map(([path, source]) => {
    const result = parse(source, path, ids);
    expect(result.errors).toEqual([]);
    return result.file;
  });
  const importTargets = new Map(
    files.flatMap((f) => f.imports.map((i): [NodeId, string] => [i.id, i.path]))
  );
  return { files, index: new ProgramIndex(files, { importTargets }) };
}

function struct(file: SourceFile, name: string): StructDeclaration {
  const found = file.structs.find((s) => s.name === name);
  if (!found) throw new Error(`no struct ${name}`);
  return found;
}

function fieldType(owner: StructDeclaration, name: string): TypeExpr {
  for (const field of owner.fields) {
    if (field.type === 'PlainField' && field.name === name) return field.valueType;
  }
  throw new Error(`no field ${name}`);
}

function userType(type: TypeExpr): UserTypeRef {
  if (type.kind !== 'simpleUser' && type.kind !== 'qualifiedUser') {
    throw new Error(`not a user type: ${type.kind}`);
  }
  return type;
}

function resolveField(index: ProgramIndex, file: SourceFile, owner: StructDeclaration, field: string) {
  const resolver = new SymbolResolver(index);
  return resolver.resolve(userType(fieldType(owner, field)), { file, containerId: owner.id });
}

describe('SymbolResolver', () => {
  describe('lookup', () => {
    it('resolves a simple name at package level', () => {
      const { files, index } = program(['a.idl', 'package demo; struct A { b B = 1; } struct B {}']);
      const outcome = resolveField(index, files[0], struct(files[0], 'A'), 'b');

      expect(outcome.ok).toBe(true);
      if (outcome.ok) {
        expect(outcome.resolution.fqn).toBe('demo.B');
        expect(outcome.resolution.kind).toBe('struct');
        expect(outcome.resolution.declarationId).toBe(struct(files[0], 'B').id);
      }
    });

    it('searches enclosing structs from the innermost outwards', () => {
      const { files, index } = program([
        'a.idl',
        'package demo; struct Outer { struct Inner { k Kind = 1; } enum Kind { A = 1; } }',
      ]);
      const inner = struct(files[0], 'Outer').structs[0];
      const outcome = resolveField(index, files[0], inner, 'k');

      expect(outcome).toMatchObject({ ok: true, resolution: { fqn: 'demo.Outer.Kind', kind: 'enum' } });
    });

    it('descends through nested struct names', () => {
      const { files, index } = program([
        'a.idl',
        'package demo; struct Outer { struct Inner {} } struct User { i Outer.Inner = 1; }',
      ]);
      const outcome = resolveField(index, files[0], struct(files[0], 'User'), 'i');

      expect(outcome).toMatchObject({ ok: true, resolution: { fqn: 'demo.Outer.Inner' } });
    });

    it('rewrites a synthesised import alias to its package', () => {
      const { files, index } = program(
        ['geo.idl', 'package org.geo; struct Point {}'],
        ['main.idl', 'package app; import "geo.idl"; struct Place { p geo.Point = 1; }']
      );
      const outcome = resolveField(index, files[1], struct(files[1], 'Place'), 'p');

      expect(outcome).toMatchObject({ ok: true, resolution: { fqn: 'org.geo.Point' } });
    });

    it('rewrites an explicit import alias', () => {
      const { files, index } = program(
        ['geo.idl', 'package org.geo; struct Point {}'],
        ['main.idl', 'package app; import "geo.idl" as g; struct Place { p g.Point = 1; }']
      );
      const outcome = resolveField(index, files[1], struct(files[1], 'Place'), 'p');

      expect(outcome).toMatchObject({ ok: true, resolution: { fqn: 'org.geo.Point' } });
    });

    it('resolves fully-qualified names', () => {
      const { files, index } = program(
        ['geo.idl', 'package org.geo; struct Point {}'],
        ['main.idl', 'package app; struct Place { p org.geo.Point = 1; }']
      );
      const outcome = resolveField(index, files[1], struct(files[1], 'Place'), 'p');

      expect(outcome).toMatchObject({ ok: true, resolution: { fqn: 'org.geo.Point' } });
    });

    it('resolves names qualified by the own package of the file', () => {
      const { files, index } = program(['a.idl', 'package demo.core; struct A { b demo.core.B = 1; } struct B {}']);
      const outcome = resolveField(index, files[0], struct(files[0], 'A'), 'b');

      expect(outcome).toMatchObject({ ok: true, resolution: { fqn: 'demo.core.B' } });
    });
  });

  describe('failures', () => {
    it('reports undefined types at the reference', () => {
      const { files, index } = program(['a.idl', 'package demo; struct A { m Missing = 1; }']);
      const outcome = resolveField(index, files[0], struct(files[0], 'A'), 'm');

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error.toDiagnostic()).toBe("a.idl:1:28: Undefined type 'Missing'");
        expect(outcome.error.typeName).toBe('Missing');
      }
    });

    it('refuses services as types', () => {
      const { files, index } = program(['a.idl', 'package demo; service Svc {} struct A { s Svc = 1; }']);
      const outcome = resolveField(index, files[0], struct(files[0], 'A'), 's');

      expect(outcome.ok ? undefined : outcome.error.message).toBe("Cannot use service 'demo.Svc' as a type");
    });

    it('refuses packages as types', () => {
      const { files, index } = program(
        ['geo.idl', 'package org.geo; struct Point {}'],
        ['main.idl', 'package app; struct Place { p org.geo = 1; }']
      );
      const outcome = resolveField(index, files[1], struct(files[1], 'Place'), 'p');

      expect(outcome.ok ? undefined : outcome.error.message).toBe("Cannot use package 'org.geo' as a type");
    });
  });

  it('returns the recorded result for an already-resolved reference', () => {
    const { files, index } = program(['a.idl', 'package demo; struct A { b B = 1; } struct B {}']);
    const resolver = new SymbolResolver(index);
    const owner = struct(files[0], 'A');
    const ref = userType(fieldType(owner, 'b'));

    const first = resolver.resolve(ref, { file: files[0], containerId: owner.id });
    const second = resolver.resolve(ref, { file: files[0], containerId: owner.id });

    expect(first).toEqual(second);
    expect(resolver.table.size).toBe(1);
    expect(resolver.table.fqnOf(ref.id)).toBe('demo.B');
  });

  describe('map keys', () => {
    it('accepts primitive, enum and struct keys and rejects the rest', () => {
      const { files, index } = program([
        'a.idl',
        [
          'package demo;',
          'struct S {}',
          'enum E { A = 1; }',
          'struct T {',
          '  a map<optional<string>, S> = 0;',
          '  b map<bytes, S> = 1;',
          '  c map<E, S> = 2;',
          '  d map<S, string> = 3;',
          '  e map<array<string>, S> = 4;',
          '  f map<map<string, string>, S> = 5;',
          '  g map<int64, S> = 6;',
          '}',
        ].join('\n'),
      ]);
      const resolver = new SymbolResolver(index);
      const owner = struct(files[0], 'T');
      const messages = (field: string) =>
        resolver.resolveType(fieldType(owner, field), { file: files[0], containerId: owner.id }).map((e) => e.message);

      expect(messages('a')).toEqual(["Illegal map key type 'optional<string>'"]);
      expect(messages('b')).toEqual(["Illegal map key type 'bytes'"]);
      expect(messages('c')).toEqual([]);
      expect(messages('d')).toEqual([]);
      expect(messages('e')).toEqual(["Illegal map key type 'array<string>'"]);
      expect(messages('f')).toEqual(["Illegal map key type 'map<string, string>'"]);
      expect(messages('g')).toEqual([]);
    });

    it('reports an undefined value type independently of a legal key', () => {
      const { files, index } = program(['a.idl', 'package p; enum E { A = 1; } struct S { m map<E, V> = 0; }']);
      const resolver = new SymbolResolver(index);
      const owner = struct(files[0], 'S');
      const errors = resolver.resolveType(fieldType(owner, 'm'), { file: files[0], containerId: owner.id });

      expect(errors.map((e) => e.message)).toEqual(["Undefined type 'V'"]);
    });
  });
});
