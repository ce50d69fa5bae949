import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { loadProgram, MemorySourceHost, NodeSourceHost } from './index.js';

const TEST_DIR = '.test-sources/loader';

describe('loadProgram', () => {
  describe('with in-memory sources', () => {
    it('loads imports depth-first and reads each path once', async () => {
      const host = new MemorySourceHost({
        'main.idl': 'package app; import "geo"; import "common";',
        'geo.idl': 'package geo; import "common"; struct Point {}',
        'common.idl': 'package common; struct Id {}',
      });

      const program = await loadProgram('main.idl', { host });

      expect(program.errors).toEqual([]);
      expect(program.entrypoint).toBe('main.idl');
      expect(program.files.map((f) => f.path)).toEqual(['main.idl', 'geo.idl', 'common.idl']);

      const [main] = program.files;
      expect(main.imports.map((i) => program.importTargets.get(i.id))).toEqual(['geo.idl', 'common.idl']);
      expect(program.sources.get('common.idl')).toBe('package common; struct Id {}');
    });

    it('terminates on cyclic imports', async () => {
      const host = new MemorySourceHost({
        'a.idl': 'package a; import "b";',
        'b.idl': 'package b; import "a";',
      });

      const program = await loadProgram('a.idl', { host });

      expect(program.errors).toEqual([]);
      expect(program.files.map((f) => f.path)).toEqual(['a.idl', 'b.idl']);
      expect(program.importTargets.get(program.files[1].imports[0].id)).toBe('a.idl');
    });

    it('resolves imports relative to the importing file', async () => {
      const host = new MemorySourceHost({
        'api/main.idl': 'package api; import "../shared/types";',
        'shared/types.idl': 'package shared; struct Id {}',
      });

      const program = await loadProgram('api/main.idl', { host });

      expect(program.files.map((f) => f.path)).toEqual(['api/main.idl', 'shared/types.idl']);
    });

    it('reports a missing import at the import declaration', async () => {
      const host = new MemorySourceHost({ 'main.idl': 'package app; import "nope";' });

      const program = await loadProgram('main.idl', { host });

      expect(program.errors.map((e) => e.toDiagnostic())).toEqual([
        'main.idl:1:14: Cannot import "nope": nope.idl does not exist',
      ]);
      expect(program.errors[0].name).toBe('ImportError');
    });

    it('reports a directory given as an import', async () => {
      const host = new MemorySourceHost({
        'main.idl': 'package app; import "dir";',
        'dir.idl/inner.idl': 'package inner;',
      });

      const program = await loadProgram('main.idl', { host });

      expect(program.errors.map((e) => e.message)).toEqual(['Cannot import "dir": dir.idl is a directory']);
    });

    it('reports a missing entry file', async () => {
      const program = await loadProgram('missing.idl', { host: new MemorySourceHost() });

      expect(program.files).toEqual([]);
      expect(program.errors.map((e) => e.message)).toEqual(['Cannot load entry file: missing.idl does not exist']);
    });

    it('collects parse errors from imported files', async () => {
      const host = new MemorySourceHost({
        'main.idl': 'package app; import "bad";',
        'bad.idl': 'package bad; struct S { x = 1; }',
      });

      const program = await loadProgram('main.idl', { host });

      expect(program.errors.map((e) => e.toDiagnostic())).toEqual(['bad.idl:1:27: Expected a type']);
    });

    it('honours a custom extension', async () => {
      const host = new MemorySourceHost(
        { 'main.arf': 'package app; import "other";', 'other.arf': 'package other;' },
        '.arf'
      );

      const program = await loadProgram('main.arf', { host });

      expect(program.files.map((f) => f.path)).toEqual(['main.arf', 'other.arf']);
    });
  });

  describe('with the file system', () => {
    beforeEach(async () => {
      await mkdir(TEST_DIR, { recursive: true });
    });

    afterEach(async () => {
      await rm(TEST_DIR, { recursive: true, force: true });
    });

    it('loads files from disk', async () => {
      await writeFile(join(TEST_DIR, 'main.idl'), 'package app; import "geo";');
      await writeFile(join(TEST_DIR, 'geo.idl'), 'package geo; struct Point {}');

      const program = await loadProgram(join(TEST_DIR, 'main.idl'));

      expect(program.errors).toEqual([]);
      expect(program.files.map((f) => f.path)).toEqual([
        resolve(TEST_DIR, 'main.idl'),
        resolve(TEST_DIR, 'geo.idl'),
      ]);
    });

    it('reports missing files and directories', async () => {
      await writeFile(join(TEST_DIR, 'main.idl'), 'package app;\nimport "missing";\nimport "sub";');
      await mkdir(join(TEST_DIR, 'sub.idl'));

      const program = await loadProgram(join(TEST_DIR, 'main.idl'), { host: new NodeSourceHost() });

      expect(program.errors.map((e) => e.message)).toEqual([
        `Cannot import "missing": ${resolve(TEST_DIR, 'missing.idl')} does not exist`,
        `Cannot import "sub": ${resolve(TEST_DIR, 'sub.idl')} is a directory`,
      ]);
      expect(program.errors.map((e) => e.location.line)).toEqual([2, 3]);
    });
  });
});
