import { describe, it, expect, afterEach } from 'vitest';
import { resolve, join } from 'node:path';
import { cpSync, mkdtempSync, rmSync, writeFileSync, unlinkSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { Database } from '../../src/storage/database.js';
import { Indexer } from '../../src/indexer/indexer.js';
import {
  RepoRepository,
  FileRepository,
  DeclarationRepository,
  SymbolRepository,
  PatternRepository,
  toDeclaration,
} from '../../src/storage/index.js';
import type { DeclarationRecord } from '../../src/types.js';

const FIXTURE_REPO = resolve('fixtures/sample-repo');

function copyFixture(): string {
  const dir = mkdtempSync(join(tmpdir(), 'declscan-indexer-'));
  cpSync(FIXTURE_REPO, dir, { recursive: true });
  return dir;
}

describe('Indexer', () => {
  let db: Database;
  let tempDir: string | undefined;

  afterEach(() => {
    if (db) {
      db.close();
    }
    if (tempDir) {
      rmSync(tempDir, { recursive: true, force: true });
      tempDir = undefined;
    }
  });

  function repoId(root: string): number {
    const repo = new RepoRepository(db).findByPath(root);
    expect(repo).not.toBeNull();
    return repo?.id ?? -1;
  }

  function declarationsNamed(id: number, name: string): DeclarationRecord[] {
    const declarationRepo = new DeclarationRepository(db);
    return new FileRepository(db)
      .findByRepoId(id)
      .flatMap((file) => declarationRepo.findByFile(file.id))
      .filter((record) => record.name === name);
  }

  describe('Full index', () => {
    it('reports exact counts for the fixture repo', async () => {
      db = new Database();
      const summary = await new Indexer(db).indexRepo(FIXTURE_REPO, 'full');

      expect(summary.mode).toBe('full');
      expect(summary.filesIndexed).toBe(4);
      expect(summary.filesSkipped).toBe(0);
      expect(summary.filesDeleted).toBe(0);
      expect(summary.declarationCount).toBe(18);
      expect(summary.symbolCount).toBe(5);
      expect(summary.patternCount).toBe(6);
      expect(summary.warnings).toEqual([]);
    });

    it('stores declarations per file in source order', async () => {
      db = new Database();
      await new Indexer(db).indexRepo(FIXTURE_REPO, 'full');

      const id = repoId(FIXTURE_REPO);
      const file = new FileRepository(db).findByPath(id, 'src/engine/physics.cpp');
      expect(file).not.toBeNull();
      expect(file?.lang).toBe('cpp');
      expect(file?.encoding).toBe('utf-8');

      const decls = new DeclarationRepository(db).findByFile(file?.id ?? -1).map(toDeclaration);
      expect(decls.map((d) => [d.line, d.type, d.name, d.initializer])).toEqual([
        [5, 'int', 'retries', '3'],
        [6, 'uint8_t[]', 'scratch', ''],
        [7, 'unsigned long', 'collision_mask', '0xFF & 0x0F'],
        [8, 'long', 'index', '7 % 4'],
        [9, 'int', 'i', '0'],
        [11, 'int', 'k', 'i'],
        [16, 'Vec2', 'position', ''],
      ]);
    });

    it('stores static and const flags', async () => {
      db = new Database();
      await new Indexer(db).indexRepo(FIXTURE_REPO, 'full');

      const [record] = declarationsNamed(repoId(FIXTURE_REPO), 'MAX_BODIES');
      expect(toDeclaration(record)).toEqual({
        name: 'MAX_BODIES',
        type: 'int',
        initializer: '64',
        line: 8,
        isStatic: true,
        isConst: true,
      });
    });

    it('stores type definitions and learned comments', async () => {
      db = new Database();
      await new Indexer(db).indexRepo(FIXTURE_REPO, 'full');
      const id = repoId(FIXTURE_REPO);

      const symbols = new SymbolRepository(db).listWithPaths(id);
      expect(symbols.map((s) => `${s.kind} ${s.name} ${s.path}:${s.line}`)).toEqual([
        'struct RigidBody src/engine/physics.cpp:15',
        'struct Vec2 src/engine/physics.h:4',
        'class RigidBody src/engine/physics.h:9',
        'enum BodyKind src/engine/physics.h:11',
        'class Renderer src/render/renderer.hpp:2',
      ]);

      const patternRepo = new PatternRepository(db);
      expect(patternRepo.countByCategory(id)).toEqual({
        function: 1,
        general: 2,
        header: 2,
        variable: 1,
      });
      expect(patternRepo.mostCommonComment(id, 'int')).toBe('Retry budget');
    });

    it('does not duplicate rows when run twice', async () => {
      db = new Database();
      const indexer = new Indexer(db);
      await indexer.indexRepo(FIXTURE_REPO, 'full');
      const second = await indexer.indexRepo(FIXTURE_REPO, 'full');

      const id = repoId(FIXTURE_REPO);
      expect(second.filesDeleted).toBe(0);
      expect(new FileRepository(db).countByRepo(id)).toBe(4);
      expect(new DeclarationRepository(db).countByRepo(id)).toBe(18);
      expect(new SymbolRepository(db).countByRepo(id)).toBe(5);
      expect(new PatternRepository(db).countByRepo(id)).toBe(6);
    });

    it('records Latin-1 files with their encoding', async () => {
      db = new Database();
      tempDir = copyFixture();
      // "int caf\xe9 = 1;\n" is not valid UTF-8
      writeFileSync(
        join(tempDir, 'src', 'legacy.c'),
        Buffer.from([0x69, 0x6e, 0x74, 0x20, 0x63, 0x61, 0x66, 0xe9, 0x20, 0x3d, 0x20, 0x31, 0x3b, 0x0a]),
      );

      await new Indexer(db).indexRepo(tempDir, 'full');

      const id = repoId(tempDir);
      const file = new FileRepository(db).findByPath(id, 'src/legacy.c');
      expect(file?.encoding).toBe('latin1');
      const decls = new DeclarationRepository(db).findByFile(file?.id ?? -1);
      expect(decls.map((d) => [d.type, d.name, d.initializer])).toEqual([['int', 'caf', '1']]);
    });
  });

  describe('Incremental index', () => {
    it('requires a previous full index', async () => {
      db = new Database();
      await expect(new Indexer(db).indexRepo(FIXTURE_REPO, 'incremental')).rejects.toThrow(
        'Repository not yet indexed',
      );
    });

    it('detects no changes when nothing changed', async () => {
      db = new Database();
      const indexer = new Indexer(db);
      await indexer.indexRepo(FIXTURE_REPO, 'full');

      const summary = await indexer.indexRepo(FIXTURE_REPO, 'incremental');

      expect(summary.mode).toBe('incremental');
      expect(summary.filesIndexed).toBe(0);
      expect(summary.filesDeleted).toBe(0);
      expect(new DeclarationRepository(db).countByRepo(repoId(FIXTURE_REPO))).toBe(18);
    });

    it('re-analyzes changed files and replaces their rows', async () => {
      db = new Database();
      tempDir = copyFixture();
      const indexer = new Indexer(db);
      await indexer.indexRepo(tempDir, 'full');

      writeFileSync(join(tempDir, 'src', 'main.c'), 'int only_one = 1;\n');
      const summary = await indexer.indexRepo(tempDir, 'incremental');

      expect(summary.filesIndexed).toBe(1);
      expect(summary.declarationCount).toBe(1);
      expect(summary.patternCount).toBe(0);

      const id = repoId(tempDir);
      expect(new DeclarationRepository(db).countByRepo(id)).toBe(13);
      expect(new PatternRepository(db).countByRepo(id)).toBe(4);
      expect(declarationsNamed(id, 'MAX_BODIES')).toEqual([]);
    });

    it('indexes new files and removes deleted ones', async () => {
      db = new Database();
      tempDir = copyFixture();
      const indexer = new Indexer(db);
      await indexer.indexRepo(tempDir, 'full');

      unlinkSync(join(tempDir, 'src', 'render', 'renderer.hpp'));
      writeFileSync(join(tempDir, 'src', 'extra.c'), 'struct Extra { int e; };\n');
      const summary = await indexer.indexRepo(tempDir, 'incremental');

      expect(summary.filesIndexed).toBe(1);
      expect(summary.filesDeleted).toBe(1);
      expect(summary.symbolCount).toBe(1);
      expect(summary.declarationCount).toBe(1);

      const id = repoId(tempDir);
      expect(new FileRepository(db).findByRepoId(id).map((f) => f.path)).toEqual([
        'src/engine/physics.cpp',
        'src/engine/physics.h',
        'src/extra.c',
        'src/main.c',
      ]);
      expect(new SymbolRepository(db).listWithPaths(id).filter((s) => s.name === 'Renderer')).toEqual([]);
      expect(new DeclarationRepository(db).countByRepo(id)).toBe(17);
    });

    it('counts files removed since the last run during a full index', async () => {
      db = new Database();
      tempDir = copyFixture();
      const indexer = new Indexer(db);
      await indexer.indexRepo(tempDir, 'full');

      unlinkSync(join(tempDir, 'src', 'main.c'));
      const summary = await indexer.indexRepo(tempDir, 'full');

      expect(summary.filesIndexed).toBe(3);
      expect(summary.filesDeleted).toBe(1);
    });
  });
});
