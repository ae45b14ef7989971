import { readFile } from 'node:fs/promises';

import type { Database } from '../storage/database.js';
import {
  RepoRepository,
  FileRepository,
  DeclarationRepository,
  SymbolRepository,
  PatternRepository,
} from '../storage/index.js';
import { analyzeSource } from '../analyzer/index.js';
import { learnPatterns } from '../comments/pattern-learner.js';
import { scanTypeDefinitions } from '../linker/symbol-scanner.js';
import { DEFAULT_EXCLUDES } from '../config.js';
import { walkSources } from './walker.js';
import { decodeSource } from './reader.js';
import { hashBytes, hashFile } from './hasher.js';
import type {
  DecodedSource,
  DiscoveredFile,
  IndexMode,
  IndexSummary,
} from '../types.js';

/** Batch size for transactional file processing. */
const BATCH_SIZE = 50;

export interface IndexOptions {
  /** Directory names to skip at any depth. */
  excludes?: readonly string[];
}

/** A discovered file with its content already read and decoded. */
interface LoadedFile {
  discovered: DiscoveredFile;
  sha256: string;
  source: DecodedSource;
}

interface FileCounts {
  declarations: number;
  symbols: number;
  patterns: number;
}

/** Mutable tallies shared by the phases of one run. */
interface RunState {
  filesIndexed: number;
  filesSkipped: number;
  declarationCount: number;
  symbolCount: number;
  patternCount: number;
  warnings: string[];
}

/**
 * Orchestrates full and incremental indexing of a repository.
 *
 * The indexer walks the file tree, runs the declaration analyzer, the
 * type-definition scanner and the comment-pattern learner over each file,
 * and stores the results.
 */
export class Indexer {
  private readonly repoRepo: RepoRepository;
  private readonly fileRepo: FileRepository;
  private readonly declarationRepo: DeclarationRepository;
  private readonly symbolRepo: SymbolRepository;
  private readonly patternRepo: PatternRepository;

  constructor(private readonly database: Database) {
    this.repoRepo = new RepoRepository(database);
    this.fileRepo = new FileRepository(database);
    this.declarationRepo = new DeclarationRepository(database);
    this.symbolRepo = new SymbolRepository(database);
    this.patternRepo = new PatternRepository(database);
  }

  /**
   * Index a repository.
   *
   * @param repoRoot - Absolute path to the repository root directory.
   * @param mode     - "full" re-analyzes everything; "incremental" processes only changes.
   * @returns Summary statistics about the indexing run.
   */
  async indexRepo(
    repoRoot: string,
    mode: IndexMode,
    options: IndexOptions = {},
  ): Promise<IndexSummary> {
    const startTime = Date.now();
    const excludes = options.excludes ?? DEFAULT_EXCLUDES;

    if (mode === 'full') {
      return this.indexFull(repoRoot, excludes, startTime);
    }
    return this.indexIncremental(repoRoot, excludes, startTime);
  }

  // ---------------------------------------------------------------------------
  // Full index
  // ---------------------------------------------------------------------------

  private async indexFull(
    repoRoot: string,
    excludes: readonly string[],
    startTime: number,
  ): Promise<IndexSummary> {
    const state = newRunState();
    const repo = this.repoRepo.upsert(repoRoot);
    const repoId = repo.id;

    const discoveredFiles = await walkSources(repoRoot, excludes);
    const discoveredPaths = new Set(discoveredFiles.map((f) => f.path));

    // Start from a clean slate; per-file rows cascade with the file.
    const stored = this.fileRepo.findByRepoId(repoId);
    const filesDeleted = stored.filter((f) => !discoveredPaths.has(f.path)).length;
    this.database.transaction(() => {
      for (const f of stored) this.fileRepo.deleteByPath(repoId, f.path);
    });

    const loaded = await this.readAllFiles(discoveredFiles, state);
    this.processInBatches(repoId, loaded, state, 'index');

    return this.summarize(repoId, 'full', filesDeleted, startTime, state);
  }

  // ---------------------------------------------------------------------------
  // Incremental index
  // ---------------------------------------------------------------------------

  private async indexIncremental(
    repoRoot: string,
    excludes: readonly string[],
    startTime: number,
  ): Promise<IndexSummary> {
    const state = newRunState();

    const repo = this.repoRepo.findByPath(repoRoot);
    if (!repo) {
      throw new Error(
        `Repository not yet indexed: ${repoRoot}. Run a full index first.`,
      );
    }
    const repoId = this.repoRepo.upsert(repoRoot).id;

    const discoveredFiles = await walkSources(repoRoot, excludes);

    // Hash each discovered file and compute the change set
    const currentFiles: Array<{ path: string; sha256: string; mtime: number }> = [];
    // Still on disk but unhashable: keep the stored rows.
    const unreadable = new Set<string>();
    for (const df of discoveredFiles) {
      try {
        const sha256 = await hashFile(df.absolutePath);
        currentFiles.push({ path: df.path, sha256, mtime: df.mtime });
      } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        state.warnings.push(`Failed to hash ${df.path}: ${msg}`);
        state.filesSkipped++;
        unreadable.add(df.path);
      }
    }

    const changes = this.fileRepo.findChanged(repoId, currentFiles, unreadable);

    const discoveredByPath = new Map<string, DiscoveredFile>();
    for (const df of discoveredFiles) {
      discoveredByPath.set(df.path, df);
    }
    const pick = (paths: string[]): DiscoveredFile[] =>
      paths
        .map((p) => discoveredByPath.get(p))
        .filter((f): f is DiscoveredFile => f !== undefined);

    const newFiles = await this.readAllFiles(pick(changes.new), state);
    const changedFiles = await this.readAllFiles(pick(changes.changed), state);

    this.processInBatches(repoId, newFiles, state, 'index new file');

    // Changed files: drop the old rows first, then re-analyze
    this.database.transaction(() => {
      for (const { discovered } of changedFiles) {
        this.fileRepo.deleteByPath(repoId, discovered.path);
      }
    });
    this.processInBatches(repoId, changedFiles, state, 're-index');

    let filesDeleted = 0;
    for (const batch of toBatches(changes.deleted, BATCH_SIZE)) {
      this.database.transaction(() => {
        for (const fileRecord of batch) {
          this.fileRepo.deleteByPath(repoId, fileRecord.path);
          filesDeleted++;
        }
      });
    }

    return this.summarize(repoId, 'incremental', filesDeleted, startTime, state);
  }

  // ---------------------------------------------------------------------------
  // File I/O helpers
  // ---------------------------------------------------------------------------

  /**
   * Read, hash and decode files before entering synchronous transactions.
   * Files that cannot be read are recorded as warnings and skipped.
   */
  private async readAllFiles(
    files: DiscoveredFile[],
    state: RunState,
  ): Promise<LoadedFile[]> {
    const loaded: LoadedFile[] = [];

    for (const discovered of files) {
      try {
        const bytes = await readFile(discovered.absolutePath);
        loaded.push({
          discovered,
          sha256: hashBytes(bytes),
          source: decodeSource(bytes),
        });
      } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        state.warnings.push(`Cannot read ${discovered.path}: ${msg}`);
        state.filesSkipped++;
      }
    }

    return loaded;
  }

  // ---------------------------------------------------------------------------
  // Per-file processing (synchronous -- called inside transactions)
  // ---------------------------------------------------------------------------

  private processInBatches(
    repoId: number,
    files: LoadedFile[],
    state: RunState,
    action: string,
  ): void {
    for (const batch of toBatches(files, BATCH_SIZE)) {
      this.database.transaction(() => {
        for (const file of batch) {
          try {
            // Nested transaction: a failing file rolls back only its own rows.
            const counts = this.database.transaction(() => this.processFile(repoId, file));
            state.filesIndexed++;
            state.declarationCount += counts.declarations;
            state.symbolCount += counts.symbols;
            state.patternCount += counts.patterns;
          } catch (error) {
            state.filesSkipped++;
            const msg = error instanceof Error ? error.message : String(error);
            state.warnings.push(`Failed to ${action} ${file.discovered.path}: ${msg}`);
          }
        }
      });
    }
  }

  /**
   * Analyze one file and store its declarations, type definitions and
   * learned comment patterns.
   */
  private processFile(repoId: number, file: LoadedFile): FileCounts {
    const { discovered, source } = file;

    const declarations = analyzeSource(source.text);
    const definitions = scanTypeDefinitions(source.text);
    const learned = learnPatterns(source.text);

    const fileRecord = this.fileRepo.upsert(
      repoId,
      discovered.path,
      discovered.lang,
      file.sha256,
      discovered.mtime,
      discovered.size,
      source.encoding,
    );

    for (const declaration of declarations) {
      this.declarationRepo.insert(repoId, fileRecord.id, declaration);
    }
    for (const definition of definitions) {
      this.symbolRepo.insert(repoId, fileRecord.id, definition);
    }
    for (const entry of learned.entries) {
      this.patternRepo.insert(repoId, fileRecord.id, entry);
    }

    return {
      declarations: declarations.length,
      symbols: definitions.length,
      patterns: learned.entries.length,
    };
  }

  private summarize(
    repoId: number,
    mode: IndexMode,
    filesDeleted: number,
    startTime: number,
    state: RunState,
  ): IndexSummary {
    return {
      repoId,
      mode,
      filesIndexed: state.filesIndexed,
      filesSkipped: state.filesSkipped,
      filesDeleted,
      declarationCount: state.declarationCount,
      symbolCount: state.symbolCount,
      patternCount: state.patternCount,
      durationMs: Date.now() - startTime,
      warnings: state.warnings,
    };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function newRunState(): RunState {
  return {
    filesIndexed: 0,
    filesSkipped: 0,
    declarationCount: 0,
    symbolCount: 0,
    patternCount: 0,
    warnings: [],
  };
}

/**
 * Split an array into batches of the given size.
 */
function toBatches<T>(items: T[], batchSize: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}
