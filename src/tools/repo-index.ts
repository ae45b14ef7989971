import type { Database } from '../storage/database.js';
import { RepoRepository } from '../storage/repositories/repo-repository.js';
import { Indexer } from '../indexer/indexer.js';
import type { IndexMode, IndexSummary } from '../types.js';
import { validateRepoPath } from './validation.js';

/**
 * Index a repository's C and C++ sources.
 *
 * If `mode` is not specified, it defaults to 'incremental' when the repo
 * has been previously indexed, or 'full' for a first-time index.
 *
 * @param db       - The Database instance.
 * @param repoPath - Path to the repository root.
 * @param mode     - 'full' or 'incremental'. Auto-detected if omitted.
 * @param excludes - Directory names to skip. Defaults to the configured excludes.
 * @returns Summary statistics of the indexing run.
 */
export async function repoIndex(
  db: Database,
  repoPath: string,
  mode?: string,
  excludes?: readonly string[],
): Promise<IndexSummary> {
  const pathResult = validateRepoPath(repoPath);
  if (!pathResult.valid) {
    throw new Error(pathResult.error);
  }

  let effectiveMode: IndexMode;
  if (mode === 'full' || mode === 'incremental') {
    effectiveMode = mode;
  } else if (mode !== undefined) {
    throw new Error(`Invalid mode: ${mode}. Use 'full' or 'incremental'.`);
  } else {
    const repoRepo = new RepoRepository(db);
    const existing = repoRepo.findByPath(pathResult.absolutePath);
    effectiveMode = existing ? 'incremental' : 'full';
  }

  const indexer = new Indexer(db);
  return indexer.indexRepo(pathResult.absolutePath, effectiveMode, { excludes });
}
