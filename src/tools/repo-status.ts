import type { Database } from '../storage/database.js';
import {
  RepoRepository,
  FileRepository,
  DeclarationRepository,
  SymbolRepository,
  PatternRepository,
} from '../storage/index.js';
import type { RepoStatus } from '../types.js';
import { validateRepoPath } from './validation.js';

/**
 * Get the indexing status of a repository.
 *
 * Returns `{ status: 'not_indexed' }` if the repo has never been indexed,
 * or file, declaration, symbol and pattern counts (patterns also by
 * category) if it has.
 */
export async function repoStatus(
  db: Database,
  repoPath: string,
): Promise<RepoStatus> {
  const pathResult = validateRepoPath(repoPath);
  if (!pathResult.valid) {
    throw new Error(pathResult.error);
  }

  const record = new RepoRepository(db).findByPath(pathResult.absolutePath);
  if (!record) {
    return { status: 'not_indexed' };
  }

  const fileRepo = new FileRepository(db);
  const patternRepo = new PatternRepository(db);

  return {
    status: 'indexed',
    repoId: record.id,
    rootPath: record.root_path,
    lastIndexedAt: record.updated_at,
    fileCounts: {
      total: fileRepo.countByRepo(record.id),
      byLang: fileRepo.countByLang(record.id),
    },
    declarationCount: new DeclarationRepository(db).countByRepo(record.id),
    symbolCount: new SymbolRepository(db).countByRepo(record.id),
    patternCount: patternRepo.countByRepo(record.id),
    patternsByCategory: patternRepo.countByCategory(record.id),
  };
}
