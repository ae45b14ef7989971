import { join, relative, sep } from 'node:path';

import type { Database } from '../storage/database.js';
import { RepoRepository, SymbolRepository } from '../storage/index.js';
import { buildSymbolMap, linkReferences } from '../linker/reference-linker.js';
import type { LinkResult } from '../types.js';
import { validateRepoPath } from './validation.js';

/**
 * Link mentions of the repo's indexed class, struct and enum names in a
 * piece of Markdown.
 *
 * @param baseDir - Directory the links are written relative to. Defaults to
 *                  the repository root.
 */
export async function linkRepoReferences(
  db: Database,
  repoPath: string,
  text: string,
  baseDir?: string,
): Promise<LinkResult> {
  const pathResult = validateRepoPath(repoPath);
  if (!pathResult.valid) {
    throw new Error(pathResult.error);
  }
  const root = pathResult.absolutePath;

  const repo = new RepoRepository(db).findByPath(root);
  if (!repo) {
    throw new Error(`Repository not indexed: ${root}. Run repo_index first.`);
  }

  const definitions = new SymbolRepository(db).listWithPaths(repo.id).map((s) => ({
    name: s.name,
    line: s.line,
    path: baseDir === undefined ? s.path : toPosix(relative(baseDir, join(root, s.path))),
  }));

  return linkReferences(text, buildSymbolMap(definitions));
}

function toPosix(p: string): string {
  return p.split(sep).join('/');
}
