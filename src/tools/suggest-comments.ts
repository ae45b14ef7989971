import type { Database } from '../storage/database.js';
import {
  RepoRepository,
  FileRepository,
  DeclarationRepository,
  PatternRepository,
  toDeclaration,
} from '../storage/index.js';
import { CommentGenerator } from '../comments/generator.js';
import { loadDictionary } from '../comments/dictionary.js';
import { resolveDictionaryPath } from '../config.js';
import type { FileSuggestions, SuggestionReport } from '../types.js';
import { validateRepoPath } from './validation.js';

/**
 * Suggest comments for every stored declaration of an indexed repository.
 *
 * Learned comments come from the repo's own indexed sources. Files without
 * any suggestion are left out of the report.
 */
export async function suggestComments(
  db: Database,
  repoPath: string,
  dictionaryPath?: string,
): Promise<SuggestionReport> {
  const pathResult = validateRepoPath(repoPath);
  if (!pathResult.valid) {
    throw new Error(pathResult.error);
  }

  const repo = new RepoRepository(db).findByPath(pathResult.absolutePath);
  if (!repo) {
    throw new Error(
      `Repository not indexed: ${pathResult.absolutePath}. Run repo_index first.`,
    );
  }

  const dictionary = await loadDictionary(
    resolveDictionaryPath(pathResult.absolutePath, dictionaryPath),
  );
  const generator = new CommentGenerator(
    dictionary,
    new PatternRepository(db).lookupFor(repo.id),
  );

  const declarationRepo = new DeclarationRepository(db);
  const files: FileSuggestions[] = [];
  let total = 0;

  for (const file of new FileRepository(db).findByRepoId(repo.id)) {
    const declarations = declarationRepo.findByFile(file.id).map(toDeclaration);
    const suggestions = generator.suggestAll(declarations);
    if (suggestions.length === 0) continue;
    files.push({ path: file.path, suggestions });
    total += suggestions.length;
  }

  return { files, total };
}
