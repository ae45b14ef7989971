import { analyzeSourceWithScopes } from '../analyzer/index.js';
import { readSource } from '../indexer/reader.js';
import type { Declaration, Scope, SourceEncoding } from '../types.js';
import { validateFilePath } from './validation.js';

export interface SourceAnalysis {
  declarations: Declaration[];
  /** Present only when scopes were requested. */
  scopes?: Scope[];
}

export interface FileAnalysis extends SourceAnalysis {
  path: string;
  encoding: SourceEncoding;
}

/**
 * Analyze an in-memory snippet.
 *
 * @param source        - C or C++ source text.
 * @param includeScopes - Also return the scope tree built during the pass.
 */
export function analyzeSnippet(source: string, includeScopes = false): SourceAnalysis {
  const result = analyzeSourceWithScopes(source);
  if (!includeScopes) {
    return { declarations: result.declarations };
  }
  return { declarations: result.declarations, scopes: result.scopes };
}

/**
 * Read a file from disk (UTF-8, falling back to Latin-1) and analyze it.
 */
export async function analyzeFile(
  filePath: string,
  includeScopes = false,
): Promise<FileAnalysis> {
  const pathResult = validateFilePath(filePath);
  if (!pathResult.valid) {
    throw new Error(pathResult.error);
  }

  const decoded = await readSource(pathResult.absolutePath);
  return {
    path: pathResult.absolutePath,
    encoding: decoded.encoding,
    ...analyzeSnippet(decoded.text, includeScopes),
  };
}
