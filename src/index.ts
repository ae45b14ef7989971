export * from './types.js';
export {
  tokenize,
  extract,
  extractScopes,
  analyzeSource,
  analyzeSourceWithScopes,
  KEYWORDS,
  OPERATOR_CHARS,
  DECLARATION_MODIFIERS,
} from './analyzer/index.js';
export { learnPatterns } from './comments/pattern-learner.js';
export { TermDictionary, loadDictionary } from './comments/dictionary.js';
export { CommentGenerator, OPERATOR_DESCRIPTIONS } from './comments/generator.js';
export type { PatternLookup } from './comments/generator.js';
export { formatSuggestion, renderReport } from './comments/report.js';
export { scanTypeDefinitions } from './linker/symbol-scanner.js';
export { linkReferences, buildSymbolMap } from './linker/reference-linker.js';
export { walkSources, detectLanguage } from './indexer/walker.js';
export { decodeSource, readSource } from './indexer/reader.js';
export { Indexer } from './indexer/indexer.js';
export type { IndexOptions } from './indexer/indexer.js';
export { Database } from './storage/database.js';
export * from './tools/index.js';
