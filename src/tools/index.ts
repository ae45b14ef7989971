export { analyzeSnippet, analyzeFile } from './analyze-source.js';
export type { SourceAnalysis, FileAnalysis } from './analyze-source.js';
export { repoStatus } from './repo-status.js';
export { repoIndex } from './repo-index.js';
export { suggestComments } from './suggest-comments.js';
export { linkRepoReferences } from './link-references.js';
export {
  validateRepoPath,
  validateFilePath,
  readStringArg,
  readOptionalStringArg,
  readFlagArg,
  readOptionalStringListArg,
} from './validation.js';
export type { ToolArgs } from './validation.js';
