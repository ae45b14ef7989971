export { SCHEMA_SQL } from './schema.js';
export { Database, expectRow } from './database.js';
export { RepoRepository } from './repositories/repo-repository.js';
export { FileRepository } from './repositories/file-repository.js';
export { DeclarationRepository, toDeclaration } from './repositories/declaration-repository.js';
export { SymbolRepository } from './repositories/symbol-repository.js';
export type { SymbolWithPath } from './repositories/symbol-repository.js';
export { PatternRepository } from './repositories/pattern-repository.js';
