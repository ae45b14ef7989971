// --- Analyzer ---

// Token classes produced by the lexer
export type TokenKind = "identifier" | "keyword" | "literal" | "operator";

export interface Token {
  readonly kind: TokenKind;
  readonly text: string; // exact source slice, never empty
  readonly line: number; // 1-based
  readonly column: number; // 1-based
  readonly offset: number; // 0-based index into the source
}

export type ScopeKind = "global" | "block";

export interface Declaration {
  readonly name: string;
  readonly type: string; // base type plus sigils and an optional "[]" marker
  readonly initializer: string; // "" when absent
  readonly line: number;
  readonly isStatic: boolean;
  readonly isConst: boolean;
}

export interface Scope {
  kind: ScopeKind;
  depth: number;
  startLine: number;
  endLine: number | null; // null while open at end of input
  declarations: Declaration[];
}

export interface ExtractionResult {
  declarations: Declaration[];
  scopes: Scope[]; // every scope opened, global first
}

// --- Language / discovery ---

export type Language = "c" | "cpp";

export type SourceEncoding = "utf-8" | "latin1";

export interface DiscoveredFile {
  path: string; // relative to repo root, forward slashes
  absolutePath: string;
  lang: Language;
  mtime: number;
  size: number;
}

export interface DecodedSource {
  text: string;
  encoding: SourceEncoding;
}

// --- Comment patterns ---

export type PatternCategory =
  | "header"
  | "function"
  | "variable"
  | "control_flow"
  | "data_structure"
  | "general";

export interface PatternEntry {
  category: PatternCategory;
  key: string | null; // declared type for variables, keyword for control flow
  comment: string;
  context: string | null; // the code line the comment was attached to
}

export interface LearnedFile {
  entries: PatternEntry[];
  commentsFound: number;
}

// --- Symbols ---

export type TypeDefinitionKind = "class" | "struct" | "enum";

export interface TypeDefinition {
  kind: TypeDefinitionKind;
  name: string;
  line: number;
}

export interface SymbolLocation {
  path: string;
  line: number;
}

// --- Database Records ---

export type IndexMode = "full" | "incremental";

export interface RepoRecord {
  id: number;
  root_path: string;
  created_at: string;
  updated_at: string;
}

export interface FileRecord {
  id: number;
  repo_id: number;
  path: string;
  lang: Language;
  sha256: string;
  mtime: number;
  size_bytes: number;
  encoding: SourceEncoding;
  last_indexed_at: string;
}

export interface DeclarationRecord {
  id: number;
  repo_id: number;
  file_id: number;
  name: string;
  type: string;
  initializer: string;
  line: number;
  is_static: number; // 0 | 1
  is_const: number; // 0 | 1
}

export interface SymbolRecord {
  id: number;
  repo_id: number;
  file_id: number;
  kind: TypeDefinitionKind;
  name: string;
  line: number;
}

export interface PatternRecord {
  id: number;
  repo_id: number;
  file_id: number;
  category: PatternCategory;
  key: string | null;
  comment: string;
  context: string | null;
}

// --- Index Results ---

export interface IndexSummary {
  repoId: number;
  mode: IndexMode;
  filesIndexed: number;
  filesSkipped: number;
  filesDeleted: number;
  declarationCount: number;
  symbolCount: number;
  patternCount: number;
  durationMs: number;
  warnings: string[];
}

export type RepoStatus =
  | { status: "not_indexed" }
  | {
      status: "indexed";
      repoId: number;
      rootPath: string;
      lastIndexedAt: string;
      fileCounts: { total: number; byLang: Record<string, number> };
      declarationCount: number;
      symbolCount: number;
      patternCount: number;
      patternsByCategory: Record<string, number>;
    };

// --- Suggestions ---

export interface Suggestion {
  line: number;
  type: string;
  name: string;
  initializer: string;
  comment: string;
}

export interface FileSuggestions {
  path: string;
  suggestions: Suggestion[];
}

export interface SuggestionReport {
  files: FileSuggestions[];
  total: number;
}

export interface LinkResult {
  text: string;
  linked: string[];
}
