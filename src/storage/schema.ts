/**
 * SQLite schema for the declscan index.
 *
 * Every per-file table references `files` with ON DELETE CASCADE, so
 * removing a file (or a repo) clears its declarations, symbols and
 * learned comment patterns.
 */
export const SCHEMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA foreign_keys = ON;

CREATE TABLE IF NOT EXISTS repos (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  root_path  TEXT    NOT NULL UNIQUE,
  created_at TEXT    NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT    NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS files (
  id              INTEGER PRIMARY KEY AUTOINCREMENT,
  repo_id         INTEGER NOT NULL REFERENCES repos(id) ON DELETE CASCADE,
  path            TEXT    NOT NULL,
  lang            TEXT    NOT NULL,
  sha256          TEXT    NOT NULL,
  mtime           REAL    NOT NULL,
  size_bytes      INTEGER NOT NULL,
  encoding        TEXT    NOT NULL,
  last_indexed_at TEXT    NOT NULL DEFAULT (datetime('now')),
  UNIQUE(repo_id, path)
);

CREATE TABLE IF NOT EXISTS declarations (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  repo_id     INTEGER NOT NULL REFERENCES repos(id) ON DELETE CASCADE,
  file_id     INTEGER NOT NULL REFERENCES files(id) ON DELETE CASCADE,
  name        TEXT    NOT NULL,
  type        TEXT    NOT NULL,
  initializer TEXT    NOT NULL DEFAULT '',
  line        INTEGER NOT NULL,
  is_static   INTEGER NOT NULL DEFAULT 0,
  is_const    INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS symbols (
  id      INTEGER PRIMARY KEY AUTOINCREMENT,
  repo_id INTEGER NOT NULL REFERENCES repos(id) ON DELETE CASCADE,
  file_id INTEGER NOT NULL REFERENCES files(id) ON DELETE CASCADE,
  kind    TEXT    NOT NULL,
  name    TEXT    NOT NULL,
  line    INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS comment_patterns (
  id       INTEGER PRIMARY KEY AUTOINCREMENT,
  repo_id  INTEGER NOT NULL REFERENCES repos(id) ON DELETE CASCADE,
  file_id  INTEGER NOT NULL REFERENCES files(id) ON DELETE CASCADE,
  category TEXT    NOT NULL,
  key      TEXT,
  comment  TEXT    NOT NULL,
  context  TEXT
);

CREATE INDEX IF NOT EXISTS idx_files_repo_path
  ON files(repo_id, path);

CREATE INDEX IF NOT EXISTS idx_declarations_repo_file
  ON declarations(repo_id, file_id);

CREATE INDEX IF NOT EXISTS idx_symbols_repo_name
  ON symbols(repo_id, name);

CREATE INDEX IF NOT EXISTS idx_patterns_repo_category_key
  ON comment_patterns(repo_id, category, key);
`;
