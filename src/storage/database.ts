import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import BetterSqlite3 from 'better-sqlite3';
import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import { SCHEMA_SQL } from './schema.js';

/**
 * Thin wrapper around better-sqlite3 that initialises the schema
 * and exposes helpers used by the repository classes.
 */
export class Database {
  /** Raw better-sqlite3 handle -- used directly by repositories. */
  public readonly db: BetterSqlite3Database;

  /**
   * Open (or create) a SQLite database.
   *
   * @param dbPath - File path, or `:memory:` for an in-memory database (default).
   */
  constructor(dbPath: string = ':memory:') {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new BetterSqlite3(dbPath);

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');

    // All statements are IF NOT EXISTS, so safe to re-run
    this.db.exec(SCHEMA_SQL);
  }

  /**
   * Execute `fn` inside a transaction.
   * If `fn` throws, the transaction is rolled back and the error is re-thrown.
   */
  transaction<T>(fn: () => T): T {
    const wrapped = this.db.transaction(fn);
    return wrapped();
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }
}

/** Unwrap the row of an `INSERT ... RETURNING` statement. */
export function expectRow<T>(row: T | undefined, statement: string): T {
  if (row === undefined) {
    throw new Error(`${statement} returned no row`);
  }
  return row;
}
