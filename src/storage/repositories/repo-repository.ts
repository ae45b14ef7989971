import type { RepoRecord } from '../../types.js';
import { expectRow } from '../database.js';
import type { Database } from '../database.js';

/**
 * Repository for the `repos` table.
 */
export class RepoRepository {
  private readonly stmtUpsert;
  private readonly stmtFindByPath;

  constructor(private readonly database: Database) {
    const db = this.database.db;

    this.stmtUpsert = db.prepare<[string], RepoRecord>(`
      INSERT INTO repos (root_path)
      VALUES (?)
      ON CONFLICT (root_path) DO UPDATE SET
        updated_at = datetime('now')
      RETURNING *
    `);

    this.stmtFindByPath = db.prepare<[string], RepoRecord>(`
      SELECT * FROM repos WHERE root_path = ?
    `);
  }

  /** Insert a new repo or touch `updated_at` if it already exists. */
  upsert(rootPath: string): RepoRecord {
    return expectRow(this.stmtUpsert.get(rootPath), 'repo upsert');
  }

  /** Look up a repo by its filesystem root path. */
  findByPath(rootPath: string): RepoRecord | null {
    return this.stmtFindByPath.get(rootPath) ?? null;
  }
}
