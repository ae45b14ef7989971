import type { PatternEntry, PatternRecord } from '../../types.js';
import type { PatternLookup } from '../../comments/generator.js';
import { expectRow } from '../database.js';
import type { Database } from '../database.js';

/**
 * Repository for the `comment_patterns` table.
 */
export class PatternRepository {
  private readonly stmtInsert;
  private readonly stmtMostCommon;
  private readonly stmtCountByRepo;
  private readonly stmtCountByCategory;

  constructor(private readonly database: Database) {
    const db = this.database.db;

    this.stmtInsert = db.prepare<
      [number, number, string, string | null, string, string | null],
      PatternRecord
    >(`
      INSERT INTO comment_patterns (repo_id, file_id, category, key, comment, context)
      VALUES (?, ?, ?, ?, ?, ?)
      RETURNING *
    `);

    // Ties resolve to the comment first stored.
    this.stmtMostCommon = db.prepare<[number, string], { comment: string }>(`
      SELECT comment
      FROM comment_patterns
      WHERE repo_id = ? AND category = 'variable' AND key = ?
      GROUP BY comment
      ORDER BY COUNT(*) DESC, MIN(id) ASC
      LIMIT 1
    `);

    this.stmtCountByRepo = db.prepare<[number], { cnt: number }>(`
      SELECT COUNT(*) AS cnt FROM comment_patterns WHERE repo_id = ?
    `);

    this.stmtCountByCategory = db.prepare<[number], { category: string; cnt: number }>(`
      SELECT category, COUNT(*) AS cnt FROM comment_patterns WHERE repo_id = ? GROUP BY category
    `);
  }

  /** Store one learned comment. */
  insert(repoId: number, fileId: number, entry: PatternEntry): PatternRecord {
    return expectRow(
      this.stmtInsert.get(repoId, fileId, entry.category, entry.key, entry.comment, entry.context),
      'pattern insert',
    );
  }

  /** Most frequent variable comment stored for `type`, or null. */
  mostCommonComment(repoId: number, type: string): string | null {
    return this.stmtMostCommon.get(repoId, type)?.comment ?? null;
  }

  /** A {@link PatternLookup} bound to one repo, for the comment generator. */
  lookupFor(repoId: number): PatternLookup {
    return { mostCommonComment: (type) => this.mostCommonComment(repoId, type) };
  }

  /** Total learned comments for a repo. */
  countByRepo(repoId: number): number {
    return this.stmtCountByRepo.get(repoId)?.cnt ?? 0;
  }

  /** Learned comment counts grouped by category. */
  countByCategory(repoId: number): Record<string, number> {
    const result: Record<string, number> = {};
    for (const row of this.stmtCountByCategory.all(repoId)) {
      result[row.category] = row.cnt;
    }
    return result;
  }
}
