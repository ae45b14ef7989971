import type { SymbolRecord, TypeDefinition } from '../../types.js';
import { expectRow } from '../database.js';
import type { Database } from '../database.js';

/** A symbol joined with the path of the file that defines it. */
export interface SymbolWithPath {
  name: string;
  kind: string;
  path: string;
  line: number;
}

/**
 * Repository for the `symbols` table (class / struct / enum definitions).
 */
export class SymbolRepository {
  private readonly stmtInsert;
  private readonly stmtListWithPaths;
  private readonly stmtCountByRepo;

  constructor(private readonly database: Database) {
    const db = this.database.db;

    this.stmtInsert = db.prepare<[number, number, string, string, number], SymbolRecord>(`
      INSERT INTO symbols (repo_id, file_id, kind, name, line)
      VALUES (?, ?, ?, ?, ?)
      RETURNING *
    `);

    this.stmtListWithPaths = db.prepare<[number], SymbolWithPath>(`
      SELECT s.name, s.kind, f.path, s.line
      FROM symbols s
      JOIN files f ON f.id = s.file_id
      WHERE s.repo_id = ?
      ORDER BY f.path, s.line
    `);

    this.stmtCountByRepo = db.prepare<[number], { cnt: number }>(`
      SELECT COUNT(*) AS cnt FROM symbols WHERE repo_id = ?
    `);
  }

  /** Insert a type definition found in a file. */
  insert(repoId: number, fileId: number, def: TypeDefinition): SymbolRecord {
    return expectRow(
      this.stmtInsert.get(repoId, fileId, def.kind, def.name, def.line),
      'symbol insert',
    );
  }

  /** All definitions in a repo with their file paths, in path/line order. */
  listWithPaths(repoId: number): SymbolWithPath[] {
    return this.stmtListWithPaths.all(repoId);
  }

  /** Total symbol count for a repo. */
  countByRepo(repoId: number): number {
    return this.stmtCountByRepo.get(repoId)?.cnt ?? 0;
  }
}
