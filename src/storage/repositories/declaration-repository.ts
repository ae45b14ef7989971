import type { Declaration, DeclarationRecord } from '../../types.js';
import { expectRow } from '../database.js';
import type { Database } from '../database.js';

/** Convert a stored row back into the analyzer's plain record. */
export function toDeclaration(record: DeclarationRecord): Declaration {
  return {
    name: record.name,
    type: record.type,
    initializer: record.initializer,
    line: record.line,
    isStatic: record.is_static === 1,
    isConst: record.is_const === 1,
  };
}

/**
 * Repository for the `declarations` table.
 */
export class DeclarationRepository {
  private readonly stmtInsert;
  private readonly stmtFindByFile;
  private readonly stmtCountByRepo;

  constructor(private readonly database: Database) {
    const db = this.database.db;

    this.stmtInsert = db.prepare<
      [number, number, string, string, string, number, number, number],
      DeclarationRecord
    >(`
      INSERT INTO declarations (repo_id, file_id, name, type, initializer, line, is_static, is_const)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      RETURNING *
    `);

    this.stmtFindByFile = db.prepare<[number], DeclarationRecord>(`
      SELECT * FROM declarations WHERE file_id = ? ORDER BY id
    `);

    this.stmtCountByRepo = db.prepare<[number], { cnt: number }>(`
      SELECT COUNT(*) AS cnt FROM declarations WHERE repo_id = ?
    `);
  }

  /** Store one extracted declaration. */
  insert(repoId: number, fileId: number, declaration: Declaration): DeclarationRecord {
    return expectRow(
      this.stmtInsert.get(
        repoId,
        fileId,
        declaration.name,
        declaration.type,
        declaration.initializer,
        declaration.line,
        declaration.isStatic ? 1 : 0,
        declaration.isConst ? 1 : 0,
      ),
      'declaration insert',
    );
  }

  /** Declarations of one file, in extraction order. */
  findByFile(fileId: number): DeclarationRecord[] {
    return this.stmtFindByFile.all(fileId);
  }

  /** Total declaration count for a repo. */
  countByRepo(repoId: number): number {
    return this.stmtCountByRepo.get(repoId)?.cnt ?? 0;
  }
}
