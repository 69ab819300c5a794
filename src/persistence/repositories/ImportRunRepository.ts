import type { Database } from 'better-sqlite3';
import type { ConflictPolicy } from '../../core/import/types.js';
import type { ImportHistoryPort, ImportRunSummary } from '../../ports/ImportHistoryPort.js';

type ImportRunRow = {
  id: string;
  source_name: string | null;
  file_sha256: string;
  conflict_policy: string;
  started_at: string;
  finished_at: string;
  rows: number;
  records: number;
  accepted: number;
  skipped: number;
  overwritten: number;
  rejected: number;
};

function toPolicy(value: string): ConflictPolicy {
  return value === 'first-wins' ? 'first-wins' : 'last-wins';
}

function rowToRun(row: ImportRunRow): ImportRunSummary {
  return {
    importId: row.id,
    sourceName: row.source_name,
    fileSha256: row.file_sha256,
    conflictPolicy: toPolicy(row.conflict_policy),
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    totals: {
      rows: row.rows,
      records: row.records,
      accepted: row.accepted,
      skipped: row.skipped,
      overwritten: row.overwritten,
      rejected: row.rejected,
    },
  };
}

/** History of committed imports, one row per `importFile` call that was not a dry run. */
export class ImportRunRepository implements ImportHistoryPort {
  constructor(private readonly db: Database) {}

  async recordRun(run: ImportRunSummary): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO import_runs (
           id, source_name, file_sha256, conflict_policy, started_at, finished_at,
           rows, records, accepted, skipped, overwritten, rejected
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        run.importId,
        run.sourceName,
        run.fileSha256,
        run.conflictPolicy,
        run.startedAt,
        run.finishedAt,
        run.totals.rows,
        run.totals.records,
        run.totals.accepted,
        run.totals.skipped,
        run.totals.overwritten,
        run.totals.rejected
      );
  }

  async lastImportOf(fileSha256: string): Promise<string | null> {
    const row = this.db
      .prepare<[string], { finished_at: string }>(
        'SELECT finished_at FROM import_runs WHERE file_sha256 = ? ORDER BY finished_at DESC LIMIT 1'
      )
      .get(fileSha256);
    return row?.finished_at ?? null;
  }

  list(): ImportRunSummary[] {
    return this.db
      .prepare<[], ImportRunRow>('SELECT * FROM import_runs ORDER BY started_at')
      .all()
      .map(rowToRun);
  }

  listRecent(limit = 20): ImportRunSummary[] {
    return this.db
      .prepare<[number], ImportRunRow>('SELECT * FROM import_runs ORDER BY started_at DESC LIMIT ?')
      .all(limit)
      .map(rowToRun);
  }
}
