import type { ConflictPolicy, ImportTotals } from '../core/import/types.js';

export interface ImportRunSummary {
  importId: string;
  sourceName: string | null;
  fileSha256: string;
  conflictPolicy: ConflictPolicy;
  startedAt: string;
  finishedAt: string;
  totals: ImportTotals;
}

export interface ImportHistoryPort {
  recordRun(run: ImportRunSummary): Promise<void>;
  /** When a file with this digest was last imported, as an ISO timestamp */
  lastImportOf(fileSha256: string): Promise<string | null>;
}
