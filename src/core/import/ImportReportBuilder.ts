import type {
  ConflictPolicy,
  FieldIssue,
  ImportReport,
  ImportTotals,
  ImportWarning,
  ReportEntry,
} from './types.js';

export interface ReportHeader {
  importId: string;
  sourceName: string | null;
  fileSha256: string;
  dryRun: boolean;
  conflictPolicy: ConflictPolicy;
  startedAt: Date;
}

export class ImportReportBuilder {
  private readonly entries: ReportEntry[] = [];
  private readonly warnings: ImportWarning[] = [];
  private ignoredColumns: string[] = [];
  private rows = 0;
  private previousImportAt: string | null = null;

  constructor(private readonly header: ReportHeader) {}

  setRowCount(rows: number): void {
    this.rows = rows;
  }

  setPreviousImport(at: string | null): void {
    this.previousImportAt = at;
  }

  setIgnoredColumns(columns: string[]): void {
    this.ignoredColumns = [...columns];
  }

  addWarnings(warnings: ImportWarning[]): void {
    this.warnings.push(...warnings);
  }

  skipRow(line: number, reason: string, fieldErrors: FieldIssue[] = []): void {
    this.entries.push({
      kind: 'row',
      key: null,
      lines: [line],
      outcome: 'skipped',
      reason,
      fieldErrors,
      conflicts: [],
    });
  }

  rejectRow(line: number, key: string | null, reason: string, fieldErrors: FieldIssue[] = []): void {
    this.entries.push({
      kind: 'row',
      key,
      lines: [line],
      outcome: 'rejected',
      reason,
      fieldErrors,
      conflicts: [],
    });
  }

  /** Adds a record entry and returns it so a later persistence failure can downgrade it. */
  addRecord(entry: ReportEntry): ReportEntry {
    this.entries.push(entry);
    return entry;
  }

  markRejected(entry: ReportEntry, reason: string): void {
    entry.outcome = 'rejected';
    entry.reason = reason;
  }

  totals(): ImportTotals {
    const count = (outcome: ReportEntry['outcome']): number =>
      this.entries.filter((entry) => entry.outcome === outcome).length;
    return {
      rows: this.rows,
      records: this.entries.filter((entry) => entry.kind !== 'row').length,
      accepted: count('accepted'),
      skipped: count('skipped'),
      overwritten: count('overwritten'),
      rejected: count('rejected'),
    };
  }

  finalize(finishedAt: Date = new Date()): ImportReport {
    return {
      importId: this.header.importId,
      sourceName: this.header.sourceName,
      fileSha256: this.header.fileSha256,
      previousImportAt: this.previousImportAt,
      dryRun: this.header.dryRun,
      conflictPolicy: this.header.conflictPolicy,
      startedAt: this.header.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      totals: this.totals(),
      entries: this.entries.map((entry) => ({ ...entry, lines: [...entry.lines] })),
      warnings: [...this.warnings],
      ignoredColumns: [...this.ignoredColumns],
    };
  }
}
