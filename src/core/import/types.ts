import type { DateOrder } from '../../utils/dates.js';
import type { DailyRecord, WeeklyRecord } from '../../ports/ProgressStorePort.js';

export type ConflictPolicy = 'last-wins' | 'first-wins';

export type ImportOutcome = 'accepted' | 'skipped' | 'overwritten' | 'rejected';

export type RecordKind = 'daily' | 'weekly';

/** One data line of the uploaded file, keyed by header text as written. */
export interface RawRow {
  line: number;
  values: Record<string, string>;
}

export interface FieldIssue {
  line: number;
  field: string;
  value: string;
  code: string;
  message: string;
}

export type WarningCode =
  | 'START_DATE_MISSING'
  | 'EXPLICIT_DATE_OVERRIDE'
  | 'DATE_OUTSIDE_WEEK'
  | 'DAILY_VALUES_WITHOUT_DATE'
  | 'WEEKLY_VALUES_WITHOUT_WEEK';

export interface ImportWarning {
  code: WarningCode;
  line: number;
  message: string;
}

export type CandidateOrigin = 'daily-row' | 'weekly-row' | 'weekly-day' | 'weekly-explicit';

export interface Provenance {
  line: number;
  origin: CandidateOrigin;
  weekNumber?: number;
  dayIndex?: number;
}

export interface Candidate<R> {
  record: R;
  provenance: Provenance;
}

export type DailyCandidate = Candidate<DailyRecord>;
export type WeeklyCandidate = Candidate<WeeklyRecord>;

export type FieldValue = string | number | null;

/** A merge replaced (or, under first-wins, refused to replace) a value already seen. */
export interface ConflictOverwrite {
  kind: RecordKind;
  key: string;
  field: string;
  against: 'import' | 'persisted';
  previous: FieldValue;
  incoming: FieldValue;
  kept: FieldValue;
  lines: number[];
}

export interface ReportEntry {
  kind: RecordKind | 'row';
  key: string | null;
  lines: number[];
  outcome: ImportOutcome;
  reason: string | null;
  fieldErrors: FieldIssue[];
  conflicts: ConflictOverwrite[];
}

export interface ImportTotals {
  rows: number;
  records: number;
  accepted: number;
  skipped: number;
  overwritten: number;
  rejected: number;
}

export interface ImportReport {
  importId: string;
  sourceName: string | null;
  fileSha256: string;
  /** Last time a file with the same digest was imported, if ever */
  previousImportAt: string | null;
  dryRun: boolean;
  conflictPolicy: ConflictPolicy;
  startedAt: string;
  finishedAt: string;
  totals: ImportTotals;
  entries: ReportEntry[];
  warnings: ImportWarning[];
  ignoredColumns: string[];
}

export interface ImportOptions {
  /** Compute the report without calling the store's upserts */
  dryRun?: boolean;
  conflictPolicy?: ConflictPolicy;
  /** Field order of slash dates such as 05/01/2024 */
  dateOrder?: DateOrder;
  timeoutMs?: number;
  sourceName?: string;
}

export interface DayValues {
  dayIndex: number;
  weightKg: number | null;
  steps: number | null;
}
