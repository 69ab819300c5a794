import { createHash } from 'node:crypto';
import type { ImportHistoryPort } from '../../ports/ImportHistoryPort.js';
import type { ProgressStorePort, SnapshotScope, StoreSnapshot } from '../../ports/ProgressStorePort.js';
import type { DateOrder } from '../../utils/dates.js';
import { Deadline } from '../../utils/deadline.js';
import { describeError, ParseError, PersistError, TimeoutError } from '../../utils/errors.js';
import { lockFor } from '../../utils/lock.js';
import { createLogger, generateImportId, type Logger } from '../../utils/logger.js';
import { readProgressCsv, type CsvInput } from './csvReader.js';
import { inferDailyCandidates } from './dateInference.js';
import { loadAliasTable, resolveHeaders, type AliasTable } from './headerAliases.js';
import { ImportReportBuilder } from './ImportReportBuilder.js';
import { reconcile, type ReconciledRecord } from './RowReconciler.js';
import { mapRow, type MapperContext } from './SchemaMapper.js';
import type {
  ConflictPolicy,
  DailyCandidate,
  FieldIssue,
  ImportOptions,
  ImportReport,
  Provenance,
  ReportEntry,
  WeeklyCandidate,
} from './types.js';

export interface PipelineDefaults {
  conflictPolicy: ConflictPolicy;
  dateOrder: DateOrder;
  timeoutMs: number;
}

export interface ImportPipelineDeps {
  defaults?: Partial<PipelineDefaults>;
  history?: ImportHistoryPort;
  aliasTable?: AliasTable;
}

interface ResolvedOptions extends PipelineDefaults {
  dryRun: boolean;
  sourceName: string | null;
}

const BUILTIN_DEFAULTS: PipelineDefaults = {
  conflictPolicy: 'last-wins',
  dateOrder: 'dmy',
  timeoutMs: 30_000,
};

const EXPLICIT_DAILY_FIELDS = new Set(['date', 'weight_kg', 'steps']);

/** Whether a field issue on `source`'s line concerns the daily value that source produced. */
function issueBelongsTo(issue: FieldIssue, source: Provenance): boolean {
  switch (source.origin) {
    case 'daily-row':
      return true;
    case 'weekly-day':
      return issue.field.startsWith(`day${source.dayIndex}_`);
    case 'weekly-explicit':
      return EXPLICIT_DAILY_FIELDS.has(issue.field);
    case 'weekly-row':
      return false;
  }
}

function describeOutcome<R>(record: ReconciledRecord<R>): string {
  if (record.created) {
    return record.outcome === 'overwritten' ? 'new record; later rows replaced earlier values' : 'new record';
  }
  if (!record.changed) return 'no change';
  return record.outcome === 'overwritten' ? 'existing values replaced' : 'existing record extended';
}

function sourceLines(sources: Provenance[]): number[] {
  return [...new Set(sources.map((source) => source.line))].sort((a, b) => a - b);
}

interface PendingWrite {
  entry: ReportEntry;
  write: () => Promise<void>;
}

/**
 * Drives one Progress Sheet import end to end: read, map, infer, reconcile,
 * upsert, report. Only ParseError and TimeoutError escape `importFile`; every
 * other problem ends up in the report.
 */
export class ImportPipeline {
  private readonly logger = createLogger({ component: 'ImportPipeline' });
  private readonly defaults: PipelineDefaults;
  private readonly history?: ImportHistoryPort;
  private readonly aliasTable?: AliasTable;

  constructor(
    private readonly store: ProgressStorePort,
    deps: ImportPipelineDeps = {}
  ) {
    this.defaults = { ...BUILTIN_DEFAULTS, ...deps.defaults };
    this.history = deps.history;
    this.aliasTable = deps.aliasTable;
  }

  async importFile(input: CsvInput, options: ImportOptions = {}): Promise<ImportReport> {
    const resolved: ResolvedOptions = {
      conflictPolicy: options.conflictPolicy ?? this.defaults.conflictPolicy,
      dateOrder: options.dateOrder ?? this.defaults.dateOrder,
      timeoutMs: options.timeoutMs ?? this.defaults.timeoutMs,
      dryRun: options.dryRun ?? false,
      sourceName: options.sourceName ?? null,
    };
    const importId = generateImportId();
    const log = this.logger.child({ importId });
    const deadline = new Deadline(resolved.timeoutMs);

    log.info(
      { sourceName: resolved.sourceName, dryRun: resolved.dryRun, conflictPolicy: resolved.conflictPolicy },
      'Import started'
    );

    try {
      return await deadline.race(this.run(input, resolved, importId, deadline, log), 'import');
    } catch (error) {
      if (error instanceof TimeoutError) {
        log.error({ stage: error.stage, timeoutMs: error.timeoutMs }, 'Import timed out');
      } else if (error instanceof ParseError) {
        log.warn({ line: error.line, reason: error.message }, 'Import rejected: file could not be parsed');
      } else {
        log.error({ error }, 'Import failed');
      }
      throw error;
    }
  }

  private async run(
    input: CsvInput,
    options: ResolvedOptions,
    importId: string,
    deadline: Deadline,
    log: Logger
  ): Promise<ImportReport> {
    const startedAt = new Date();
    const fileSha256 = createHash('sha256')
      .update(typeof input === 'string' ? Buffer.from(input, 'utf-8') : input)
      .digest('hex');

    // Step 1: structure
    const sheet = readProgressCsv(input);
    const table = this.aliasTable ?? loadAliasTable();
    const headerMap = resolveHeaders(sheet.headers, table);

    const report = new ImportReportBuilder({
      importId,
      sourceName: options.sourceName,
      fileSha256,
      dryRun: options.dryRun,
      conflictPolicy: options.conflictPolicy,
      startedAt,
    });
    report.setRowCount(sheet.rows.length);
    report.setIgnoredColumns(headerMap.ignored);
    log.debug(
      { rows: sheet.rows.length, bound: headerMap.bindings.length, ignored: headerMap.ignored },
      'File parsed'
    );

    if (this.history) {
      try {
        report.setPreviousImport(await deadline.race(this.history.lastImportOf(fileSha256), 'history'));
      } catch (error) {
        if (error instanceof TimeoutError) throw error;
        log.warn({ error: describeError(error) }, 'Could not look up earlier imports of this file');
      }
    }

    // Steps 2-3: map rows, unfold weekly rows into daily candidates
    deadline.check('mapping');
    const ctx: MapperContext = { headerMap, table, dateOrder: options.dateOrder };
    const weeklyCandidates: WeeklyCandidate[] = [];
    const dailyCandidates: DailyCandidate[] = [];
    const issuesByLine = new Map<number, FieldIssue[]>();
    const claimed = new Set<FieldIssue>();

    for (const row of sheet.rows) {
      const mapped = mapRow(row, ctx);
      report.addWarnings(mapped.warnings);

      switch (mapped.kind) {
        case 'unrecognized':
          report.skipRow(mapped.line, mapped.reason, mapped.issues);
          break;
        case 'rejected':
          report.rejectRow(mapped.line, mapped.error.value, mapped.error.message, mapped.issues);
          break;
        case 'daily':
          issuesByLine.set(mapped.line, mapped.issues);
          dailyCandidates.push({ record: mapped.record, provenance: { line: mapped.line, origin: 'daily-row' } });
          break;
        case 'weekly': {
          issuesByLine.set(mapped.line, mapped.issues);
          if (mapped.dateError) {
            const dailyIssues = mapped.issues.filter((issue) => EXPLICIT_DAILY_FIELDS.has(issue.field));
            dailyIssues.forEach((issue) => claimed.add(issue));
            report.rejectRow(mapped.line, mapped.dateError.value, mapped.dateError.message, dailyIssues);
          }
          weeklyCandidates.push({
            record: mapped.record,
            provenance: { line: mapped.line, origin: 'weekly-row', weekNumber: mapped.record.weekNumber },
          });
          const inferred = inferDailyCandidates(mapped);
          report.addWarnings(inferred.warnings);
          dailyCandidates.push(...inferred.candidates);
          break;
        }
      }
    }

    // Step 4: reconcile against what the store already holds
    const scope: SnapshotScope = {
      dates: [...new Set(dailyCandidates.map((candidate) => candidate.record.date))],
      weekNumbers: [...new Set(weeklyCandidates.map((candidate) => candidate.record.weekNumber))],
    };
    let snapshot: StoreSnapshot;
    try {
      snapshot = await deadline.race(this.store.snapshot(scope), 'snapshot');
    } catch (error) {
      if (error instanceof TimeoutError) throw error;
      throw new PersistError(`could not read existing records: ${describeError(error)}`, { cause: error });
    }

    const reconciled = reconcile({
      daily: dailyCandidates,
      weekly: weeklyCandidates,
      snapshot,
      policy: options.conflictPolicy,
    });

    const dailyErrors = reconciled.daily.map((record) => {
      const errors: FieldIssue[] = [];
      for (const source of record.sources) {
        for (const issue of issuesByLine.get(source.line) ?? []) {
          if (!claimed.has(issue) && issueBelongsTo(issue, source)) {
            claimed.add(issue);
            errors.push(issue);
          }
        }
      }
      return errors;
    });

    const writes: PendingWrite[] = [];
    for (const record of reconciled.weekly) {
      const fieldErrors = record.sources
        .filter((source) => source.origin === 'weekly-row')
        .flatMap((source) => issuesByLine.get(source.line) ?? [])
        .filter((issue) => !claimed.has(issue));
      const entry = report.addRecord({
        kind: 'weekly',
        key: record.key,
        lines: sourceLines(record.sources),
        outcome: record.outcome,
        reason: describeOutcome(record),
        fieldErrors,
        conflicts: record.conflicts,
      });
      writes.push({ entry, write: () => this.store.upsertWeekly(record.incoming) });
    }

    reconciled.daily.forEach((record, index) => {
      const entry = report.addRecord({
        kind: 'daily',
        key: record.key,
        lines: sourceLines(record.sources),
        outcome: record.outcome,
        reason: describeOutcome(record),
        fieldErrors: dailyErrors[index] ?? [],
        conflicts: record.conflicts,
      });
      writes.push({ entry, write: () => this.store.upsertDaily(record.incoming) });
    });

    for (const rejected of reconciled.rejected) {
      report.rejectRow(rejected.provenance.line, rejected.key, rejected.reason);
    }

    // Step 5: write, one record at a time, holding the store's lock
    if (options.dryRun) {
      log.debug({ records: writes.length }, 'Dry run; skipping upserts');
    } else {
      await lockFor(this.store).runExclusive(async () => {
        for (const pending of writes) {
          await this.persist(pending, report, deadline, log);
        }
      });
    }

    // Step 6
    const finished = report.finalize();
    if (!options.dryRun && this.history) {
      try {
        await deadline.race(
          this.history.recordRun({
            importId,
            sourceName: options.sourceName,
            fileSha256,
            conflictPolicy: options.conflictPolicy,
            startedAt: finished.startedAt,
            finishedAt: finished.finishedAt,
            totals: finished.totals,
          }),
          'history'
        );
      } catch (error) {
        if (error instanceof TimeoutError) throw error;
        log.warn({ error: describeError(error) }, 'Import succeeded but could not be added to the history');
      }
    }

    log.info({ totals: finished.totals, warnings: finished.warnings.length }, 'Import finished');
    return finished;
  }

  private async persist(pending: PendingWrite, report: ImportReportBuilder, deadline: Deadline, log: Logger): Promise<void> {
    const { entry } = pending;
    deadline.check('upsert');
    const write = Promise.resolve().then(pending.write);
    try {
      await deadline.race(write, 'upsert');
    } catch (error) {
      if (error instanceof TimeoutError) {
        // The caller already has its TimeoutError; the store lock stays held until this write lands
        log.warn({ kind: entry.kind, key: entry.key }, 'Upsert still running at the deadline; waiting before releasing the store');
        await write.catch((writeError: unknown) => {
          log.warn({ kind: entry.kind, key: entry.key, error: describeError(writeError) }, 'Late upsert failed');
        });
        throw error;
      }
      const failure =
        error instanceof PersistError
          ? error
          : new PersistError(`could not store ${entry.kind} ${entry.key}: ${describeError(error)}`, { cause: error });
      report.markRejected(entry, failure.message);
      log.warn({ kind: entry.kind, key: entry.key, reason: failure.message }, 'Upsert failed; continuing');
    }
  }
}
