import { createHash } from 'node:crypto';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InMemoryProgressStore } from '../../adapters/memory/InMemoryProgressStore.js';
import { ImportPipeline } from '../../core/import/ImportPipeline.js';
import type { ImportHistoryPort } from '../../ports/ImportHistoryPort.js';
import type { DailyRecord } from '../../ports/ProgressStorePort.js';
import { ParseError, TimeoutError } from '../../utils/errors.js';

function csv(...lines: string[]): string {
  return `${lines.join('\n')}\n`;
}

const DAILY_FILE = csv('date,weight_kg,steps', '2024-01-15,80.0,5000', '2024-01-16,80.4,');

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Fails or slows down the upserts of chosen dates. */
class FlakyStore extends InMemoryProgressStore {
  failing = new Set<string>();
  /** Milliseconds an upsert of the date takes before it commits */
  delays = new Map<string, number>();

  override async upsertDaily(record: DailyRecord): Promise<void> {
    if (this.failing.has(record.date)) throw new Error('disk full');
    const delay = this.delays.get(record.date);
    if (delay !== undefined) await sleep(delay);
    return super.upsertDaily(record);
  }
}

describe('ImportPipeline', () => {
  let store: InMemoryProgressStore;
  let pipeline: ImportPipeline;

  beforeEach(() => {
    store = new InMemoryProgressStore();
    pipeline = new ImportPipeline(store);
  });

  it('imports daily rows and totals the outcomes', async () => {
    const report = await pipeline.importFile(DAILY_FILE, { sourceName: 'progress.csv' });

    expect(report.totals).toEqual({ rows: 2, records: 2, accepted: 2, skipped: 0, overwritten: 0, rejected: 0 });
    expect(report.sourceName).toBe('progress.csv');
    expect(report.dryRun).toBe(false);
    expect(report.conflictPolicy).toBe('last-wins');
    expect(report.fileSha256).toBe(createHash('sha256').update(DAILY_FILE).digest('hex'));
    expect(report.entries[0]).toEqual({
      kind: 'daily',
      key: '2024-01-15',
      lines: [2],
      outcome: 'accepted',
      reason: 'new record',
      fieldErrors: [],
      conflicts: [],
    });
    expect(store.getDaily('2024-01-16')).toEqual({ date: '2024-01-16', weightKg: 80.4, steps: null, weekNumber: null });
  });

  it('is idempotent: a second import of the same file changes nothing', async () => {
    await pipeline.importFile(DAILY_FILE);
    const afterFirst = store.listDaily();

    const second = await pipeline.importFile(DAILY_FILE);

    expect(store.listDaily()).toEqual(afterFirst);
    expect(second.totals.accepted).toBe(2);
    expect(second.totals.overwritten).toBe(0);
    expect(second.entries.map((entry) => entry.reason)).toEqual(['no change', 'no change']);
  });

  it('unfolds day columns of a weekly row onto the dates of its week', async () => {
    const days = [1, 2, 3, 4, 5, 6, 7];
    const header = ['week_number', 'start_date', 'chest_in', ...days.map((day) => `day${day}_steps`)].join(',');
    const values = ['3', '2024-01-15', '40', ...days.map((day) => String(day * 1000))].join(',');

    const report = await pipeline.importFile(csv(header, values));

    expect(report.entries.map((entry) => [entry.kind, entry.key])).toEqual([
      ['weekly', '3'],
      ['daily', '2024-01-15'],
      ['daily', '2024-01-16'],
      ['daily', '2024-01-17'],
      ['daily', '2024-01-18'],
      ['daily', '2024-01-19'],
      ['daily', '2024-01-20'],
      ['daily', '2024-01-21'],
    ]);
    expect(store.getWeekly(3)?.chestIn).toBe(40);
    expect(store.getDaily('2024-01-21')).toEqual({ date: '2024-01-21', weightKg: null, steps: 7000, weekNumber: 3 });
  });

  it('lets a later standalone row win over derived values under last-wins', async () => {
    const file = csv(
      'week_number,start_date,date,weight_kg,steps,day1_weight_kg,day1_steps',
      '3,2024-01-15,,,,80,5000',
      '3,2024-01-15,,,,80.5,',
      ',,2024-01-15,81,6000,,'
    );

    const report = await pipeline.importFile(file);

    expect(store.getDaily('2024-01-15')).toEqual({ date: '2024-01-15', weightKg: 81, steps: 6000, weekNumber: 3 });
    const entry = report.entries.find((candidate) => candidate.key === '2024-01-15');
    expect(entry?.outcome).toBe('overwritten');
    expect(entry?.reason).toBe('new record; later rows replaced earlier values');
    expect(entry?.lines).toEqual([2, 3, 4]);
    expect(entry?.conflicts).toHaveLength(3);
  });

  it('keeps the first values under first-wins', async () => {
    const file = csv(
      'week_number,start_date,date,weight_kg,steps,day1_weight_kg,day1_steps',
      '3,2024-01-15,,,,80,5000',
      '3,2024-01-15,,,,80.5,',
      ',,2024-01-15,81,6000,,'
    );

    await pipeline.importFile(file, { conflictPolicy: 'first-wins' });

    expect(store.getDaily('2024-01-15')).toEqual({ date: '2024-01-15', weightKg: 80, steps: 5000, weekNumber: 3 });
  });

  it('rejects a row with an unparseable date without blocking the others', async () => {
    const rows: string[] = [];
    for (let day = 1; day <= 10; day++) {
      rows.push(`2024-03-${String(day).padStart(2, '0')},80,${day * 100}`);
    }
    rows.splice(5, 0, 'not-a-date,80,100');
    const upsert = vi.spyOn(store, 'upsertDaily');

    const report = await pipeline.importFile(csv('date,weight_kg,steps', ...rows));

    expect(report.totals).toEqual({ rows: 11, records: 10, accepted: 10, skipped: 0, overwritten: 0, rejected: 1 });
    expect(upsert).toHaveBeenCalledTimes(10);
    expect(report.entries.find((entry) => entry.outcome === 'rejected')).toEqual({
      kind: 'row',
      key: 'not-a-date',
      lines: [7],
      outcome: 'rejected',
      reason: 'date "not-a-date" is not a calendar date',
      fieldErrors: [],
      conflicts: [],
    });
  });

  it('rejects the daily part of a template row with an unparseable date and keeps its week', async () => {
    const rows: string[] = [];
    for (let day = 1; day <= 10; day++) {
      const [week, start] = day <= 7 ? ['1', '2024-03-01'] : ['2', '2024-03-08'];
      rows.push(`${week},${start},2024-03-${String(day).padStart(2, '0')},80,${day * 100}`);
    }
    rows.splice(5, 0, '1,2024-03-01,not-a-date,80,100');
    const upsert = vi.spyOn(store, 'upsertDaily');

    const report = await pipeline.importFile(csv('week_number,start_date,date,weight_kg,steps', ...rows));

    expect(report.totals).toEqual({ rows: 11, records: 12, accepted: 12, skipped: 0, overwritten: 0, rejected: 1 });
    expect(upsert).toHaveBeenCalledTimes(10);
    expect(report.warnings).toEqual([]);
    expect(report.entries.find((entry) => entry.outcome === 'rejected')).toEqual({
      kind: 'row',
      key: 'not-a-date',
      lines: [7],
      outcome: 'rejected',
      reason: 'date "not-a-date" is not a calendar date',
      fieldErrors: [],
      conflicts: [],
    });
    expect(report.entries.find((entry) => entry.kind === 'weekly' && entry.key === '1')?.lines).toEqual([
      2, 3, 4, 5, 6, 7, 8, 9,
    ]);
  });

  it('skips rows without any key instead of rejecting them', async () => {
    const report = await pipeline.importFile(csv('date,week_number,steps', ',,4000', '2024-01-15,,5000'));

    expect(report.totals.skipped).toBe(1);
    expect(report.totals.rejected).toBe(0);
    expect(report.entries[0]).toMatchObject({ kind: 'row', lines: [2], outcome: 'skipped' });
  });

  it('attaches field errors to the record they belong to', async () => {
    const report = await pipeline.importFile(
      csv('week_number,start_date,sleep_issues,day1_steps,day2_steps', '3,2024-01-15,9,lots,4000')
    );

    const weekly = report.entries.find((entry) => entry.kind === 'weekly');
    expect(weekly?.outcome).toBe('accepted');
    expect(weekly?.fieldErrors.map((issue) => issue.field)).toEqual(['sleep_issues', 'day1_steps']);
    expect(store.getWeekly(3)?.sleepIssues).toBeNull();
    expect(store.getDaily('2024-01-16')?.steps).toBe(4000);
  });

  it('reports warnings and ignored columns', async () => {
    const report = await pipeline.importFile(csv('week_number,day1_steps,notes', '3,5000,felt good'));

    expect(report.ignoredColumns).toEqual(['notes']);
    expect(report.warnings).toEqual([
      {
        code: 'START_DATE_MISSING',
        line: 2,
        message: 'week 3 has per-day values but no usable start_date; daily values were not derived',
      },
    ]);
  });

  it('converts values from unit-bearing headers', async () => {
    await pipeline.importFile(csv('date,weight_lb', '2024-01-15,176'));

    expect(store.getDaily('2024-01-15')?.weightKg).toBe(79.83);
  });

  it('computes the report without writing on a dry run', async () => {
    const upsert = vi.spyOn(store, 'upsertDaily');

    const report = await pipeline.importFile(DAILY_FILE, { dryRun: true });

    expect(report.dryRun).toBe(true);
    expect(report.totals.accepted).toBe(2);
    expect(upsert).not.toHaveBeenCalled();
    expect(store.listDaily()).toEqual([]);
  });

  it('rejects only the record whose write failed', async () => {
    const flaky = new FlakyStore();
    flaky.failing.add('2024-01-16');

    const report = await new ImportPipeline(flaky).importFile(
      csv('date,steps', '2024-01-15,1000', '2024-01-16,2000', '2024-01-17,3000')
    );

    expect(report.totals).toEqual({ rows: 3, records: 3, accepted: 2, skipped: 0, overwritten: 0, rejected: 1 });
    expect(report.entries[1]).toMatchObject({
      key: '2024-01-16',
      outcome: 'rejected',
      reason: 'could not store daily 2024-01-16: disk full',
    });
    expect(flaky.getDaily('2024-01-17')?.steps).toBe(3000);
  });

  it('fails with ParseError before touching the store', async () => {
    const upsert = vi.spyOn(store, 'upsertDaily');

    await expect(pipeline.importFile('date,steps\n')).rejects.toBeInstanceOf(ParseError);
    await expect(pipeline.importFile('')).rejects.toThrow('file is empty');
    expect(upsert).not.toHaveBeenCalled();
  });

  it('times out, keeps committed writes and releases the store once the last write lands', async () => {
    const flaky = new FlakyStore();
    flaky.delays.set('2024-01-16', 150);
    const slow = new ImportPipeline(flaky, { defaults: { timeoutMs: 50 } });

    await expect(
      slow.importFile(csv('date,steps', '2024-01-15,1000', '2024-01-16,2000', '2024-01-17,3000'))
    ).rejects.toBeInstanceOf(TimeoutError);
    expect(flaky.getDaily('2024-01-15')?.steps).toBe(1000);
    expect(flaky.getDaily('2024-01-16')).toBeUndefined();

    flaky.delays.clear();
    const report = await slow.importFile(csv('date,steps', '2024-01-17,3000'), { timeoutMs: 1000 });
    expect(report.totals.accepted).toBe(1);
    expect(flaky.getDaily('2024-01-16')?.steps).toBe(2000);
    expect(flaky.getDaily('2024-01-17')?.steps).toBe(3000);
  });

  it('does not let a write that outlived its deadline overwrite the next import', async () => {
    const flaky = new FlakyStore();
    flaky.delays.set('2024-01-01', 100);
    const timedOut = new ImportPipeline(flaky, { defaults: { timeoutMs: 30 } });
    const next = new ImportPipeline(flaky);

    await expect(timedOut.importFile(csv('date,steps', '2024-01-01,1'))).rejects.toBeInstanceOf(TimeoutError);
    flaky.delays.clear();
    await next.importFile(csv('date,steps', '2024-01-01,2'));
    await sleep(150);

    expect(flaky.getDaily('2024-01-01')).toEqual({ date: '2024-01-01', weightKg: null, steps: 2, weekNumber: null });
  });

  it('serializes the upsert phase of concurrent imports on one store', async () => {
    const writes: string[] = [];
    const original = store.upsertDaily.bind(store);
    vi.spyOn(store, 'upsertDaily').mockImplementation(async (record) => {
      await new Promise((resolve) => setTimeout(resolve, 2));
      writes.push(record.date);
      return original(record);
    });

    await Promise.all([
      pipeline.importFile(csv('date,steps', '2024-01-01,1', '2024-01-02,2', '2024-01-03,3')),
      pipeline.importFile(csv('date,steps', '2024-02-01,1', '2024-02-02,2', '2024-02-03,3')),
    ]);

    const firstMonth = writes[0]?.slice(0, 7);
    expect(writes.slice(0, 3).every((date) => date.startsWith(firstMonth ?? '-'))).toBe(true);
    expect(writes.slice(3).every((date) => !date.startsWith(firstMonth ?? '-'))).toBe(true);
    expect(writes).toHaveLength(6);
  });

  describe('with an import history', () => {
    let history: ImportHistoryPort;

    beforeEach(() => {
      history = {
        recordRun: vi.fn().mockResolvedValue(undefined),
        lastImportOf: vi.fn().mockResolvedValue('2024-05-01T10:00:00.000Z'),
      };
      pipeline = new ImportPipeline(store, { history });
    });

    it('records committed imports and flags repeated files', async () => {
      const report = await pipeline.importFile(DAILY_FILE, { sourceName: 'progress.csv' });

      expect(report.previousImportAt).toBe('2024-05-01T10:00:00.000Z');
      expect(history.lastImportOf).toHaveBeenCalledWith(report.fileSha256);
      expect(history.recordRun).toHaveBeenCalledWith({
        importId: report.importId,
        sourceName: 'progress.csv',
        fileSha256: report.fileSha256,
        conflictPolicy: 'last-wins',
        startedAt: report.startedAt,
        finishedAt: report.finishedAt,
        totals: report.totals,
      });
    });

    it('does not record dry runs', async () => {
      await pipeline.importFile(DAILY_FILE, { dryRun: true });

      expect(history.recordRun).not.toHaveBeenCalled();
    });

    it('still returns the report when the history cannot be written', async () => {
      vi.mocked(history.recordRun).mockRejectedValue(new Error('read-only database'));

      const report = await pipeline.importFile(DAILY_FILE);

      expect(report.totals.accepted).toBe(2);
    });
  });
});
