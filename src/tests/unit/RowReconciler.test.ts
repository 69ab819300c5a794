import { describe, it, expect } from 'vitest';
import { reconcile } from '../../core/import/RowReconciler.js';
import type { DailyCandidate, WeeklyCandidate } from '../../core/import/types.js';
import {
  emptyWeeklyRecord,
  type DailyRecord,
  type StoreSnapshot,
  type WeeklyRecord,
} from '../../ports/ProgressStorePort.js';

const EMPTY: StoreSnapshot = { daily: new Map(), weekly: new Map() };

function derived(line: number, record: DailyRecord, dayIndex = 1): DailyCandidate {
  return { record, provenance: { line, origin: 'weekly-day', weekNumber: record.weekNumber ?? undefined, dayIndex } };
}

function standalone(line: number, record: DailyRecord): DailyCandidate {
  return { record, provenance: { line, origin: 'daily-row' } };
}

function weekly(line: number, record: WeeklyRecord): WeeklyCandidate {
  return { record, provenance: { line, origin: 'weekly-row', weekNumber: record.weekNumber } };
}

describe('reconcile', () => {
  const tieBreakCandidates = [
    derived(2, { date: '2024-01-15', weightKg: 80, steps: 5000, weekNumber: 3 }),
    derived(3, { date: '2024-01-15', weightKg: 80.5, steps: null, weekNumber: 3 }),
    standalone(4, { date: '2024-01-15', weightKg: 81, steps: 6000, weekNumber: null }),
  ];

  it('gives the standalone row the last word under last-wins', () => {
    const result = reconcile({ daily: tieBreakCandidates, weekly: [], snapshot: EMPTY, policy: 'last-wins' });

    expect(result.daily).toHaveLength(1);
    const [record] = result.daily;
    expect(record.incoming).toEqual({ date: '2024-01-15', weightKg: 81, steps: 6000, weekNumber: 3 });
    expect(record.outcome).toBe('overwritten');
    expect(record.created).toBe(true);
    expect(record.conflicts).toEqual([
      {
        kind: 'daily',
        key: '2024-01-15',
        against: 'import',
        lines: [2, 3],
        field: 'weightKg',
        previous: 80,
        incoming: 80.5,
        kept: 80.5,
      },
      {
        kind: 'daily',
        key: '2024-01-15',
        against: 'import',
        lines: [2, 3, 4],
        field: 'weightKg',
        previous: 80.5,
        incoming: 81,
        kept: 81,
      },
      {
        kind: 'daily',
        key: '2024-01-15',
        against: 'import',
        lines: [2, 3, 4],
        field: 'steps',
        previous: 5000,
        incoming: 6000,
        kept: 6000,
      },
    ]);
  });

  it('keeps the first values under first-wins and still reports the clashes', () => {
    const result = reconcile({ daily: tieBreakCandidates, weekly: [], snapshot: EMPTY, policy: 'first-wins' });
    const [record] = result.daily;

    expect(record.incoming).toEqual({ date: '2024-01-15', weightKg: 80, steps: 5000, weekNumber: 3 });
    expect(record.outcome).toBe('accepted');
    expect(record.conflicts.map((conflict) => [conflict.field, conflict.kept])).toEqual([
      ['weightKg', 80],
      ['weightKg', 80],
      ['steps', 5000],
    ]);
  });

  it('never lets a null regress a persisted value', () => {
    const snapshot: StoreSnapshot = {
      daily: new Map([['2024-01-15', { date: '2024-01-15', weightKg: 80, steps: null, weekNumber: null }]]),
      weekly: new Map(),
    };
    const result = reconcile({
      daily: [standalone(2, { date: '2024-01-15', weightKg: null, steps: 5000, weekNumber: null })],
      weekly: [],
      snapshot,
      policy: 'last-wins',
    });
    const [record] = result.daily;

    expect(record.merged).toEqual({ date: '2024-01-15', weightKg: 80, steps: 5000, weekNumber: null });
    expect(record.incoming).toEqual({ date: '2024-01-15', weightKg: null, steps: 5000, weekNumber: null });
    expect(record.created).toBe(false);
    expect(record.changed).toBe(true);
    expect(record.outcome).toBe('accepted');
    expect(record.conflicts).toEqual([]);
  });

  it('reports a replaced persisted value as an overwrite', () => {
    const stored = { ...emptyWeeklyRecord(3), chestIn: 40 };
    const result = reconcile({
      daily: [],
      weekly: [weekly(5, { ...emptyWeeklyRecord(3), chestIn: 39.5 })],
      snapshot: { daily: new Map(), weekly: new Map([[3, stored]]) },
      policy: 'first-wins',
    });
    const [record] = result.weekly;

    expect(record.outcome).toBe('overwritten');
    expect(record.merged.chestIn).toBe(39.5);
    expect(record.conflicts).toEqual([
      {
        kind: 'weekly',
        key: '3',
        against: 'persisted',
        lines: [5],
        field: 'chestIn',
        previous: 40,
        incoming: 39.5,
        kept: 39.5,
      },
    ]);
  });

  it('marks an identical re-import as unchanged', () => {
    const record: DailyRecord = { date: '2024-01-15', weightKg: 80, steps: 5000, weekNumber: null };
    const result = reconcile({
      daily: [standalone(2, record)],
      weekly: [],
      snapshot: { daily: new Map([['2024-01-15', record]]), weekly: new Map() },
      policy: 'last-wins',
    });

    expect(result.daily[0].changed).toBe(false);
    expect(result.daily[0].outcome).toBe('accepted');
    expect(result.daily[0].conflicts).toEqual([]);
  });

  it('orders weekly records by week and daily records by date', () => {
    const result = reconcile({
      daily: [
        standalone(2, { date: '2024-01-20', weightKg: 80, steps: null, weekNumber: null }),
        standalone(3, { date: '2024-01-02', weightKg: 81, steps: null, weekNumber: null }),
      ],
      weekly: [weekly(4, emptyWeeklyRecord(7)), weekly(5, emptyWeeklyRecord(2))],
      snapshot: EMPTY,
      policy: 'last-wins',
    });

    expect(result.weekly.map((record) => record.key)).toEqual(['2', '7']);
    expect(result.daily.map((record) => record.key)).toEqual(['2024-01-02', '2024-01-20']);
  });

  it('rejects candidates whose key is not usable', () => {
    const result = reconcile({
      daily: [standalone(2, { date: 'someday', weightKg: 80, steps: null, weekNumber: null })],
      weekly: [weekly(3, emptyWeeklyRecord(0))],
      snapshot: EMPTY,
      policy: 'last-wins',
    });

    expect(result.daily).toEqual([]);
    expect(result.weekly).toEqual([]);
    expect(result.rejected.map((rejected) => rejected.reason)).toEqual([
      'invalid weekly key "0"',
      'invalid daily key "someday"',
    ]);
  });
});
