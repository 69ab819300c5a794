import { describe, it, expect } from 'vitest';
import { loadAliasTable, resolveHeaders } from '../../core/import/headerAliases.js';
import { classifyRow, mapRow, type MapperContext } from '../../core/import/SchemaMapper.js';
import type { RawRow } from '../../core/import/types.js';

const table = loadAliasTable();

function contextFor(headers: string[]): MapperContext {
  return { headerMap: resolveHeaders(headers, table), table, dateOrder: 'dmy' };
}

function row(line: number, values: Record<string, string>): RawRow {
  return { line, values };
}

describe('classifyRow', () => {
  const ctx = contextFor(['week_number', 'date', 'weight_kg']);

  it('prefers week_number over date', () => {
    expect(classifyRow(row(2, { week_number: '3', date: '2024-01-15', weight_kg: '' }), ctx)).toBe('weekly');
    expect(classifyRow(row(3, { week_number: '', date: '2024-01-15', weight_kg: '80' }), ctx)).toBe('daily');
    expect(classifyRow(row(4, { week_number: 'n/a', date: '-', weight_kg: '80' }), ctx)).toBe('unrecognized');
  });
});

describe('mapRow', () => {
  it('normalizes a daily row', () => {
    const ctx = contextFor(['Date', 'Weight', 'Steps']);
    const mapped = mapRow(row(2, { Date: '15/01/2024', Weight: '80,5', Steps: '12,319' }), ctx);

    expect(mapped).toEqual({
      kind: 'daily',
      line: 2,
      record: { date: '2024-01-15', weightKg: 80.5, steps: 12319, weekNumber: null },
      issues: [],
      warnings: [],
    });
  });

  it('skips rows with neither key', () => {
    const ctx = contextFor(['date', 'week_number', 'steps']);
    const mapped = mapRow(row(5, { date: '', week_number: '', steps: '4000' }), ctx);

    expect(mapped.kind).toBe('unrecognized');
    if (mapped.kind === 'unrecognized') {
      expect(mapped.reason).toBe('row has neither week_number nor date');
    }
  });

  it('rejects a weekly row with an unusable key', () => {
    const ctx = contextFor(['week_number', 'chest_in']);
    const mapped = mapRow(row(3, { week_number: 'three', chest_in: '40' }), ctx);

    expect(mapped.kind).toBe('rejected');
    if (mapped.kind === 'rejected') {
      expect(mapped.classifiedAs).toBe('weekly');
      expect(mapped.error.field).toBe('week_number');
      expect(mapped.error.value).toBe('three');
    }
  });

  it('rejects a daily row with an unparseable date', () => {
    const ctx = contextFor(['date', 'steps']);
    const mapped = mapRow(row(4, { date: '2024-13-40', steps: '1000' }), ctx);

    expect(mapped.kind).toBe('rejected');
    if (mapped.kind === 'rejected') {
      expect(mapped.error.message).toBe('date "2024-13-40" is not a calendar date');
    }
  });

  it('keeps a weekly row when one field fails coercion', () => {
    const ctx = contextFor(['week_number', 'start_date', 'chest_in', 'sleep_issues']);
    const mapped = mapRow(row(2, { week_number: '3', start_date: '2024-01-15', chest_in: '40', sleep_issues: '9' }), ctx);

    expect(mapped.kind).toBe('weekly');
    if (mapped.kind === 'weekly') {
      expect(mapped.record.weekNumber).toBe(3);
      expect(mapped.record.startDate).toBe('2024-01-15');
      expect(mapped.record.chestIn).toBe(40);
      expect(mapped.record.sleepIssues).toBeNull();
      expect(mapped.issues).toEqual([
        {
          line: 2,
          field: 'sleep_issues',
          value: '9',
          code: 'FIELD_COERCION',
          message: '9 is above the allowed maximum of 5',
        },
      ]);
    }
  });

  it('keeps a weekly row whose date cell is not a date, flagging the date', () => {
    const ctx = contextFor(['week_number', 'start_date', 'date', 'weight_kg', 'steps']);
    const mapped = mapRow(
      row(4, { week_number: '1', start_date: '2024-03-01', date: 'not-a-date', weight_kg: '80', steps: '100' }),
      ctx
    );

    expect(mapped.kind).toBe('weekly');
    if (mapped.kind === 'weekly') {
      expect(mapped.explicitDate).toBeNull();
      expect(mapped.dateError?.message).toBe('date "not-a-date" is not a calendar date');
      expect(mapped.rowDaily).toEqual({ weightKg: 80, steps: 100 });
      expect(mapped.issues).toEqual([]);
    }
  });

  it('collects per-day sub-columns and labels their issues by day', () => {
    const ctx = contextFor(['week_number', 'start_date', 'day1_steps', 'day3_weight_kg', 'day4_steps']);
    const mapped = mapRow(
      row(2, { week_number: '3', start_date: '2024-01-15', day1_steps: '5000', day3_weight_kg: '80', day4_steps: 'lots' }),
      ctx
    );

    expect(mapped.kind).toBe('weekly');
    if (mapped.kind === 'weekly') {
      expect(mapped.days).toEqual([
        { dayIndex: 1, weightKg: null, steps: 5000 },
        { dayIndex: 3, weightKg: 80, steps: null },
      ]);
      expect(mapped.issues.map((issue) => issue.field)).toEqual(['day4_steps']);
    }
  });

  it('uses the first non-empty column when two headers map to one field', () => {
    const ctx = contextFor(['date', 'weight', 'weight_lb']);
    const mapped = mapRow(row(2, { date: '2024-01-15', weight: '', weight_lb: '176' }), ctx);

    expect(mapped.kind).toBe('daily');
    if (mapped.kind === 'daily') expect(mapped.record.weightKg).toBe(79.83);
  });

  it('warns about weekly columns on a daily row', () => {
    const ctx = contextFor(['date', 'weight_kg', 'chest_in']);
    const mapped = mapRow(row(6, { date: '2024-01-15', weight_kg: '80', chest_in: '40' }), ctx);

    expect(mapped.warnings).toEqual([
      {
        code: 'WEEKLY_VALUES_WITHOUT_WEEK',
        line: 6,
        message: 'weekly columns ignored on a row without week_number: chest_in',
      },
    ]);
  });
});
