import { emptyWeeklyRecord, type DailyRecord, type WeeklyRecord } from '../../ports/ProgressStorePort.js';
import type { DateOrder, IsoDate } from '../../utils/dates.js';
import { KeyInvalidError, type FieldCoercionError } from '../../utils/errors.js';
import type { AliasTable, ColumnBinding, HeaderMap } from './headerAliases.js';
import { WEEKLY_COLUMN_NAMES, WEEKLY_COLUMNS, type CanonicalField } from './fieldSpecs.js';
import type { DayValues, FieldIssue, ImportWarning, RawRow, RecordKind } from './types.js';
import { coerceDate, coerceNumber, isEmptyValue, parseDateKey, parseWeekNumberKey } from './valueCoercion.js';

export type RowClass = RecordKind | 'unrecognized';

interface MappedBase {
  line: number;
  issues: FieldIssue[];
  warnings: ImportWarning[];
}

export interface MappedDailyRow extends MappedBase {
  kind: 'daily';
  record: DailyRecord;
}

export interface MappedWeeklyRow extends MappedBase {
  kind: 'weekly';
  record: WeeklyRecord;
  /** Explicit `date` cell on a weekly row, when one parsed */
  explicitDate: IsoDate | null;
  /** Set when the `date` cell holds text that is not a date; the row's daily part is rejected */
  dateError: KeyInvalidError | null;
  /** Row-level `weight_kg` / `steps` cells, which belong to `explicitDate` */
  rowDaily: { weightKg: number | null; steps: number | null };
  days: DayValues[];
}

export interface UnrecognizedRow extends MappedBase {
  kind: 'unrecognized';
  reason: string;
}

export interface RejectedRow extends MappedBase {
  kind: 'rejected';
  classifiedAs: RecordKind;
  error: KeyInvalidError;
}

export type MappedRow = MappedDailyRow | MappedWeeklyRow | UnrecognizedRow | RejectedRow;

export interface MapperContext {
  headerMap: HeaderMap;
  table: AliasTable;
  dateOrder: DateOrder;
}

interface Cell {
  raw: string;
  binding: ColumnBinding;
}

function findCell(row: RawRow, ctx: MapperContext, field: CanonicalField, dayIndex: number | null = null): Cell | null {
  for (const binding of ctx.headerMap.bindings) {
    if (binding.field !== field || binding.dayIndex !== dayIndex) continue;
    const raw = row.values[binding.header] ?? '';
    if (!isEmptyValue(raw, ctx.table)) {
      return { raw, binding };
    }
  }
  return null;
}

function toIssue(line: number, label: string, error: FieldCoercionError): FieldIssue {
  return { line, field: label, value: error.value, code: error.code, message: error.message };
}

interface RowReader {
  issues: FieldIssue[];
  number(field: CanonicalField, dayIndex?: number | null): number | null;
  date(field: CanonicalField): IsoDate | null;
}

/**
 * Reads typed values out of one row. Coercion failures are collected as
 * issues and the value is reported as null.
 */
function createReader(row: RawRow, ctx: MapperContext): RowReader {
  const issues: FieldIssue[] = [];

  const number = (field: CanonicalField, dayIndex: number | null = null): number | null => {
    const cell = findCell(row, ctx, field, dayIndex);
    if (!cell) return null;
    const result = coerceNumber(field, cell.raw, cell.binding.unit, ctx.table);
    if (!result.ok) {
      issues.push(toIssue(row.line, dayIndex === null ? field : `day${dayIndex}_${field}`, result.error));
      return null;
    }
    return result.value;
  };

  const date = (field: CanonicalField): IsoDate | null => {
    const cell = findCell(row, ctx, field);
    if (!cell) return null;
    const result = coerceDate(field, cell.raw, ctx.dateOrder, ctx.table);
    if (!result.ok) {
      issues.push(toIssue(row.line, field, result.error));
      return null;
    }
    return result.value;
  };

  return { issues, number, date };
}

export function classifyRow(row: RawRow, ctx: MapperContext): RowClass {
  if (findCell(row, ctx, 'week_number')) return 'weekly';
  if (findCell(row, ctx, 'date')) return 'daily';
  return 'unrecognized';
}

/** Classifies one row and turns its cells into typed, canonical values. Pure. */
export function mapRow(row: RawRow, ctx: MapperContext): MappedRow {
  const classification = classifyRow(row, ctx);

  if (classification === 'unrecognized') {
    return {
      kind: 'unrecognized',
      line: row.line,
      reason: 'row has neither week_number nor date',
      issues: [],
      warnings: [],
    };
  }

  return classification === 'weekly' ? mapWeeklyRow(row, ctx) : mapDailyRow(row, ctx);
}

function mapDailyRow(row: RawRow, ctx: MapperContext): MappedDailyRow | RejectedRow {
  const reader = createReader(row, ctx);
  const warnings: ImportWarning[] = [];
  const dateCell = findCell(row, ctx, 'date');
  const key = parseDateKey(dateCell?.raw ?? '', ctx.dateOrder);

  const weightKg = reader.number('weight_kg');
  const steps = reader.number('steps');

  if (key instanceof KeyInvalidError) {
    return { kind: 'rejected', classifiedAs: 'daily', line: row.line, error: key, issues: reader.issues, warnings };
  }

  const strayWeekly = WEEKLY_COLUMN_NAMES.filter((column) => findCell(row, ctx, column) !== null);
  if (strayWeekly.length > 0) {
    warnings.push({
      code: 'WEEKLY_VALUES_WITHOUT_WEEK',
      line: row.line,
      message: `weekly columns ignored on a row without week_number: ${strayWeekly.join(', ')}`,
    });
  }

  return {
    kind: 'daily',
    line: row.line,
    record: { date: key, weightKg, steps, weekNumber: null },
    issues: reader.issues,
    warnings,
  };
}

function mapWeeklyRow(row: RawRow, ctx: MapperContext): MappedWeeklyRow | RejectedRow {
  const reader = createReader(row, ctx);
  const weekCell = findCell(row, ctx, 'week_number');
  const key = parseWeekNumberKey(weekCell?.raw ?? '');

  const startDate = reader.date('start_date');
  const measures = WEEKLY_COLUMN_NAMES.map((column) => ({ column, value: reader.number(column) }));
  const dateCell = findCell(row, ctx, 'date');
  const dateKey = dateCell ? parseDateKey(dateCell.raw, ctx.dateOrder) : null;
  const explicitDate = typeof dateKey === 'string' ? dateKey : null;
  const dateError = dateKey instanceof KeyInvalidError ? dateKey : null;
  const rowDaily = { weightKg: reader.number('weight_kg'), steps: reader.number('steps') };

  const days: DayValues[] = [];
  for (let dayIndex = 1; dayIndex <= 7; dayIndex++) {
    const weightKg = reader.number('weight_kg', dayIndex);
    const steps = reader.number('steps', dayIndex);
    if (weightKg !== null || steps !== null) {
      days.push({ dayIndex, weightKg, steps });
    }
  }

  if (key instanceof KeyInvalidError) {
    return { kind: 'rejected', classifiedAs: 'weekly', line: row.line, error: key, issues: reader.issues, warnings: [] };
  }

  const record = emptyWeeklyRecord(key);
  record.startDate = startDate;
  for (const { column, value } of measures) {
    record[WEEKLY_COLUMNS[column]] = value;
  }

  return {
    kind: 'weekly',
    line: row.line,
    record,
    explicitDate,
    dateError,
    rowDaily,
    days,
    issues: reader.issues,
    warnings: [],
  };
}
