import { FieldCoercionError, KeyInvalidError } from '../../utils/errors.js';
import { parseCalendarDate, type DateOrder, type IsoDate } from '../../utils/dates.js';
import type { AliasTable } from './headerAliases.js';
import { CANONICAL_UNITS, FIELD_SPECS, type CanonicalField } from './fieldSpecs.js';

export type Coerced<T> = { ok: true; value: T | null } | { ok: false; error: FieldCoercionError };

const UNIT_SUFFIX = /^(.*[\d.,])\s*([a-z]+|")$/i;
const WEEK_LABEL = /^(?:week|wk)\s*#?\s*(\d+)$/i;

export function isEmptyValue(raw: string, table: AliasTable): boolean {
  return table.emptyMarkers.has(raw.trim().toLowerCase());
}

/**
 * Reads a number written with either `.` or `,` as the decimal separator.
 *
 * When both appear, the last one is the decimal separator. A single separator
 * followed by exactly three digits is read as grouping only for whole-number
 * fields, so `12,319` steps is 12319 while `80,5` kg is 80.5.
 */
export function parseLocaleNumber(text: string, wholeNumber: boolean): number | null {
  let s = text.replace(/[\s'_]/g, '');
  if (!/^[+-]?[\d.,]+$/.test(s)) return null;

  const sign = s.startsWith('-') ? -1 : 1;
  s = s.replace(/^[+-]/, '');

  const lastDot = s.lastIndexOf('.');
  const lastComma = s.lastIndexOf(',');

  if (lastDot >= 0 && lastComma >= 0) {
    const decimal = lastDot > lastComma ? '.' : ',';
    const grouping = decimal === '.' ? ',' : '.';
    s = s.split(grouping).join('');
    if (s.split(decimal).length > 2) return null;
    s = s.replace(decimal, '.');
  } else if (lastDot >= 0 || lastComma >= 0) {
    const separator = lastDot >= 0 ? '.' : ',';
    const parts = s.split(separator);
    if (parts.length > 2) {
      if (!parts.slice(1).every((part) => part.length === 3)) return null;
      s = parts.join('');
    } else if (wholeNumber && parts[1].length === 3 && parts[0].length >= 1 && parts[0].length <= 3) {
      s = parts.join('');
    } else {
      s = parts.join('.');
    }
  }

  if (!/^(\d+(\.\d*)?|\.\d+)$/.test(s)) return null;
  return sign * Number(s);
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function coerceNumber(
  field: CanonicalField,
  raw: string,
  headerUnit: string | null,
  table: AliasTable
): Coerced<number> {
  const spec = FIELD_SPECS[field];
  const text = raw.trim();
  if (isEmptyValue(text, table)) return { ok: true, value: null };
  const fail = (message: string): Coerced<number> => ({
    ok: false,
    error: new FieldCoercionError(field, raw, message),
  });

  if (spec.type === 'date') {
    return fail('expected a number');
  }

  let numberText = text;
  let unit = headerUnit;
  const suffix = text.match(UNIT_SUFFIX);
  if (suffix?.[1] && suffix[2]) {
    numberText = suffix[1];
    unit = suffix[2].toLowerCase();
  }

  const parsed = parseLocaleNumber(numberText, spec.type === 'integer');
  if (parsed === null) {
    return fail(`"${raw}" is not a number`);
  }

  let value = parsed;
  if (unit !== null) {
    if (!spec.dimension) {
      return fail(`unexpected unit "${unit}"`);
    }
    const factor = table.units[spec.dimension][unit];
    if (factor === undefined) {
      return fail(`unknown unit "${unit}"`);
    }
    if (unit !== CANONICAL_UNITS[spec.dimension] && factor !== 1) {
      value = roundTo(parsed * factor, 2);
    }
  }

  if (spec.type === 'integer' && !Number.isInteger(value)) {
    return fail(`expected a whole number, got "${raw}"`);
  }
  if (spec.minExclusive ? value <= spec.min : value < spec.min) {
    return fail(`${value} is below the allowed minimum`);
  }
  if (spec.max !== undefined && value > spec.max) {
    return fail(`${value} is above the allowed maximum of ${spec.max}`);
  }
  return { ok: true, value };
}

export function coerceDate(
  field: CanonicalField,
  raw: string,
  order: DateOrder,
  table: AliasTable
): Coerced<IsoDate> {
  if (isEmptyValue(raw, table)) return { ok: true, value: null };
  const date = parseCalendarDate(raw, order);
  if (date === null) {
    return {
      ok: false,
      error: new FieldCoercionError(field, raw, `"${raw}" is not a calendar date`),
    };
  }
  return { ok: true, value: date };
}

export function parseWeekNumberKey(raw: string): number | KeyInvalidError {
  const text = raw.trim();
  const label = text.match(WEEK_LABEL);
  const value = label?.[1] ? Number(label[1]) : parseLocaleNumber(text, true);
  if (value === null || !Number.isInteger(value) || value < 1) {
    return new KeyInvalidError('week_number', raw, `week_number "${raw}" is not a positive whole number`);
  }
  return value;
}

export function parseDateKey(raw: string, order: DateOrder): IsoDate | KeyInvalidError {
  const date = parseCalendarDate(raw, order);
  if (date === null) {
    return new KeyInvalidError('date', raw, `date "${raw}" is not a calendar date`);
  }
  return date;
}
