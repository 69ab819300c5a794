import { addDays, differenceInCalendarDays, format, isValid, parse } from 'date-fns';

/** Calendar date as `yyyy-MM-dd`, with no time of day and no timezone. */
export type IsoDate = string;

export type DateOrder = 'dmy' | 'mdy';

const ISO_FORMAT = 'yyyy-MM-dd';
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ]\d{2}:\d{2}/;

// Spreadsheet serial day numbers count from 1899-12-30
const SERIAL_EPOCH = new Date(1899, 11, 30);
const SERIAL_MIN = 20_000; // 1954-10-03
const SERIAL_MAX = 80_000; // 2119-01-10

const TEXT_FORMATS = ['yyyy/MM/dd', 'd.M.yyyy', 'd MMM yyyy', 'd MMMM yyyy', 'MMM d, yyyy', 'MMMM d, yyyy'];

// Fixed reference so that parsing never depends on "today"
const REFERENCE_DATE = new Date(2000, 0, 1);

function toLocalDate(iso: IsoDate): Date {
  return parse(iso, ISO_FORMAT, REFERENCE_DATE);
}

export function formatIsoDate(date: Date): IsoDate {
  return format(date, ISO_FORMAT);
}

export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && isValid(toLocalDate(value));
}

/**
 * Parses the date spellings found in spreadsheet exports into an IsoDate.
 * Returns null when the text is not a real calendar date.
 */
export function parseCalendarDate(raw: string, order: DateOrder = 'dmy'): IsoDate | null {
  const text = raw.trim();
  if (!text) return null;

  const dateTime = text.match(ISO_DATE_TIME);
  const candidate = dateTime?.[1] ?? text;
  if (ISO_DATE.test(candidate)) {
    return isIsoDate(candidate) ? candidate : null;
  }

  if (/^\d{8}$/.test(text)) {
    const compact = parse(text, 'yyyyMMdd', REFERENCE_DATE);
    return isValid(compact) ? formatIsoDate(compact) : null;
  }

  if (/^\d+$/.test(text)) {
    const serial = Number(text);
    if (serial >= SERIAL_MIN && serial <= SERIAL_MAX) {
      return formatIsoDate(addDays(SERIAL_EPOCH, serial));
    }
    return null;
  }

  const slashFormat = order === 'dmy' ? 'd/M/yyyy' : 'M/d/yyyy';
  for (const fmt of [slashFormat, ...TEXT_FORMATS]) {
    const parsed = parse(text, fmt, REFERENCE_DATE);
    if (isValid(parsed) && parsed.getFullYear() >= 1000) {
      return formatIsoDate(parsed);
    }
  }
  return null;
}

export function addCalendarDays(iso: IsoDate, days: number): IsoDate {
  return formatIsoDate(addDays(toLocalDate(iso), days));
}

export function calendarDaysBetween(from: IsoDate, to: IsoDate): number {
  return differenceInCalendarDays(toLocalDate(to), toLocalDate(from));
}
