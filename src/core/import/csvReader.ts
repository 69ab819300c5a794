import { CsvError } from 'csv-parse';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { describeError, ParseError } from '../../utils/errors.js';
import type { RawRow } from './types.js';

export type CsvInput = Buffer | Uint8Array | string;

export interface ParsedSheet {
  headers: string[];
  rows: RawRow[];
}

const recordsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({ lines: z.number().int() }),
  })
);

function decode(input: CsvInput): string {
  if (typeof input === 'string') return input;
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(input);
  } catch (error) {
    throw new ParseError('file is not valid UTF-8 text', undefined, { cause: error });
  }
}

/** Splits an uploaded Progress Sheet export into its header and line-numbered rows. */
export function readProgressCsv(input: CsvInput): ParsedSheet {
  const text = decode(input);
  if (text.trim() === '') {
    throw new ParseError('file is empty');
  }

  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      delimiter: ',',
      info: true,
      relax_column_count: true,
      skip_empty_lines: true,
      skip_records_with_empty_values: true,
      trim: true,
    });
  } catch (error) {
    const line = error instanceof CsvError && typeof error.lines === 'number' ? error.lines : undefined;
    throw new ParseError(`malformed CSV: ${describeError(error)}`, line, { cause: error });
  }

  const records = recordsSchema.safeParse(parsed);
  if (!records.success) {
    throw new ParseError('file is not delimited tabular text', undefined, { cause: records.error });
  }

  const [header, ...data] = records.data;
  if (!header) {
    throw new ParseError('file has no header row');
  }

  // Blank header cells (trailing commas in spreadsheet exports) carry no column
  const columns = header.record
    .map((name, index) => ({ name, index }))
    .filter((column) => column.name !== '');
  if (columns.length === 0) {
    throw new ParseError('header row has no column names', header.info.lines);
  }

  const seen = new Set<string>();
  for (const { name } of columns) {
    const folded = name.toLowerCase();
    if (seen.has(folded)) {
      throw new ParseError(`duplicate header "${name}"`, header.info.lines);
    }
    seen.add(folded);
  }

  if (data.length === 0) {
    throw new ParseError('file has no data rows');
  }

  const rows: RawRow[] = data.map(({ record, info }) => {
    const values: Record<string, string> = {};
    for (const { name, index } of columns) {
      values[name] = record[index] ?? '';
    }
    return { line: info.lines, values };
  });

  const headers = columns.map((column) => column.name);
  return { headers, rows };
}
