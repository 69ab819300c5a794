import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from '../../utils/errors.js';
import {
  CANONICAL_FIELDS,
  DAY_FIELDS,
  FIELD_SPECS,
  type CanonicalField,
  type Dimension,
} from './fieldSpecs.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const DEFAULT_TABLE_PATH = join(__dirname, '../../../schema/header-aliases.json');

const aliasFileSchema = z.object({
  fields: z.record(
    z.enum(CANONICAL_FIELDS),
    z.object({
      aliases: z.array(z.string()).min(1),
      units: z.record(z.string(), z.array(z.string())).optional(),
    })
  ),
  units: z.object({
    mass: z.record(z.string(), z.number().positive()),
    length: z.record(z.string(), z.number().positive()),
  }),
  emptyMarkers: z.array(z.string()),
});

export interface AliasTarget {
  field: CanonicalField;
  /** Unit the header itself declares (`weight_lb`), null for the canonical unit */
  unit: string | null;
}

export interface AliasTable {
  aliases: ReadonlyMap<string, AliasTarget>;
  units: Record<Dimension, Readonly<Record<string, number>>>;
  emptyMarkers: ReadonlySet<string>;
}

export interface ColumnBinding {
  header: string;
  field: CanonicalField;
  unit: string | null;
  /** 1..7 for a per-day sub-column of a weekly row */
  dayIndex: number | null;
}

export interface HeaderMap {
  bindings: ColumnBinding[];
  ignored: string[];
}

const DAY_COLUMN = /^(?:day|d)_?([1-7])_(.+)$/;

export function normalizeHeader(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function compileAliasTable(source: unknown): AliasTable {
  const parsed = aliasFileSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid header alias table:\n${issues.join('\n')}`);
  }

  const aliases = new Map<string, AliasTarget>();
  const register = (alias: string, target: AliasTarget): void => {
    const key = normalizeHeader(alias);
    const existing = aliases.get(key);
    if (existing && existing.field !== target.field) {
      throw new ConfigError(`Header alias "${alias}" maps to both ${existing.field} and ${target.field}`);
    }
    aliases.set(key, target);
  };

  for (const field of CANONICAL_FIELDS) {
    const entry = parsed.data.fields[field];
    register(field, { field, unit: null });
    if (!entry) continue;

    for (const alias of entry.aliases) {
      register(alias, { field, unit: null });
    }
    for (const [unit, unitAliases] of Object.entries(entry.units ?? {})) {
      const spec = FIELD_SPECS[field];
      if (spec.type === 'date' || !spec.dimension || !(unit in parsed.data.units[spec.dimension])) {
        throw new ConfigError(`Header alias unit "${unit}" is not a known unit for ${field}`);
      }
      for (const alias of unitAliases) {
        register(alias, { field, unit });
      }
    }
  }

  return {
    aliases,
    units: parsed.data.units,
    emptyMarkers: new Set(parsed.data.emptyMarkers.map((marker) => marker.trim().toLowerCase())),
  };
}

let defaultTable: AliasTable | undefined;

export function loadAliasTable(path?: string): AliasTable {
  if (!path && defaultTable) {
    return defaultTable;
  }
  const filePath = path ?? DEFAULT_TABLE_PATH;
  let source: unknown;
  try {
    source = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read header alias table at ${filePath}`, { cause: error });
  }
  const table = compileAliasTable(source);
  if (!path) {
    defaultTable = table;
  }
  return table;
}

/** Binds every header of an uploaded file to a canonical field, where one matches. */
export function resolveHeaders(headers: readonly string[], table: AliasTable = loadAliasTable()): HeaderMap {
  const bindings: ColumnBinding[] = [];
  const ignored: string[] = [];

  for (const header of headers) {
    const normalized = normalizeHeader(header);
    const direct = table.aliases.get(normalized);
    if (direct) {
      bindings.push({ header, field: direct.field, unit: direct.unit, dayIndex: null });
      continue;
    }

    const day = normalized.match(DAY_COLUMN);
    const dayTarget = day?.[2] ? table.aliases.get(day[2]) : undefined;
    if (day?.[1] && dayTarget && isDayField(dayTarget.field)) {
      bindings.push({
        header,
        field: dayTarget.field,
        unit: dayTarget.unit,
        dayIndex: Number(day[1]),
      });
      continue;
    }

    ignored.push(header);
  }

  return { bindings, ignored };
}

function isDayField(field: CanonicalField): boolean {
  return DAY_FIELDS.some((dayField) => dayField === field);
}
