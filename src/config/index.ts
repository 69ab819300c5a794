import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const timeOfDay = z.string().regex(/^([0-1]?[0-9]|2[0-3]):[0-5][0-9]$/);

const configSchema = z.object({
  // Storage
  databasePath: z.string().default('data/progress.db'),
  backupTime: timeOfDay.optional(), // Optional: no scheduled backup when unset
  backupDir: z.string().default('data/backups'),

  // Import
  importTimeoutMs: z.coerce.number().int().positive().default(30_000),
  importConflictPolicy: z.enum(['last-wins', 'first-wins']).default('last-wins'),
  importDateOrder: z.enum(['dmy', 'mdy']).default('dmy'),
  maxUploadBytes: z.coerce.number().int().positive().default(5 * 1024 * 1024),

  // App
  timezone: z.string().default('UTC'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(5000),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    databasePath: env('DATABASE_PATH'),
    backupTime: env('BACKUP_TIME'),
    backupDir: env('BACKUP_DIR'),
    importTimeoutMs: env('IMPORT_TIMEOUT_MS'),
    importConflictPolicy: env('IMPORT_CONFLICT_POLICY'),
    importDateOrder: env('IMPORT_DATE_ORDER'),
    maxUploadBytes: env('MAX_UPLOAD_BYTES'),
    timezone: env('TIMEZONE'),
    logLevel: env('LOG_LEVEL'),
    host: env('HOST'),
    port: env('PORT'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, {
      cause: result.error,
    });
  }
  return result.data;
}
