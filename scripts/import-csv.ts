/**
 * Imports a Progress Sheet CSV from disk into the configured database and
 * prints the report as JSON.
 * Run with: npx tsx scripts/import-csv.ts <file.csv> [--dry-run] [--policy first-wins] [--date-order mdy]
 */
import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { loadConfig } from '../src/config/index.js';
import { SqliteProgressStore } from '../src/adapters/sqlite/SqliteProgressStore.js';
import { ImportPipeline } from '../src/core/import/ImportPipeline.js';
import { openDatabase } from '../src/persistence/database.js';
import { ImportRunRepository } from '../src/persistence/repositories/ImportRunRepository.js';
import { ProgressError } from '../src/utils/errors.js';

const argsSchema = z.object({
  file: z.string({ required_error: 'usage: import-csv <file.csv> [--dry-run] [--policy last-wins|first-wins] [--date-order dmy|mdy]' }),
  dryRun: z.boolean().default(false),
  policy: z.enum(['last-wins', 'first-wins']).optional(),
  dateOrder: z.enum(['dmy', 'mdy']).optional(),
});

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      'dry-run': { type: 'boolean' },
      policy: { type: 'string' },
      'date-order': { type: 'string' },
    },
  });
  const args = argsSchema.parse({
    file: positionals[0],
    dryRun: values['dry-run'],
    policy: values.policy,
    dateOrder: values['date-order'],
  });

  const config = loadConfig();
  const db = openDatabase(config.databasePath);
  const pipeline = new ImportPipeline(new SqliteProgressStore(db), {
    defaults: {
      conflictPolicy: config.importConflictPolicy,
      dateOrder: config.importDateOrder,
      timeoutMs: config.importTimeoutMs,
    },
    history: new ImportRunRepository(db),
  });

  try {
    const report = await pipeline.importFile(await readFile(args.file), {
      dryRun: args.dryRun,
      conflictPolicy: args.policy,
      dateOrder: args.dateOrder,
      sourceName: basename(args.file),
    });
    console.log(JSON.stringify(report, null, 2));
    if (report.totals.rejected > 0) process.exitCode = 2;
  } finally {
    db.close();
  }
}

main().catch((error) => {
  if (error instanceof z.ZodError) {
    console.error(error.issues.map((issue) => issue.message).join('\n'));
  } else if (error instanceof ProgressError) {
    console.error(`${error.code}: ${error.message}`);
  } else {
    console.error('Import failed:', error);
  }
  process.exit(1);
});
