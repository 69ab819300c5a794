// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { openDatabase } from './persistence/database.js';
import { SqliteProgressStore } from './adapters/sqlite/SqliteProgressStore.js';
import { ImportRunRepository } from './persistence/repositories/ImportRunRepository.js';
import { ImportPipeline } from './core/import/ImportPipeline.js';
import { ProgressExporter } from './core/export/ProgressExporter.js';
import { DataCleanupService } from './core/cleanup/DataCleanupService.js';
import { BackupJob } from './scheduler/BackupJob.js';
import { scheduleBackup } from './scheduler/index.js';
import { createApp, startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting Progress Sheet importer');

  try {
    const config = loadConfig();
    const db = openDatabase(config.databasePath);

    const history = new ImportRunRepository(db);
    const pipeline = new ImportPipeline(new SqliteProgressStore(db), {
      defaults: {
        conflictPolicy: config.importConflictPolicy,
        dateOrder: config.importDateOrder,
        timeoutMs: config.importTimeoutMs,
      },
      history,
    });

    if (config.backupTime) {
      scheduleBackup(new BackupJob(db, config.backupDir), config.backupTime, config.timezone);
    }

    const app = createApp({
      pipeline,
      history,
      exporter: new ProgressExporter(db),
      cleanup: new DataCleanupService(db),
      maxUploadBytes: config.maxUploadBytes,
    });
    const server = await startServer(app, config.port, config.host);

    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Shutting down');
      server.close(() => {
        db.close();
        process.exit(0);
      });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    logger.info({ host: config.host, port: config.port }, 'Server started successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
