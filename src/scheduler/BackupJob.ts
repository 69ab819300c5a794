import type { Database } from 'better-sqlite3';
import { format } from 'date-fns';
import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger } from '../utils/logger.js';

/** Copies the live database into `backupDir` with SQLite's online backup. */
export class BackupJob {
  private readonly logger = createLogger({ job: 'BackupJob' });

  constructor(
    private readonly db: Database,
    private readonly backupDir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  backupPath(at: Date): string {
    return join(this.backupDir, `progress-${format(at, 'yyyyMMdd-HHmm')}.db`);
  }

  async run(): Promise<string> {
    const destination = this.backupPath(this.now());
    mkdirSync(this.backupDir, { recursive: true });

    const started = Date.now();
    const { totalPages } = await this.db.backup(destination);
    this.logger.info({ destination, totalPages, durationMs: Date.now() - started }, 'Database backup written');
    return destination;
  }
}
