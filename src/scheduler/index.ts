import cron, { type ScheduledTask } from 'node-cron';
import { ConfigError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { BackupJob } from './BackupJob.js';

const logger = createLogger({ component: 'scheduler' });

export function toDailyCron(time: string): string {
  const [hourStr, minuteStr] = time.split(':');
  const hour = Number(hourStr);
  const minute = Number(minuteStr);
  if (Number.isNaN(hour) || Number.isNaN(minute) || hour > 23 || minute > 59) {
    throw new ConfigError(`Invalid BACKUP_TIME format: ${time}`);
  }
  return `${minute} ${hour} * * *`;
}

export function scheduleBackup(job: BackupJob, backupTime: string, timezone: string): ScheduledTask {
  const cronExpression = toDailyCron(backupTime);
  logger.info({ cronExpression, timezone }, 'Scheduling database backup job');

  return cron.schedule(
    cronExpression,
    () => {
      job.run().catch((error) => {
        logger.error({ error }, 'Database backup failed');
      });
    },
    { timezone }
  );
}
