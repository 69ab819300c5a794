import type { Database } from 'better-sqlite3';
import type {
  DailyRecord,
  ProgressStorePort,
  SnapshotScope,
  StoreSnapshot,
  WeeklyRecord,
} from '../../ports/ProgressStorePort.js';
import type { IsoDate } from '../../utils/dates.js';
import { describeError, PersistError } from '../../utils/errors.js';
import { DailyMetricRepository } from '../../persistence/repositories/DailyMetricRepository.js';
import { WeeklyCheckinRepository } from '../../persistence/repositories/WeeklyCheckinRepository.js';

/** Progress store backed by the `daily_metrics` and `weekly_checkins` tables. */
export class SqliteProgressStore implements ProgressStorePort {
  private readonly daily: DailyMetricRepository;
  private readonly weekly: WeeklyCheckinRepository;

  constructor(db: Database) {
    this.daily = new DailyMetricRepository(db);
    this.weekly = new WeeklyCheckinRepository(db);
  }

  async snapshot(scope: SnapshotScope): Promise<StoreSnapshot> {
    const daily = new Map<IsoDate, DailyRecord>();
    for (const metric of this.daily.getByDates(scope.dates)) {
      daily.set(metric.date, {
        date: metric.date,
        weightKg: metric.weightKg,
        steps: metric.steps,
        weekNumber: metric.weekNumber,
      });
    }

    const weekly = new Map<number, WeeklyRecord>();
    for (const { updatedAt: _updatedAt, ...record } of this.weekly.getByWeekNumbers(scope.weekNumbers)) {
      weekly.set(record.weekNumber, record);
    }

    return { daily, weekly };
  }

  async upsertDaily(record: DailyRecord): Promise<void> {
    try {
      this.daily.upsert(record);
    } catch (error) {
      throw new PersistError(`daily ${record.date}: ${describeError(error)}`, { cause: error });
    }
  }

  async upsertWeekly(record: WeeklyRecord): Promise<void> {
    try {
      this.weekly.upsert(record);
    } catch (error) {
      throw new PersistError(`weekly ${record.weekNumber}: ${describeError(error)}`, { cause: error });
    }
  }
}
