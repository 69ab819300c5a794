import type { Database } from 'better-sqlite3';
import { DailyMetricRepository } from '../../persistence/repositories/DailyMetricRepository.js';
import { WeeklyCheckinRepository } from '../../persistence/repositories/WeeklyCheckinRepository.js';
import { isIsoDate, type IsoDate } from '../../utils/dates.js';
import { ValidationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export interface DateRangePreview {
  dailyRows: number;
  /** Weeks that own at least one daily row in the range */
  weeksTouched: number[];
  /** Touched weeks with no daily row left outside the range */
  weeksEmptied: number[];
}

export interface WeekRangePreview {
  weeks: number[];
  linkedDailyRows: number;
}

export interface CleanupResult {
  dailyDeleted: number;
  weeksDeleted: number[];
}

function checkDateRange(from: IsoDate, to: IsoDate): void {
  if (!isIsoDate(from) || !isIsoDate(to)) {
    throw new ValidationError(`date range must be two yyyy-MM-dd dates, got "${from}" to "${to}"`);
  }
  if (from > to) {
    throw new ValidationError(`date range starts after it ends: ${from} > ${to}`);
  }
}

function checkWeekRange(fromWeek: number, toWeek: number): void {
  if (!Number.isInteger(fromWeek) || !Number.isInteger(toWeek) || fromWeek < 1 || toWeek < 1) {
    throw new ValidationError(`week numbers must be positive integers, got ${fromWeek} to ${toWeek}`);
  }
  if (fromWeek > toWeek) {
    throw new ValidationError(`week range starts after it ends: ${fromWeek} > ${toWeek}`);
  }
}

/** Removes imported data by calendar range or by week numbers, with a preview of each. */
export class DataCleanupService {
  private readonly logger = createLogger({ component: 'DataCleanupService' });
  private readonly daily: DailyMetricRepository;
  private readonly weekly: WeeklyCheckinRepository;

  constructor(private readonly db: Database) {
    this.daily = new DailyMetricRepository(this.db);
    this.weekly = new WeeklyCheckinRepository(this.db);
  }

  previewDateRange(from: IsoDate, to: IsoDate): DateRangePreview {
    checkDateRange(from, to);
    const inRange = this.daily.findRange(from, to);

    const perWeek = new Map<number, number>();
    for (const metric of inRange) {
      if (metric.weekNumber === null) continue;
      perWeek.set(metric.weekNumber, (perWeek.get(metric.weekNumber) ?? 0) + 1);
    }

    const weeksTouched = [...perWeek.keys()].sort((a, b) => a - b);
    const weeksEmptied = weeksTouched.filter(
      (weekNumber) => this.daily.countByWeek(weekNumber) === perWeek.get(weekNumber)
    );

    return { dailyRows: inRange.length, weeksTouched, weeksEmptied };
  }

  deleteDateRange(from: IsoDate, to: IsoDate, options: { removeEmptiedWeeks?: boolean } = {}): CleanupResult {
    const removeEmptiedWeeks = options.removeEmptiedWeeks ?? true;

    const result = this.db.transaction((): CleanupResult => {
      const preview = this.previewDateRange(from, to);
      const dailyDeleted = this.daily.deleteRange(from, to);
      const weeksDeleted = removeEmptiedWeeks
        ? preview.weeksEmptied.filter((weekNumber) => this.weekly.delete(weekNumber))
        : [];
      return { dailyDeleted, weeksDeleted };
    })();

    this.logger.info({ from, to, ...result }, 'Deleted daily rows by date range');
    return result;
  }

  previewWeekRange(fromWeek: number, toWeek: number): WeekRangePreview {
    checkWeekRange(fromWeek, toWeek);
    return {
      weeks: this.weekly.findRange(fromWeek, toWeek).map((checkin) => checkin.weekNumber),
      linkedDailyRows: this.daily.findByWeekRange(fromWeek, toWeek).length,
    };
  }

  deleteWeekRange(fromWeek: number, toWeek: number, options: { includeDailies?: boolean } = {}): CleanupResult {
    const includeDailies = options.includeDailies ?? true;

    const result = this.db.transaction((): CleanupResult => {
      const { weeks } = this.previewWeekRange(fromWeek, toWeek);
      const dailyDeleted = includeDailies ? this.daily.deleteByWeekRange(fromWeek, toWeek) : 0;
      this.weekly.deleteRange(fromWeek, toWeek);
      return { dailyDeleted, weeksDeleted: weeks };
    })();

    this.logger.info({ fromWeek, toWeek, ...result }, 'Deleted weeks by number range');
    return result;
  }
}
