import type { Database } from 'better-sqlite3';
import type { DailyRecord } from '../../ports/ProgressStorePort.js';
import type { IsoDate } from '../../utils/dates.js';

export interface DailyMetric extends DailyRecord {
  /** Distance equivalent of `steps`, derived on write */
  runKm: number | null;
  updatedAt: number;
}

type DailyMetricRow = {
  date: string;
  week_number: number | null;
  weight_kg: number | null;
  steps: number | null;
  run_km: number | null;
  updated_at: number;
};

type DailyMetricParams = DailyRecord & { runKm: number | null };

// SQLite caps bound parameters per statement
const IN_CHUNK = 500;

/** 8 km for every 1780 × 5 steps. */
export function stepsToKm(steps: number): number {
  return (steps * 8) / (1780 * 5);
}

function rowToMetric(row: DailyMetricRow): DailyMetric {
  return {
    date: row.date,
    weekNumber: row.week_number,
    weightKg: row.weight_kg,
    steps: row.steps,
    runKm: row.run_km,
    updatedAt: row.updated_at,
  };
}

export class DailyMetricRepository {
  constructor(private readonly db: Database) {}

  /** Insert or partially update: null fields leave the stored value as it is. */
  upsert(record: DailyRecord): void {
    this.db
      .prepare<DailyMetricParams>(
        `INSERT INTO daily_metrics (date, week_number, weight_kg, steps, run_km, updated_at)
         VALUES (@date, @weekNumber, @weightKg, @steps, @runKm, strftime('%s', 'now'))
         ON CONFLICT(date) DO UPDATE SET
           week_number = COALESCE(excluded.week_number, week_number),
           weight_kg = COALESCE(excluded.weight_kg, weight_kg),
           steps = COALESCE(excluded.steps, steps),
           run_km = COALESCE(excluded.run_km, run_km),
           updated_at = strftime('%s', 'now')`
      )
      .run({
        date: record.date,
        weekNumber: record.weekNumber,
        weightKg: record.weightKg,
        steps: record.steps,
        runKm: record.steps === null ? null : stepsToKm(record.steps),
      });
  }

  getByDates(dates: readonly IsoDate[]): DailyMetric[] {
    const metrics: DailyMetric[] = [];
    for (let i = 0; i < dates.length; i += IN_CHUNK) {
      const chunk = dates.slice(i, i + IN_CHUNK);
      const placeholders = chunk.map(() => '?').join(', ');
      const rows = this.db
        .prepare<IsoDate[], DailyMetricRow>(`SELECT * FROM daily_metrics WHERE date IN (${placeholders})`)
        .all(...chunk);
      metrics.push(...rows.map(rowToMetric));
    }
    return metrics;
  }

  list(): DailyMetric[] {
    return this.db
      .prepare<[], DailyMetricRow>('SELECT * FROM daily_metrics ORDER BY date')
      .all()
      .map(rowToMetric);
  }

  findRange(from: IsoDate, to: IsoDate): DailyMetric[] {
    return this.db
      .prepare<[IsoDate, IsoDate], DailyMetricRow>(
        'SELECT * FROM daily_metrics WHERE date >= ? AND date <= ? ORDER BY date'
      )
      .all(from, to)
      .map(rowToMetric);
  }

  findByWeekRange(fromWeek: number, toWeek: number): DailyMetric[] {
    return this.db
      .prepare<[number, number], DailyMetricRow>(
        'SELECT * FROM daily_metrics WHERE week_number >= ? AND week_number <= ? ORDER BY date'
      )
      .all(fromWeek, toWeek)
      .map(rowToMetric);
  }

  countByWeek(weekNumber: number): number {
    const row = this.db
      .prepare<[number], { total: number }>('SELECT COUNT(*) AS total FROM daily_metrics WHERE week_number = ?')
      .get(weekNumber);
    return row?.total ?? 0;
  }

  deleteRange(from: IsoDate, to: IsoDate): number {
    return this.db.prepare('DELETE FROM daily_metrics WHERE date >= ? AND date <= ?').run(from, to).changes;
  }

  deleteByWeekRange(fromWeek: number, toWeek: number): number {
    return this.db
      .prepare('DELETE FROM daily_metrics WHERE week_number >= ? AND week_number <= ?')
      .run(fromWeek, toWeek).changes;
  }
}
