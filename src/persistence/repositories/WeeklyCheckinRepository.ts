import type { Database } from 'better-sqlite3';
import type { WeeklyRecord } from '../../ports/ProgressStorePort.js';

export interface WeeklyCheckin extends WeeklyRecord {
  updatedAt: number;
}

type WeeklyCheckinRow = {
  week_number: number;
  start_date: string | null;
  r_biceps_in: number | null;
  l_biceps_in: number | null;
  chest_in: number | null;
  r_thigh_in: number | null;
  l_thigh_in: number | null;
  waist_navel_in: number | null;
  sleep_issues: number | null;
  hunger_issues: number | null;
  stress_issues: number | null;
  diet_score: number | null;
  workout_score: number | null;
  updated_at: number;
};

const IN_CHUNK = 500;

function rowToCheckin(row: WeeklyCheckinRow): WeeklyCheckin {
  return {
    weekNumber: row.week_number,
    startDate: row.start_date,
    rBicepsIn: row.r_biceps_in,
    lBicepsIn: row.l_biceps_in,
    chestIn: row.chest_in,
    rThighIn: row.r_thigh_in,
    lThighIn: row.l_thigh_in,
    waistNavelIn: row.waist_navel_in,
    sleepIssues: row.sleep_issues,
    hungerIssues: row.hunger_issues,
    stressIssues: row.stress_issues,
    dietScore: row.diet_score,
    workoutScore: row.workout_score,
    updatedAt: row.updated_at,
  };
}

export class WeeklyCheckinRepository {
  constructor(private readonly db: Database) {}

  /** Insert or partially update: null fields leave the stored value as it is. */
  upsert(record: WeeklyRecord): void {
    this.db
      .prepare<WeeklyRecord>(
        `INSERT INTO weekly_checkins (
           week_number, start_date,
           r_biceps_in, l_biceps_in, chest_in, r_thigh_in, l_thigh_in, waist_navel_in,
           sleep_issues, hunger_issues, stress_issues, diet_score, workout_score,
           updated_at
         ) VALUES (
           @weekNumber, @startDate,
           @rBicepsIn, @lBicepsIn, @chestIn, @rThighIn, @lThighIn, @waistNavelIn,
           @sleepIssues, @hungerIssues, @stressIssues, @dietScore, @workoutScore,
           strftime('%s', 'now')
         )
         ON CONFLICT(week_number) DO UPDATE SET
           start_date = COALESCE(excluded.start_date, start_date),
           r_biceps_in = COALESCE(excluded.r_biceps_in, r_biceps_in),
           l_biceps_in = COALESCE(excluded.l_biceps_in, l_biceps_in),
           chest_in = COALESCE(excluded.chest_in, chest_in),
           r_thigh_in = COALESCE(excluded.r_thigh_in, r_thigh_in),
           l_thigh_in = COALESCE(excluded.l_thigh_in, l_thigh_in),
           waist_navel_in = COALESCE(excluded.waist_navel_in, waist_navel_in),
           sleep_issues = COALESCE(excluded.sleep_issues, sleep_issues),
           hunger_issues = COALESCE(excluded.hunger_issues, hunger_issues),
           stress_issues = COALESCE(excluded.stress_issues, stress_issues),
           diet_score = COALESCE(excluded.diet_score, diet_score),
           workout_score = COALESCE(excluded.workout_score, workout_score),
           updated_at = strftime('%s', 'now')`
      )
      .run({
        weekNumber: record.weekNumber,
        startDate: record.startDate,
        rBicepsIn: record.rBicepsIn,
        lBicepsIn: record.lBicepsIn,
        chestIn: record.chestIn,
        rThighIn: record.rThighIn,
        lThighIn: record.lThighIn,
        waistNavelIn: record.waistNavelIn,
        sleepIssues: record.sleepIssues,
        hungerIssues: record.hungerIssues,
        stressIssues: record.stressIssues,
        dietScore: record.dietScore,
        workoutScore: record.workoutScore,
      });
  }

  getByWeekNumbers(weekNumbers: readonly number[]): WeeklyCheckin[] {
    const checkins: WeeklyCheckin[] = [];
    for (let i = 0; i < weekNumbers.length; i += IN_CHUNK) {
      const chunk = weekNumbers.slice(i, i + IN_CHUNK);
      const placeholders = chunk.map(() => '?').join(', ');
      const rows = this.db
        .prepare<number[], WeeklyCheckinRow>(`SELECT * FROM weekly_checkins WHERE week_number IN (${placeholders})`)
        .all(...chunk);
      checkins.push(...rows.map(rowToCheckin));
    }
    return checkins;
  }

  list(): WeeklyCheckin[] {
    return this.db
      .prepare<[], WeeklyCheckinRow>('SELECT * FROM weekly_checkins ORDER BY week_number')
      .all()
      .map(rowToCheckin);
  }

  findRange(fromWeek: number, toWeek: number): WeeklyCheckin[] {
    return this.db
      .prepare<[number, number], WeeklyCheckinRow>(
        'SELECT * FROM weekly_checkins WHERE week_number >= ? AND week_number <= ? ORDER BY week_number'
      )
      .all(fromWeek, toWeek)
      .map(rowToCheckin);
  }

  delete(weekNumber: number): boolean {
    return this.db.prepare('DELETE FROM weekly_checkins WHERE week_number = ?').run(weekNumber).changes > 0;
  }

  deleteRange(fromWeek: number, toWeek: number): number {
    return this.db
      .prepare('DELETE FROM weekly_checkins WHERE week_number >= ? AND week_number <= ?')
      .run(fromWeek, toWeek).changes;
  }
}
