import type { IsoDate } from '../utils/dates.js';

export interface DailyRecord {
  date: IsoDate;
  weightKg: number | null;
  steps: number | null;
  /** Week the record was unfolded from, when it came from a weekly row */
  weekNumber: number | null;
}

export interface WeeklyRecord {
  weekNumber: number;
  startDate: IsoDate | null;
  // Circumferences, inches
  rBicepsIn: number | null;
  lBicepsIn: number | null;
  chestIn: number | null;
  rThighIn: number | null;
  lThighIn: number | null;
  waistNavelIn: number | null;
  // Wellbeing, 0 (none) to 5 (severe)
  sleepIssues: number | null;
  hungerIssues: number | null;
  stressIssues: number | null;
  // Adherence, 0 to 10
  dietScore: number | null;
  workoutScore: number | null;
}

export const DAILY_VALUE_FIELDS = ['weightKg', 'steps', 'weekNumber'] as const satisfies readonly (keyof DailyRecord)[];

export const WEEKLY_VALUE_FIELDS = [
  'startDate',
  'rBicepsIn',
  'lBicepsIn',
  'chestIn',
  'rThighIn',
  'lThighIn',
  'waistNavelIn',
  'sleepIssues',
  'hungerIssues',
  'stressIssues',
  'dietScore',
  'workoutScore',
] as const satisfies readonly (keyof WeeklyRecord)[];

export interface SnapshotScope {
  dates: IsoDate[];
  weekNumbers: number[];
}

export interface StoreSnapshot {
  daily: ReadonlyMap<IsoDate, DailyRecord>;
  weekly: ReadonlyMap<number, WeeklyRecord>;
}

/**
 * Write side of the progress store as seen by the importer.
 *
 * Upserts are partial updates: a `null` field in the incoming record leaves the
 * stored value untouched. Implementations reject a failed write by throwing.
 */
export interface ProgressStorePort {
  snapshot(scope: SnapshotScope): Promise<StoreSnapshot>;
  upsertDaily(record: DailyRecord): Promise<void>;
  upsertWeekly(record: WeeklyRecord): Promise<void>;
}

export function emptyWeeklyRecord(weekNumber: number): WeeklyRecord {
  return {
    weekNumber,
    startDate: null,
    rBicepsIn: null,
    lBicepsIn: null,
    chestIn: null,
    rThighIn: null,
    lThighIn: null,
    waistNavelIn: null,
    sleepIssues: null,
    hungerIssues: null,
    stressIssues: null,
    dietScore: null,
    workoutScore: null,
  };
}
