import type { WeeklyRecord } from '../../ports/ProgressStorePort.js';

export type Dimension = 'mass' | 'length';

export type FieldSpec =
  | { type: 'date' }
  | {
      type: 'decimal' | 'integer';
      dimension?: Dimension;
      min: number;
      minExclusive?: boolean;
      max?: number;
    };

export const CANONICAL_FIELDS = [
  'date',
  'week_number',
  'start_date',
  'weight_kg',
  'steps',
  'r_biceps_in',
  'l_biceps_in',
  'chest_in',
  'r_thigh_in',
  'l_thigh_in',
  'waist_navel_in',
  'sleep_issues',
  'hunger_issues',
  'stress_issues',
  'diet_score',
  'workout_score',
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

/** Fields that may also appear per day inside a weekly row (`day3_steps`). */
export const DAY_FIELDS = ['weight_kg', 'steps'] as const;
export type DayField = (typeof DAY_FIELDS)[number];

const circumference: FieldSpec = { type: 'decimal', dimension: 'length', min: 0, minExclusive: true, max: 120 };
const issueScale: FieldSpec = { type: 'integer', min: 0, max: 5 };
const adherenceScale: FieldSpec = { type: 'integer', min: 0, max: 10 };

export const FIELD_SPECS: Record<CanonicalField, FieldSpec> = {
  date: { type: 'date' },
  week_number: { type: 'integer', min: 1 },
  start_date: { type: 'date' },
  weight_kg: { type: 'decimal', dimension: 'mass', min: 0, minExclusive: true, max: 500 },
  steps: { type: 'integer', min: 0 },
  r_biceps_in: circumference,
  l_biceps_in: circumference,
  chest_in: circumference,
  r_thigh_in: circumference,
  l_thigh_in: circumference,
  waist_navel_in: circumference,
  sleep_issues: issueScale,
  hunger_issues: issueScale,
  stress_issues: issueScale,
  diet_score: adherenceScale,
  workout_score: adherenceScale,
};

export const CANONICAL_UNITS: Record<Dimension, string> = {
  mass: 'kg',
  length: 'in',
};

type WeeklyNumericField = Exclude<keyof WeeklyRecord, 'weekNumber' | 'startDate'>;

/** Weekly measurement and score columns and the record property each one fills. */
export const WEEKLY_COLUMNS = {
  r_biceps_in: 'rBicepsIn',
  l_biceps_in: 'lBicepsIn',
  chest_in: 'chestIn',
  r_thigh_in: 'rThighIn',
  l_thigh_in: 'lThighIn',
  waist_navel_in: 'waistNavelIn',
  sleep_issues: 'sleepIssues',
  hunger_issues: 'hungerIssues',
  stress_issues: 'stressIssues',
  diet_score: 'dietScore',
  workout_score: 'workoutScore',
} as const satisfies Partial<Record<CanonicalField, WeeklyNumericField>>;

export type WeeklyColumn = keyof typeof WEEKLY_COLUMNS;

export const WEEKLY_COLUMN_NAMES: readonly WeeklyColumn[] = [
  'r_biceps_in',
  'l_biceps_in',
  'chest_in',
  'r_thigh_in',
  'l_thigh_in',
  'waist_navel_in',
  'sleep_issues',
  'hunger_issues',
  'stress_issues',
  'diet_score',
  'workout_score',
];
