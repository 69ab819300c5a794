import type { Database } from 'better-sqlite3';
import { stringify } from 'csv-stringify/sync';
import { DailyMetricRepository } from '../../persistence/repositories/DailyMetricRepository.js';
import { ImportRunRepository } from '../../persistence/repositories/ImportRunRepository.js';
import { WeeklyCheckinRepository } from '../../persistence/repositories/WeeklyCheckinRepository.js';

export const EXPORT_TABLES = ['daily', 'weekly', 'imports'] as const;

export type ExportTable = (typeof EXPORT_TABLES)[number];

export function isExportTable(value: string): value is ExportTable {
  return EXPORT_TABLES.some((table) => table === value);
}

const TEMPLATE_COLUMNS = [
  'week_number',
  'start_date',
  'date',
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
];

const TEMPLATE_EXAMPLE = [1, '2025-01-06', '2025-01-06', 88.9, 12319, 12.5, 12.3, 40, 22, 21.8, 36.5, 1, 2, 1, 9, 8];

export class ProgressExporter {
  private readonly daily: DailyMetricRepository;
  private readonly weekly: WeeklyCheckinRepository;
  private readonly imports: ImportRunRepository;

  constructor(db: Database) {
    this.daily = new DailyMetricRepository(db);
    this.weekly = new WeeklyCheckinRepository(db);
    this.imports = new ImportRunRepository(db);
  }

  /** Header of a Progress Sheet plus one filled-in example row. */
  template(): string {
    return stringify([TEMPLATE_EXAMPLE], { header: true, columns: TEMPLATE_COLUMNS });
  }

  exportTable(table: ExportTable): string {
    switch (table) {
      case 'daily':
        return stringify(
          this.daily.list().map((metric) => [metric.date, metric.weekNumber, metric.weightKg, metric.steps, metric.runKm]),
          { header: true, columns: ['date', 'week_number', 'weight_kg', 'steps', 'run_km'] }
        );
      case 'weekly':
        return stringify(
          this.weekly
            .list()
            .map((checkin) => [
              checkin.weekNumber,
              checkin.startDate,
              checkin.rBicepsIn,
              checkin.lBicepsIn,
              checkin.chestIn,
              checkin.rThighIn,
              checkin.lThighIn,
              checkin.waistNavelIn,
              checkin.sleepIssues,
              checkin.hungerIssues,
              checkin.stressIssues,
              checkin.dietScore,
              checkin.workoutScore,
            ]),
          { header: true, columns: TEMPLATE_COLUMNS.filter((column) => column !== 'date' && column !== 'weight_kg' && column !== 'steps') }
        );
      case 'imports':
        return stringify(
          this.imports
            .list()
            .map((run) => [
              run.importId,
              run.sourceName,
              run.fileSha256,
              run.conflictPolicy,
              run.startedAt,
              run.finishedAt,
              run.totals.rows,
              run.totals.accepted,
              run.totals.skipped,
              run.totals.overwritten,
              run.totals.rejected,
            ]),
          {
            header: true,
            columns: [
              'import_id',
              'source_name',
              'file_sha256',
              'conflict_policy',
              'started_at',
              'finished_at',
              'rows',
              'accepted',
              'skipped',
              'overwritten',
              'rejected',
            ],
          }
        );
    }
  }
}
