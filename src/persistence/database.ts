import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';

const logger = createLogger({ component: 'database' });

/**
 * Opens (creating if needed) a database file and brings its schema up to date.
 * `:memory:` gives a private in-process database.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  logger.info({ dbPath }, 'Opening database');
  const database = new Database(dbPath);
  if (dbPath !== ':memory:') {
    database.pragma('journal_mode = WAL');
  }
  database.pragma('foreign_keys = ON');

  runMigrations(database);
  return database;
}

export function runMigrations(database: Database.Database): void {
  logger.debug('Running database migrations');

  // One row per calendar date; week_number set when the row was unfolded from a weekly check-in
  database.exec(`
    CREATE TABLE IF NOT EXISTS daily_metrics (
      date TEXT PRIMARY KEY,
      week_number INTEGER,
      weight_kg REAL,
      steps INTEGER,
      run_km REAL,
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );

    CREATE INDEX IF NOT EXISTS idx_daily_metrics_week ON daily_metrics(week_number);
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS weekly_checkins (
      week_number INTEGER PRIMARY KEY,
      start_date TEXT,
      r_biceps_in REAL,
      l_biceps_in REAL,
      chest_in REAL,
      r_thigh_in REAL,
      l_thigh_in REAL,
      waist_navel_in REAL,
      sleep_issues INTEGER,
      hunger_issues INTEGER,
      stress_issues INTEGER,
      diet_score INTEGER,
      workout_score INTEGER,
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS import_runs (
      id TEXT PRIMARY KEY,
      source_name TEXT,
      file_sha256 TEXT NOT NULL,
      conflict_policy TEXT NOT NULL,
      started_at TEXT NOT NULL,
      finished_at TEXT NOT NULL,
      rows INTEGER NOT NULL,
      records INTEGER NOT NULL,
      accepted INTEGER NOT NULL,
      skipped INTEGER NOT NULL,
      overwritten INTEGER NOT NULL,
      rejected INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_import_runs_sha ON import_runs(file_sha256);
  `);

  logger.debug('Database migrations completed');
}
