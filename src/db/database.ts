/**
 * Database module using better-sqlite3
 */

import Database from "better-sqlite3";
import { mkdirSync, existsSync } from "fs";
import { dirname } from "path";

/**
 * Initialize the database with all required tables
 */
export function initDatabase(dbPath: string = "./data/energy_prices.db"): Database.Database {
  // Ensure the directory exists before creating the database
  const dir = dirname(dbPath);
  if (dbPath !== ":memory:" && dir !== "." && !existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);

  // The pipeline and its task process open the same file
  db.pragma("journal_mode = WAL");

  db.exec(`
    CREATE TABLE IF NOT EXISTS price_points (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      series TEXT NOT NULL,
      time TEXT NOT NULL,
      price REAL NOT NULL,
      UNIQUE(series, time)
    );

    CREATE TABLE IF NOT EXISTS price_sync_state (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      series TEXT NOT NULL UNIQUE,
      last_synced_at TEXT NOT NULL
    );

    -- One row per pipeline run, finalised when the run ends
    CREATE TABLE IF NOT EXISTS pipeline_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      trigger TEXT NOT NULL,
      status TEXT NOT NULL,
      started_at TEXT NOT NULL,
      finished_at TEXT,
      failed_step TEXT,
      error TEXT,
      revision TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_price_points_series_time ON price_points(series, time);
    CREATE INDEX IF NOT EXISTS idx_pipeline_runs_started ON pipeline_runs(started_at);
  `);

  return db;
}

export type { Database };
