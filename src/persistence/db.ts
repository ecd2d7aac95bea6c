/*********************************************************************
 * SQLite connection and schema for recorded rides.
 *
 *   rides : one row per saved ride (summary numbers only)
 *   fixes : every recorded fix, keyed by ride id and sequence number
 *   meta  : key/value settings (auto-pause threshold, units, ...)
 *
 * Pass ":memory:" for a throwaway database (tests).
 *********************************************************************/

import Database from 'better-sqlite3';

export type RideDatabase = Database.Database;

export function openRideDatabase(dbPath: string): RideDatabase {
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  ensureSchema(db);
  return db;
}

function ensureSchema(db: RideDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS rides (
      id                        TEXT PRIMARY KEY,
      name                      TEXT NOT NULL,
      started_at_ms             INTEGER NOT NULL,
      ended_at_ms               INTEGER NOT NULL,
      moving_distance_m         REAL NOT NULL,
      moving_duration_ms        INTEGER NOT NULL,
      paused_duration_ms        INTEGER NOT NULL,
      manual_paused_duration_ms INTEGER NOT NULL,
      auto_paused_duration_ms   INTEGER NOT NULL,
      max_speed_kmh             REAL NOT NULL,
      avg_speed_kmh             REAL NOT NULL,
      point_count               INTEGER NOT NULL
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS fixes (
      ride_id             TEXT NOT NULL,
      seq                 INTEGER NOT NULL,
      latitude            REAL NOT NULL,
      longitude           REAL NOT NULL,
      accuracy_m          REAL NOT NULL,
      timestamp_ms        INTEGER NOT NULL,
      reported_speed_mps  REAL,
      reported_bearing_deg REAL,
      PRIMARY KEY (ride_id, seq)
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS meta (
      key   TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);
}
