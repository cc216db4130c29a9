import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { sqlite } from './index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Run database migrations.
 *
 * Strategy:
 *  1. If the drizzle migrations folder exists (generated via `drizzle-kit generate`),
 *     use drizzle-orm's migrate() to apply them.
 *  2. Otherwise, create tables directly with CREATE TABLE IF NOT EXISTS.
 */
export async function runMigrations(): Promise<void> {
  const migrationsFolder = resolve(__dirname, '../../drizzle');

  if (existsSync(migrationsFolder)) {
    const { migrate } = await import('drizzle-orm/better-sqlite3/migrator');
    const { db } = await import('./index.js');
    migrate(db, { migrationsFolder });
    console.log('[DB] Migrations applied (drizzle migrator)');
    return;
  }

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS remediation_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      event_id TEXT NOT NULL UNIQUE,
      service_id TEXT NOT NULL,
      severity TEXT NOT NULL,
      action_taken TEXT NOT NULL,
      escalated INTEGER NOT NULL DEFAULT 0,
      skip_reason TEXT,
      restart_status TEXT,
      post_restart_health REAL,
      duration_ms INTEGER,
      reason TEXT NOT NULL,
      payload TEXT NOT NULL,
      timestamp TEXT NOT NULL,
      recorded_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_remediation_events_service ON remediation_events(service_id);
    CREATE INDEX IF NOT EXISTS idx_remediation_events_timestamp ON remediation_events(timestamp);
    CREATE INDEX IF NOT EXISTS idx_remediation_events_action ON remediation_events(action_taken);

    CREATE TABLE IF NOT EXISTS incident_reports (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      event_id TEXT NOT NULL UNIQUE,
      service_id TEXT NOT NULL,
      root_cause TEXT NOT NULL,
      action_taken TEXT NOT NULL,
      outcome TEXT NOT NULL,
      duration_ms INTEGER NOT NULL,
      generated_at TEXT NOT NULL,
      recorded_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_incident_reports_service ON incident_reports(service_id);
    CREATE INDEX IF NOT EXISTS idx_incident_reports_outcome ON incident_reports(outcome);
  `);

  console.log('[DB] Migrations applied (direct SQL)');
}
