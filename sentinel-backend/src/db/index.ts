import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { config } from '../config.js';
import * as schema from './schema.js';

const IN_MEMORY = config.dbPath === ':memory:';

// Ensure the data directory exists before opening the database file
if (!IN_MEMORY) {
  mkdirSync(dirname(config.dbPath), { recursive: true });
}

// Open SQLite database
const sqlite: DatabaseType = new Database(config.dbPath);

// WAL journal mode for concurrent reads while the engine writes.
// - synchronous = NORMAL: safe in WAL mode, skips fsync on most writes
// - temp_store = MEMORY: temp tables and indices kept in RAM
if (!IN_MEMORY) {
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('synchronous = NORMAL');
}
sqlite.pragma('temp_store = MEMORY');

// Export typed Drizzle instance
export const db = drizzle(sqlite, { schema });

// Export raw sqlite for migrations and health checks
export { sqlite };
