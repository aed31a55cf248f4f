import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync } from 'node:fs';

export type QuadrantDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

const DB_PATH_ENV = 'QUADRANT_DB_PATH';

/** Returns QUADRANT_DB_PATH if set, otherwise the platform-appropriate default database path */
export function getDefaultDbPath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env[DB_PATH_ENV];
  if (fromEnv) return fromEnv;

  const platform = process.platform;
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', 'quadrant');
  } else if (platform === 'win32') {
    dir = join(env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), 'quadrant');
  } else {
    // Linux / other
    dir = join(env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), 'quadrant');
  }

  return join(dir, 'quadrant.db');
}

/** The raw SQL to create the schema from scratch (for new databases and tests) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS "tasks" (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL CHECK (length(trim(title)) > 0),
    description TEXT,
    urgent INTEGER NOT NULL CHECK (urgent IN (0, 1)),
    important INTEGER NOT NULL CHECK (important IN (0, 1)),
    done INTEGER NOT NULL DEFAULT 0 CHECK (done IN (0, 1)),
    deadline_at TEXT,
    created_at TEXT NOT NULL,
    completed_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_tasks_quadrant ON tasks(urgent, important);
CREATE INDEX IF NOT EXISTS idx_tasks_done ON tasks(done);
`;

/**
 * Create a Drizzle database connection with proper pragmas.
 * If no path is given, uses the platform default.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path?: string): QuadrantDb {
  const dbPath = path ?? getDefaultDbPath();

  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // Pragmas are per connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  // Idempotent: every statement uses IF NOT EXISTS
  sqlite.exec(CREATE_SCHEMA_SQL);

  return drizzle(sqlite, { schema });
}

/** Create an in-memory database with schema applied. For tests. */
export function createTestDb(): QuadrantDb {
  return createDb(':memory:');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for operations not supported by Drizzle (transactions, pragmas, close).
 */
export function getRawDb(db: QuadrantDb): Database.Database {
  return db.$client;
}

/** Get the file path of the database ('' for in-memory) */
export function getDbPath(db: QuadrantDb): string {
  const list = getRawDb(db).pragma('database_list') as Array<{ file: string }>;
  return list[0]?.file ?? '';
}

/** Close the underlying connection */
export function closeDb(db: QuadrantDb): void {
  const raw = getRawDb(db);
  if (raw.open) raw.close();
}
