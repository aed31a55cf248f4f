import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  createDb, createTestDb, closeDb, getRawDb, getDbPath, getDefaultDbPath,
} from '../src/db.js';

describe('createDb', () => {
  let tmpDir: string | null = null;

  afterEach(() => {
    if (tmpDir) {
      rmSync(tmpDir, { recursive: true, force: true });
      tmpDir = null;
    }
  });

  it('creates an in-memory database', () => {
    const db = createDb(':memory:');
    const raw = getRawDb(db);
    expect(raw.name).toBe(':memory:');
    expect(getDbPath(db)).toBe('');
    closeDb(db);
  });

  it('creates a file-based database and parent directories', () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'quadrant-db-test-'));
    const dbPath = join(tmpDir, 'nested', 'dir', 'quadrant.db');

    const db = createDb(dbPath);
    const raw = getRawDb(db);

    expect(existsSync(dbPath)).toBe(true);
    expect(raw.pragma('journal_mode', { simple: true })).toBe('wal');
    expect(raw.pragma('foreign_keys', { simple: true })).toBe(1);
    expect(getDbPath(db)).toMatch(/dir[\\/]quadrant\.db$/);
    closeDb(db);
  });

  it('reopens an existing file without losing rows', () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'quadrant-db-test-'));
    const dbPath = join(tmpDir, 'quadrant.db');

    const first = createDb(dbPath);
    getRawDb(first).prepare(
      "INSERT INTO tasks (title, urgent, important, created_at) VALUES ('kept', 1, 0, '2026-01-01T00:00:00.000Z')",
    ).run();
    closeDb(first);

    const second = createDb(dbPath);
    const row = getRawDb(second).prepare('SELECT COUNT(*) AS n FROM tasks').get();
    expect(row).toEqual({ n: 1 });
    closeDb(second);
  });

  it('closeDb can be called twice', () => {
    const db = createDb(':memory:');
    closeDb(db);
    expect(() => closeDb(db)).not.toThrow();
  });
});

describe('createTestDb', () => {
  it('creates the tasks table and its indexes', () => {
    const raw = getRawDb(createTestDb());

    const names = (raw.prepare(
      "SELECT name FROM sqlite_master WHERE name NOT LIKE 'sqlite_%' ORDER BY name",
    ).all() as Array<{ name: string }>).map(r => r.name);

    expect(names).toEqual(['idx_tasks_done', 'idx_tasks_quadrant', 'tasks']);
  });

  it('rejects blank titles at the schema level', () => {
    const raw = getRawDb(createTestDb());
    expect(() => raw.prepare(
      "INSERT INTO tasks (title, urgent, important, created_at) VALUES ('   ', 0, 0, '2026-01-01T00:00:00.000Z')",
    ).run()).toThrow(/CHECK constraint failed/);
  });
});

describe('getDefaultDbPath', () => {
  it('prefers QUADRANT_DB_PATH', () => {
    expect(getDefaultDbPath({ QUADRANT_DB_PATH: '/srv/tasks.db' })).toBe('/srv/tasks.db');
  });

  it.runIf(process.platform === 'linux')('uses XDG_DATA_HOME on linux', () => {
    expect(getDefaultDbPath({ XDG_DATA_HOME: '/data' })).toBe('/data/quadrant/quadrant.db');
  });
});
