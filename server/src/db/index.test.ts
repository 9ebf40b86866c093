import fs from 'fs';
import os from 'os';
import path from 'path';
import Database from 'better-sqlite3';
import { closeDatabase, initializeDatabase, runMigrations } from './index';

jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

describe('Database', () => {
  let testDb: Database.Database;

  beforeEach(() => {
    testDb = new Database(':memory:');
  });

  afterEach(() => {
    testDb.close();
  });

  it('should create all required tables', () => {
    expect(runMigrations(testDb)).toBe(1);

    const tables = testDb
      .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'")
      .all() as { name: string }[];

    expect(tables.map(t => t.name).sort()).toEqual(['_migrations', 'service_states', 'status_change_events']);
  });

  it('should not apply migrations twice', () => {
    runMigrations(testDb);

    expect(runMigrations(testDb)).toBe(0);
    const applied = testDb.prepare('SELECT id, name FROM _migrations').all();
    expect(applied).toEqual([{ id: '001', name: 'initial_schema' }]);
  });

  it('should reject unknown statuses', () => {
    runMigrations(testDb);

    expect(() => {
      testDb.prepare(`
        INSERT INTO service_states (identity, current_status, updated_at)
        VALUES ('dbservice', 'FLAPPING', '2024-01-15T08:30:00.000Z')
      `).run();
    }).toThrow(/CHECK constraint failed/);
  });
});

describe('initializeDatabase', () => {
  it('should create the database file and its directory', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'monitor-db-'));
    const dbPath = path.join(dir, 'nested', 'monitor.db');

    const db = initializeDatabase(dbPath);
    try {
      expect(fs.existsSync(dbPath)).toBe(true);
      expect(db.prepare('SELECT id FROM _migrations').all()).toEqual([{ id: '001' }]);
    } finally {
      closeDatabase(db);
      fs.rmSync(dir, { recursive: true, force: true });
    }
    expect(db.open).toBe(false);
  });
});
