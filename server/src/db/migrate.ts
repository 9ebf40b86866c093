import { Database } from 'better-sqlite3';
import * as migration001 from './migrations/001_initial_schema';
import logger from '../utils/logger';

interface Migration {
  id: string;
  name: string;
  up: (db: Database) => void;
}

const migrations: Migration[] = [
  { id: '001', name: 'initial_schema', up: migration001.up },
];

/**
 * Apply every migration not yet recorded in `_migrations`, each in its own
 * transaction. Returns how many were applied.
 */
export function runMigrations(db: Database): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const rows = db.prepare('SELECT id FROM _migrations').all() as { id: string }[];
  const applied = new Set(rows.map(row => row.id));
  const pending = migrations.filter(migration => !applied.has(migration.id));

  for (const migration of pending) {
    db.transaction(() => {
      migration.up(db);
      db.prepare('INSERT INTO _migrations (id, name) VALUES (?, ?)').run(migration.id, migration.name);
    })();
    logger.info({ id: migration.id, name: migration.name }, 'migration applied');
  }

  return pending.length;
}
