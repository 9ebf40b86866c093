import fs from 'fs';
import path from 'path';
import Database, { Database as DatabaseType } from 'better-sqlite3';
import { runMigrations } from './migrate';
import logger from '../utils/logger';

/**
 * Open (creating if needed) the monitor database and bring its schema up
 * to date. Pass ':memory:' for a throwaway database.
 */
export function initializeDatabase(dbPath: string): DatabaseType {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const db = new Database(dbPath);

  // WAL keeps readers (e.g. an operator's sqlite3 shell) from blocking the loop
  db.pragma('journal_mode = WAL');

  runMigrations(db);

  logger.info({ path: dbPath }, 'database initialized');
  return db;
}

export function closeDatabase(db: DatabaseType): void {
  if (db.open) {
    db.close();
    logger.info('database connection closed');
  }
}

export { runMigrations } from './migrate';
