import { Database } from 'better-sqlite3';

export function up(db: Database): void {
  db.exec(`
    CREATE TABLE service_states (
      identity TEXT PRIMARY KEY,
      current_status TEXT NOT NULL CHECK (current_status IN ('UP', 'DOWN', 'UNKNOWN')),
      last_alert_sent_at TEXT,
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE status_change_events (
      id TEXT PRIMARY KEY,
      identity TEXT NOT NULL,
      previous_status TEXT NOT NULL,
      current_status TEXT NOT NULL,
      recorded_at TEXT NOT NULL
    );
    CREATE INDEX idx_status_change_events_time ON status_change_events(recorded_at);
    CREATE INDEX idx_status_change_events_identity ON status_change_events(identity);
  `);
}
