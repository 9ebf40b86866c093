import { randomUUID } from 'crypto';
import { Database } from 'better-sqlite3';
import { StatusChangeEventRow } from '../../db/types';
import { ServiceStatus } from '../../services/tracking/types';
import { IStatusChangeEventStore } from '../interfaces/IStatusChangeEventStore';

export class StatusChangeEventStore implements IStatusChangeEventStore {
  constructor(private db: Database) {}

  record(
    identity: string,
    previousStatus: ServiceStatus,
    currentStatus: ServiceStatus,
    timestamp: string
  ): StatusChangeEventRow {
    const id = randomUUID();

    this.db
      .prepare(`
        INSERT INTO status_change_events (id, identity, previous_status, current_status, recorded_at)
        VALUES (?, ?, ?, ?, ?)
      `)
      .run(id, identity, previousStatus, currentStatus, timestamp);

    return this.db
      .prepare('SELECT * FROM status_change_events WHERE id = ?')
      .get(id) as StatusChangeEventRow;
  }

  getRecent(limit: number): StatusChangeEventRow[] {
    return this.db
      .prepare(`
        SELECT *
        FROM status_change_events
        ORDER BY recorded_at DESC
        LIMIT ?
      `)
      .all(limit) as StatusChangeEventRow[];
  }
}
