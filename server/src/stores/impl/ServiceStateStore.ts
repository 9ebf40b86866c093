import { Database } from 'better-sqlite3';
import { ServiceStateRow } from '../../db/types';
import { ServiceStatus } from '../../services/tracking/types';
import { IServiceStateStore } from '../interfaces/IServiceStateStore';

export class ServiceStateStore implements IServiceStateStore {
  constructor(private db: Database) {}

  findAll(): ServiceStateRow[] {
    return this.db
      .prepare('SELECT * FROM service_states ORDER BY identity ASC')
      .all() as ServiceStateRow[];
  }

  findByIdentity(identity: string): ServiceStateRow | undefined {
    return this.db
      .prepare('SELECT * FROM service_states WHERE identity = ?')
      .get(identity) as ServiceStateRow | undefined;
  }

  save(identity: string, currentStatus: ServiceStatus, lastAlertSentAt: string | null, updatedAt: string): void {
    this.db
      .prepare(`
        INSERT INTO service_states (identity, current_status, last_alert_sent_at, updated_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(identity) DO UPDATE SET
          current_status = excluded.current_status,
          last_alert_sent_at = excluded.last_alert_sent_at,
          updated_at = excluded.updated_at
      `)
      .run(identity, currentStatus, lastAlertSentAt, updatedAt);
  }
}
