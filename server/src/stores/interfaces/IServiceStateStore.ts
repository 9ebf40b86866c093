import { ServiceStateRow } from '../../db/types';
import { ServiceStatus } from '../../services/tracking/types';

export interface IServiceStateStore {
  findAll(): ServiceStateRow[];

  findByIdentity(identity: string): ServiceStateRow | undefined;

  /**
   * Insert or update the last-known status of a service.
   */
  save(identity: string, currentStatus: ServiceStatus, lastAlertSentAt: string | null, updatedAt: string): void;
}
