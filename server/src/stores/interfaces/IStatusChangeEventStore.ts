import { StatusChangeEventRow } from '../../db/types';
import { ServiceStatus } from '../../services/tracking/types';

export interface IStatusChangeEventStore {
  record(
    identity: string,
    previousStatus: ServiceStatus,
    currentStatus: ServiceStatus,
    timestamp: string
  ): StatusChangeEventRow;

  getRecent(limit: number): StatusChangeEventRow[];
}
