import { ServiceStatus } from '../services/tracking/types';

export interface ServiceStateRow {
  identity: string;
  /** One of the ServiceStatus values; validated when restored */
  current_status: string;
  last_alert_sent_at: string | null;
  updated_at: string;
}

export interface StatusChangeEventRow {
  id: string;
  identity: string;
  previous_status: ServiceStatus;
  current_status: ServiceStatus;
  recorded_at: string;
}
