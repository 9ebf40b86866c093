/**
 * Status read from a dashboard indicator. UNKNOWN is a failed read, never a
 * service state in its own right.
 */
export type ServiceStatus = 'UP' | 'DOWN' | 'UNKNOWN';

/** A status an indicator can actually show. */
export type ConfirmedStatus = Exclude<ServiceStatus, 'UNKNOWN'>;

export const SERVICE_STATUSES: readonly ServiceStatus[] = ['UP', 'DOWN', 'UNKNOWN'];

export function isServiceStatus(value: unknown): value is ServiceStatus {
  return SERVICE_STATUSES.some(status => status === value);
}

/** Canonical service key: lower-case letters and digits only. */
export type ServiceIdentity = string;

/**
 * Debounce state of one service. A pending transition only exists while a
 * candidate differs from the current status.
 */
export type DebounceState =
  | { kind: 'stable'; currentStatus: ServiceStatus }
  | {
      kind: 'pending';
      currentStatus: ServiceStatus;
      candidate: ConfirmedStatus;
      count: number;
      pendingSince: Date;
    };

export interface ServiceStateRecord {
  identity: ServiceIdentity;
  debounce: DebounceState;
  lastObservedAt: Date | null;
  lastAlertSentAt: Date | null;
}

export interface StatusChangedEvent {
  serviceIdentity: ServiceIdentity;
  oldStatus: ServiceStatus;
  newStatus: ConfirmedStatus;
  observedAt: Date;
}

/** An observation whose label has already been resolved to an identity. */
export interface ResolvedObservation {
  identity: ServiceIdentity;
  rawLabel: string;
  colorState: ServiceStatus;
  observedAt: Date;
}

/** Persisted subset of a record, used to resume after a restart. */
export interface ServiceStateSnapshot {
  identity: ServiceIdentity;
  currentStatus: ServiceStatus;
  lastAlertSentAt: Date | null;
}
