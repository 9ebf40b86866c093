export { StateTracker, mergeTickObservations, DEFAULT_CONFIRMATION_THRESHOLD } from './StateTracker';
export { isServiceStatus, SERVICE_STATUSES } from './types';
export type {
  ConfirmedStatus,
  DebounceState,
  ResolvedObservation,
  ServiceIdentity,
  ServiceStateRecord,
  ServiceStateSnapshot,
  ServiceStatus,
  StatusChangedEvent,
} from './types';
