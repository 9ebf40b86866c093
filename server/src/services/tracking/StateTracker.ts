import {
  ConfirmedStatus,
  DebounceState,
  ResolvedObservation,
  ServiceIdentity,
  ServiceStateRecord,
  ServiceStateSnapshot,
  ServiceStatus,
  StatusChangedEvent,
} from './types';

export const DEFAULT_CONFIRMATION_THRESHOLD = 2;

/**
 * StateTracker owns the last-known status of every service seen on the
 * dashboard and debounces indicator flicker.
 *
 * A status only changes after `confirmationThreshold` consecutive reads agree
 * on the same new value. A read equal to the current status cancels any
 * pending transition; UNKNOWN reads are ignored. Records are created on first
 * sight and kept for the process lifetime.
 */
export class StateTracker {
  private records: Map<ServiceIdentity, ServiceStateRecord> = new Map();
  private readonly confirmationThreshold: number;

  constructor(confirmationThreshold = DEFAULT_CONFIRMATION_THRESHOLD) {
    if (!Number.isInteger(confirmationThreshold) || confirmationThreshold < 1) {
      throw new RangeError(`confirmationThreshold must be a positive integer, got ${confirmationThreshold}`);
    }
    this.confirmationThreshold = confirmationThreshold;
  }

  get threshold(): number {
    return this.confirmationThreshold;
  }

  /**
   * Apply one observation. Returns the confirmed transition, if this read
   * completed one.
   */
  observe(identity: ServiceIdentity, status: ServiceStatus, observedAt: Date): StatusChangedEvent | null {
    const record = this.getOrCreate(identity);
    record.lastObservedAt = observedAt;

    if (status === 'UNKNOWN') {
      return null;
    }

    const state = record.debounce;

    if (status === state.currentStatus) {
      record.debounce = { kind: 'stable', currentStatus: state.currentStatus };
      return null;
    }

    const count = state.kind === 'pending' && state.candidate === status ? state.count + 1 : 1;
    const pendingSince = state.kind === 'pending' && state.candidate === status ? state.pendingSince : observedAt;

    if (count >= this.confirmationThreshold) {
      record.debounce = { kind: 'stable', currentStatus: status };
      return {
        serviceIdentity: identity,
        oldStatus: state.currentStatus,
        newStatus: status,
        observedAt,
      };
    }

    record.debounce = {
      kind: 'pending',
      currentStatus: state.currentStatus,
      candidate: status,
      count,
      pendingSince,
    };
    return null;
  }

  /**
   * Record that an alert for the service's current status went out.
   * Called by the orchestration loop after dispatch, never by senders.
   */
  markAlertSent(identity: ServiceIdentity, sentAt: Date): void {
    this.getOrCreate(identity).lastAlertSentAt = sentAt;
  }

  /**
   * Seed records from persisted state. Only identities not yet observed in
   * this process are restored.
   */
  restore(snapshots: ServiceStateSnapshot[]): number {
    let restored = 0;
    for (const snapshot of snapshots) {
      if (this.records.has(snapshot.identity)) continue;
      this.records.set(snapshot.identity, {
        identity: snapshot.identity,
        debounce: { kind: 'stable', currentStatus: snapshot.currentStatus },
        lastObservedAt: null,
        lastAlertSentAt: snapshot.lastAlertSentAt,
      });
      restored++;
    }
    return restored;
  }

  getStatus(identity: ServiceIdentity): ServiceStatus {
    return this.records.get(identity)?.debounce.currentStatus ?? 'UNKNOWN';
  }

  /**
   * Copy of a record, safe to hand out (e.g. to persistence or diagnostics).
   */
  getRecord(identity: ServiceIdentity): ServiceStateRecord | undefined {
    const record = this.records.get(identity);
    return record ? copyRecord(record) : undefined;
  }

  snapshot(): ServiceStateRecord[] {
    return [...this.records.values()].map(copyRecord);
  }

  get size(): number {
    return this.records.size;
  }

  private getOrCreate(identity: ServiceIdentity): ServiceStateRecord {
    let record = this.records.get(identity);
    if (!record) {
      record = {
        identity,
        debounce: { kind: 'stable', currentStatus: 'UNKNOWN' },
        lastObservedAt: null,
        lastAlertSentAt: null,
      };
      this.records.set(identity, record);
    }
    return record;
  }
}

function copyDebounce(state: DebounceState): DebounceState {
  return state.kind === 'pending' ? { ...state, pendingSince: new Date(state.pendingSince) } : { ...state };
}

function copyRecord(record: ServiceStateRecord): ServiceStateRecord {
  return {
    identity: record.identity,
    debounce: copyDebounce(record.debounce),
    lastObservedAt: record.lastObservedAt ? new Date(record.lastObservedAt) : null,
    lastAlertSentAt: record.lastAlertSentAt ? new Date(record.lastAlertSentAt) : null,
  };
}

/**
 * Collapse one tick's observations to a single read per identity, so a
 * label detected twice in the same frame cannot count as two consecutive
 * reads. Agreeing reads merge; conflicting UP/DOWN reads become UNKNOWN;
 * UNKNOWN reads only survive when nothing better was seen. Order of first
 * appearance is kept and the latest timestamp wins.
 */
export function mergeTickObservations(observations: ResolvedObservation[]): ResolvedObservation[] {
  const groups = new Map<ServiceIdentity, { first: ResolvedObservation; reads: Set<ConfirmedStatus>; latest: Date }>();

  for (const observation of observations) {
    let group = groups.get(observation.identity);
    if (!group) {
      group = { first: observation, reads: new Set(), latest: observation.observedAt };
      groups.set(observation.identity, group);
    }
    if (observation.colorState !== 'UNKNOWN') {
      group.reads.add(observation.colorState);
    }
    if (observation.observedAt > group.latest) {
      group.latest = observation.observedAt;
    }
  }

  return [...groups.values()].map(({ first, reads, latest }) => {
    const [only] = reads;
    return {
      ...first,
      colorState: reads.size === 1 && only !== undefined ? only : 'UNKNOWN',
      observedAt: latest,
    };
  });
}
