import { AlertAttempt } from '../alerts/types';
import { StatusChangedEvent } from '../tracking/types';
import { ObservationSourceError } from '../../utils/errors';

export interface TickSummary {
  tickNumber: number;
  skipped: boolean;
  observations: number;
  discarded: number;
  events: StatusChangedEvent[];
  attempts: AlertAttempt[];
  logFailures: number;
  durationMs: number;
}

export interface TickSkippedEvent {
  tickNumber: number;
  error: ObservationSourceError;
  consecutiveFailures: number;
}

export interface MonitorHaltedEvent {
  reason: string;
  error: ObservationSourceError;
}

export interface MonitorLoopOptions {
  intervalMs: number;
  pollTimeoutMs: number;
  /** Stop the loop after this many skipped ticks in a row; 0 never stops */
  maxConsecutiveSourceFailures: number;
}

export enum MonitorEventType {
  STATUS_CHANGE = 'status:change',
  TICK_COMPLETE = 'tick:complete',
  TICK_SKIPPED = 'tick:skipped',
  HALTED = 'monitor:halted',
}
