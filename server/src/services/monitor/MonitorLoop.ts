import { EventEmitter } from 'events';
import { MonitorEventType, MonitorLoopOptions, TickSummary } from './types';
import { NotificationDispatcher } from '../alerts/NotificationDispatcher';
import { AlertAttempt } from '../alerts/types';
import { AuditLogger } from '../audit/AuditLogger';
import { IObservationSource, ServiceObservation } from '../observation/types';
import { ServiceResolver } from '../resolver/ServiceResolver';
import { StateTracker, mergeTickObservations } from '../tracking/StateTracker';
import { ResolvedObservation, ServiceStateSnapshot, StatusChangedEvent, isServiceStatus } from '../tracking/types';
import type { IServiceStateStore, IStatusChangeEventStore } from '../../stores';
import { ObservationSourceError, UnresolvedLabelError, describeError } from '../../utils/errors';
import { withTimeout } from '../../utils/timeout';
import logger from '../../utils/logger';

const DEFAULT_OPTIONS: MonitorLoopOptions = {
  intervalMs: 60_000,
  pollTimeoutMs: 30_000,
  maxConsecutiveSourceFailures: 0,
};

export interface MonitorStores {
  serviceStates: IServiceStateStore;
  statusChangeEvents: IStatusChangeEventStore;
}

export interface MonitorLoopDeps {
  source: IObservationSource;
  resolver: ServiceResolver;
  tracker: StateTracker;
  dispatcher: NotificationDispatcher;
  auditLogger: AuditLogger;
  /** Optional persistence of last-known status and transitions */
  stores?: MonitorStores | null;
}

interface ObservationOutcome {
  event: StatusChangedEvent | null;
  attempts: AlertAttempt[];
  logged: boolean;
}

/**
 * MonitorLoop drives one tick per sampling interval:
 * poll -> resolve -> debounce -> dispatch -> audit.
 *
 * Ticks never overlap: the next one is scheduled only after the current one
 * has finished its dispatch and logging. A failing source skips the tick and
 * leaves every service's state untouched.
 */
export class MonitorLoop extends EventEmitter {
  private readonly options: MonitorLoopOptions;
  private readonly stores: MonitorStores | null;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;
  private tickCount = 0;
  private consecutiveSourceFailures = 0;

  constructor(private readonly deps: MonitorLoopDeps, options: Partial<MonitorLoopOptions> = {}) {
    super();
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.stores = deps.stores ?? null;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Restore persisted state and run the first tick right away.
   */
  start(): void {
    if (this.running) return;
    this.running = true;

    this.restoreState();
    logger.info({ intervalMs: this.options.intervalMs, threshold: this.deps.tracker.threshold }, 'monitor started');
    this.scheduleNext(0);
  }

  /**
   * Graceful stop: no new ticks are started, the one in progress (if any)
   * finishes its dispatch and logging before this resolves.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    await this.deps.auditLogger.flush();
    logger.info({ ticks: this.tickCount }, 'monitor stopped');
  }

  /**
   * Run a single tick. Public so a tick can be triggered outside the
   * schedule (tests, one-shot runs).
   */
  async tick(): Promise<TickSummary> {
    const startedAt = Date.now();
    const tickNumber = ++this.tickCount;
    const summary: TickSummary = {
      tickNumber,
      skipped: false,
      observations: 0,
      discarded: 0,
      events: [],
      attempts: [],
      logFailures: 0,
      durationMs: 0,
    };

    let observations: ServiceObservation[];
    try {
      observations = await withTimeout(this.deps.source.poll(), this.options.pollTimeoutMs, 'observation poll');
    } catch (err) {
      this.handleSourceFailure(tickNumber, err);
      summary.skipped = true;
      summary.durationMs = Date.now() - startedAt;
      return summary;
    }
    this.consecutiveSourceFailures = 0;
    summary.observations = observations.length;

    const resolved: ResolvedObservation[] = [];
    for (const observation of observations) {
      try {
        resolved.push({
          identity: this.deps.resolver.resolve(observation.rawLabel),
          rawLabel: observation.rawLabel,
          colorState: observation.colorState,
          observedAt: observation.observedAt,
        });
      } catch (err) {
        if (!(err instanceof UnresolvedLabelError)) throw err;
        summary.discarded++;
        logger.debug({ rawLabel: observation.rawLabel }, 'observation discarded: label has no identity');
      }
    }

    // Debounce every identity first; tracker state is final before any dispatch starts
    const transitions = mergeTickObservations(resolved).map(observation => ({
      observation,
      event: this.deps.tracker.observe(observation.identity, observation.colorState, observation.observedAt),
    }));

    const outcomes = await Promise.all(
      transitions.map(({ observation, event }) => this.handleObservation(observation, event)),
    );

    for (const outcome of outcomes) {
      if (outcome.event) summary.events.push(outcome.event);
      summary.attempts.push(...outcome.attempts);
      if (!outcome.logged) summary.logFailures++;
    }

    summary.durationMs = Date.now() - startedAt;
    logger.debug(
      { tick: tickNumber, observations: summary.observations, events: summary.events.length, durationMs: summary.durationMs },
      'tick complete',
    );
    this.emit(MonitorEventType.TICK_COMPLETE, summary);
    return summary;
  }

  private scheduleNext(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runScheduledTick();
    }, delayMs);
  }

  private runScheduledTick(): void {
    const startedAt = Date.now();

    this.inFlight = this.tick()
      .then(() => undefined)
      .catch(err => {
        logger.error({ err }, 'tick failed');
      })
      .finally(() => {
        this.inFlight = null;
        if (this.running) {
          const elapsed = Date.now() - startedAt;
          this.scheduleNext(Math.max(0, this.options.intervalMs - elapsed));
        }
      });
  }

  /**
   * Dispatch (when the tracker confirmed a transition) and write the audit
   * rows for one observation. Never rejects.
   */
  private async handleObservation(
    observation: ResolvedObservation,
    event: StatusChangedEvent | null,
  ): Promise<ObservationOutcome> {
    let attempts: AlertAttempt[] = [];

    if (event) {
      try {
        attempts = await this.handleStatusChange(event);
      } catch (err) {
        logger.error({ err, identity: event.serviceIdentity }, 'status change handling failed');
        attempts = [{
          timestamp: new Date(),
          serviceIdentity: event.serviceIdentity,
          status: event.newStatus,
          channel: 'NONE',
          recipients: [],
          success: false,
        }];
      }
    }

    const result = await this.deps.auditLogger.record(
      observation.identity,
      observation.colorState,
      attempts,
      observation.observedAt,
      observation.rawLabel,
    );

    return { event, attempts, logged: result.ok };
  }

  private async handleStatusChange(event: StatusChangedEvent): Promise<AlertAttempt[]> {
    logger.info(
      { identity: event.serviceIdentity, from: event.oldStatus, to: event.newStatus },
      'service status changed',
    );
    this.emit(MonitorEventType.STATUS_CHANGE, event);

    this.persist('status change', stores => {
      stores.statusChangeEvents.record(
        event.serviceIdentity,
        event.oldStatus,
        event.newStatus,
        event.observedAt.toISOString(),
      );
    });
    this.saveState(event.serviceIdentity);

    const plan = this.deps.resolver.planFor(event.serviceIdentity);
    if (plan.isDefaultFallback) {
      logger.info({ identity: event.serviceIdentity }, 'no notification entry for service, using default recipients');
    }

    const attempts = await this.deps.dispatcher.dispatch(event, plan);

    const delivered = attempts.filter(attempt => attempt.success);
    if (delivered.length > 0) {
      this.deps.tracker.markAlertSent(event.serviceIdentity, delivered[delivered.length - 1].timestamp);
      this.saveState(event.serviceIdentity);
    }

    return attempts;
  }

  private handleSourceFailure(tickNumber: number, err: unknown): void {
    const error = err instanceof ObservationSourceError
      ? err
      : new ObservationSourceError(describeError(err), { cause: err });
    this.consecutiveSourceFailures++;

    logger.warn(
      { err: error, tick: tickNumber, consecutiveFailures: this.consecutiveSourceFailures },
      'observation source failed, skipping tick',
    );
    this.emit(MonitorEventType.TICK_SKIPPED, {
      tickNumber,
      error,
      consecutiveFailures: this.consecutiveSourceFailures,
    });

    const limit = this.options.maxConsecutiveSourceFailures;
    if (limit > 0 && this.consecutiveSourceFailures >= limit && this.running) {
      this.halt(`observation source failed ${this.consecutiveSourceFailures} ticks in a row`, error);
    }
  }

  private halt(reason: string, error: ObservationSourceError): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    logger.error({ err: error, reason }, 'monitor halted');
    this.emit(MonitorEventType.HALTED, { reason, error });
  }

  private restoreState(): void {
    if (!this.stores) return;

    let snapshots: ServiceStateSnapshot[];
    try {
      snapshots = this.stores.serviceStates.findAll().flatMap(row => {
        if (!isServiceStatus(row.current_status)) {
          logger.warn({ identity: row.identity, status: row.current_status }, 'ignoring persisted state with unknown status');
          return [];
        }
        return [{
          identity: row.identity,
          currentStatus: row.current_status,
          lastAlertSentAt: row.last_alert_sent_at ? new Date(row.last_alert_sent_at) : null,
        }];
      });
    } catch (err) {
      logger.error({ err }, 'failed to load persisted service states');
      return;
    }

    const restored = this.deps.tracker.restore(snapshots);
    logger.info({ restored }, 'service states restored');
  }

  private saveState(identity: string): void {
    const record = this.deps.tracker.getRecord(identity);
    if (!record) return;

    this.persist('service state', stores => {
      stores.serviceStates.save(
        identity,
        record.debounce.currentStatus,
        record.lastAlertSentAt ? record.lastAlertSentAt.toISOString() : null,
        new Date().toISOString(),
      );
    });
  }

  /**
   * Persistence is best-effort: a failing database never aborts a tick.
   */
  private persist(what: string, write: (stores: MonitorStores) => void): void {
    if (!this.stores) return;
    try {
      write(this.stores);
    } catch (err) {
      logger.error({ err, what }, 'failed to persist monitor state');
    }
  }
}
