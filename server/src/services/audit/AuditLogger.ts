import { promises as fs } from 'fs';
import path from 'path';
import { toCsvRow } from './csv';
import { AlertAttempt, AlertChannel } from '../alerts/types';
import { ServiceIdentity, ServiceStatus } from '../tracking/types';
import { LogWriteError, describeError, hasErrorCode } from '../../utils/errors';
import { formatBucketKey, formatTimestamp } from '../../utils/time';
import { withTimeout } from '../../utils/timeout';
import logger from '../../utils/logger';

export const AUDIT_COLUMNS = ['Timestamp', 'ServiceName', 'Status', 'AlertSent', 'AlertType', 'Recipients'] as const;

const ALERT_TYPE_LABELS: Record<AlertChannel, string> = {
  EMAIL: 'Email',
  WHATSAPP: 'WhatsApp',
  NONE: 'None',
};

const DEFAULT_WRITE_TIMEOUT_MS = 5_000;

export type AuditWriteResult =
  | { ok: true; file: string; rows: number }
  | { ok: false; file: string; error: LogWriteError };

/**
 * Append-only, day-bucketed CSV audit trail.
 *
 * Every call appends one row for the observation followed by one row per
 * alert attempt to `<dir>/<yy_mm_dd>.csv`, where the date is the local
 * calendar date of the observation. A bucket gets its header row when it is
 * created. All writes go through a single promise chain, so rows from
 * concurrent callers never interleave.
 */
export class AuditLogger {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly logDir: string,
    private readonly writeTimeoutMs = DEFAULT_WRITE_TIMEOUT_MS,
  ) {}

  bucketPath(observedAt: Date): string {
    return path.join(this.logDir, `${formatBucketKey(observedAt)}.csv`);
  }

  /**
   * Never rejects: a failed or timed-out write resolves to `ok: false` and
   * is logged, so the monitoring loop carries on.
   *
   * @param serviceName name written to the ServiceName column, usually the
   *   label as read from the dashboard; defaults to the identity
   */
  async record(
    identity: ServiceIdentity,
    status: ServiceStatus,
    attempts: readonly AlertAttempt[],
    observedAt: Date,
    serviceName: string = identity,
  ): Promise<AuditWriteResult> {
    const file = this.bucketPath(observedAt);
    const rows = [
      toCsvRow([formatTimestamp(observedAt), serviceName, status, 'false', '', '']),
      ...attempts.map(attempt => toCsvRow([
        formatTimestamp(attempt.timestamp),
        serviceName,
        attempt.status,
        String(attempt.success),
        ALERT_TYPE_LABELS[attempt.channel],
        attempt.recipients.join(', '),
      ])),
    ];

    // The queue waits for the real write, even when the caller gave up on it
    const write = this.queue.then(() => this.append(file, rows.join('')));
    this.queue = write.catch(() => undefined);

    try {
      await withTimeout(write, this.writeTimeoutMs, 'audit log write');
      logger.debug({ identity, status, file, rows: rows.length }, 'audit rows written');
      return { ok: true, file, rows: rows.length };
    } catch (err) {
      const error = new LogWriteError(file, describeError(err), { cause: err });
      logger.error({ err: error, identity, status }, 'audit log write failed');
      return { ok: false, file, error };
    }
  }

  /** Resolves once every write queued so far has settled. */
  async flush(): Promise<void> {
    await this.queue;
  }

  private async append(file: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(file), { recursive: true });

    try {
      await fs.writeFile(file, toCsvRow(AUDIT_COLUMNS), { flag: 'wx' });
      logger.info({ file }, 'audit log bucket created');
    } catch (err) {
      if (!hasErrorCode(err, 'EEXIST')) throw err;
    }

    await fs.appendFile(file, content);
  }
}
