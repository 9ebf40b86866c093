import fs from 'fs';
import { validateNotificationConfig } from './NotificationConfigValidator';
import { INotificationConfigProvider, NotificationConfigSnapshot, emptyRecipientLists } from './types';
import { ConfigurationError, describeError, hasErrorCode } from '../../utils/errors';
import logger from '../../utils/logger';

const MISSING = 'missing';

/**
 * Notification table backed by a JSON file that other tools (the
 * configuration UI, an operator's editor) rewrite at any time.
 *
 * `current()` stats the file on every call and re-reads it when its
 * modification time or size changed, so an edit is visible on the next
 * lookup without a restart. A missing, unreadable or invalid file keeps the
 * last accepted snapshot; before the first successful load that is an
 * empty table with no default recipients.
 *
 * Limitation: an edit that keeps the file size and lands within the
 * filesystem's mtime granularity of the previous write is not noticed until
 * the file changes again.
 */
export class FileNotificationConfigProvider implements INotificationConfigProvider {
  private snapshot: NotificationConfigSnapshot = {
    version: 0,
    loadedAt: null,
    defaults: emptyRecipientLists(),
    services: new Map(),
  };

  /** `mtimeMs:size` of the last file state that was looked at */
  private fingerprint: string | null = null;

  constructor(private readonly filePath: string) {}

  current(): NotificationConfigSnapshot {
    let stat: fs.Stats;
    try {
      stat = fs.statSync(this.filePath);
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        if (this.fingerprint !== MISSING) {
          this.fingerprint = MISSING;
          logger.warn({ path: this.filePath, version: this.snapshot.version }, 'notification config file not found, keeping current table');
        }
      } else {
        this.fingerprint = null;
        logger.error({ err, path: this.filePath }, 'failed to stat notification config');
      }
      return this.snapshot;
    }

    const fingerprint = `${stat.mtimeMs}:${stat.size}`;
    if (fingerprint !== this.fingerprint) {
      this.fingerprint = fingerprint;
      this.reload();
    }
    return this.snapshot;
  }

  private reload(): void {
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
    } catch (err) {
      const error = new ConfigurationError(this.filePath, describeError(err), { cause: err });
      logger.error({ err: error, version: this.snapshot.version }, 'notification config unreadable, keeping current table');
      return;
    }

    const result = validateNotificationConfig(data);
    for (const warning of result.warnings) {
      logger.warn({ path: warning.path }, `notification config: ${warning.message}`);
    }

    if (!result.valid) {
      const summary = result.errors.map(issue => `${issue.path || '<root>'}: ${issue.message}`).join('; ');
      const error = new ConfigurationError(this.filePath, summary);
      logger.error({ err: error, version: this.snapshot.version }, 'notification config rejected, keeping current table');
      return;
    }

    this.snapshot = {
      version: this.snapshot.version + 1,
      loadedAt: new Date(),
      defaults: result.defaults,
      services: result.services,
    };
    logger.info(
      { path: this.filePath, version: this.snapshot.version, services: result.services.size },
      'notification config loaded',
    );
  }
}
