#!/usr/bin/env node
// Loads .env before any module reads process.env (the logger does at import)
import 'dotenv/config';
import path from 'path';
import { loadSettings } from './config/settings';
import { initializeDatabase, closeDatabase } from './db';
import { StoreRegistry } from './stores';
import {
  AuditLogger,
  EmailSender,
  FileNotificationConfigProvider,
  FileObservationSource,
  MonitorEventType,
  MonitorHaltedEvent,
  MonitorLoop,
  NotificationDispatcher,
  ServiceResolver,
  StateTracker,
  WhatsAppSender,
} from './services';
import logger from './utils/logger';

async function main(): Promise<void> {
  const { settings, issues } = loadSettings();
  for (const issue of issues) {
    logger.warn({ env: issue.env }, issue.message);
  }

  const db = initializeDatabase(settings.database_path);
  const stores = StoreRegistry.create(db);

  const configProvider = new FileNotificationConfigProvider(path.resolve(settings.service_config_path));
  const resolver = new ServiceResolver(configProvider);
  // Load once up front so configuration problems show at start-up
  configProvider.current();

  const dispatcher = new NotificationDispatcher(
    new EmailSender({
      host: settings.smtp_server,
      port: settings.smtp_port,
      user: settings.email_sender,
      password: settings.email_password,
    }),
    new WhatsAppSender({
      url: settings.whatsapp_gateway_url,
      token: settings.whatsapp_gateway_token,
    }),
    {
      notifyOnRecovery: settings.notify_on_recovery,
      retryBackoffMs: settings.retry_backoff_ms,
      sendTimeoutMs: settings.send_timeout_ms,
    },
  );

  const monitor = new MonitorLoop(
    {
      source: new FileObservationSource(path.resolve(settings.observations_file), {
        maxAgeMs: settings.observation_max_age_ms,
      }),
      resolver,
      tracker: new StateTracker(settings.confirmation_threshold),
      dispatcher,
      auditLogger: new AuditLogger(path.resolve(settings.log_dir), settings.log_write_timeout_ms),
      stores,
    },
    {
      intervalMs: settings.sample_interval_ms,
      pollTimeoutMs: settings.poll_timeout_ms,
      maxConsecutiveSourceFailures: settings.max_consecutive_source_failures,
    },
  );

  let shuttingDown = false;
  const shutdown = async (reason: string, exitCode: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ reason }, 'shutting down');

    await monitor.stop();
    closeDatabase(db);
    process.exit(exitCode);
  };

  monitor.on(MonitorEventType.HALTED, (event: MonitorHaltedEvent) => {
    shutdown(event.reason, 1).catch(err => {
      logger.fatal({ err }, 'shutdown failed');
      process.exit(1);
    });
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal, 0).catch(err => {
        logger.fatal({ err }, 'shutdown failed');
        process.exit(1);
      });
    });
  }

  monitor.start();
}

main().catch(err => {
  logger.fatal({ err }, 'failed to start monitor');
  process.exit(1);
});
