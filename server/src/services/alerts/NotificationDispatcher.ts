import { buildEmailMessage, buildWhatsAppMessage, groupInviteCode } from './messages';
import {
  AlertAttempt,
  AlertChannel,
  DispatchPolicy,
  IEmailSender,
  IWhatsAppSender,
  WhatsAppTarget,
} from './types';
import { NotificationPlan } from '../resolver/types';
import { StatusChangedEvent } from '../tracking/types';
import { ChannelDeliveryError, describeError } from '../../utils/errors';
import { delay, withTimeout } from '../../utils/timeout';
import logger from '../../utils/logger';

const MAX_SEND_ATTEMPTS = 2; // first try + one retry

const DEFAULT_POLICY: DispatchPolicy = {
  notifyOnRecovery: false,
  retryBackoffMs: 2_000,
  sendTimeoutMs: 30_000,
};

/** One recipient list of a plan, delivered as an isolated task. */
interface DeliveryTask {
  channel: AlertChannel;
  recipients: string[];
  run: () => Promise<boolean>;
}

/**
 * NotificationDispatcher turns a confirmed status change into alert
 * attempts on every channel of the resolved plan.
 *
 * Each recipient list (email, WhatsApp numbers, WhatsApp groups) is sent by
 * its own task; tasks run concurrently and one failing never stops the
 * others. A failed send is retried once after a short backoff. The
 * dispatcher only reads the event: it never touches tracker state, and it is
 * called exactly once per event.
 */
export class NotificationDispatcher {
  private readonly policy: DispatchPolicy;

  constructor(
    private readonly emailSender: IEmailSender,
    private readonly whatsAppSender: IWhatsAppSender,
    policy: Partial<DispatchPolicy> = {},
    private readonly now: () => Date = () => new Date(),
  ) {
    this.policy = { ...DEFAULT_POLICY, ...policy };
  }

  /**
   * DOWN transitions always alert; UP transitions only when recovery
   * notices are enabled and the service was confirmed DOWN before.
   */
  shouldAlert(event: StatusChangedEvent): boolean {
    if (event.newStatus === 'DOWN') return true;
    return this.policy.notifyOnRecovery && event.oldStatus === 'DOWN';
  }

  async dispatch(event: StatusChangedEvent, plan: NotificationPlan): Promise<AlertAttempt[]> {
    if (!this.shouldAlert(event)) {
      logger.debug({ identity: event.serviceIdentity, from: event.oldStatus, to: event.newStatus }, 'alert: transition does not notify');
      return [this.noAlert(event)];
    }

    const tasks = this.buildTasks(event, plan);
    if (tasks.length === 0) {
      logger.warn({ identity: event.serviceIdentity, isDefaultFallback: plan.isDefaultFallback }, 'alert: plan has no recipients');
      return [this.noAlert(event)];
    }

    logger.info(
      { identity: event.serviceIdentity, status: event.newStatus, channels: tasks.length, isDefaultFallback: plan.isDefaultFallback },
      'alert: dispatching to channels',
    );

    const settled = await Promise.allSettled(tasks.map(task => task.run()));

    return settled.map((outcome, index) => {
      const task = tasks[index];
      if (outcome.status === 'rejected') {
        logger.error({ err: outcome.reason, channel: task.channel }, 'alert task failed unexpectedly');
      }
      return this.attempt(event, task.channel, task.recipients, outcome.status === 'fulfilled' && outcome.value);
    });
  }

  private buildTasks(event: StatusChangedEvent, plan: NotificationPlan): DeliveryTask[] {
    const tasks: DeliveryTask[] = [];

    if (plan.emailRecipients.length > 0) {
      const recipients = [...plan.emailRecipients];
      const { subject, body } = buildEmailMessage(event, plan.displayName);
      tasks.push({
        channel: 'EMAIL',
        recipients,
        run: () => this.deliver('EMAIL', recipients.join(', '), () => this.emailSender.sendEmail(recipients, subject, body)),
      });
    }

    const message = buildWhatsAppMessage(event, plan.displayName);

    if (plan.whatsappNumbers.length > 0) {
      const targets = plan.whatsappNumbers.map((address): WhatsAppTarget => ({ kind: 'individual', address }));
      tasks.push({
        channel: 'WHATSAPP',
        recipients: targets.map(target => target.address),
        run: () => this.deliverWhatsApp(targets, message),
      });
    }

    if (plan.whatsappGroups.length > 0) {
      const targets = plan.whatsappGroups.map((link): WhatsAppTarget => ({ kind: 'group', address: groupInviteCode(link) }));
      tasks.push({
        channel: 'WHATSAPP',
        recipients: targets.map(target => `group:${target.address}`),
        run: () => this.deliverWhatsApp(targets, message),
      });
    }

    return tasks;
  }

  /**
   * Targets of one list go out one after another; the list succeeds only
   * when every target was delivered.
   */
  private async deliverWhatsApp(targets: WhatsAppTarget[], message: string): Promise<boolean> {
    let allDelivered = true;
    for (const target of targets) {
      const label = target.kind === 'group' ? `group:${target.address}` : target.address;
      const delivered = await this.deliver('WHATSAPP', label, () => this.whatsAppSender.sendWhatsApp(target, message));
      allDelivered = allDelivered && delivered;
    }
    return allDelivered;
  }

  /**
   * Run one send with a timeout, retrying once. Never throws: a transport
   * error, a false result and a timeout all count as a failed attempt.
   */
  private async deliver(channel: AlertChannel, recipient: string, send: () => Promise<boolean>): Promise<boolean> {
    let lastFailure = 'sender reported failure';

    for (let attempt = 1; attempt <= MAX_SEND_ATTEMPTS; attempt++) {
      try {
        const delivered = await withTimeout(send(), this.policy.sendTimeoutMs, `${channel} send`);
        if (delivered) {
          if (attempt > 1) {
            logger.info({ channel, recipient }, 'alert retry succeeded');
          }
          return true;
        }
        lastFailure = 'sender reported failure';
      } catch (err) {
        lastFailure = describeError(err);
      }

      if (attempt < MAX_SEND_ATTEMPTS) {
        logger.warn({ channel, recipient, reason: lastFailure }, 'alert send failed, retrying');
        await delay(this.policy.retryBackoffMs);
      }
    }

    const error = new ChannelDeliveryError(channel, recipient, lastFailure);
    logger.error({ err: error, channel, recipient }, 'alert delivery failed');
    return false;
  }

  private attempt(event: StatusChangedEvent, channel: AlertChannel, recipients: string[], success: boolean): AlertAttempt {
    return {
      timestamp: this.now(),
      serviceIdentity: event.serviceIdentity,
      status: event.newStatus,
      channel,
      recipients,
      success,
    };
  }

  private noAlert(event: StatusChangedEvent): AlertAttempt {
    return this.attempt(event, 'NONE', [], false);
  }
}
