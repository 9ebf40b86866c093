import { ServiceIdentity, ServiceStatus } from '../tracking/types';

/**
 * Delivery mechanism of an alert attempt. NONE marks an event for which no
 * alert was attempted at all.
 */
export type AlertChannel = 'EMAIL' | 'WHATSAPP' | 'NONE';

/**
 * Immutable audit record of one delivery attempt for one recipient list.
 */
export interface AlertAttempt {
  readonly timestamp: Date;
  readonly serviceIdentity: ServiceIdentity;
  readonly status: ServiceStatus;
  readonly channel: AlertChannel;
  readonly recipients: readonly string[];
  readonly success: boolean;
}

export interface WhatsAppTarget {
  kind: 'individual' | 'group';
  /** Phone number, or group invite code for groups */
  address: string;
}

/**
 * Email transport. Resolves false (or throws) when the message was not
 * handed to the mail server.
 */
export interface IEmailSender {
  sendEmail(recipients: readonly string[], subject: string, body: string): Promise<boolean>;
}

/**
 * WhatsApp transport for individual numbers and groups.
 */
export interface IWhatsAppSender {
  sendWhatsApp(target: WhatsAppTarget, message: string): Promise<boolean>;
}

export interface DispatchPolicy {
  /** Send "recovered" notices for DOWN -> UP transitions */
  notifyOnRecovery: boolean;
  /** Pause before the single retry of a failed send */
  retryBackoffMs: number;
  /** Upper bound for one send call */
  sendTimeoutMs: number;
}
