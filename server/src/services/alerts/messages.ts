import { StatusChangedEvent } from '../tracking/types';
import { formatTimestamp } from '../../utils/time';

export interface EmailMessage {
  subject: string;
  body: string;
}

function isRecovery(event: StatusChangedEvent): boolean {
  return event.newStatus === 'UP';
}

export function buildEmailMessage(event: StatusChangedEvent, serviceName: string): EmailMessage {
  const time = formatTimestamp(event.observedAt);

  if (isRecovery(event)) {
    return {
      subject: `RECOVERED: Service Up - ${serviceName} - ${time}`,
      body: `The service ${serviceName} is UP again.\n\nTime: ${time}`,
    };
  }
  return {
    subject: `ALERT: Service Down - ${serviceName} - ${time}`,
    body: `The service ${serviceName} is currently DOWN.\n\nTime: ${time}`,
  };
}

export function buildWhatsAppMessage(event: StatusChangedEvent, serviceName: string): string {
  const time = formatTimestamp(event.observedAt);

  if (isRecovery(event)) {
    return `\u{1F7E2} RECOVERED: Service Up - ${serviceName}\nTime: ${time}`;
  }
  return `\u{1F534} ALERT: Service Down - ${serviceName}\nTime: ${time}`;
}

/**
 * Group invite links are reduced to their trailing invite code,
 * e.g. `https://chat.whatsapp.com/AbC123?x=1` -> `AbC123`.
 */
export function groupInviteCode(link: string): string {
  const withoutQuery = link.trim().split(/[?#]/)[0];
  const segments = withoutQuery.split('/').filter(segment => segment.length > 0);
  return segments.length > 0 ? segments[segments.length - 1] : link.trim();
}
