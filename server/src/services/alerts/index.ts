export { NotificationDispatcher } from './NotificationDispatcher';
export { EmailSender } from './senders/EmailSender';
export { WhatsAppSender } from './senders/WhatsAppSender';
export { buildEmailMessage, buildWhatsAppMessage, groupInviteCode } from './messages';
export type {
  AlertAttempt,
  AlertChannel,
  DispatchPolicy,
  IEmailSender,
  IWhatsAppSender,
  WhatsAppTarget,
} from './types';
