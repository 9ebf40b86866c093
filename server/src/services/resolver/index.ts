export { ServiceResolver } from './ServiceResolver';
export { FileNotificationConfigProvider } from './FileNotificationConfigProvider';
export { validateNotificationConfig } from './NotificationConfigValidator';
export { normalizeLabel } from './identity';
export type {
  INotificationConfigProvider,
  NotificationConfigSnapshot,
  NotificationPlan,
  RecipientLists,
  ServiceNotificationEntry,
} from './types';
