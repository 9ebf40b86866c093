import { ServiceIdentity } from '../tracking/types';

export interface RecipientLists {
  email: string[];
  whatsapp: string[];
  whatsappGroups: string[];
}

export interface ServiceNotificationEntry extends RecipientLists {
  displayName: string | null;
}

/**
 * One accepted version of the notification configuration table.
 * `version` increases every time new file content is accepted.
 */
export interface NotificationConfigSnapshot {
  version: number;
  loadedAt: Date | null;
  defaults: RecipientLists;
  services: ReadonlyMap<ServiceIdentity, ServiceNotificationEntry>;
}

/**
 * Read-through accessor for the configuration table. Implementations return
 * the newest accepted snapshot on every call; callers must not cache it.
 */
export interface INotificationConfigProvider {
  current(): NotificationConfigSnapshot;
}

export interface NotificationPlan {
  serviceIdentity: ServiceIdentity;
  displayName: string;
  emailRecipients: string[];
  whatsappNumbers: string[];
  whatsappGroups: string[];
  isDefaultFallback: boolean;
}

export interface ConfigValidationIssue {
  severity: 'error' | 'warning';
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationIssue[];
  warnings: ConfigValidationIssue[];
  defaults: RecipientLists;
  services: Map<ServiceIdentity, ServiceNotificationEntry>;
}

export function emptyRecipientLists(): RecipientLists {
  return { email: [], whatsapp: [], whatsappGroups: [] };
}
