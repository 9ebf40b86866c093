import { normalizeLabel } from './identity';
import { INotificationConfigProvider, NotificationPlan, RecipientLists } from './types';
import { ServiceIdentity } from '../tracking/types';
import { UnresolvedLabelError } from '../../utils/errors';

/**
 * Maps dashboard labels to service identities and identities to the people
 * who should hear about them.
 */
export class ServiceResolver {
  constructor(private readonly configProvider: INotificationConfigProvider) {}

  /**
   * @throws UnresolvedLabelError when the label has no letters or digits
   */
  resolve(rawLabel: string): ServiceIdentity {
    const identity = normalizeLabel(rawLabel);
    if (!identity) {
      throw new UnresolvedLabelError(rawLabel);
    }
    return identity;
  }

  /**
   * Notification plan for an identity, read from the configuration snapshot
   * current at call time. A configured service never falls back to the
   * defaults, even for a channel whose list is empty.
   */
  planFor(identity: ServiceIdentity): NotificationPlan {
    const config = this.configProvider.current();
    const entry = config.services.get(identity);

    if (entry) {
      return buildPlan(identity, entry.displayName ?? identity, entry, false);
    }
    return buildPlan(identity, identity, config.defaults, true);
  }
}

function buildPlan(
  identity: ServiceIdentity,
  displayName: string,
  lists: RecipientLists,
  isDefaultFallback: boolean,
): NotificationPlan {
  return {
    serviceIdentity: identity,
    displayName,
    emailRecipients: [...lists.email],
    whatsappNumbers: [...lists.whatsapp],
    whatsappGroups: [...lists.whatsappGroups],
    isDefaultFallback,
  };
}
