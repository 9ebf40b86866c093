import { ServiceIdentity } from '../tracking/types';

const NON_ALPHANUMERIC = /[^\p{L}\p{N}]/gu;

/**
 * Canonical identity for a dashboard label: lower-cased with every character
 * that is not a letter or digit removed, so "DB-Service", "db service" and
 * "dbservice" are the same service. Returns '' when nothing is left.
 */
export function normalizeLabel(rawLabel: string): ServiceIdentity {
  return rawLabel.toLowerCase().replace(NON_ALPHANUMERIC, '');
}
