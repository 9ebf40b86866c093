import { ServiceStatus } from '../tracking/types';

const UP_COLORS = new Set(['green', 'up']);
const DOWN_COLORS = new Set(['red', 'down']);

/**
 * Map the colour (or status word) the frame reader reported for an
 * indicator. Anything it could not classify is an UNKNOWN read.
 */
export function colorToStatus(color: string): ServiceStatus {
  const normalized = color.trim().toLowerCase();
  if (UP_COLORS.has(normalized)) return 'UP';
  if (DOWN_COLORS.has(normalized)) return 'DOWN';
  return 'UNKNOWN';
}
