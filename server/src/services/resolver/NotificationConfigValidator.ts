import { normalizeLabel } from './identity';
import {
  ConfigValidationIssue,
  ConfigValidationResult,
  RecipientLists,
  ServiceNotificationEntry,
  emptyRecipientLists,
} from './types';
import { ServiceIdentity } from '../tracking/types';

// --- Constants ---

const KNOWN_TOP_LEVEL_KEYS = new Set(['default_config', 'services']);
/** File field -> recipient list it fills. */
const LIST_FIELDS: ReadonlyArray<readonly [string, keyof RecipientLists]> = [
  ['email', 'email'],
  ['whatsapp', 'whatsapp'],
  ['whatsapp_groups', 'whatsappGroups'],
];
const KNOWN_DEFAULT_FIELDS = new Set(LIST_FIELDS.map(([field]) => field));
const KNOWN_SERVICE_FIELDS = new Set([...KNOWN_DEFAULT_FIELDS, 'display_name']);

// --- Helpers ---

function addError(issues: ConfigValidationIssue[], path: string, message: string): void {
  issues.push({ severity: 'error', path, message });
}

function addWarning(issues: ConfigValidationIssue[], path: string, message: string): void {
  issues.push({ severity: 'warning', path, message });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function warnUnknownKeys(
  obj: Record<string, unknown>,
  known: Set<string>,
  basePath: string,
  warnings: ConfigValidationIssue[],
): void {
  for (const key of Object.keys(obj)) {
    if (!known.has(key)) {
      addWarning(warnings, `${basePath}.${key}`, `Unknown field "${key}"`);
    }
  }
}

/**
 * Validate one recipient list. Blank entries are dropped with a warning and
 * duplicates are removed, keeping the first occurrence.
 */
function validateList(
  value: unknown,
  path: string,
  errors: ConfigValidationIssue[],
  warnings: ConfigValidationIssue[],
): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    addError(errors, path, 'Must be an array of strings');
    return [];
  }

  const seen = new Set<string>();
  const result: string[] = [];
  value.forEach((item: unknown, index) => {
    if (typeof item !== 'string') {
      addError(errors, `${path}[${index}]`, 'Must be a string');
      return;
    }
    const trimmed = item.trim();
    if (!trimmed) {
      addWarning(warnings, `${path}[${index}]`, 'Blank entry ignored');
      return;
    }
    if (seen.has(trimmed)) {
      addWarning(warnings, `${path}[${index}]`, `Duplicate recipient "${trimmed}" ignored`);
      return;
    }
    seen.add(trimmed);
    result.push(trimmed);
  });
  return result;
}

function validateLists(
  obj: Record<string, unknown>,
  basePath: string,
  errors: ConfigValidationIssue[],
  warnings: ConfigValidationIssue[],
): RecipientLists {
  const lists = emptyRecipientLists();
  for (const [field, target] of LIST_FIELDS) {
    lists[target] = validateList(obj[field], `${basePath}.${field}`, errors, warnings);
  }
  return lists;
}

// --- Public API ---

/**
 * Validate a parsed notification configuration document.
 *
 * Service keys are canonicalised with the same function used for dashboard
 * labels, so `"API Gateway"` and `"api-gateway"` both key the identity
 * `apigateway`; two keys colliding on one identity is an error.
 */
export function validateNotificationConfig(data: unknown): ConfigValidationResult {
  const errors: ConfigValidationIssue[] = [];
  const warnings: ConfigValidationIssue[] = [];
  const services = new Map<ServiceIdentity, ServiceNotificationEntry>();
  let defaults = emptyRecipientLists();

  if (!isRecord(data)) {
    addError(errors, '', 'Configuration must be a JSON object');
    return { valid: false, errors, warnings, defaults, services };
  }

  warnUnknownKeys(data, KNOWN_TOP_LEVEL_KEYS, '', warnings);

  const rawDefaults = data.default_config;
  if (rawDefaults !== undefined) {
    if (!isRecord(rawDefaults)) {
      addError(errors, '.default_config', 'Must be an object');
    } else {
      warnUnknownKeys(rawDefaults, KNOWN_DEFAULT_FIELDS, '.default_config', warnings);
      defaults = validateLists(rawDefaults, '.default_config', errors, warnings);
    }
  } else {
    addWarning(warnings, '.default_config', 'No default recipients configured');
  }

  const rawServices = data.services;
  if (rawServices !== undefined && !isRecord(rawServices)) {
    addError(errors, '.services', 'Must be an object keyed by service name');
  } else if (rawServices !== undefined) {
    const keyByIdentity = new Map<ServiceIdentity, string>();

    for (const [key, rawEntry] of Object.entries(rawServices)) {
      const path = `.services.${key}`;
      const identity = normalizeLabel(key);

      if (!identity) {
        addError(errors, path, 'Service name must contain at least one letter or digit');
        continue;
      }
      const previousKey = keyByIdentity.get(identity);
      if (previousKey !== undefined) {
        addError(errors, path, `Resolves to the same service as "${previousKey}" (${identity})`);
        continue;
      }
      keyByIdentity.set(identity, key);

      if (!isRecord(rawEntry)) {
        addError(errors, path, 'Must be an object');
        continue;
      }
      warnUnknownKeys(rawEntry, KNOWN_SERVICE_FIELDS, path, warnings);

      let displayName: string | null = null;
      if (rawEntry.display_name !== undefined) {
        if (typeof rawEntry.display_name !== 'string' || !rawEntry.display_name.trim()) {
          addError(errors, `${path}.display_name`, 'Must be a non-empty string');
        } else {
          displayName = rawEntry.display_name.trim();
        }
      }

      services.set(identity, { displayName, ...validateLists(rawEntry, path, errors, warnings) });
    }
  }

  return { valid: errors.length === 0, errors, warnings, defaults, services };
}
