/**
 * Runtime settings for the monitor, read from the environment (after
 * dotenv has loaded `.env`). Every numeric setting has a default and an
 * accepted range; values outside it are reported and replaced by the default.
 */
export interface MonitorSettings {
  sample_interval_ms: number;
  confirmation_threshold: number;
  notify_on_recovery: boolean;
  retry_backoff_ms: number;
  send_timeout_ms: number;
  poll_timeout_ms: number;
  log_write_timeout_ms: number;
  max_consecutive_source_failures: number;
  observation_max_age_ms: number;
  service_config_path: string;
  observations_file: string;
  log_dir: string;
  database_path: string;
  smtp_server: string;
  smtp_port: number;
  email_sender: string | null;
  email_password: string | null;
  whatsapp_gateway_url: string | null;
  whatsapp_gateway_token: string | null;
}

type NumericSettingsKey = {
  [K in keyof MonitorSettings]: MonitorSettings[K] extends number ? K : never;
}[keyof MonitorSettings];

interface NumericRule {
  env: string;
  fallback: number;
  min: number;
  max: number;
}

const NUMERIC_RULES: Record<NumericSettingsKey, NumericRule> = {
  sample_interval_ms: { env: 'SAMPLE_INTERVAL_MS', fallback: 60_000, min: 1_000, max: 3_600_000 },
  confirmation_threshold: { env: 'CONFIRMATION_THRESHOLD', fallback: 2, min: 1, max: 20 },
  retry_backoff_ms: { env: 'RETRY_BACKOFF_MS', fallback: 2_000, min: 0, max: 60_000 },
  send_timeout_ms: { env: 'SEND_TIMEOUT_MS', fallback: 30_000, min: 1_000, max: 300_000 },
  poll_timeout_ms: { env: 'POLL_TIMEOUT_MS', fallback: 30_000, min: 1_000, max: 300_000 },
  log_write_timeout_ms: { env: 'LOG_WRITE_TIMEOUT_MS', fallback: 5_000, min: 100, max: 60_000 },
  max_consecutive_source_failures: { env: 'MAX_CONSECUTIVE_SOURCE_FAILURES', fallback: 0, min: 0, max: 10_000 },
  observation_max_age_ms: { env: 'OBSERVATION_MAX_AGE_MS', fallback: 180_000, min: 0, max: 86_400_000 },
  smtp_port: { env: 'SMTP_PORT', fallback: 587, min: 1, max: 65_535 },
};

export interface SettingsIssue {
  env: string;
  message: string;
}

export interface LoadedSettings {
  settings: MonitorSettings;
  issues: SettingsIssue[];
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, rule: NumericRule, issues: SettingsIssue[]): number {
  const raw = env[rule.env];
  if (raw === undefined || raw.trim() === '') return rule.fallback;

  if (!/^-?\d+$/.test(raw.trim())) {
    issues.push({ env: rule.env, message: `${rule.env} must be an integer, using ${rule.fallback}` });
    return rule.fallback;
  }

  const value = parseInt(raw, 10);
  if (value < rule.min || value > rule.max) {
    issues.push({
      env: rule.env,
      message: `${rule.env} must be between ${rule.min} and ${rule.max}, using ${rule.fallback}`,
    });
    return rule.fallback;
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean, issues: SettingsIssue[]): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const normalized = raw.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;

  issues.push({ env: name, message: `${name} must be true or false, using ${fallback}` });
  return fallback;
}

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

function readOptional(env: Env, name: string): string | null {
  const raw = env[name]?.trim();
  return raw ? raw : null;
}

export function loadSettings(env: Env = process.env): LoadedSettings {
  const issues: SettingsIssue[] = [];
  const numeric = (key: NumericSettingsKey): number => readInteger(env, NUMERIC_RULES[key], issues);

  const settings: MonitorSettings = {
    sample_interval_ms: numeric('sample_interval_ms'),
    confirmation_threshold: numeric('confirmation_threshold'),
    notify_on_recovery: readBoolean(env, 'NOTIFY_ON_RECOVERY', false, issues),
    retry_backoff_ms: numeric('retry_backoff_ms'),
    send_timeout_ms: numeric('send_timeout_ms'),
    poll_timeout_ms: numeric('poll_timeout_ms'),
    log_write_timeout_ms: numeric('log_write_timeout_ms'),
    max_consecutive_source_failures: numeric('max_consecutive_source_failures'),
    observation_max_age_ms: numeric('observation_max_age_ms'),
    service_config_path: readString(env, 'SERVICE_CONFIG_PATH', 'service_config.json'),
    observations_file: readString(env, 'OBSERVATIONS_FILE', 'observations.json'),
    log_dir: readString(env, 'LOG_DIR', 'service_logs'),
    database_path: readString(env, 'DATABASE_PATH', 'data/monitor.sqlite'),
    smtp_server: readString(env, 'SMTP_SERVER', 'smtp.gmail.com'),
    smtp_port: numeric('smtp_port'),
    email_sender: readOptional(env, 'EMAIL_SENDER'),
    email_password: readOptional(env, 'EMAIL_PASSWORD'),
    whatsapp_gateway_url: readOptional(env, 'WHATSAPP_GATEWAY_URL'),
    whatsapp_gateway_token: readOptional(env, 'WHATSAPP_GATEWAY_TOKEN'),
  };

  return { settings, issues };
}
