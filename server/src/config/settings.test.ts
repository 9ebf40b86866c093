import { loadSettings } from './settings';

describe('loadSettings', () => {
  it('should use defaults for an empty environment', () => {
    const { settings, issues } = loadSettings({});

    expect(issues).toEqual([]);
    expect(settings).toEqual({
      sample_interval_ms: 60_000,
      confirmation_threshold: 2,
      notify_on_recovery: false,
      retry_backoff_ms: 2_000,
      send_timeout_ms: 30_000,
      poll_timeout_ms: 30_000,
      log_write_timeout_ms: 5_000,
      max_consecutive_source_failures: 0,
      observation_max_age_ms: 180_000,
      service_config_path: 'service_config.json',
      observations_file: 'observations.json',
      log_dir: 'service_logs',
      database_path: 'data/monitor.sqlite',
      smtp_server: 'smtp.gmail.com',
      smtp_port: 587,
      email_sender: null,
      email_password: null,
      whatsapp_gateway_url: null,
      whatsapp_gateway_token: null,
    });
  });

  it('should read values from the environment', () => {
    const { settings, issues } = loadSettings({
      SAMPLE_INTERVAL_MS: '15000',
      CONFIRMATION_THRESHOLD: '3',
      NOTIFY_ON_RECOVERY: 'true',
      SMTP_PORT: '465',
      EMAIL_SENDER: 'monitor@example.com',
      WHATSAPP_GATEWAY_URL: 'http://localhost:8081/send',
      LOG_DIR: '  /var/log/sentinel  ',
    });

    expect(issues).toEqual([]);
    expect(settings.sample_interval_ms).toBe(15_000);
    expect(settings.confirmation_threshold).toBe(3);
    expect(settings.notify_on_recovery).toBe(true);
    expect(settings.smtp_port).toBe(465);
    expect(settings.email_sender).toBe('monitor@example.com');
    expect(settings.whatsapp_gateway_url).toBe('http://localhost:8081/send');
    expect(settings.log_dir).toBe('/var/log/sentinel');
  });

  it('should fall back to the default for out-of-range numbers', () => {
    const { settings, issues } = loadSettings({ CONFIRMATION_THRESHOLD: '0', SAMPLE_INTERVAL_MS: '500' });

    expect(settings.confirmation_threshold).toBe(2);
    expect(settings.sample_interval_ms).toBe(60_000);
    expect(issues).toEqual([
      { env: 'SAMPLE_INTERVAL_MS', message: 'SAMPLE_INTERVAL_MS must be between 1000 and 3600000, using 60000' },
      { env: 'CONFIRMATION_THRESHOLD', message: 'CONFIRMATION_THRESHOLD must be between 1 and 20, using 2' },
    ]);
  });

  it('should reject non-integer numbers', () => {
    const { settings, issues } = loadSettings({ RETRY_BACKOFF_MS: '2s' });

    expect(settings.retry_backoff_ms).toBe(2_000);
    expect(issues).toEqual([{ env: 'RETRY_BACKOFF_MS', message: 'RETRY_BACKOFF_MS must be an integer, using 2000' }]);
  });

  it.each([
    ['1', true],
    ['yes', true],
    ['OFF', false],
    ['false', false],
  ])('should parse NOTIFY_ON_RECOVERY=%s', (raw, expected) => {
    expect(loadSettings({ NOTIFY_ON_RECOVERY: raw }).settings.notify_on_recovery).toBe(expected);
  });

  it('should report an unparseable boolean', () => {
    const { settings, issues } = loadSettings({ NOTIFY_ON_RECOVERY: 'sometimes' });

    expect(settings.notify_on_recovery).toBe(false);
    expect(issues).toEqual([{ env: 'NOTIFY_ON_RECOVERY', message: 'NOTIFY_ON_RECOVERY must be true or false, using false' }]);
  });

  it('should treat blank optional values as unset', () => {
    const { settings } = loadSettings({ EMAIL_PASSWORD: '   ', WHATSAPP_GATEWAY_TOKEN: '' });

    expect(settings.email_password).toBeNull();
    expect(settings.whatsapp_gateway_token).toBeNull();
  });
});
