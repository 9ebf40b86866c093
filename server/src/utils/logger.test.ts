import { Writable } from 'stream';
import { parseLogLevel, createLogger, type LogLevel } from './logger';

function captureStream(): { stream: Writable; lines: string[] } {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    },
  });
  return { stream, lines };
}

describe('parseLogLevel', () => {
  it('should return "info" when env value is undefined', () => {
    expect(parseLogLevel(undefined)).toBe('info');
  });

  it('should return "info" when env value is empty string', () => {
    expect(parseLogLevel('')).toBe('info');
  });

  it.each<[string, LogLevel]>([
    ['fatal', 'fatal'],
    ['error', 'error'],
    ['warn', 'warn'],
    ['info', 'info'],
    ['debug', 'debug'],
    ['trace', 'trace'],
    ['silent', 'silent'],
  ])('should return "%s" for input "%s"', (input, expected) => {
    expect(parseLogLevel(input)).toBe(expected);
  });

  it('should be case-insensitive and trim whitespace', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('  Warn  ')).toBe('warn');
  });

  it('should return "info" for invalid values', () => {
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel('critical')).toBe('info');
  });
});

describe('createLogger', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should create a logger with default info level', () => {
    delete process.env.LOG_LEVEL;
    const log = createLogger({ pretty: false });
    expect(log.level).toBe('info');
  });

  it('should read LOG_LEVEL from env when level option is not provided', () => {
    process.env.LOG_LEVEL = 'warn';
    const log = createLogger({ pretty: false });
    expect(log.level).toBe('warn');
  });

  it('should prefer option over env var', () => {
    process.env.LOG_LEVEL = 'warn';
    const log = createLogger({ level: 'error', pretty: false });
    expect(log.level).toBe('error');
  });

  it('should write JSON lines tagged with the application name', () => {
    const { stream, lines } = captureStream();
    const log = createLogger({ level: 'info', destination: stream });

    log.info({ identity: 'apigateway' }, 'service status changed');

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]);
    expect(entry.name).toBe('statusboard-sentinel');
    expect(entry.identity).toBe('apigateway');
    expect(entry.msg).toBe('service status changed');
  });

  it('should redact credentials in logged objects', () => {
    const { stream, lines } = captureStream();
    const log = createLogger({ level: 'info', destination: stream });

    log.warn({ smtp: { password: 'test-secret', host: 'smtp.example.com' } }, 'smtp failure');

    const entry = JSON.parse(lines[0]);
    expect(entry.smtp.password).toBe('[redacted]');
    expect(entry.smtp.host).toBe('smtp.example.com');
  });
});
