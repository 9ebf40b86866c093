import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const VALID_LOG_LEVELS: readonly LogLevel[] = [
  'fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent',
];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.some(level => level === value);
}

export function parseLogLevel(envValue: string | undefined): LogLevel {
  if (!envValue) return 'info';
  const normalized = envValue.toLowerCase().trim();
  return isLogLevel(normalized) ? normalized : 'info';
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  /** Write to this stream instead of stdout (disables pretty printing) */
  destination?: pino.DestinationStream;
}

/**
 * SMTP and gateway credentials can end up in error objects thrown by the
 * channel adapters; keep them out of the log stream.
 */
const REDACTED_PATHS = [
  'password',
  '*.password',
  'auth.pass',
  '*.auth.pass',
  'token',
  '*.token',
  'headers.Authorization',
];

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const env = process.env.NODE_ENV;
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
  // Worker-thread transports outlive jest workers, so tests always log plain JSON
  const pretty = !options.destination && (options.pretty ?? (env !== 'production' && env !== 'test'));

  const transport = pretty
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l' } }
    : undefined;

  const pinoOptions: pino.LoggerOptions = {
    name: 'statusboard-sentinel',
    level,
    transport,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  };

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

const logger = createLogger();

export default logger;
