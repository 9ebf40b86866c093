export type MonitorErrorCode =
  | 'UNRESOLVED_LABEL'
  | 'CHANNEL_DELIVERY_FAILURE'
  | 'CONFIGURATION_INVALID'
  | 'LOG_WRITE_FAILURE'
  | 'OBSERVATION_SOURCE_FAILURE'
  | 'TIMEOUT';

/**
 * Base monitor error class.
 *
 * Operational errors are expected failures of an external collaborator
 * (camera feed, SMTP server, disk) and never terminate the monitoring loop.
 */
export class MonitorError extends Error {
  public readonly code: MonitorErrorCode;
  public readonly isOperational: boolean;

  constructor(message: string, code: MonitorErrorCode, isOperational = true, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A dashboard label that normalizes to an empty service identity.
 */
export class UnresolvedLabelError extends MonitorError {
  public readonly rawLabel: string;

  constructor(rawLabel: string) {
    super(`Label "${rawLabel}" does not contain any letters or digits`, 'UNRESOLVED_LABEL');
    this.rawLabel = rawLabel;
  }
}

/**
 * A channel send that still failed after its retry.
 */
export class ChannelDeliveryError extends MonitorError {
  public readonly channel: string;
  public readonly recipient: string;

  constructor(channel: string, recipient: string, reason: string, options?: ErrorOptions) {
    super(`${channel} delivery to ${recipient} failed: ${reason}`, 'CHANNEL_DELIVERY_FAILURE', true, options);
    this.channel = channel;
    this.recipient = recipient;
  }
}

export class ConfigurationError extends MonitorError {
  public readonly source: string;

  constructor(source: string, message: string, options?: ErrorOptions) {
    super(`${source}: ${message}`, 'CONFIGURATION_INVALID', true, options);
    this.source = source;
  }
}

export class LogWriteError extends MonitorError {
  public readonly file: string;

  constructor(file: string, reason: string, options?: ErrorOptions) {
    super(`Failed to write audit log ${file}: ${reason}`, 'LOG_WRITE_FAILURE', true, options);
    this.file = file;
  }
}

/**
 * The sampling source (camera, OCR or the file it feeds) could not produce
 * observations for this tick. Never means the services are down.
 */
export class ObservationSourceError extends MonitorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'OBSERVATION_SOURCE_FAILURE', true, options);
  }
}

export class TimeoutError extends MonitorError {
  public readonly operation: string;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Turn any thrown value into a short, log-safe description.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * True for Node.js filesystem errors carrying the given errno code.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
