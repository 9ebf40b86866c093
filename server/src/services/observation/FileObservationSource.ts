import { promises as fs } from 'fs';
import { colorToStatus } from './colorMapping';
import { IObservationSource, ServiceObservation } from './types';
import { ObservationSourceError, describeError, hasErrorCode } from '../../utils/errors';
import logger from '../../utils/logger';

export interface FileObservationSourceOptions {
  /** Reject frames whose file is older than this; 0 disables the check */
  maxAgeMs?: number;
  now?: () => Date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Reads the latest frame analysis written by the capture/OCR process.
 *
 * Two document shapes are accepted:
 * - indicator list: `[{ "label": "API Gateway", "color": "red", "observed_at": "..." }]`
 * - colour buckets: `{ "captured_at": "...", "down": ["API Gateway"], "up": ["Billing"] }`
 *
 * A missing, unreadable or stale file fails the poll, which skips the tick
 * instead of reporting anything as down. So does a frame that was already
 * consumed: a frame reader that stopped writing must not turn one reading
 * into several consecutive ones.
 */
export class FileObservationSource implements IObservationSource {
  private readonly maxAgeMs: number;
  private readonly now: () => Date;
  /** `mtimeMs` and content of the last frame handed out */
  private lastFrame: { mtimeMs: number; content: string } | null = null;

  constructor(private readonly filePath: string, options: FileObservationSourceOptions = {}) {
    this.maxAgeMs = options.maxAgeMs ?? 0;
    this.now = options.now ?? (() => new Date());
  }

  async poll(): Promise<ServiceObservation[]> {
    let content: string;
    let modifiedAt: Date;
    let mtimeMs: number;
    try {
      const stat = await fs.stat(this.filePath);
      modifiedAt = stat.mtime;
      mtimeMs = stat.mtimeMs;
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      const reason = hasErrorCode(err, 'ENOENT') ? 'file not found' : describeError(err);
      throw new ObservationSourceError(`Cannot read observations from ${this.filePath}: ${reason}`, { cause: err });
    }

    if (this.lastFrame && this.lastFrame.mtimeMs === mtimeMs && this.lastFrame.content === content) {
      throw new ObservationSourceError(
        `Observations in ${this.filePath} have not changed since the last poll (last written ${modifiedAt.toISOString()})`,
      );
    }

    const now = this.now();
    if (this.maxAgeMs > 0 && now.getTime() - modifiedAt.getTime() > this.maxAgeMs) {
      throw new ObservationSourceError(
        `Observations in ${this.filePath} are stale (last written ${modifiedAt.toISOString()})`,
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (err) {
      throw new ObservationSourceError(`Observations in ${this.filePath} are not valid JSON`, { cause: err });
    }

    const observations = this.parse(data, modifiedAt);
    this.lastFrame = { mtimeMs, content };
    return observations;
  }

  private parse(data: unknown, fallbackTime: Date): ServiceObservation[] {
    if (Array.isArray(data)) {
      return this.parseIndicatorList(data, fallbackTime);
    }
    if (isRecord(data)) {
      return this.parseColourBuckets(data, fallbackTime);
    }
    throw new ObservationSourceError(`Observations in ${this.filePath} must be an array or an object`);
  }

  private parseIndicatorList(items: unknown[], fallbackTime: Date): ServiceObservation[] {
    const observations: ServiceObservation[] = [];

    items.forEach((item, index) => {
      if (!isRecord(item) || typeof item.label !== 'string' || typeof item.color !== 'string') {
        logger.warn({ index }, 'observation entry needs string label and color, skipped');
        return;
      }
      observations.push({
        rawLabel: item.label,
        colorState: colorToStatus(item.color),
        observedAt: parseTime(item.observed_at) ?? fallbackTime,
      });
    });

    return observations;
  }

  private parseColourBuckets(data: Record<string, unknown>, fallbackTime: Date): ServiceObservation[] {
    const observedAt = parseTime(data.captured_at) ?? fallbackTime;
    const observations: ServiceObservation[] = [];

    for (const [key, colorState] of [['down', 'DOWN'], ['up', 'UP'], ['unknown', 'UNKNOWN']] as const) {
      const labels = data[key];
      if (labels === undefined) continue;
      if (!isStringArray(labels)) {
        throw new ObservationSourceError(`"${key}" in ${this.filePath} must be an array of labels`);
      }
      for (const rawLabel of labels) {
        observations.push({ rawLabel, colorState, observedAt });
      }
    }

    return observations;
  }
}

function parseTime(value: unknown): Date | null {
  if (typeof value !== 'string') return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}
