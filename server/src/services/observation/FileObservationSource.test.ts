import fs from 'fs';
import os from 'os';
import path from 'path';
import { FileObservationSource } from './FileObservationSource';
import { ObservationSourceError } from '../../utils/errors';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

describe('FileObservationSource', () => {
  let dir: string;
  let filePath: string;
  const modifiedAt = new Date('2024-01-15T08:30:00.000Z');

  function writeObservations(content: unknown): void {
    fs.writeFileSync(filePath, typeof content === 'string' ? content : JSON.stringify(content));
    fs.utimesSync(filePath, modifiedAt, modifiedAt);
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'observations-'));
    filePath = path.join(dir, 'observations.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read an indicator list', async () => {
    writeObservations([
      { label: 'DB-Service', color: 'red', observed_at: '2024-01-15T08:29:58.000Z' },
      { label: 'Billing', color: 'green' },
      { label: 'Search', color: 'grey' },
    ]);
    const source = new FileObservationSource(filePath);

    await expect(source.poll()).resolves.toEqual([
      { rawLabel: 'DB-Service', colorState: 'DOWN', observedAt: new Date('2024-01-15T08:29:58.000Z') },
      { rawLabel: 'Billing', colorState: 'UP', observedAt: modifiedAt },
      { rawLabel: 'Search', colorState: 'UNKNOWN', observedAt: modifiedAt },
    ]);
  });

  it('should skip malformed entries of an indicator list', async () => {
    writeObservations([{ label: 'Billing' }, 'nope', { label: 'Search', color: 'green' }]);
    const source = new FileObservationSource(filePath);

    const observations = await source.poll();

    expect(observations.map(o => o.rawLabel)).toEqual(['Search']);
  });

  it('should read colour buckets', async () => {
    writeObservations({
      captured_at: '2024-01-15T08:29:59.000Z',
      down: ['DB-Service'],
      up: ['Billing', 'Search'],
    });
    const source = new FileObservationSource(filePath);

    const capturedAt = new Date('2024-01-15T08:29:59.000Z');
    await expect(source.poll()).resolves.toEqual([
      { rawLabel: 'DB-Service', colorState: 'DOWN', observedAt: capturedAt },
      { rawLabel: 'Billing', colorState: 'UP', observedAt: capturedAt },
      { rawLabel: 'Search', colorState: 'UP', observedAt: capturedAt },
    ]);
  });

  it('should return nothing for an empty frame', async () => {
    writeObservations({ down: [], up: [] });
    const source = new FileObservationSource(filePath);

    await expect(source.poll()).resolves.toEqual([]);
  });

  it('should reject a bucket that is not a list of labels', async () => {
    writeObservations({ down: 'DB-Service' });
    const source = new FileObservationSource(filePath);

    await expect(source.poll()).rejects.toThrow(`"down" in ${filePath} must be an array of labels`);
  });

  it('should fail when the file is missing', async () => {
    const source = new FileObservationSource(filePath);

    await expect(source.poll()).rejects.toThrow(`Cannot read observations from ${filePath}: file not found`);
  });

  it('should fail on invalid JSON', async () => {
    writeObservations('{ "down": [');
    const source = new FileObservationSource(filePath);

    await expect(source.poll()).rejects.toThrow(ObservationSourceError);
  });

  it('should fail when the frame is stale', async () => {
    writeObservations({ down: ['DB-Service'] });
    const source = new FileObservationSource(filePath, {
      maxAgeMs: 60_000,
      now: () => new Date('2024-01-15T08:31:01.000Z'),
    });

    await expect(source.poll()).rejects.toThrow(
      `Observations in ${filePath} are stale (last written 2024-01-15T08:30:00.000Z)`,
    );
  });

  it('should accept a frame within the age limit', async () => {
    writeObservations({ down: ['DB-Service'] });
    const source = new FileObservationSource(filePath, {
      maxAgeMs: 60_000,
      now: () => new Date('2024-01-15T08:31:00.000Z'),
    });

    await expect(source.poll()).resolves.toHaveLength(1);
  });

  describe('repeated polls', () => {
    it('should fail when the frame was already consumed', async () => {
      writeObservations({ down: ['DB-Service'] });
      const source = new FileObservationSource(filePath);
      await source.poll();

      await expect(source.poll()).rejects.toThrow(
        `Observations in ${filePath} have not changed since the last poll (last written 2024-01-15T08:30:00.000Z)`,
      );
    });

    it('should accept a rewritten frame with the same content', async () => {
      writeObservations({ down: ['DB-Service'] });
      const source = new FileObservationSource(filePath);
      await source.poll();

      const rewrittenAt = new Date('2024-01-15T08:31:00.000Z');
      fs.utimesSync(filePath, rewrittenAt, rewrittenAt);

      await expect(source.poll()).resolves.toEqual([
        { rawLabel: 'DB-Service', colorState: 'DOWN', observedAt: rewrittenAt },
      ]);
    });

    it('should accept new content with the same modification time', async () => {
      writeObservations({ captured_at: '2024-01-15T08:29:00.000Z', down: ['DB-Service'] });
      const source = new FileObservationSource(filePath);
      await source.poll();

      writeObservations({ captured_at: '2024-01-15T08:30:00.000Z', down: ['DB-Service'] });

      await expect(source.poll()).resolves.toEqual([
        { rawLabel: 'DB-Service', colorState: 'DOWN', observedAt: new Date('2024-01-15T08:30:00.000Z') },
      ]);
    });

    it('should not consume a frame that failed to parse', async () => {
      writeObservations({ down: 'DB-Service' });
      const source = new FileObservationSource(filePath);

      await expect(source.poll()).rejects.toThrow('must be an array of labels');
      await expect(source.poll()).rejects.toThrow('must be an array of labels');
    });
  });
});
