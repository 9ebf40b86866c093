import { StateTracker, mergeTickObservations } from './StateTracker';
import { ResolvedObservation } from './types';

const t = (seconds: number) => new Date(Date.UTC(2024, 0, 15, 8, 0, seconds));

describe('StateTracker', () => {
  describe('constructor', () => {
    it('should default to a confirmation threshold of 2', () => {
      expect(new StateTracker().threshold).toBe(2);
    });

    it.each([0, -1, 1.5, Number.NaN])('should reject threshold %p', value => {
      expect(() => new StateTracker(value)).toThrow(RangeError);
    });
  });

  describe('observe', () => {
    let tracker: StateTracker;

    beforeEach(() => {
      tracker = new StateTracker(2);
      tracker.restore([{ identity: 'dbservice', currentStatus: 'UP', lastAlertSentAt: null }]);
    });

    it('should confirm a change after two consecutive reads', () => {
      expect(tracker.observe('dbservice', 'DOWN', t(0))).toBeNull();
      expect(tracker.getStatus('dbservice')).toBe('UP');

      const event = tracker.observe('dbservice', 'DOWN', t(60));

      expect(event).toEqual({ serviceIdentity: 'dbservice', oldStatus: 'UP', newStatus: 'DOWN', observedAt: t(60) });
      expect(tracker.getStatus('dbservice')).toBe('DOWN');
    });

    it('should not emit again while the status holds', () => {
      tracker.observe('dbservice', 'DOWN', t(0));
      tracker.observe('dbservice', 'DOWN', t(60));

      expect(tracker.observe('dbservice', 'DOWN', t(120))).toBeNull();
      expect(tracker.observe('dbservice', 'DOWN', t(180))).toBeNull();
    });

    it('should cancel a pending change when the current status is read again', () => {
      expect(tracker.observe('dbservice', 'DOWN', t(0))).toBeNull();
      expect(tracker.observe('dbservice', 'UP', t(60))).toBeNull();
      expect(tracker.observe('dbservice', 'DOWN', t(120))).toBeNull();

      expect(tracker.getStatus('dbservice')).toBe('UP');
      expect(tracker.getRecord('dbservice')?.debounce).toEqual({
        kind: 'pending',
        currentStatus: 'UP',
        candidate: 'DOWN',
        count: 1,
        pendingSince: t(120),
      });
    });

    it('should ignore UNKNOWN reads without breaking a pending change', () => {
      tracker.observe('dbservice', 'DOWN', t(0));
      expect(tracker.observe('dbservice', 'UNKNOWN', t(60))).toBeNull();

      const event = tracker.observe('dbservice', 'DOWN', t(120));

      expect(event?.newStatus).toBe('DOWN');
      expect(tracker.getRecord('dbservice')?.lastObservedAt).toEqual(t(120));
    });

    it('should keep pendingSince from the first read of the candidate', () => {
      const threeReads = new StateTracker(3);
      threeReads.observe('cache', 'DOWN', t(0));
      threeReads.observe('cache', 'DOWN', t(60));

      expect(threeReads.getRecord('cache')?.debounce).toEqual({
        kind: 'pending',
        currentStatus: 'UNKNOWN',
        candidate: 'DOWN',
        count: 2,
        pendingSince: t(0),
      });
    });

    it('should confirm the first status of a new service from UNKNOWN', () => {
      expect(tracker.observe('billing', 'UP', t(0))).toBeNull();
      expect(tracker.getStatus('billing')).toBe('UNKNOWN');

      expect(tracker.observe('billing', 'UP', t(60))).toEqual({
        serviceIdentity: 'billing',
        oldStatus: 'UNKNOWN',
        newStatus: 'UP',
        observedAt: t(60),
      });
    });

    it('should confirm on the first read with a threshold of 1', () => {
      const immediate = new StateTracker(1);

      expect(immediate.observe('billing', 'DOWN', t(0))?.newStatus).toBe('DOWN');
      expect(immediate.observe('billing', 'UP', t(60))).toEqual({
        serviceIdentity: 'billing',
        oldStatus: 'DOWN',
        newStatus: 'UP',
        observedAt: t(60),
      });
    });

    it('should report UNKNOWN for services never seen', () => {
      expect(tracker.getStatus('nothing')).toBe('UNKNOWN');
      expect(tracker.getRecord('nothing')).toBeUndefined();
    });
  });

  describe('markAlertSent', () => {
    it('should record the alert time', () => {
      const tracker = new StateTracker();
      tracker.observe('dbservice', 'DOWN', t(0));

      tracker.markAlertSent('dbservice', t(5));

      expect(tracker.getRecord('dbservice')?.lastAlertSentAt).toEqual(t(5));
    });
  });

  describe('restore', () => {
    it('should skip identities already tracked', () => {
      const tracker = new StateTracker();
      tracker.observe('dbservice', 'DOWN', t(0));

      const restored = tracker.restore([
        { identity: 'dbservice', currentStatus: 'UP', lastAlertSentAt: null },
        { identity: 'billing', currentStatus: 'DOWN', lastAlertSentAt: t(1) },
      ]);

      expect(restored).toBe(1);
      expect(tracker.getStatus('dbservice')).toBe('UNKNOWN');
      expect(tracker.getStatus('billing')).toBe('DOWN');
      expect(tracker.size).toBe(2);
    });
  });

  describe('snapshot', () => {
    it('should hand out copies', () => {
      const tracker = new StateTracker();
      tracker.observe('dbservice', 'DOWN', t(0));

      const [record] = tracker.snapshot();
      record.debounce = { kind: 'stable', currentStatus: 'UP' };

      expect(tracker.getRecord('dbservice')?.debounce.kind).toBe('pending');
    });
  });
});

describe('mergeTickObservations', () => {
  const obs = (identity: string, colorState: ResolvedObservation['colorState'], at: Date, rawLabel = identity): ResolvedObservation => ({
    identity,
    rawLabel,
    colorState,
    observedAt: at,
  });

  it('should keep one read per identity in order of first appearance', () => {
    const merged = mergeTickObservations([
      obs('dbservice', 'DOWN', t(0), 'DB-Service'),
      obs('billing', 'UP', t(0)),
      obs('dbservice', 'DOWN', t(1), 'db service'),
    ]);

    expect(merged).toEqual([
      { identity: 'dbservice', rawLabel: 'DB-Service', colorState: 'DOWN', observedAt: t(1) },
      { identity: 'billing', rawLabel: 'billing', colorState: 'UP', observedAt: t(0) },
    ]);
  });

  it('should turn conflicting reads into UNKNOWN', () => {
    const merged = mergeTickObservations([
      obs('dbservice', 'UP', t(0)),
      obs('dbservice', 'DOWN', t(0)),
      obs('dbservice', 'UP', t(0)),
    ]);

    expect(merged).toHaveLength(1);
    expect(merged[0].colorState).toBe('UNKNOWN');
  });

  it('should prefer a definite read over UNKNOWN', () => {
    const merged = mergeTickObservations([obs('dbservice', 'UNKNOWN', t(0)), obs('dbservice', 'DOWN', t(0))]);

    expect(merged[0].colorState).toBe('DOWN');
  });

  it('should return an empty list for an empty tick', () => {
    expect(mergeTickObservations([])).toEqual([]);
  });
});
