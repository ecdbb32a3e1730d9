import { describe, expect, it } from 'vitest';
import { MinMaxTracker } from '../src/stats/min-max-tracker.js';
import {
  ACCELERATION_AXES,
  formatMinMaxLine,
  formatSampleLine,
  pickAcceleration,
} from '../src/stats/report.js';
import { RegisterKey } from '../src/types/sensor-types.js';

/** Local clock that advances one second per call, starting at 12:00:00.000 */
function steppingClock(): () => Date {
  let tick = 0;
  return () => new Date(2024, 0, 1, 12, 0, tick++, 0);
}

describe('MinMaxTracker', () => {
  it('returns null before the first sample', () => {
    expect(new MinMaxTracker(ACCELERATION_AXES).summary()).toBeNull();
  });

  it('tracks extremes with the time of the first sample reaching them', () => {
    const tracker = new MinMaxTracker(ACCELERATION_AXES, steppingClock());

    expect(tracker.record({ AccX: 0.5, AccY: -1, AccZ: 1 })).toBe(1);
    expect(tracker.record({ AccX: 1.25, AccY: -1, AccZ: 0.98 })).toBe(2);
    expect(tracker.record({ AccX: 1.25, AccY: -1.5, AccZ: 1 })).toBe(3);

    const summary = tracker.summary();
    expect(summary?.get('AccX')).toEqual({ min: 0.5, max: 1.25, minAt: '12:00:00.000', maxAt: '12:00:01.000' });
    expect(summary?.get('AccY')).toEqual({ min: -1.5, max: -1, minAt: '12:00:02.000', maxAt: '12:00:00.000' });
    expect(summary?.get('AccZ')).toEqual({ min: 0.98, max: 1, minAt: '12:00:01.000', maxAt: '12:00:00.000' });
  });

  it('starts over after reset', () => {
    const tracker = new MinMaxTracker(['x'], steppingClock());
    tracker.record({ x: 10 });
    tracker.reset();

    expect(tracker.count).toBe(0);
    expect(tracker.summary()).toBeNull();
    tracker.record({ x: -3 });
    expect(tracker.summary()?.get('x')).toEqual({ min: -3, max: -3, minAt: '12:00:01.000', maxAt: '12:00:01.000' });
  });

  it('requires at least one axis', () => {
    expect(() => new MinMaxTracker([])).toThrow(RangeError);
  });
});

describe('report lines', () => {
  const at = new Date(2024, 0, 1, 9, 5, 7, 42);

  it('picks acceleration from decoded values', () => {
    const values = new Map<RegisterKey, number>([
      ['AccX', 0.5],
      ['AccY', -1],
      ['AccZ', 1],
      ['AngZ', 45],
    ]);

    expect(pickAcceleration(values)).toEqual({ AccX: 0.5, AccY: -1, AccZ: 1 });
    expect(pickAcceleration(new Map<RegisterKey, number>([['AccX', 1]]))).toBeNull();
  });

  it('formats a live sample', () => {
    expect(formatSampleLine({ AccX: 0.5, AccY: -1, AccZ: 9.81 }, 0xe9fa, at)).toBe(
      '09:05:07.042 - AX: 0.500, AY: -1.000, AZ: 9.810, CRC: 59898'
    );
  });

  it('formats the min/max report', () => {
    const tracker = new MinMaxTracker(ACCELERATION_AXES);
    tracker.record({ AccX: 0.5, AccY: -1, AccZ: 1 });
    tracker.record({ AccX: -0.25, AccY: 2, AccZ: 1 });
    const summary = tracker.summary();
    expect(summary).not.toBeNull();
    if (!summary) return;

    expect(formatMinMaxLine(summary, at)).toBe(
      '09:05:07.042 - Min/Max AX: -0.250 / 0.500  |  AY: -1.000 / 2.000  |  AZ: 1.000 / 1.000'
    );
  });
});
