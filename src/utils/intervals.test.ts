import { describe, expect, it } from 'vitest';
import { intervalsToTimes, isStrictlyIncreasing, timesToIntervals } from './intervals';

describe('timesToIntervals', () => {
  it('pairs consecutive boundaries', () => {
    expect(timesToIntervals([0.0, 2.5, 5.0, 7.5])).toEqual([
      [0.0, 2.5],
      [2.5, 5.0],
      [5.0, 7.5],
    ]);
  });

  it('returns no intervals for fewer than two times', () => {
    expect(timesToIntervals([3])).toEqual([]);
    expect(timesToIntervals([])).toEqual([]);
  });
});

describe('intervalsToTimes', () => {
  it('takes every start and the last end', () => {
    expect(intervalsToTimes([[0, 10], [10, 22.5], [22.5, 30]])).toEqual([0, 10, 22.5, 30]);
  });

  it('returns nothing for no intervals', () => {
    expect(intervalsToTimes([])).toEqual([]);
  });
});

describe('isStrictlyIncreasing', () => {
  it('detects repeated or decreasing times', () => {
    expect(isStrictlyIncreasing([0, 1, 2])).toBe(true);
    expect(isStrictlyIncreasing([0, 1, 1])).toBe(false);
    expect(isStrictlyIncreasing([0, 2, 1])).toBe(false);
  });
});
