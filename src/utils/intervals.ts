import { SegmentBoundaries, SegmentInterval } from '../algorithms/ISegmentAlgorithm';

/** [0, 2.5, 5] -> [[0, 2.5], [2.5, 5]] */
export function timesToIntervals(times: SegmentBoundaries): SegmentInterval[] {
  const intervals: SegmentInterval[] = [];
  for (let i = 1; i < times.length; i++) {
    intervals.push([times[i - 1], times[i]]);
  }
  return intervals;
}

/** Inverse of timesToIntervals for contiguous intervals. */
export function intervalsToTimes(intervals: SegmentInterval[]): SegmentBoundaries {
  if (!intervals.length) {
    return [];
  }
  return [...intervals.map(([start]) => start), intervals[intervals.length - 1][1]];
}

export function isStrictlyIncreasing(times: SegmentBoundaries): boolean {
  return times.every((time, i) => i === 0 || time > times[i - 1]);
}
