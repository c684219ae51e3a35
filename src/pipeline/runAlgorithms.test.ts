import { describe, expect, it, vi } from 'vitest';
import { fakeAlgorithm } from '../__fixtures__/algorithms';
import { Configuration } from '../algorithms/ISegmentAlgorithm';
import { ReferenceReader } from '../io/annotations';
import { InvalidEstimateError } from '../utils/errors';
import { runAlgorithms } from './runAlgorithms';

const config: Configuration = Object.freeze({ annot_beats: false, feature: 'hpcp', framesync: false });
const audioPath = '/data/audio/SALAMI_12.mp3';

function references(estimate = { boundaries: [0, 12, 40.5], labels: ['intro', 'verse'] }) {
  const reader: ReferenceReader = { readReferences: vi.fn(async () => estimate) };
  return reader;
}

describe('runAlgorithms', () => {
  it('runs a fused algorithm once for boundaries and labels', async () => {
    const scluster = fakeAlgorithm({ name: 'scluster' });
    const reader = references();

    const result = await runAlgorithms(audioPath, scluster, scluster, config, { seed: 123, references: reader });

    expect(result).toEqual({ boundaries: [0, 2.5, 5, 7.5], labels: ['A', 'B', 'A'] });
    expect(scluster.instantiations).toHaveLength(1);
    expect(scluster.instantiations[0].input).toEqual({ kind: 'joint' });
    expect(scluster.instantiations[0].context).toEqual({ config, seed: 123 });
    expect(reader.readReferences).not.toHaveBeenCalled();
  });

  it('treats distinct definitions with the same name as one algorithm', async () => {
    const bounds = fakeAlgorithm({ name: 'scluster' });
    const labels = fakeAlgorithm({ name: 'scluster' });

    await runAlgorithms(audioPath, bounds, labels, config, { seed: 1, references: references() });

    expect(bounds.instantiations).toHaveLength(1);
    expect(labels.instantiations).toHaveLength(0);
  });

  it('labels the boundaries found by a different boundary algorithm', async () => {
    const foote = fakeAlgorithm({ name: 'foote', labels: false });
    const fmc2d = fakeAlgorithm({
      name: 'fmc2d',
      boundaries: false,
      estimate: () => ({ boundaries: [0, 100], labels: ['p', 'q', 'p'] }),
    });

    const result = await runAlgorithms(audioPath, foote, fmc2d, config, { seed: 7, references: references() });

    expect(result).toEqual({ boundaries: [0, 2.5, 5, 7.5], labels: ['p', 'q', 'p'] });
    expect(foote.instantiations.map(({ input }) => input)).toEqual([{ kind: 'boundaries', inLabels: [] }]);
    expect(fmc2d.instantiations.map(({ input }) => input)).toEqual([
      { kind: 'labels', inBoundTimes: [0, 2.5, 5, 7.5] },
    ]);
  });

  it('keeps the boundary algorithm labels when no label algorithm is given', async () => {
    const foote = fakeAlgorithm({ name: 'foote', labels: false });

    const result = await runAlgorithms(audioPath, foote, null, config, { seed: 7, references: references() });

    expect(result).toEqual({ boundaries: [0, 2.5, 5, 7.5], labels: ['x', 'y', 'z'] });
    expect(foote.instantiations).toHaveLength(1);
  });

  it('uses the reference annotation when there is no boundary algorithm', async () => {
    const reader = references();

    const result = await runAlgorithms(audioPath, null, null, config, { seed: 7, references: reader });

    expect(result).toEqual({ boundaries: [0, 12, 40.5], labels: ['intro', 'verse'] });
    expect(reader.readReferences).toHaveBeenCalledWith(audioPath);
  });

  it('labels reference boundaries without creating a boundary algorithm', async () => {
    const fmc2d = fakeAlgorithm({ name: 'fmc2d', boundaries: false });

    const result = await runAlgorithms(audioPath, null, fmc2d, config, { seed: 7, references: references() });

    expect(result).toEqual({ boundaries: [0, 12, 40.5], labels: ['L0', 'L1'] });
    expect(fmc2d.instantiations).toHaveLength(1);
    expect(result.labels).toHaveLength(result.boundaries.length - 1);
  });

  it('propagates algorithm failures unchanged', async () => {
    const failure = new Error('feature file missing');
    const broken = fakeAlgorithm({
      name: 'broken',
      estimate: () => {
        throw failure;
      },
    });

    await expect(
      runAlgorithms(audioPath, broken, null, config, { seed: 7, references: references() }),
    ).rejects.toBe(failure);
  });

  it('rejects label counts that do not match the segments', async () => {
    const fmc2d = fakeAlgorithm({
      name: 'fmc2d',
      boundaries: false,
      estimate: () => ({ boundaries: [0, 1], labels: ['a'] }),
    });

    await expect(
      runAlgorithms(audioPath, null, fmc2d, config, { seed: 7, references: references() }),
    ).rejects.toThrow(InvalidEstimateError);
  });

  it('rejects boundaries that are not increasing', async () => {
    const backwards = fakeAlgorithm({
      name: 'backwards',
      labels: false,
      estimate: () => ({ boundaries: [0, 5, 3], labels: [] }),
    });

    await expect(
      runAlgorithms(audioPath, backwards, null, config, { seed: 7, references: references() }),
    ).rejects.toThrow(`Boundaries for ${audioPath} are not strictly increasing`);
  });
});
