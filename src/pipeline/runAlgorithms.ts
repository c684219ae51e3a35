import {
  AlgorithmContext,
  AlgorithmDefinition,
  Configuration,
  SegmentEstimate,
} from '../algorithms/ISegmentAlgorithm';
import { ReferenceReader } from '../io/annotations';
import { InvalidEstimateError } from '../utils/errors';
import { isStrictlyIncreasing } from '../utils/intervals';

export interface RunOptions {
  seed: number;
  references: ReferenceReader;
}

function checkEstimate(audioPath: string, { boundaries, labels }: SegmentEstimate): void {
  if (boundaries.length < 2) {
    throw new InvalidEstimateError(`Fewer than two boundaries estimated for ${audioPath}`);
  }
  if (!isStrictlyIncreasing(boundaries)) {
    throw new InvalidEstimateError(`Boundaries for ${audioPath} are not strictly increasing`);
  }
  if (labels.length && labels.length !== boundaries.length - 1) {
    throw new InvalidEstimateError(
      `Got ${labels.length} labels for ${boundaries.length - 1} segments in ${audioPath}`,
    );
  }
}

/**
 * Runs the boundary and label algorithms on one audio file.
 *
 * When both identify the same algorithm it runs once and produces boundaries and
 * labels together. Otherwise boundaries come from the boundary algorithm (or the
 * reference annotation when there is none) and stay fixed while the label
 * algorithm labels them.
 */
export async function runAlgorithms(
  audioPath: string,
  boundaryAlgorithm: AlgorithmDefinition | null,
  labelAlgorithm: AlgorithmDefinition | null,
  config: Configuration,
  { seed, references }: RunOptions,
): Promise<SegmentEstimate> {
  const context: AlgorithmContext = { config, seed };

  if (boundaryAlgorithm && labelAlgorithm && boundaryAlgorithm.name === labelAlgorithm.name) {
    const estimate = await boundaryAlgorithm.create(audioPath, { kind: 'joint' }, context).process();
    checkEstimate(audioPath, estimate);
    return estimate;
  }

  let estimate: SegmentEstimate;
  if (boundaryAlgorithm) {
    estimate = await boundaryAlgorithm
      .create(audioPath, { kind: 'boundaries', inLabels: [] }, context)
      .process();
  } else {
    estimate = await references.readReferences(audioPath);
  }

  if (labelAlgorithm) {
    const labeled = await labelAlgorithm
      .create(audioPath, { kind: 'labels', inBoundTimes: [...estimate.boundaries] }, context)
      .process();
    // boundaries stay as estimated above whatever the label algorithm returns
    estimate = { boundaries: estimate.boundaries, labels: labeled.labels };
  }

  checkEstimate(audioPath, estimate);
  return estimate;
}
