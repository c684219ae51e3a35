import { probeDuration } from '../audio/ffprobe';
import {
  AlgorithmContext,
  AlgorithmDefinition,
  AlgorithmInput,
  SegmentAlgorithm,
  SegmentBoundaries,
  SegmentEstimate,
} from './ISegmentAlgorithm';

export const UNIFORM_ALGORITHM_ID = 'uniform';

const DEFAULT_SEGMENT_SEC = 30;

/**
 * Boundaries every `segmentSec` seconds from 0 to `duration`. A trailing
 * fragment shorter than half a segment is merged into the previous segment.
 */
export function uniformBoundaries(duration: number, segmentSec: number): SegmentBoundaries {
  const times: SegmentBoundaries = [0];
  for (let k = 1; k * segmentSec < duration; k++) {
    times.push(k * segmentSec);
  }
  if (times.length > 1 && duration - times[times.length - 1] < segmentSec / 2) {
    times.pop();
  }
  times.push(duration);
  return times;
}

export class UniformAlgorithm implements SegmentAlgorithm {
  constructor(
    private readonly audioPath: string,
    private readonly segmentSec: number,
    private readonly probe: (audioPath: string) => Promise<number>,
  ) {}

  async process(): Promise<SegmentEstimate> {
    const duration = await this.probe(this.audioPath);
    return { boundaries: uniformBoundaries(duration, this.segmentSec), labels: [] };
  }
}

export function createUniformDefinition(
  probe: (audioPath: string) => Promise<number> = (audioPath) => probeDuration(audioPath),
): AlgorithmDefinition {
  return {
    name: UNIFORM_ALGORITHM_ID,
    supportsBoundaryDetection: true,
    supportsLabeling: false,
    defaults: { uniform_segment_sec: DEFAULT_SEGMENT_SEC },
    create(audioPath: string, _input: AlgorithmInput, { config }: AlgorithmContext) {
      const option = config.uniform_segment_sec;
      const segmentSec = typeof option === 'number' && option > 0 ? option : DEFAULT_SEGMENT_SEC;
      return new UniformAlgorithm(audioPath, segmentSec, probe);
    },
  };
}
