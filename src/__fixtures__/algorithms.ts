import {
  AlgorithmContext,
  AlgorithmDefinition,
  AlgorithmInput,
  ConfigValue,
  SegmentAlgorithm,
  SegmentEstimate,
} from '../algorithms/ISegmentAlgorithm';

export interface Instantiation {
  audioPath: string;
  input: AlgorithmInput;
  context: AlgorithmContext;
}

export interface FakeAlgorithm extends AlgorithmDefinition {
  instantiations: Instantiation[];
}

export interface FakeAlgorithmOptions {
  name: string;
  boundaries?: boolean;
  labels?: boolean;
  defaults?: Record<string, ConfigValue>;
  estimate?: (audioPath: string, input: AlgorithmInput) => SegmentEstimate;
}

function defaultEstimate(_audioPath: string, input: AlgorithmInput): SegmentEstimate {
  if (input.kind === 'labels') {
    return {
      boundaries: [0, 1],
      labels: input.inBoundTimes.slice(1).map((_, i) => `L${i}`),
    };
  }
  return { boundaries: [0, 2.5, 5, 7.5], labels: input.kind === 'joint' ? ['A', 'B', 'A'] : ['x', 'y', 'z'] };
}

/** Algorithm definition that records every instance it creates. */
export function fakeAlgorithm(options: FakeAlgorithmOptions): FakeAlgorithm {
  const instantiations: Instantiation[] = [];
  const estimate = options.estimate ?? defaultEstimate;
  return {
    name: options.name,
    supportsBoundaryDetection: options.boundaries ?? true,
    supportsLabeling: options.labels ?? true,
    defaults: options.defaults ?? {},
    instantiations,
    create(audioPath: string, input: AlgorithmInput, context: AlgorithmContext): SegmentAlgorithm {
      instantiations.push({ audioPath, input, context });
      return {
        async process() {
          return estimate(audioPath, input);
        },
      };
    },
  };
}
