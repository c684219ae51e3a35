export type ConfigValue = string | number | boolean | null;

export type FeatureType = 'hpcp' | 'tonnetz' | 'mfcc';

export const FEATURE_TYPES: readonly FeatureType[] = ['hpcp', 'tonnetz', 'mfcc'];

export interface Configuration {
  readonly annot_beats: boolean;
  readonly feature: FeatureType;
  readonly framesync: boolean;
  readonly [option: string]: ConfigValue;
}

/** Segment boundary times in seconds, strictly increasing. */
export type SegmentBoundaries = number[];

/** One label per interval between consecutive boundaries. */
export type SegmentLabels = string[];

export type SegmentInterval = [start: number, end: number];

export interface SegmentEstimate {
  boundaries: SegmentBoundaries;
  labels: SegmentLabels;
}

/**
 * How an algorithm instance is constructed:
 * - `joint`: boundaries and labels in one pass
 * - `boundaries`: boundary detection, no prior labels
 * - `labels`: labeling over fixed boundary times
 */
export type AlgorithmInput =
  | { kind: 'joint' }
  | { kind: 'boundaries'; inLabels: SegmentLabels }
  | { kind: 'labels'; inBoundTimes: SegmentBoundaries };

export interface AlgorithmContext {
  config: Configuration;
  seed: number;
}

export interface SegmentAlgorithm {
  process(): Promise<SegmentEstimate>;
}

export interface AlgorithmDefinition {
  readonly name: string;
  readonly supportsBoundaryDetection: boolean;
  readonly supportsLabeling: boolean;
  /** Options merged into the batch configuration when this algorithm is selected. */
  readonly defaults: Readonly<Record<string, ConfigValue>>;
  create(audioPath: string, input: AlgorithmInput, context: AlgorithmContext): SegmentAlgorithm;
}
