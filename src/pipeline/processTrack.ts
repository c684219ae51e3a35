import { AlgorithmDefinition, Configuration, SegmentInterval, SegmentLabels } from '../algorithms/ISegmentAlgorithm';
import {
  AnnotationDocument,
  ReferenceReader,
  hasAnnotatedBeats,
  loadAnnotation,
  referenceReader,
} from '../io/annotations';
import { DatasetItem } from '../io/dataset';
import { writeEstimation } from '../io/estimations';
import { MissingAnnotationError } from '../utils/errors';
import { timesToIntervals } from '../utils/intervals';
import { logger } from '../utils/logger';
import { runAlgorithms } from './runAlgorithms';

/** File access used by a track task; tests swap parts of it. */
export interface TrackIo extends ReferenceReader {
  loadAnnotation(annotationPath: string): Promise<AnnotationDocument>;
  writeEstimation(
    outputPath: string,
    intervals: SegmentInterval[],
    labels: SegmentLabels,
    boundariesId: string,
    labelsId: string | null,
    config: Configuration,
  ): Promise<void>;
}

export const fileTrackIo: TrackIo = {
  loadAnnotation,
  readReferences: referenceReader.readReferences,
  writeEstimation,
};

export interface TrackAlgorithms {
  boundariesId: string;
  labelsId: string | null;
  boundaryAlgorithm: AlgorithmDefinition | null;
  labelAlgorithm: AlgorithmDefinition | null;
}

export type TrackOutcome =
  | { status: 'processed'; item: DatasetItem; estimationPath: string }
  | { status: 'skipped'; item: DatasetItem; reason: string };

async function skipReason(item: DatasetItem, io: TrackIo): Promise<string | null> {
  let annotation: AnnotationDocument;
  try {
    annotation = await io.loadAnnotation(item.referencePath);
  } catch (error) {
    if (error instanceof MissingAnnotationError) {
      return 'no annotation file';
    }
    throw error;
  }
  return hasAnnotatedBeats(annotation) ? null : 'no annotated beats';
}

/** Segments one dataset item and saves the estimation next to the dataset's other estimations. */
export async function processTrack(
  item: DatasetItem,
  algorithms: TrackAlgorithms,
  config: Configuration,
  seed: number,
  io: TrackIo = fileTrackIo,
): Promise<TrackOutcome> {
  // Only analyze files with annotated beats
  if (config.annot_beats) {
    const reason = await skipReason(item, io);
    if (reason) {
      logger.debug(`Skipping ${item.audioPath}: ${reason}`);
      return { status: 'skipped', item, reason };
    }
  }

  logger.info(`Segmenting ${item.audioPath}`);

  const { boundaries, labels } = await runAlgorithms(
    item.audioPath,
    algorithms.boundaryAlgorithm,
    algorithms.labelAlgorithm,
    config,
    { seed, references: io },
  );

  logger.info(`Writing results in: ${item.estimationPath}`);
  await io.writeEstimation(
    item.estimationPath,
    timesToIntervals(boundaries),
    labels,
    algorithms.boundariesId,
    algorithms.labelsId,
    config,
  );

  return { status: 'processed', item, estimationPath: item.estimationPath };
}
