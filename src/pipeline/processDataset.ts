import pMap from 'p-map';
import { Configuration, FeatureType } from '../algorithms/ISegmentAlgorithm';
import { AlgorithmRegistry, NO_LABELS_ID, REFERENCE_BOUNDARIES_ID } from '../algorithms/registry';
import { resolveConfiguration } from '../config/configuration';
import { ALL_DATASETS, DatasetItem, getDatasetFiles } from '../io/dataset';
import { getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { TrackAlgorithms, TrackIo, TrackOutcome, fileTrackIo, processTrack } from './processTrack';

export const DEFAULT_SEED = 123;

export interface ProcessDatasetOptions {
  registry: AlgorithmRegistry;
  feature?: FeatureType;
  annotBeats?: boolean;
  framesync?: boolean;
  boundariesId?: string;
  labelsId?: string | null;
  dsName?: string;
  nJobs?: number;
  seed?: number;
  /** Replaces the configuration built from the algorithms' defaults. */
  config?: Configuration;
  io?: TrackIo;
  discover?: (datasetPath: string, dsName: string) => Promise<DatasetItem[]>;
}

export interface FailedTrack {
  item: DatasetItem;
  error: string;
}

export interface BatchReport {
  total: number;
  processed: DatasetItem[];
  skipped: Array<{ item: DatasetItem; reason: string }>;
  failed: FailedTrack[];
}

type SettledTrack = TrackOutcome | { status: 'failed'; item: DatasetItem; error: string };

function buildReport(results: SettledTrack[]): BatchReport {
  const report: BatchReport = { total: results.length, processed: [], skipped: [], failed: [] };
  for (const result of results) {
    if (result.status === 'processed') report.processed.push(result.item);
    else if (result.status === 'skipped') report.skipped.push({ item: result.item, reason: result.reason });
    else report.failed.push({ item: result.item, error: result.error });
  }
  return report;
}

/**
 * Runs the selected algorithms over every matching file of a dataset.
 *
 * Algorithm identifiers and the configuration are validated before any file is
 * touched. A failing file is recorded in the report and does not stop the others.
 */
export async function processDataset(datasetPath: string, options: ProcessDatasetOptions): Promise<BatchReport> {
  const {
    registry,
    feature = 'hpcp',
    annotBeats = false,
    framesync = false,
    boundariesId = REFERENCE_BOUNDARIES_ID,
    dsName = ALL_DATASETS,
    nJobs = 4,
    seed = DEFAULT_SEED,
    io = fileTrackIo,
    discover = getDatasetFiles,
  } = options;
  const labelsId = options.labelsId === NO_LABELS_ID ? null : options.labelsId ?? null;

  if (!Number.isInteger(nJobs) || nJobs < 1) {
    throw new RangeError(`nJobs must be a positive integer, got ${nJobs}`);
  }

  const algorithms: TrackAlgorithms = {
    boundariesId,
    labelsId,
    boundaryAlgorithm: registry.resolveBoundaries(boundariesId),
    labelAlgorithm: registry.resolveLabels(labelsId),
  };

  const config = Object.freeze(
    options.config ?? resolveConfiguration(feature, annotBeats, framesync, boundariesId, labelsId, registry),
  );

  const items = await discover(datasetPath, dsName);
  logger.info(`Processing ${items.length} file(s) from ${datasetPath} with ${nJobs} worker(s)`);

  const results = await pMap(
    items,
    async (item): Promise<SettledTrack> => {
      try {
        return await processTrack(item, algorithms, config, seed, io);
      } catch (error) {
        const message = getErrorMessage(error);
        logger.error(`Failed to segment ${item.audioPath}: ${message}`, error);
        return { status: 'failed', item, error: message };
      }
    },
    { concurrency: nJobs },
  );

  const report = buildReport(results);
  logger.info(
    `Processed ${report.processed.length}, skipped ${report.skipped.length}, failed ${report.failed.length} of ${report.total}`,
  );
  return report;
}
