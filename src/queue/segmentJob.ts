import path from 'node:path';
import { AlgorithmRegistry } from '../algorithms/registry';
import { Env } from '../config/env';
import { BatchReport, ProcessDatasetOptions, processDataset } from '../pipeline/processDataset';
import { ConfigurationError } from '../utils/errors';
import { validatePlain } from '../utils/validation';
import { SegmentDatasetJobDto } from './dto';

export interface SegmentJobResult {
  total: number;
  processed: number;
  skipped: number;
  failed: Array<{ audio: string; error: string }>;
}

export function summarize(report: BatchReport): SegmentJobResult {
  return {
    total: report.total,
    processed: report.processed.length,
    skipped: report.skipped.length,
    failed: report.failed.map(({ item, error }) => ({ audio: path.basename(item.audioPath), error })),
  };
}

export interface SegmentJobDeps {
  registry: AlgorithmRegistry;
  env: Env;
  run?: (datasetPath: string, options: ProcessDatasetOptions) => Promise<BatchReport>;
}

/** Validates a queued job payload and runs the batch it describes. */
export async function handleSegmentJob(data: unknown, deps: SegmentJobDeps): Promise<SegmentJobResult> {
  const { value: job, errors } = await validatePlain(SegmentDatasetJobDto, data);
  if (!job) {
    throw new ConfigurationError(`Invalid segment job: ${errors.join('; ')}`);
  }

  const run = deps.run ?? processDataset;
  const report = await run(job.datasetPath, {
    registry: deps.registry,
    feature: job.feature,
    annotBeats: job.annotBeats,
    framesync: job.framesync,
    boundariesId: job.boundariesId,
    labelsId: job.labelsId ?? null,
    dsName: job.dsName,
    nJobs: job.nJobs ?? deps.env.workerConcurrency,
    seed: job.seed ?? deps.env.randomSeed,
  });
  return summarize(report);
}
