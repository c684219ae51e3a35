import { Command, InvalidArgumentError, Option } from 'commander';
import { FEATURE_TYPES, FeatureType } from './algorithms/ISegmentAlgorithm';
import { AlgorithmRegistry, REFERENCE_BOUNDARIES_ID } from './algorithms/registry';
import { Env } from './config/env';
import { isFeatureType } from './config/configuration';
import { ALL_DATASETS } from './io/dataset';
import { ProcessDatasetOptions, processDataset } from './pipeline/processDataset';
import { createRuntime } from './runtime';
import { logger } from './utils/logger';

export interface CliOptions {
  feature: string;
  annotBeats: boolean;
  framesync: boolean;
  bid: string;
  lid?: string;
  dsName: string;
  jobs: number;
  seed: number;
}

function parseInteger(minimum: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < minimum) {
      throw new InvalidArgumentError(`Expected an integer >= ${minimum}.`);
    }
    return parsed;
  };
}

function toFeature(value: string): FeatureType {
  if (!isFeatureType(value)) {
    throw new InvalidArgumentError(`Unknown feature ${value}.`);
  }
  return value;
}

export function createProgram(registry: AlgorithmRegistry, env: Env): Command {
  return new Command('segment-dataset')
    .description('Runs the specified algorithm(s) on a segmentation dataset.')
    .argument('<in_path>', 'Input dataset')
    .addOption(new Option('-f, --feature <feature>', 'Type of features').choices(FEATURE_TYPES).default('hpcp'))
    .option('-b, --annot-beats', 'Use annotated beats', false)
    .option('-s, --framesync', 'Use frame-synchronous features', false)
    .addOption(
      new Option('--bid <id>', 'Boundary algorithm identifier')
        .choices([REFERENCE_BOUNDARIES_ID, ...registry.boundaryAlgorithmNames()])
        .default(REFERENCE_BOUNDARIES_ID),
    )
    .addOption(new Option('--lid <id>', 'Label algorithm identifier').choices(registry.labelAlgorithmNames()))
    .option('-d, --ds-name <name>', 'The prefix of the dataset to use (e.g. Isophonics, SALAMI)', ALL_DATASETS)
    .option('-j, --jobs <n>', 'The number of parallel workers', parseInteger(1), env.workerConcurrency)
    .option('--seed <n>', 'Random seed passed to the algorithms', parseInteger(0), env.randomSeed);
}

export function toProcessOptions(registry: AlgorithmRegistry, options: CliOptions): ProcessDatasetOptions {
  return {
    registry,
    feature: toFeature(options.feature),
    annotBeats: options.annotBeats,
    framesync: options.framesync,
    boundariesId: options.bid,
    labelsId: options.lid ?? null,
    dsName: options.dsName,
    nJobs: options.jobs,
    seed: options.seed,
  };
}

/** Parses the command line, runs the batch and sets a failing exit code when any track failed. */
export async function runCli(argv: string[]): Promise<void> {
  const { env, registry } = await createRuntime();
  const program = createProgram(registry, env);
  program.parse(argv);
  const [inPath] = program.args;
  const options = toProcessOptions(registry, program.opts<CliOptions>());

  const startTime = Date.now();
  const report = await processDataset(inPath, options);
  logger.info(`Done! Took ${((Date.now() - startTime) / 1000).toFixed(2)} seconds.`);

  if (report.failed.length) {
    process.exitCode = 1;
  }
}
