import { Type } from 'class-transformer';
import { IsArray, IsNumber, IsObject, IsOptional, IsString, ValidateNested } from 'class-validator';
import path from 'node:path';
import {
  ConfigValue,
  Configuration,
  SegmentInterval,
  SegmentLabels,
} from '../algorithms/ISegmentAlgorithm';
import { SegmenterError, getErrorMessage } from '../utils/errors';
import { readJsonFile, writeJsonFile } from '../utils/file';
import { validatePlain } from '../utils/validation';

export class EstimatedSegment {
  @IsNumber()
  start!: number;

  @IsNumber()
  end!: number;

  @IsOptional()
  @IsString()
  label!: string | null;
}

export class EstimationEntry {
  @IsString()
  boundaries_id!: string;

  @IsOptional()
  @IsString()
  labels_id!: string | null;

  @IsObject()
  config!: Record<string, ConfigValue>;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => EstimatedSegment)
  data!: EstimatedSegment[];
}

export class EstimationFile {
  @IsOptional()
  @IsString()
  file!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => EstimationEntry)
  estimations!: EstimationEntry[];
}

function sortedConfig(config: Configuration): Record<string, ConfigValue> {
  const sorted: Record<string, ConfigValue> = {};
  for (const key of Object.keys(config).sort()) {
    sorted[key] = config[key];
  }
  return sorted;
}

function sameConfig(a: Record<string, ConfigValue>, b: Record<string, ConfigValue>): boolean {
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every((key) => a[key] === b[key]);
}

function toPlainEntry(entry: EstimationEntry): EstimationEntry {
  return {
    boundaries_id: entry.boundaries_id,
    labels_id: entry.labels_id ?? null,
    config: { ...entry.config },
    data: entry.data.map(({ start, end, label }) => ({ start, end, label: label ?? null })),
  };
}

async function readEstimations(filePath: string): Promise<EstimationEntry[]> {
  let existing: unknown;
  try {
    existing = await readJsonFile(filePath);
  } catch (error) {
    throw new SegmenterError(`Can not read estimations in ${filePath}: ${getErrorMessage(error)}`, 'INVALID_ESTIMATE');
  }
  if (existing === undefined) {
    return [];
  }
  const { value, errors } = await validatePlain(EstimationFile, existing);
  if (!value) {
    throw new SegmenterError(
      `Unexpected estimation file format in ${filePath}: ${errors.join('; ')}`,
      'INVALID_ESTIMATE',
    );
  }
  return value.estimations.map(toPlainEntry);
}

/**
 * Saves one run's estimation. A previous estimation with the same algorithm
 * identifiers and configuration is replaced; any other is kept.
 */
export async function writeEstimation(
  outputPath: string,
  intervals: SegmentInterval[],
  labels: SegmentLabels,
  boundariesId: string,
  labelsId: string | null,
  config: Configuration,
): Promise<void> {
  const entry: EstimationEntry = {
    boundaries_id: boundariesId,
    labels_id: labelsId,
    config: sortedConfig(config),
    data: intervals.map(([start, end], i) => ({ start, end, label: labels[i] ?? null })),
  };

  const estimations = await readEstimations(outputPath);
  const index = estimations.findIndex(
    (other) =>
      other.boundaries_id === entry.boundaries_id &&
      other.labels_id === entry.labels_id &&
      sameConfig(other.config, entry.config),
  );
  if (index >= 0) {
    estimations[index] = entry;
  } else {
    estimations.push(entry);
  }

  const file: EstimationFile = {
    file: path.basename(outputPath, path.extname(outputPath)),
    estimations,
  };
  await writeJsonFile(outputPath, file);
}
