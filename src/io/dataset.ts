import { promises as fs } from 'node:fs';
import path from 'node:path';
import { DatasetError, isNotFoundError } from '../utils/errors';
import { ensureDir } from '../utils/file';

export const DATASET_LAYOUT = {
  audioDir: 'audio',
  referencesDir: 'references',
  estimationsDir: 'estimations',
  referencesExt: '.jams',
  estimationsExt: '.jams',
  audioExts: ['.wav', '.mp3', '.aif'],
} as const;

/** Dataset names whose files carry another dataset's prefix. */
const DATASET_PREFIXES: Readonly<Record<string, string>> = {
  Beatles: 'Isophonics',
};

export const ALL_DATASETS = '*';

export interface DatasetItem {
  readonly audioPath: string;
  readonly referencePath: string;
  readonly estimationPath: string;
}

export function datasetPrefix(dsName: string): string {
  return DATASET_PREFIXES[dsName] ?? dsName;
}

function matchesDataset(fileName: string, dsName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  if (!DATASET_LAYOUT.audioExts.some((audioExt) => audioExt === ext)) {
    return false;
  }
  return dsName === ALL_DATASETS || fileName.startsWith(`${datasetPrefix(dsName)}_`);
}

export function datasetItemFor(datasetPath: string, audioPath: string): DatasetItem {
  const base = path.basename(audioPath, path.extname(audioPath));
  return {
    audioPath,
    referencePath: path.join(datasetPath, DATASET_LAYOUT.referencesDir, base + DATASET_LAYOUT.referencesExt),
    estimationPath: path.join(datasetPath, DATASET_LAYOUT.estimationsDir, base + DATASET_LAYOUT.estimationsExt),
  };
}

function assertUniqueOutputs(items: DatasetItem[]): void {
  const byEstimation = new Map<string, string[]>();
  for (const item of items) {
    const shared = byEstimation.get(item.estimationPath) ?? [];
    shared.push(path.basename(item.audioPath));
    byEstimation.set(item.estimationPath, shared);
  }
  const clashes = [...byEstimation.values()].filter((names) => names.length > 1);
  if (clashes.length) {
    throw new DatasetError(
      `Audio files share an estimation file: ${clashes.map((names) => names.join(', ')).join('; ')}`,
    );
  }
}

/**
 * Lists the audio files of a dataset with their reference and estimation paths,
 * sorted by audio path. Creates the estimations directory when it is missing.
 * Fails when two audio files would write the same estimation file.
 */
export async function getDatasetFiles(datasetPath: string, dsName: string = ALL_DATASETS): Promise<DatasetItem[]> {
  const audioDir = path.join(datasetPath, DATASET_LAYOUT.audioDir);
  let entries: string[];
  try {
    entries = await fs.readdir(audioDir);
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new DatasetError(`No audio directory in ${datasetPath}`);
    }
    throw error;
  }

  await ensureDir(path.join(datasetPath, DATASET_LAYOUT.estimationsDir));

  const items = entries
    .filter((fileName) => matchesDataset(fileName, dsName))
    .map((fileName) => path.join(audioDir, fileName))
    .sort()
    .map((audioPath) => datasetItemFor(datasetPath, audioPath));
  assertUniqueOutputs(items);
  return items;
}
