import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsInt,
  IsObject,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  Min,
  ValidateNested,
} from 'class-validator';
import { Dispatcher } from 'undici';
import { ConfigurationError, getErrorMessage } from '../utils/errors';
import { readJsonFile } from '../utils/file';
import { validatePlain } from '../utils/validation';
import { createHttpDefinition } from './HttpAlgorithm';
import { ConfigValue } from './ISegmentAlgorithm';
import { AlgorithmRegistry } from './registry';
import { createUniformDefinition } from './UniformAlgorithm';

export class CatalogEntry {
  @IsString()
  @Matches(/^[A-Za-z0-9_-]+$/)
  name!: string;

  @IsUrl({ require_tld: false, require_protocol: true })
  endpoint!: string;

  @IsBoolean()
  boundaries!: boolean;

  @IsBoolean()
  labels!: boolean;

  @IsOptional()
  @IsInt()
  @Min(1)
  timeoutMs?: number;

  @IsOptional()
  @IsObject()
  defaults?: Record<string, ConfigValue>;
}

export class AlgorithmCatalog {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CatalogEntry)
  algorithms!: CatalogEntry[];
}

export interface RegistryOptions {
  defaultTimeoutMs: number;
  probeDuration?: (audioPath: string) => Promise<number>;
  dispatcher?: Dispatcher;
}

function isConfigValue(value: unknown): value is ConfigValue {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

/** Loads the remote algorithm catalog; no path means no remote algorithms. */
export async function loadAlgorithmCatalog(catalogPath?: string): Promise<AlgorithmCatalog> {
  if (!catalogPath) {
    return { algorithms: [] };
  }
  let plain: unknown;
  try {
    plain = await readJsonFile(catalogPath);
  } catch (error) {
    throw new ConfigurationError(`Can not read algorithm catalog ${catalogPath}: ${getErrorMessage(error)}`);
  }
  if (plain === undefined) {
    throw new ConfigurationError(`Algorithm catalog ${catalogPath} does not exist`);
  }
  const { value, errors } = await validatePlain(AlgorithmCatalog, plain);
  if (!value) {
    throw new ConfigurationError(`Invalid algorithm catalog ${catalogPath}: ${errors.join('; ')}`);
  }
  for (const entry of value.algorithms) {
    const invalid = Object.entries(entry.defaults ?? {}).filter(([, option]) => !isConfigValue(option));
    if (invalid.length) {
      throw new ConfigurationError(
        `Algorithm ${entry.name} has non-scalar defaults: ${invalid.map(([key]) => key).join(', ')}`,
      );
    }
  }
  return value;
}

/** Built-in algorithms plus one remote algorithm per catalog entry. */
export function createRegistry(catalog: AlgorithmCatalog, options: RegistryOptions): AlgorithmRegistry {
  const registry = new AlgorithmRegistry([createUniformDefinition(options.probeDuration)]);
  for (const entry of catalog.algorithms) {
    registry.register(
      createHttpDefinition({
        name: entry.name,
        endpoint: entry.endpoint,
        timeoutMs: entry.timeoutMs ?? options.defaultTimeoutMs,
        boundaries: entry.boundaries,
        labels: entry.labels,
        defaults: entry.defaults,
        dispatcher: options.dispatcher,
      }),
    );
  }
  return registry;
}
