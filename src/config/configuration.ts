import {
  ConfigValue,
  Configuration,
  FEATURE_TYPES,
  FeatureType,
} from '../algorithms/ISegmentAlgorithm';
import { AlgorithmRegistry } from '../algorithms/registry';
import { ConfigurationError } from '../utils/errors';

export function isFeatureType(value: string): value is FeatureType {
  return FEATURE_TYPES.some((feature) => feature === value);
}

/**
 * Builds the batch configuration: the base flags plus the default options of the
 * selected algorithms. Two different algorithms may not declare the same option.
 */
export function resolveConfiguration(
  feature: FeatureType,
  annotBeats: boolean,
  framesync: boolean,
  boundariesId: string,
  labelsId: string | null,
  registry: AlgorithmRegistry,
): Configuration {
  const boundaryAlgorithm = registry.resolveBoundaries(boundariesId);
  const labelAlgorithm = registry.resolveLabels(labelsId);

  const options: Record<string, ConfigValue> = {};
  const boundaryDefaults = boundaryAlgorithm?.defaults ?? {};
  Object.assign(options, boundaryDefaults);

  if (labelAlgorithm) {
    if (labelAlgorithm.name !== boundaryAlgorithm?.name) {
      const overlap = Object.keys(labelAlgorithm.defaults).filter((key) => key in boundaryDefaults);
      if (overlap.length) {
        throw new ConfigurationError(
          `Parameter(s) ${overlap.join(', ')} must not exist both in ${boundariesId} and ${labelAlgorithm.name} algorithms`,
        );
      }
    }
    Object.assign(options, labelAlgorithm.defaults);
  }

  return Object.freeze({
    ...options,
    annot_beats: annotBeats,
    feature,
    framesync,
  });
}
