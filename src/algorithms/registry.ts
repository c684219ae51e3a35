import {
  ConfigurationError,
  DuplicateAlgorithmError,
  UnknownAlgorithmError,
  UnsupportedCapabilityError,
} from '../utils/errors';
import { AlgorithmDefinition } from './ISegmentAlgorithm';

/** Boundary identifier meaning "use the reference annotation". */
export const REFERENCE_BOUNDARIES_ID = 'gt';

/** Label identifier meaning "no labeling requested". */
export const NO_LABELS_ID = 'none';

export class AlgorithmRegistry {
  private readonly algorithms = new Map<string, AlgorithmDefinition>();

  constructor(definitions: Iterable<AlgorithmDefinition> = []) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  register(definition: AlgorithmDefinition): this {
    if (definition.name === REFERENCE_BOUNDARIES_ID || definition.name === NO_LABELS_ID) {
      throw new ConfigurationError(`"${definition.name}" is a reserved algorithm identifier`);
    }
    if (this.algorithms.has(definition.name)) {
      throw new DuplicateAlgorithmError(definition.name);
    }
    this.algorithms.set(definition.name, definition);
    return this;
  }

  get(name: string): AlgorithmDefinition {
    const definition = this.algorithms.get(name);
    if (!definition) {
      throw new UnknownAlgorithmError(name);
    }
    return definition;
  }

  resolveBoundaries(boundariesId: string): AlgorithmDefinition | null {
    if (boundariesId === REFERENCE_BOUNDARIES_ID) {
      return null;
    }
    const definition = this.get(boundariesId);
    if (!definition.supportsBoundaryDetection) {
      throw new UnsupportedCapabilityError(boundariesId, 'boundaries');
    }
    return definition;
  }

  resolveLabels(labelsId: string | null | undefined): AlgorithmDefinition | null {
    if (labelsId === null || labelsId === undefined || labelsId === NO_LABELS_ID) {
      return null;
    }
    const definition = this.get(labelsId);
    if (!definition.supportsLabeling) {
      throw new UnsupportedCapabilityError(labelsId, 'labels');
    }
    return definition;
  }

  boundaryAlgorithmNames(): string[] {
    return this.namesWhere((definition) => definition.supportsBoundaryDetection);
  }

  labelAlgorithmNames(): string[] {
    return this.namesWhere((definition) => definition.supportsLabeling);
  }

  private namesWhere(predicate: (definition: AlgorithmDefinition) => boolean): string[] {
    return [...this.algorithms.values()]
      .filter(predicate)
      .map((definition) => definition.name)
      .sort();
  }
}
