import { describe, expect, it } from 'vitest';
import { fakeAlgorithm } from '../__fixtures__/algorithms';
import {
  ConfigurationError,
  DuplicateAlgorithmError,
  UnknownAlgorithmError,
  UnsupportedCapabilityError,
} from '../utils/errors';
import { AlgorithmRegistry } from './registry';

function registry() {
  return new AlgorithmRegistry([
    fakeAlgorithm({ name: 'foote', boundaries: true, labels: false }),
    fakeAlgorithm({ name: 'fmc2d', boundaries: false, labels: true }),
    fakeAlgorithm({ name: 'scluster', boundaries: true, labels: true }),
  ]);
}

describe('AlgorithmRegistry', () => {
  it('returns null for the reference boundaries sentinel', () => {
    expect(registry().resolveBoundaries('gt')).toBeNull();
  });

  it('returns null when no labels are requested', () => {
    const algorithms = registry();
    expect(algorithms.resolveLabels(null)).toBeNull();
    expect(algorithms.resolveLabels(undefined)).toBeNull();
    expect(algorithms.resolveLabels('none')).toBeNull();
  });

  it('resolves algorithms by name and capability', () => {
    const algorithms = registry();
    expect(algorithms.resolveBoundaries('foote')?.name).toBe('foote');
    expect(algorithms.resolveLabels('fmc2d')?.name).toBe('fmc2d');
    expect(algorithms.resolveBoundaries('scluster')).toBe(algorithms.resolveLabels('scluster'));
  });

  it('rejects a boundary algorithm that can only label', () => {
    const error = (() => {
      try {
        registry().resolveBoundaries('fmc2d');
      } catch (err) {
        return err;
      }
    })();
    expect(error).toBeInstanceOf(UnsupportedCapabilityError);
    expect(error).toMatchObject({ algorithmId: 'fmc2d', capability: 'boundaries' });
    expect(error).toHaveProperty('message', 'Algorithm fmc2d can not identify boundaries!');
  });

  it('rejects a label algorithm that can only find boundaries', () => {
    expect(() => registry().resolveLabels('foote')).toThrow('Algorithm foote can not label segments!');
  });

  it('rejects unknown identifiers', () => {
    expect(() => registry().resolveBoundaries('cnmf9')).toThrow(UnknownAlgorithmError);
    expect(() => registry().resolveLabels('cnmf9')).toThrow(UnknownAlgorithmError);
  });

  it('rejects duplicate and reserved names', () => {
    const algorithms = registry();
    expect(() => algorithms.register(fakeAlgorithm({ name: 'foote' }))).toThrow(DuplicateAlgorithmError);
    expect(() => algorithms.register(fakeAlgorithm({ name: 'gt' }))).toThrow(ConfigurationError);
  });

  it('lists names by capability', () => {
    const algorithms = registry();
    expect(algorithms.boundaryAlgorithmNames()).toEqual(['foote', 'scluster']);
    expect(algorithms.labelAlgorithmNames()).toEqual(['fmc2d', 'scluster']);
  });
});
