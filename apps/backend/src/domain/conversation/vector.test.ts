import { describe, it, expect } from 'vitest';
import { SchemaMismatchError } from '@chat-recall/shared-types';
import { assertDimensions, cosineSimilarity, isFiniteVector, isZeroVector } from './vector.js';

describe('cosineSimilarity', () => {
  it('is 1 for vectors pointing the same way', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 12);
  });

  it('is 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('is -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, 0], [-3, 0])).toBe(-1);
  });

  it('is 0 when either vector has zero magnitude', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('rejects vectors of different lengths', () => {
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow(SchemaMismatchError);
  });
});

describe('vector checks', () => {
  it('detects zero and non-finite vectors', () => {
    expect(isZeroVector([0, 0, 0])).toBe(true);
    expect(isZeroVector([0, 0.1, 0])).toBe(false);
    expect(isFiniteVector([1, 2])).toBe(true);
    expect(isFiniteVector([1, Number.NaN])).toBe(false);
    expect(isFiniteVector([Number.POSITIVE_INFINITY])).toBe(false);
  });

  it('reports the expected and actual dimensionality', () => {
    expect(() => assertDimensions([1, 2, 3], 4, 'embedding')).toThrow(
      'embedding has 3 dimensions, index expects 4'
    );
    expect(() => assertDimensions([1, 2, 3, 4], 4, 'embedding')).not.toThrow();
  });
});
