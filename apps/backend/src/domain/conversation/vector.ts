// =============================================================================
// Vector Math
// =============================================================================

import { SchemaMismatchError } from '@chat-recall/shared-types';

/**
 * Compute cosine similarity between two vectors
 *
 * @returns A score in [-1, 1]; 0 when either vector has zero magnitude
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new SchemaMismatchError('Vectors must have the same length', {
      left: a.length,
      right: b.length,
    });
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) return 0;

  // Clamp floating-point drift so identical vectors never exceed 1
  return Math.max(-1, Math.min(1, dotProduct / magnitude));
}

export function isZeroVector(vector: number[]): boolean {
  return vector.every((value) => value === 0);
}

export function isFiniteVector(vector: number[]): boolean {
  return vector.every((value) => Number.isFinite(value));
}

/**
 * Reject a vector whose length differs from the index's dimensionality
 *
 * @param role - What the vector is, for the error message ("embedding", "query vector")
 */
export function assertDimensions(vector: number[], expected: number, role: string): void {
  if (vector.length !== expected) {
    throw new SchemaMismatchError(
      `${role} has ${vector.length} dimensions, index expects ${expected}`,
      { expected, actual: vector.length }
    );
  }
}

/**
 * Reject a vector carrying NaN or an infinite component
 */
export function assertFiniteVector(vector: number[], role: string): void {
  if (!isFiniteVector(vector)) {
    throw new SchemaMismatchError(`${role} contains non-finite components`);
  }
}
