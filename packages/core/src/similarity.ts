import { DimensionMismatchError } from "@benchrag/errors";

export type SimilarityScorer = (a: readonly number[], b: readonly number[]) => number;

/**
 * Cosine of the angle between two vectors, in [-1, 1].
 * A vector whose components are all exactly 0 scores 0 against anything.
 */
export const cosineSimilarity: SimilarityScorer = (a, b) => {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }

  const scaleA = largestMagnitude(a);
  const scaleB = largestMagnitude(b);
  if (scaleA === 0 || scaleB === 0) {
    return 0;
  }

  // Each vector is divided by its largest component so the squared norms
  // neither underflow to 0 nor overflow to Infinity.
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = (a[i] ?? 0) / scaleA;
    const y = (b[i] ?? 0) / scaleB;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  const score = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  // Rounding can push parallel vectors a hair past 1.
  return Math.min(1, Math.max(-1, score));
};

function largestMagnitude(vector: readonly number[]): number {
  let largest = 0;
  for (const value of vector) {
    largest = Math.max(largest, Math.abs(value));
  }
  return largest;
}
