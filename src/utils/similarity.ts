/**
 * Vector similarity helpers
 */

export function dotProduct(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function magnitude(vector: readonly number[]): number {
  return Math.sqrt(dotProduct(vector, vector));
}

/**
 * Cosine similarity in [-1, 1]; 0 when either vector has zero magnitude
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const normA = magnitude(a);
  const normB = magnitude(b);
  if (normA === 0 || normB === 0) return 0;
  return dotProduct(a, b) / (normA * normB);
}

export function interpretSimilarity(similarity: number): string {
  if (similarity >= 0.9) return 'nearly identical';
  if (similarity >= 0.8) return 'very high';
  if (similarity >= 0.7) return 'high';
  if (similarity >= 0.6) return 'moderate';
  if (similarity >= 0.5) return 'some';
  if (similarity >= 0.3) return 'low';
  return 'very low';
}
