/**
 * Cosine distance: 1 - cos(a, b), in [0, 2]. Lower is closer.
 *
 * A zero vector has no direction; its distance to anything is 1
 * (orthogonal) rather than NaN.
 */
export function cosineDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 1;
  }

  const cosine = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  // Rounding can push |cosine| slightly past 1
  return 1 - Math.max(-1, Math.min(1, cosine));
}
