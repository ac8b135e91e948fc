/**
 * Cosine similarity of two equal-length vectors. Zero when either has no magnitude.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(
      `Vector length mismatch: ${String(a.length)} vs ${String(b.length)}`,
    );
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i]!;
    const y = b[i]!;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function isWellFormedVector(vector: unknown, dimensions?: number): vector is number[] {
  if (!Array.isArray(vector) || vector.length === 0) return false;
  if (dimensions !== undefined && vector.length !== dimensions) return false;
  return vector.every((value) => typeof value === "number" && Number.isFinite(value));
}
