/**
 * Embedding math. Every vector is L2-normalized before it is stored or
 * compared, so cosine similarity is a plain dot product.
 */

const EPSILON = 1e-9;

export function l2Normalize(vector: ArrayLike<number>): Float32Array {
  let sumSq = 0;
  for (let i = 0; i < vector.length; i++) {
    sumSq += vector[i] * vector[i];
  }
  const norm = Math.sqrt(sumSq) + EPSILON;
  const out = new Float32Array(vector.length);
  for (let i = 0; i < vector.length; i++) {
    out[i] = vector[i] / norm;
  }
  return out;
}

export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new RangeError(`Embedding length mismatch: ${a.length} vs ${b.length}`);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Cosine similarity clamped to [-1, 1]. Both inputs are normalized here, so
 * callers may pass raw model output.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const sim = dot(l2Normalize(a), l2Normalize(b));
  return Math.max(-1, Math.min(1, sim));
}

/**
 * Mean of the normalized inputs, renormalized.
 */
export function averageEmbeddings(vectors: ReadonlyArray<ArrayLike<number>>): Float32Array {
  if (vectors.length === 0) {
    throw new RangeError('Cannot average zero embeddings');
  }
  const length = vectors[0].length;
  const sum = new Float32Array(length);
  for (const vector of vectors) {
    const normalized = l2Normalize(vector);
    if (normalized.length !== length) {
      throw new RangeError(`Embedding length mismatch: ${normalized.length} vs ${length}`);
    }
    for (let i = 0; i < length; i++) {
      sum[i] += normalized[i];
    }
  }
  return l2Normalize(sum);
}
