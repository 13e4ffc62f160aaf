/**
 * Vector math for the brute-force backends
 */

export function normalize(vector: Float32Array): Float32Array {
  let norm = 0;
  for (const value of vector) {
    norm += value * value;
  }
  norm = Math.sqrt(norm);
  const out = new Float32Array(vector.length);
  if (norm === 0) {
    return out;
  }
  for (let i = 0; i < vector.length; i++) {
    out[i] = (vector[i] ?? 0) / norm;
  }
  return out;
}

/**
 * Dot product; equals cosine similarity for unit vectors.
 * Vectors of different length never match.
 */
export function dot(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    return 0;
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  return dot(normalize(a), normalize(b));
}
