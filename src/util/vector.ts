// src/util/vector.ts
// What: Vector math for cosine similarity.
// How: Vectors are L2-normalized into Float32Array once; similarity is then a plain dot product.

export function l2Norm(v: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < v.length; i++) {
    const x = v[i] ?? 0;
    sum += x * x;
  }
  return Math.sqrt(sum);
}

export function isFiniteVector(v: ArrayLike<number>): boolean {
  for (let i = 0; i < v.length; i++) {
    if (!Number.isFinite(v[i])) return false;
  }
  return true;
}

/** Returns null for a zero vector, which has no direction to compare. */
export function normalize(v: ArrayLike<number>): Float32Array | null {
  const norm = l2Norm(v);
  if (norm === 0 || !Number.isFinite(norm)) return null;
  const out = new Float32Array(v.length);
  for (let i = 0; i < v.length; i++) out[i] = (v[i] ?? 0) / norm;
  return out;
}

export function dot(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) sum += (a[i] ?? 0) * (b[i] ?? 0);
  return sum;
}

// Float32 rounding can push a unit dot product just past the bounds.
export function clampSimilarity(score: number): number {
  if (score < -1) return -1;
  if (score > 1) return 1;
  return score;
}
