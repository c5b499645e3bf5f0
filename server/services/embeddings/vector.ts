export const dot = (a: readonly number[], b: readonly number[]): number => {
  const n = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < n; i += 1) sum += a[i] * b[i];
  return sum;
};

export const magnitude = (v: readonly number[]): number => Math.sqrt(dot(v, v));

/** Cosine in [-1, 1]; 0 when either side is the zero vector or lengths differ. */
export const cosineSimilarity = (a: readonly number[], b: readonly number[]): number => {
  if (a.length !== b.length || a.length === 0) return 0;
  const denom = magnitude(a) * magnitude(b);
  if (denom === 0) return 0;
  return Math.max(-1, Math.min(1, dot(a, b) / denom));
};
