/**
 * Returns a unit-length float32 copy of `values`. A zero vector stays zero:
 * its norm is treated as 1 for the division.
 */
export function l2Normalize(values: ArrayLike<number>): Float32Array {
  let sumSquares = 0;
  for (let i = 0; i < values.length; i += 1) {
    sumSquares += values[i] * values[i];
  }
  const norm = Math.sqrt(sumSquares) || 1;

  const normalized = new Float32Array(values.length);
  for (let i = 0; i < values.length; i += 1) {
    normalized[i] = values[i] / norm;
  }
  return normalized;
}

export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const length = Math.min(a.length, b.length);
  let total = 0;
  for (let i = 0; i < length; i += 1) {
    total += a[i] * b[i];
  }
  return total;
}

export function vectorNorm(values: ArrayLike<number>): number {
  return Math.sqrt(dot(values, values));
}
