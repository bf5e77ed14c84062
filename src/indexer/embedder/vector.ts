/**
 * Vector helpers shared by the embedders.
 */

/**
 * Scale a vector to unit length. A zero vector is returned unchanged.
 */
export function l2Normalize(vector: readonly number[]): number[] {
  let sumSquares = 0;
  for (const value of vector) {
    sumSquares += value * value;
  }

  const norm = Math.sqrt(sumSquares);
  if (norm === 0) {
    return [...vector];
  }

  return vector.map((value) => value / norm);
}
