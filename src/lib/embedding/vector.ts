export function l2Normalize(vector: readonly number[]): number[] {
  let sumOfSquares = 0;

  for (const value of vector) {
    sumOfSquares += value * value;
  }

  if (sumOfSquares === 0) {
    return vector.map(() => 0);
  }

  const norm = Math.sqrt(sumOfSquares);
  return vector.map((value) => value / norm);
}

export function dotProduct(left: readonly number[], right: readonly number[]): number {
  if (left.length !== right.length) {
    throw new Error(`Vector dimension mismatch: ${left.length} vs ${right.length}`);
  }

  let sum = 0;
  for (let index = 0; index < left.length; index += 1) {
    sum += left[index] * right[index];
  }

  return sum;
}

export function isFiniteVector(vector: readonly number[]): boolean {
  return vector.every((value) => Number.isFinite(value));
}
