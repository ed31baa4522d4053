/**
 * Error-free transformation of a floating point addition: `sum` is the rounded
 * result and `err` the exact rounding error, so `a + b === sum + err` holds in
 * real arithmetic.
 */
export function twoSum(a: number, b: number): { sum: number; err: number } {
  const sum = a + b;
  const z = sum - a;
  const err = a - (sum - z) + (b - z);
  return { sum, err };
}

/**
 * Compensated summation (Ogita, Rump & Oishi "Sum2"): accumulates the rounding
 * error of every addition and folds it back in at the end. The result is as
 * accurate as if computed in twice the working precision.
 */
export function compensatedSum(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let s = values[0];
  let sigma = 0;
  for (let i = 1; i < values.length; i++) {
    const { sum, err } = twoSum(s, values[i]);
    s = sum;
    sigma += err;
  }
  return s + sigma;
}

/** Arithmetic mean using {@link compensatedSum}; NaN for an empty input. */
export function compensatedMean(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN;
  return compensatedSum(values) / values.length;
}
