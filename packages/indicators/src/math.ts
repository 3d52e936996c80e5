/**
 * Numeric helpers shared by the indicators.
 */

/**
 * Rounds half away from zero to a fixed number of decimals.
 *
 * @example
 * ```typescript
 * roundTo(3.14159, 2); // 3.14
 * roundTo(-0.00005, 4); // -0.0001
 * ```
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}

/**
 * Element-wise `a[i] - b[i]`. Both arrays must have the same length.
 */
export function subtract(a: readonly number[], b: readonly number[]): number[] {
  if (a.length !== b.length) {
    throw new Error(`Length mismatch: ${a.length} vs ${b.length}`);
  }
  return a.map((value, i) => value - (b[i] ?? Number.NaN));
}
