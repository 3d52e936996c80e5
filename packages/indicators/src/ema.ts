/**
 * Exponential moving average, recursive form.
 *
 * Seeds with the first value and applies `alpha = 2 / (span + 1)` at every
 * step after it (no bias adjustment):
 *
 *   ema[0] = values[0]
 *   ema[i] = ema[i-1] + alpha * (values[i] - ema[i-1])
 *
 * The output has the same length and indexing as the input.
 */
export function ema(values: readonly number[], span: number): number[] {
  if (!Number.isFinite(span) || span < 1) {
    throw new Error(`Invalid EMA span: ${span}`);
  }

  const alpha = 2 / (span + 1);
  const out: number[] = [];
  let previous: number | undefined;

  for (const value of values) {
    const next = previous === undefined ? value : previous + alpha * (value - previous);
    out.push(next);
    previous = next;
  }

  return out;
}
