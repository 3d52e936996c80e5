/**
 * MACD oscillator and the monthly "first positive histogram bar" signal.
 *
 * Everything here is a pure function of the input series; nothing is cached
 * between scans.
 */

import type { MacdRegime, PriceSeries } from '@yieldwatch/contracts';
import { ema } from './ema.js';
import { subtract } from './math.js';

export interface MacdParams {
  /** Fast EMA span */
  fast: number;

  /** Slow EMA span */
  slow: number;

  /** Signal-line EMA span over the MACD line */
  signal: number;

  /**
   * Bars required before a series is evaluated at all. Shorter series
   * report insufficient history instead of a signal.
   */
  minBars: number;
}

export const DEFAULT_MACD_PARAMS: Readonly<MacdParams> = {
  fast: 12,
  slow: 26,
  signal: 9,
  minBars: 12,
};

/**
 * Three parallel series indexed like the input closes.
 *
 * @invariant histogram[i] === macd[i] - signal[i]
 */
export interface MacdSeries {
  macd: number[];
  signal: number[];
  histogram: number[];
}

/**
 * Result of evaluating the latest two histogram bars.
 */
export interface SignalEvent {
  /** True when the latest bar is the first positive one */
  fired: boolean;
  currentHistogram: number;
  previousHistogram: number;

  /** Sign of the MACD line (not the histogram) at the latest bar */
  regime: MacdRegime;
}

export type MacdAnalysis =
  | { kind: 'insufficient_history'; bars: number; required: number }
  | { kind: 'evaluated'; series: MacdSeries; event: SignalEvent };

export function computeMacd(
  closes: readonly number[],
  params: Pick<MacdParams, 'fast' | 'slow' | 'signal'> = DEFAULT_MACD_PARAMS
): MacdSeries {
  const macd = subtract(ema(closes, params.fast), ema(closes, params.slow));
  const signal = ema(macd, params.signal);
  return { macd, signal, histogram: subtract(macd, signal) };
}

/**
 * True iff the last histogram value is positive and the one before it is
 * not (`h[last] > 0 && h[last-1] <= 0`). A prior value of exactly zero
 * counts as not yet positive. Only the latest two points are inspected.
 *
 * @example
 * ```typescript
 * isFirstPositiveBar([-0.4, 0, 0.01]); // true
 * isFirstPositiveBar([-0.4, 0, 0]);    // false
 * isFirstPositiveBar([0.2, 0.3]);      // false
 * ```
 */
export function isFirstPositiveBar(histogram: readonly number[]): boolean {
  if (histogram.length < 2) {
    return false;
  }
  const current = histogram[histogram.length - 1] ?? Number.NaN;
  const previous = histogram[histogram.length - 2] ?? Number.NaN;
  return current > 0 && previous <= 0;
}

/**
 * Runs MACD over monthly closes and evaluates the first-positive-bar rule at
 * the latest bar.
 */
export function analyzeMonthlyMacd(bars: PriceSeries, params: Partial<MacdParams> = {}): MacdAnalysis {
  const resolved: MacdParams = { ...DEFAULT_MACD_PARAMS, ...params };
  // A transition needs two histogram values whatever minBars says.
  const required = Math.max(resolved.minBars, 2);

  if (bars.length < required) {
    return { kind: 'insufficient_history', bars: bars.length, required };
  }

  const series = computeMacd(
    bars.map((bar) => bar.close),
    resolved
  );
  const last = series.histogram.length - 1;
  const currentHistogram = series.histogram[last] ?? Number.NaN;
  const previousHistogram = series.histogram[last - 1] ?? Number.NaN;
  const latestMacd = series.macd[last] ?? Number.NaN;

  return {
    kind: 'evaluated',
    series,
    event: {
      fired: isFirstPositiveBar(series.histogram),
      currentHistogram,
      previousHistogram,
      regime: latestMacd > 0 ? 'bullish' : 'bearish',
    },
  };
}
