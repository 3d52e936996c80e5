/**
 * @fileoverview Public API of @yieldwatch/indicators.
 *
 * Indicator engine (EMA, MACD, first-positive-bar detection) and the
 * dividend eligibility filter.
 */

export { ema } from './ema.js';
export { roundTo } from './math.js';

export { computeMacd, isFirstPositiveBar, analyzeMonthlyMacd, DEFAULT_MACD_PARAMS } from './macd.js';
export type { MacdParams, MacdSeries, SignalEvent, MacdAnalysis } from './macd.js';

export { buildDividendProfile, dedupeDividends, isEligible, DEFAULT_DIVIDEND_OPTIONS } from './dividends.js';
export type { DividendProfile, DividendProfileOptions } from './dividends.js';
