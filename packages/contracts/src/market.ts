/**
 * @fileoverview Market data types shared by providers and analysis.
 *
 * Pure data structures with no I/O. Providers normalize their raw payloads
 * into these shapes before anything else sees them.
 *
 * @module @yieldwatch/contracts/market
 */

/**
 * A single OHLCV bar.
 *
 * @invariant high >= low
 * @invariant timestamp is a valid ISO 8601 string (UTC)
 *
 * @example
 * ```typescript
 * const bar: PriceBar = {
 *   timestamp: '2026-09-01T00:00:00.000Z',
 *   open: 51.2,
 *   high: 55.0,
 *   low: 50.0,
 *   close: 54.3,
 *   volume: 1830000
 * };
 * ```
 */
export interface PriceBar {
  /** ISO 8601 timestamp of bar open (UTC) */
  timestamp: string;

  open: number;
  high: number;
  low: number;
  close: number;

  /** Traded volume; 0 when the provider omits it */
  volume: number;
}

/**
 * Chronologically ascending bars with no duplicate timestamps.
 * Used at monthly granularity by the scanner.
 */
export type PriceSeries = readonly PriceBar[];

/**
 * A cash dividend paid on a given date.
 */
export interface DividendEvent {
  /** ISO 8601 timestamp of the ex-dividend date (UTC) */
  timestamp: string;

  /** Cash amount per share, in the security's trading currency */
  amount: number;
}

/**
 * Market-data collaborator used by the scanner and the monitor.
 *
 * Symbols are provider symbols (see `toProviderSymbol`). Transport failures
 * reject with `ProviderRequestError`, unusable payloads with
 * `ProviderResponseError`.
 */
export interface MarketDataProvider {
  /** About two years of monthly bars, oldest first */
  getMonthlyBars(symbol: string): Promise<PriceSeries>;

  /** Dividend events of about the last two years, oldest first */
  getDividends(symbol: string): Promise<DividendEvent[]>;

  /** Closes of the last few sessions, oldest first */
  getRecentCloses(symbol: string): Promise<number[]>;

  /** Latest traded price rounded to 2 decimals, null when none is available */
  getLivePrice(symbol: string): Promise<number | null>;
}
