/**
 * @fileoverview Security identities, scan rows and monitored rows.
 *
 * @module @yieldwatch/contracts/securities
 */

/**
 * Exchange segment a security trades on.
 * - 'listed': Taiwan Stock Exchange (TWSE)
 * - 'otc': Taipei Exchange over-the-counter market (TPEx)
 */
export type Market = 'listed' | 'otc';

/**
 * Direction of the MACD line at the latest bar.
 */
export type MacdRegime = 'bullish' | 'bearish';

/**
 * One entry of the security universe.
 */
export interface SecurityRef {
  /** Four-digit exchange code without any provider suffix (e.g. '2330') */
  code: string;

  /** Display name as published by the exchange */
  name: string;

  market: Market;
}

/**
 * Provider symbol suffix per market.
 */
const MARKET_SUFFIX: Record<Market, string> = {
  listed: '.TW',
  otc: '.TWO',
};

/**
 * Builds the market-data symbol for a security.
 *
 * @example
 * ```typescript
 * toProviderSymbol({ code: '2371', market: 'listed' }); // '2371.TW'
 * toProviderSymbol({ code: '6488', market: 'otc' });    // '6488.TWO'
 * ```
 */
export function toProviderSymbol(security: Pick<SecurityRef, 'code' | 'market'>): string {
  return `${security.code}${MARKET_SUFFIX[security.market]}`;
}

/**
 * A qualifying security as written to the hand-off report.
 *
 * Created once by the scanner and never mutated afterwards.
 */
export interface ScanResult extends SecurityRef {
  /** Close of the latest monthly bar */
  currentPrice: number;

  /** Low of the latest monthly bar */
  monthlyLow: number;

  /** Dividends paid in the trailing 365 days */
  trailingAnnualDividend: number;

  /** trailingAnnualDividend / recent close * 100 */
  trailingYieldPct: number;

  regime: MacdRegime;
  currentHistogram: number;
  previousHistogram: number;
}

/**
 * The part of a scan row the monitor needs, parsed back from the report.
 */
export interface MonitoredSecurity extends SecurityRef {
  monthlyLow: number;
}
