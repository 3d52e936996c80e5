/**
 * @fileoverview Converts a chart API result into yieldwatch market types.
 *
 * @module @yieldwatch/provider-yahoo/parser
 */

import moment from 'moment-timezone';
import type { DividendEvent, PriceBar } from '@yieldwatch/contracts';
import type { ChartResult } from './schema.js';

/** Used when the payload does not name the exchange timezone */
export const DEFAULT_EXCHANGE_TIMEZONE = 'Asia/Taipei';

function toIso(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString();
}

/**
 * OHLCV bars in ascending time order.
 *
 * Rows missing any of open/high/low/close are dropped. When a timestamp
 * repeats, the later row wins. During a trading month the monthly range
 * ends with a live row for the current session; when that last row falls
 * in the same exchange-local month as the one before it, the two are
 * folded into one month bar.
 *
 * @example
 * ```typescript
 * const bars = parseChartBars({
 *   timestamp: [1788220800],
 *   indicators: { quote: [{ open: [51], high: [55], low: [50], close: [54], volume: [1200] }] },
 * });
 * // [{ timestamp: '2026-09-01T00:00:00.000Z', open: 51, ... }]
 * ```
 */
export function parseChartBars(result: ChartResult): PriceBar[] {
  const quote = result.indicators?.quote?.[0];
  if (!quote) {
    return [];
  }

  const byTimestamp = new Map<number, PriceBar>();
  (result.timestamp ?? []).forEach((ts, i) => {
    const open = quote.open?.[i];
    const high = quote.high?.[i];
    const low = quote.low?.[i];
    const close = quote.close?.[i];
    if (open == null || high == null || low == null || close == null) {
      return;
    }
    byTimestamp.delete(ts);
    byTimestamp.set(ts, {
      timestamp: toIso(ts),
      open,
      high,
      low,
      close,
      volume: quote.volume?.[i] ?? 0,
    });
  });

  const rows = [...byTimestamp.entries()].sort(([a], [b]) => a - b);
  const timezone = result.meta?.exchangeTimezoneName ?? DEFAULT_EXCHANGE_TIMEZONE;
  const last = rows.at(-1);
  const previous = rows.at(-2);
  if (last && previous && monthOf(last[0], timezone) === monthOf(previous[0], timezone)) {
    rows.splice(-2, 2, [previous[0], foldBars(previous[1], last[1])]);
  }
  return rows.map(([, bar]) => bar);
}

function monthOf(epochSeconds: number, timezone: string): string {
  return moment.tz(epochSeconds * 1000, timezone).format('YYYY-MM');
}

/** One bar spanning both inputs; volume is the larger of the two. */
function foldBars(first: PriceBar, second: PriceBar): PriceBar {
  return {
    timestamp: first.timestamp,
    open: first.open,
    high: Math.max(first.high, second.high),
    low: Math.min(first.low, second.low),
    close: second.close,
    volume: Math.max(first.volume, second.volume),
  };
}

/**
 * Non-null closes in the order the API returned them.
 */
export function parseCloses(result: ChartResult): number[] {
  const closes = result.indicators?.quote?.[0]?.close ?? [];
  return closes.filter((close): close is number => close !== null);
}

/**
 * Dividend events sorted by ex-dividend date.
 */
export function parseDividends(result: ChartResult): DividendEvent[] {
  const dividends = Object.values(result.events?.dividends ?? {});
  return dividends
    .map((dividend) => ({ timestamp: toIso(dividend.date), amount: dividend.amount }))
    .sort((a, b) => a.timestamp.localeCompare(b.timestamp));
}

/**
 * Last non-null intraday close, falling back to the quote's
 * `regularMarketPrice`; null when neither exists.
 */
export function parseLatestPrice(result: ChartResult): number | null {
  const closes = parseCloses(result);
  const last = closes[closes.length - 1];
  if (last !== undefined) {
    return last;
  }
  return result.meta?.regularMarketPrice ?? null;
}
