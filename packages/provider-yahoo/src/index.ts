/**
 * @fileoverview Public API for @yieldwatch/provider-yahoo.
 *
 * @module @yieldwatch/provider-yahoo
 * @example
 * ```typescript
 * import { YahooProvider } from '@yieldwatch/provider-yahoo';
 * import { toProviderSymbol } from '@yieldwatch/contracts';
 *
 * const provider = new YahooProvider();
 * const bars = await provider.getMonthlyBars(toProviderSymbol({ code: '2371', market: 'listed' }));
 * ```
 */

export { YahooProvider, DEFAULT_YAHOO_BASE_URL, DEFAULT_YAHOO_TIMEOUT_MS } from './yahoo-provider.js';
export type { YahooProviderOptions, ChartQuery } from './yahoo-provider.js';

export { parseChartBars, parseCloses, parseDividends, parseLatestPrice } from './parser.js';

export { chartResponseSchema } from './schema.js';
export type { ChartResult, ChartResponse } from './schema.js';
