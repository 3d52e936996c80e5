/**
 * @fileoverview Yahoo Finance market-data provider.
 *
 * Talks to the public chart API (`v8/finance/chart/<symbol>`) over axios.
 * One request per call, no retry; failures surface as provider errors so the
 * orchestrators can record them per security.
 *
 * @module @yieldwatch/provider-yahoo
 */

import axios, { type AxiosInstance } from 'axios';
import {
  ProviderRequestError,
  ProviderResponseError,
  errorMessage,
  type DividendEvent,
  type MarketDataProvider,
  type PriceSeries,
} from '@yieldwatch/contracts';
import { roundTo } from '@yieldwatch/indicators';
import { startTimer, type Logger } from '@yieldwatch/logger';
import { parseChartBars, parseCloses, parseDividends, parseLatestPrice } from './parser.js';
import { chartResponseSchema, type ChartError, type ChartResult } from './schema.js';

export const DEFAULT_YAHOO_BASE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';
export const DEFAULT_YAHOO_TIMEOUT_MS = 30_000;

// The chart API rejects requests without a browser-like agent.
const USER_AGENT = 'Mozilla/5.0 (compatible; yieldwatch/0.1)';

const PROVIDER_ID = 'yahoo';

export interface ChartQuery {
  range: string;
  interval: string;
  events?: string;
}

export interface YahooProviderOptions {
  /** @default DEFAULT_YAHOO_BASE_URL */
  baseUrl?: string;

  /** @default 30000 */
  timeoutMs?: number;

  /** Preconfigured client; `baseUrl` and `timeoutMs` are ignored when set */
  httpClient?: AxiosInstance;

  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const provider = new YahooProvider({ logger });
 * const bars = await provider.getMonthlyBars('2371.TW');
 * const price = await provider.getLivePrice('2371.TW');
 * ```
 */
export class YahooProvider implements MarketDataProvider {
  readonly id = PROVIDER_ID;

  private readonly http: AxiosInstance;
  private readonly logger?: Logger;

  constructor(options: YahooProviderOptions = {}) {
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: options.baseUrl ?? DEFAULT_YAHOO_BASE_URL,
        timeout: options.timeoutMs ?? DEFAULT_YAHOO_TIMEOUT_MS,
        headers: { 'User-Agent': USER_AGENT },
      });
    this.logger = options.logger?.child({ component: 'yahoo-provider' });
  }

  async getMonthlyBars(symbol: string): Promise<PriceSeries> {
    const result = await this.fetchChart(symbol, { range: '2y', interval: '1mo' });
    return parseChartBars(result);
  }

  async getDividends(symbol: string): Promise<DividendEvent[]> {
    const result = await this.fetchChart(symbol, { range: '2y', interval: '1mo', events: 'div' });
    return parseDividends(result);
  }

  async getRecentCloses(symbol: string): Promise<number[]> {
    const result = await this.fetchChart(symbol, { range: '5d', interval: '1d' });
    return parseCloses(result);
  }

  async getLivePrice(symbol: string): Promise<number | null> {
    const result = await this.fetchChart(symbol, { range: '1d', interval: '1m' });
    const price = parseLatestPrice(result);
    return price === null ? null : roundTo(price, 2);
  }

  /**
   * Fetches one chart result and validates its shape.
   */
  async fetchChart(symbol: string, query: ChartQuery): Promise<ChartResult> {
    const timer = startTimer();
    let payload: unknown;
    try {
      const response = await this.http.get<unknown>(`/${encodeURIComponent(symbol)}`, { params: query });
      payload = response.data;
    } catch (error) {
      throw this.toProviderError(error, symbol);
    }

    const result = this.extractResult(payload, symbol);
    this.logger?.debug('Chart fetched', { symbol, ...query, duration_ms: timer.stop() });
    return result;
  }

  private extractResult(payload: unknown, symbol: string): ChartResult {
    const parsed = chartResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderResponseError(`Unexpected Yahoo Finance payload for ${symbol}`, {
        provider: PROVIDER_ID,
        symbol,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const { result, error } = parsed.data.chart;
    if (error) {
      throw new ProviderResponseError(`Yahoo Finance error for ${symbol}: ${describeChartError(error)}`, {
        provider: PROVIDER_ID,
        symbol,
        errorCode: error.code,
      });
    }

    const first = result?.[0];
    if (!first) {
      throw new ProviderResponseError(`Yahoo Finance returned no result for ${symbol}`, {
        provider: PROVIDER_ID,
        symbol,
      });
    }
    return first;
  }

  /**
   * Maps a failed request to a provider error. An HTTP error whose body is a
   * chart error (unknown symbol, delisted) is a response error, everything
   * else a request error.
   */
  private toProviderError(error: unknown, symbol: string): ProviderRequestError | ProviderResponseError {
    if (!axios.isAxiosError(error)) {
      return new ProviderRequestError(`Yahoo Finance request failed for ${symbol}: ${errorMessage(error)}`, {
        provider: PROVIDER_ID,
        symbol,
      });
    }

    const body = chartResponseSchema.safeParse(error.response?.data);
    const chartError = body.success ? body.data.chart.error : null;
    if (chartError) {
      return new ProviderResponseError(`Yahoo Finance error for ${symbol}: ${describeChartError(chartError)}`, {
        provider: PROVIDER_ID,
        symbol,
        errorCode: chartError.code,
        statusCode: error.response?.status,
      });
    }

    return new ProviderRequestError(`Yahoo Finance request failed for ${symbol}: ${error.message}`, {
      provider: PROVIDER_ID,
      symbol,
      url: error.config?.url,
      statusCode: error.response?.status,
    });
  }
}

function describeChartError(error: ChartError): string {
  return error.description ?? error.code ?? 'unknown error';
}
