/**
 * Security universe from the TWSE ISIN listing pages.
 *
 * `C_public.jsp?strMode=2` lists exchange securities, `strMode=4` the OTC
 * market. Pages are Big5-encoded HTML tables whose first cell reads
 * `<code>　<name>` (ideographic space). Only four-digit codes are kept.
 */

import axios, { type AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import {
  ProviderRequestError,
  ProviderResponseError,
  errorMessage,
  type Market,
  type SecurityRef,
} from '@yieldwatch/contracts';
import { startTimer, type Logger } from '@yieldwatch/logger';
import type { UniverseSource } from './types.js';

export const DEFAULT_LISTING_BASE_URL = 'https://isin.twse.com.tw/isin/C_public.jsp';

const PROVIDER_ID = 'twse-isin';
const IDEOGRAPHIC_SPACE = '　';
const STOCK_CODE = /^\d{4}$/;

const MARKET_MODES: ReadonlyArray<{ market: Market; strMode: number }> = [
  { market: 'listed', strMode: 2 },
  { market: 'otc', strMode: 4 },
];

export interface TwseListingSourceOptions {
  logger: Logger;

  /** @default DEFAULT_LISTING_BASE_URL */
  baseUrl?: string;

  /** @default 30000 */
  timeoutMs?: number;

  httpClient?: AxiosInstance;
}

/**
 * Extracts securities from one listing page.
 *
 * @example
 * ```typescript
 * parseListingHtml('<table><tr><td>2371　大同</td></tr></table>', 'listed');
 * // [{ code: '2371', name: '大同', market: 'listed' }]
 * ```
 */
export function parseListingHtml(html: string, market: Market): SecurityRef[] {
  const $ = cheerio.load(html);
  const securities: SecurityRef[] = [];

  $('tr').each((_, row) => {
    const firstCell = $(row).find('td').first().text().trim();
    const separator = firstCell.indexOf(IDEOGRAPHIC_SPACE);
    if (separator < 0) {
      return;
    }
    const code = firstCell.slice(0, separator).trim();
    const name = firstCell.slice(separator + 1).trim();
    if (STOCK_CODE.test(code)) {
      securities.push({ code, name, market });
    }
  });

  return securities;
}

function toBytes(data: unknown): Uint8Array | null {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return null;
}

export class TwseListingSource implements UniverseSource {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly decoder = new TextDecoder('big5');

  constructor(options: TwseListingSourceOptions) {
    this.baseUrl = options.baseUrl ?? DEFAULT_LISTING_BASE_URL;
    this.http =
      options.httpClient ??
      axios.create({
        timeout: options.timeoutMs ?? 30_000,
        headers: { 'User-Agent': 'Mozilla/5.0' },
      });
    this.logger = options.logger.child({ component: 'listing' });
  }

  /**
   * Listed securities first, then OTC. A market whose page cannot be
   * fetched is logged and skipped.
   */
  async *securities(): AsyncGenerator<SecurityRef> {
    for (const { market, strMode } of MARKET_MODES) {
      let entries: SecurityRef[];
      try {
        entries = await this.fetchMarket(market, strMode);
      } catch (error) {
        this.logger.warn('Listing unavailable, market skipped', { market, error: errorMessage(error) });
        continue;
      }
      yield* entries;
    }
  }

  async fetchMarket(market: Market, strMode: number): Promise<SecurityRef[]> {
    const timer = startTimer();
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(this.baseUrl, {
        params: { strMode },
        responseType: 'arraybuffer',
      });
      data = response.data;
    } catch (error) {
      throw new ProviderRequestError(`Listing request failed for ${market}: ${errorMessage(error)}`, {
        provider: PROVIDER_ID,
        url: this.baseUrl,
        statusCode: axios.isAxiosError(error) ? error.response?.status : undefined,
        market,
      });
    }

    const bytes = toBytes(data);
    if (bytes === null) {
      throw new ProviderResponseError(`Listing page for ${market} is not binary content`, {
        provider: PROVIDER_ID,
        market,
      });
    }

    const securities = parseListingHtml(this.decoder.decode(bytes), market);
    this.logger.info('Listing loaded', { market, count: securities.length, duration_ms: timer.stop() });
    return securities;
  }
}
