/**
 * In-process stand-ins shared by the app tests. The axios stub answers
 * every request itself and applies the request's own `validateStatus`.
 */

import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import type {
  DividendEvent,
  MarketDataProvider,
  MonitoredSecurity,
  PriceBar,
  PriceSeries,
  SecurityRef,
} from '@yieldwatch/contracts';
import { createLogger } from '@yieldwatch/logger';
import type { Notifier, NotifyReceipt } from '../src/notify/http-notifier.js';
import type { ReportSource } from '../src/report/report-file.js';
import type { UniverseSource } from '../src/universe/types.js';

export const silentLogger = createLogger({ level: 'error', console: false });

export type Responder = (config: InternalAxiosRequestConfig) => { status?: number; data: unknown };

export function stubClient(respond: Responder): { client: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const client = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const { status = 200, data } = respond(config);
      const response = { data, status, statusText: String(status), headers: {}, config };
      const accepted = config.validateStatus ? config.validateStatus(status) : status < 400;
      if (!accepted) {
        throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
      }
      return response;
    },
  });
  return { client, requests };
}

export class StaticUniverse implements UniverseSource {
  constructor(private readonly entries: readonly SecurityRef[]) {}

  async *securities(): AsyncGenerator<SecurityRef> {
    yield* this.entries;
  }
}

/**
 * One bar per calendar month starting January 2024; low is close - 1.
 */
export function monthlyBars(closes: readonly number[]): PriceBar[] {
  return closes.map((close, i) => ({
    timestamp: new Date(Date.UTC(2024, i, 1)).toISOString(),
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume: 1000,
  }));
}

/** 23 falling closes then a jump: the latest histogram bar is the first positive one. */
export const FIRING_CLOSES: readonly number[] = [...Array.from({ length: 23 }, (_, i) => 100 - i), 130];

/** Steady rise: histogram positive on both of the last two bars. */
export const RISING_CLOSES: readonly number[] = Array.from({ length: 24 }, (_, i) => 100 + i);

function answer<T>(table: Map<string, T | Error>, key: string, fallback: T): T {
  if (!table.has(key)) {
    return fallback;
  }
  const value = table.get(key);
  if (value instanceof Error) {
    throw value;
  }
  return value === undefined ? fallback : value;
}

/**
 * Market data keyed by provider symbol. An Error entry is thrown.
 */
export class FakeMarketData implements MarketDataProvider {
  readonly bars = new Map<string, PriceSeries | Error>();
  readonly dividends = new Map<string, DividendEvent[] | Error>();
  readonly closes = new Map<string, number[] | Error>();
  readonly prices = new Map<string, number | null | Error>();
  readonly calls: string[] = [];

  async getMonthlyBars(symbol: string): Promise<PriceSeries> {
    this.calls.push(`bars:${symbol}`);
    return answer(this.bars, symbol, []);
  }

  async getDividends(symbol: string): Promise<DividendEvent[]> {
    this.calls.push(`dividends:${symbol}`);
    return answer(this.dividends, symbol, []);
  }

  async getRecentCloses(symbol: string): Promise<number[]> {
    this.calls.push(`closes:${symbol}`);
    return answer(this.closes, symbol, []);
  }

  async getLivePrice(symbol: string): Promise<number | null> {
    this.calls.push(`price:${symbol}`);
    return answer(this.prices, symbol, null);
  }
}

export class RecordingNotifier implements Notifier {
  readonly sent: string[] = [];
  failWith: Error | null = null;

  async notify(code: string): Promise<NotifyReceipt> {
    if (this.failWith !== null) {
      throw this.failWith;
    }
    this.sent.push(code);
    return { url: `http://notify.test/?num=${code}`, status: 200 };
  }
}

export class MemoryReports implements ReportSource {
  loads = 0;

  constructor(private readonly rows: MonitoredSecurity[] | null) {}

  async load(): Promise<MonitoredSecurity[] | null> {
    this.loads += 1;
    return this.rows;
  }
}
