/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();
const timeOfDay = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:mm');

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'production']).default('development'),
      dryRun: z.boolean().default(false),
      verbose: z.boolean().default(false),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  scan: z
    .object({
      reportPath: z.string().min(1).default('scan_result.txt'),
      minDividendYieldPct: z.coerce.number().min(0).default(3),
      yieldCeilingPct: z.coerce.number().positive().default(20),
      minMonthlyBars: z.coerce.number().int().min(2).default(12),
      macd: z
        .object({
          fast: positiveInt.default(12),
          slow: positiveInt.default(26),
          signal: positiveInt.default(9),
        })
        .default({}),
    })
    .default({}),

  monitor: z
    .object({
      ledgerPath: z.string().min(1).default('alert_log.json'),
      cooldownMinutes: z.coerce.number().min(0).default(60),
      lockStaleMinutes: z.coerce.number().positive().default(10),
    })
    .default({}),

  notify: z
    .object({
      /** Code is appended URL-encoded; unset disables the monitor */
      baseUrl: z.string().url().optional(),
      timeoutMs: positiveInt.default(10_000),
    })
    .default({}),

  provider: z
    .object({
      yahooBaseUrl: z.string().url().default('https://query1.finance.yahoo.com/v8/finance/chart'),
      listingBaseUrl: z.string().url().default('https://isin.twse.com.tw/isin/C_public.jsp'),
      timeoutMs: positiveInt.default(30_000),
    })
    .default({}),

  tradingWindow: z
    .object({
      timezone: z.string().min(1).default('Asia/Taipei'),
      open: timeOfDay.default('09:00'),
      close: timeOfDay.default('13:30'),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Readonly<Record<string, string>> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  REPORT_PATH: 'scan.reportPath',
  MIN_DIVIDEND_YIELD: 'scan.minDividendYieldPct',
  YIELD_CEILING: 'scan.yieldCeilingPct',
  MIN_MONTHLY_BARS: 'scan.minMonthlyBars',
  MACD_FAST: 'scan.macd.fast',
  MACD_SLOW: 'scan.macd.slow',
  MACD_SIGNAL: 'scan.macd.signal',
  ALERT_LEDGER_PATH: 'monitor.ledgerPath',
  ALERT_COOLDOWN_MINUTES: 'monitor.cooldownMinutes',
  LEDGER_LOCK_STALE_MINUTES: 'monitor.lockStaleMinutes',
  NOTIFY_URL: 'notify.baseUrl',
  NOTIFY_TIMEOUT_MS: 'notify.timeoutMs',
  YAHOO_BASE_URL: 'provider.yahooBaseUrl',
  LISTING_BASE_URL: 'provider.listingBaseUrl',
  PROVIDER_TIMEOUT_MS: 'provider.timeoutMs',
  TRADING_TZ: 'tradingWindow.timezone',
  TRADING_OPEN: 'tradingWindow.open',
  TRADING_CLOSE: 'tradingWindow.close',
};
