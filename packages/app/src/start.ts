/**
 * Wires configuration, logger and services into the two jobs.
 */

import { ConfigError, errorMessage } from '@yieldwatch/contracts';
import { FileLedgerStore } from '@yieldwatch/alerts';
import {
  attachGlobalHandlers,
  createLogger,
  withRunContext,
  type Logger,
} from '@yieldwatch/logger';
import { YahooProvider } from '@yieldwatch/provider-yahoo';
import {
  DEFAULT_TRADING_WINDOW,
  validateTradingWindow,
  type TradingWindow,
} from '@yieldwatch/trading-calendar';
import { getConfigSummary, loadConfig, requireNotifyUrl, type Config } from './config/index.js';
import { MonitorCommand, type MonitorCommandOutput } from './commands/monitor.command.js';
import { ScanCommand, type ScanCommandOutput } from './commands/scan.command.js';
import type { CommandResult } from './commands/types.js';
import { PriceMonitor } from './monitor/price-monitor.js';
import { HttpNotifier } from './notify/http-notifier.js';
import { ReportFile } from './report/report-file.js';
import { MonthlyScanner } from './scanner/monthly-scanner.js';
import { TwseListingSource } from './universe/twse-listing-source.js';

const MINUTE_MS = 60_000;

export interface ScanFlags {
  report?: string;
  minYield?: number;
  dryRun?: boolean;
  verbose?: boolean;
}

export interface MonitorFlags {
  report?: string;
  ledger?: string;
  ignoreTradingWindow?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

export function createRootLogger(config: Config): Logger {
  return createLogger({
    level: config.app.verbose ? 'debug' : config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });
}

/**
 * @throws {ConfigError} When the configured zone or times are unusable
 */
export function tradingWindowFrom(config: Config): TradingWindow {
  const window: TradingWindow = {
    timezone: config.tradingWindow.timezone,
    days: DEFAULT_TRADING_WINDOW.days,
    open: config.tradingWindow.open,
    close: config.tradingWindow.close,
  };
  try {
    validateTradingWindow(window);
  } catch (error) {
    throw new ConfigError(`Invalid trading window: ${errorMessage(error)}`, {
      issues: [`tradingWindow: ${errorMessage(error)}`],
    });
  }
  return window;
}

export async function runScan(
  flags: ScanFlags,
  env: NodeJS.ProcessEnv = process.env
): Promise<CommandResult<ScanCommandOutput>> {
  const config = loadConfig(env, {
    reportPath: flags.report,
    minDividendYieldPct: flags.minYield,
    dryRun: flags.dryRun,
    verbose: flags.verbose,
  });
  const logger = createRootLogger(config);
  attachGlobalHandlers(logger);

  return withRunContext(
    async () => {
      logger.info('Configuration loaded', getConfigSummary(config));

      const provider = new YahooProvider({
        baseUrl: config.provider.yahooBaseUrl,
        timeoutMs: config.provider.timeoutMs,
        logger,
      });
      const universe = new TwseListingSource({
        baseUrl: config.provider.listingBaseUrl,
        timeoutMs: config.provider.timeoutMs,
        logger,
      });
      const scanner = new MonthlyScanner({
        universe,
        provider,
        logger,
        settings: {
          minDividendYieldPct: config.scan.minDividendYieldPct,
          yieldCeilingPct: config.scan.yieldCeilingPct,
          macd: { ...config.scan.macd, minBars: config.scan.minMonthlyBars },
        },
      });
      const command = new ScanCommand({
        scanner,
        sink: new ReportFile(config.scan.reportPath, logger),
        reportPath: config.scan.reportPath,
        minYieldPct: config.scan.minDividendYieldPct,
        timezone: config.tradingWindow.timezone,
        logger,
      });

      return command.execute({ dryRun: config.app.dryRun, verbose: config.app.verbose });
    },
    { job: 'scan' }
  );
}

export async function runMonitor(
  flags: MonitorFlags,
  env: NodeJS.ProcessEnv = process.env
): Promise<CommandResult<MonitorCommandOutput>> {
  const config = loadConfig(env, {
    reportPath: flags.report,
    ledgerPath: flags.ledger,
    dryRun: flags.dryRun,
    verbose: flags.verbose,
  });
  const notifyUrl = requireNotifyUrl(config);
  const tradingWindow = tradingWindowFrom(config);
  const logger = createRootLogger(config);
  attachGlobalHandlers(logger);

  return withRunContext(
    async () => {
      logger.info('Configuration loaded', getConfigSummary(config));

      const monitor = new PriceMonitor({
        provider: new YahooProvider({
          baseUrl: config.provider.yahooBaseUrl,
          timeoutMs: config.provider.timeoutMs,
          logger,
        }),
        reports: new ReportFile(config.scan.reportPath, logger),
        ledgerStore: new FileLedgerStore({
          path: config.monitor.ledgerPath,
          logger,
          lockStaleMs: config.monitor.lockStaleMinutes * MINUTE_MS,
        }),
        notifier: new HttpNotifier({ baseUrl: notifyUrl, timeoutMs: config.notify.timeoutMs, logger }),
        logger,
        cooldownMs: config.monitor.cooldownMinutes * MINUTE_MS,
      });
      const command = new MonitorCommand({ monitor, tradingWindow, logger });

      return command.execute({
        dryRun: config.app.dryRun,
        verbose: config.app.verbose,
        ignoreTradingWindow: flags.ignoreTradingWindow ?? false,
      });
    },
    { job: 'monitor' }
  );
}
