/**
 * `monitor`: one pass over the report's securities during trading hours.
 */

import { systemClock, type Clock, type MonitorOutcomeStatus } from '@yieldwatch/contracts';
import type { Logger } from '@yieldwatch/logger';
import { isWithinTradingWindow, type TradingWindow } from '@yieldwatch/trading-calendar';
import type { MonitorRunStatus, PriceMonitor } from '../monitor/price-monitor.js';
import { BaseCommand, type CommandExecution } from './base.command.js';
import type { CommandOptions } from './types.js';

export interface MonitorCommandOptions extends CommandOptions {
  /** Run even outside the trading window */
  ignoreTradingWindow?: boolean;
}

export interface MonitorCommandOutput {
  status: MonitorRunStatus;
  counts: Record<MonitorOutcomeStatus, number>;
  ledgerSaved: boolean;
}

export interface MonitorCommandConfig {
  monitor: Pick<PriceMonitor, 'run'>;
  tradingWindow: TradingWindow;
  logger: Logger;
  clock?: Clock;
}

export class MonitorCommand extends BaseCommand<MonitorCommandOptions, MonitorCommandOutput> {
  readonly name = 'monitor';
  readonly description = 'Notify securities trading below their monthly low';

  private readonly monitor: Pick<PriceMonitor, 'run'>;
  private readonly tradingWindow: TradingWindow;
  private readonly clock: Clock;

  constructor(config: MonitorCommandConfig) {
    super(config.logger);
    this.monitor = config.monitor;
    this.tradingWindow = config.tradingWindow;
    this.clock = config.clock ?? systemClock;
  }

  protected async executeCommand(
    options: MonitorCommandOptions
  ): Promise<CommandExecution<MonitorCommandOutput>> {
    const withinTradingWindow =
      (options.ignoreTradingWindow ?? false) || isWithinTradingWindow(this.clock.now(), this.tradingWindow);

    const summary = await this.monitor.run({ withinTradingWindow, dryRun: options.dryRun ?? false });

    return {
      output: { status: summary.status, counts: summary.counts, ledgerSaved: summary.ledgerSaved },
      metadata: { status: summary.status, withinTradingWindow },
    };
  }
}
