/**
 * `scan`: run the monthly scan and write the hand-off report.
 */

import { systemClock, type Clock, type ScanOutcomeStatus } from '@yieldwatch/contracts';
import type { Logger } from '@yieldwatch/logger';
import { formatReport } from '../report/report-format.js';
import type { ReportSink } from '../report/report-file.js';
import type { MonthlyScanner, ScanRunStatus } from '../scanner/monthly-scanner.js';
import { BaseCommand, type CommandExecution } from './base.command.js';
import type { CommandOptions } from './types.js';

export interface ScanCommandOutput {
  status: ScanRunStatus;
  counts: Record<ScanOutcomeStatus, number>;
  matches: number;

  /** Where the report went; null when nothing was written */
  reportPath: string | null;

  /** Rendered report; null for an empty universe */
  report: string | null;
}

export interface ScanCommandConfig {
  scanner: Pick<MonthlyScanner, 'run'>;
  sink: ReportSink;
  reportPath: string;
  minYieldPct: number;

  /** Zone the report's run time is printed in */
  timezone: string;
  logger: Logger;
  clock?: Clock;
}

export class ScanCommand extends BaseCommand<CommandOptions, ScanCommandOutput> {
  readonly name = 'scan';
  readonly description = 'Scan the universe for first positive monthly MACD bars with a dividend yield';

  private readonly scanner: Pick<MonthlyScanner, 'run'>;
  private readonly sink: ReportSink;
  private readonly reportPath: string;
  private readonly minYieldPct: number;
  private readonly timezone: string;
  private readonly clock: Clock;

  constructor(config: ScanCommandConfig) {
    super(config.logger);
    this.scanner = config.scanner;
    this.sink = config.sink;
    this.reportPath = config.reportPath;
    this.minYieldPct = config.minYieldPct;
    this.timezone = config.timezone;
    this.clock = config.clock ?? systemClock;
  }

  protected async executeCommand(options: CommandOptions): Promise<CommandExecution<ScanCommandOutput>> {
    const summary = await this.scanner.run();
    const base = { status: summary.status, counts: summary.counts, matches: summary.results.length };

    if (summary.status === 'empty_universe') {
      return { output: { ...base, reportPath: null, report: null }, metadata: { status: summary.status } };
    }

    const report = formatReport(summary.results, {
      runAt: this.clock.now(),
      minYieldPct: this.minYieldPct,
      timezone: this.timezone,
    });

    if (options.dryRun) {
      this.logger.info('Dry run: report not written', { path: this.reportPath, matches: base.matches });
      return { output: { ...base, reportPath: null, report }, metadata: { status: summary.status, dryRun: true } };
    }

    await this.sink.write(report);
    return {
      output: { ...base, reportPath: this.reportPath, report },
      metadata: { status: summary.status, durationMs: summary.durationMs },
    };
  }
}
