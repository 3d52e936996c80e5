/**
 * Intraday monitor: re-reads the report, checks live prices against each
 * security's monthly low and notifies breaches through the alert gate.
 *
 * The ledger is read once, changed in memory and saved once, only when a
 * notification succeeded. The whole read-modify-write runs under the ledger
 * store's lock.
 */

import {
  countOutcomes,
  errorMessage,
  systemClock,
  toProviderSymbol,
  EMPTY_MONITOR_COUNTS,
  type Clock,
  type MarketDataProvider,
  type MonitoredSecurity,
  type MonitorOutcome,
  type MonitorOutcomeStatus,
} from '@yieldwatch/contracts';
import { AlertGate, type AlertLedger, type LedgerStore } from '@yieldwatch/alerts';
import { startTimer, type Logger } from '@yieldwatch/logger';
import type { Notifier } from '../notify/http-notifier.js';
import type { ReportSource } from '../report/report-file.js';

export interface PriceMonitorOptions {
  provider: Pick<MarketDataProvider, 'getLivePrice'>;
  reports: ReportSource;
  ledgerStore: LedgerStore;
  notifier: Notifier;
  logger: Logger;
  cooldownMs: number;
  clock?: Clock;
}

export interface MonitorRunInput {
  withinTradingWindow: boolean;

  /** Evaluate and log only: nothing is sent and the ledger is not written */
  dryRun?: boolean;
}

export type MonitorRunStatus = 'outside_trading_window' | 'no_report' | 'empty_report' | 'completed';

export interface MonitorRunSummary {
  status: MonitorRunStatus;
  outcomes: MonitorOutcome[];
  counts: Record<MonitorOutcomeStatus, number>;
  ledgerSaved: boolean;
}

export class PriceMonitor {
  private readonly provider: Pick<MarketDataProvider, 'getLivePrice'>;
  private readonly reports: ReportSource;
  private readonly ledgerStore: LedgerStore;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly cooldownMs: number;
  private readonly clock: Clock;

  constructor(options: PriceMonitorOptions) {
    this.provider = options.provider;
    this.reports = options.reports;
    this.ledgerStore = options.ledgerStore;
    this.notifier = options.notifier;
    this.logger = options.logger.child({ component: 'monitor' });
    this.cooldownMs = options.cooldownMs;
    this.clock = options.clock ?? systemClock;
  }

  async run(input: MonitorRunInput): Promise<MonitorRunSummary> {
    if (!input.withinTradingWindow) {
      this.logger.info('Outside trading window, nothing to do');
      return emptySummary('outside_trading_window');
    }

    const securities = await this.reports.load();
    if (securities === null) {
      this.logger.warn('No report found, nothing to monitor');
      return emptySummary('no_report');
    }
    if (securities.length === 0) {
      this.logger.info('Report lists no securities, nothing to monitor');
      return emptySummary('empty_report');
    }

    const dryRun = input.dryRun ?? false;
    // A dry run writes nothing, the lock file included.
    return dryRun
      ? this.checkAll(securities, true)
      : this.ledgerStore.withLock(() => this.checkAll(securities, false));
  }

  private async checkAll(securities: readonly MonitoredSecurity[], dryRun: boolean): Promise<MonitorRunSummary> {
    const timer = startTimer();
    const ledger = await this.ledgerStore.load();
    const gate = new AlertGate(ledger, { cooldownMs: this.cooldownMs, clock: this.clock });

    const outcomes: MonitorOutcome[] = [];
    for (const security of securities) {
      outcomes.push(await this.checkSecurity(security, ledger, gate, dryRun));
    }

    let ledgerSaved = false;
    if (ledger.isDirty && !dryRun) {
      await this.ledgerStore.save(ledger);
      ledgerSaved = true;
    }

    const counts = countOutcomes(outcomes, EMPTY_MONITOR_COUNTS);
    this.logger.info('Monitor run finished', {
      total: outcomes.length,
      ...counts,
      ledgerSaved,
      dryRun,
      duration_ms: timer.stop(),
    });
    return { status: 'completed', outcomes, counts, ledgerSaved };
  }

  private async checkSecurity(
    security: MonitoredSecurity,
    ledger: AlertLedger,
    gate: AlertGate,
    dryRun: boolean
  ): Promise<MonitorOutcome> {
    const { code } = security;

    let price: number | null;
    try {
      price = await this.provider.getLivePrice(toProviderSymbol(security));
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.warn('Live price unavailable', { code, reason });
      return { status: 'no_quote', security, reason };
    }
    if (price === null) {
      this.logger.warn('Live price unavailable', { code, reason: 'no price in response' });
      return { status: 'no_quote', security, reason: 'no price in response' };
    }

    if (price >= security.monthlyLow) {
      this.logger.debug('Above monthly low', { code, price, monthlyLow: security.monthlyLow });
      return { status: 'ok', security, price };
    }

    const decision = gate.evaluate(code);
    if (!decision.shouldNotify) {
      const elapsedMs = decision.elapsedMs ?? 0;
      this.logger.info('Breach suppressed, cooling down', {
        code,
        price,
        monthlyLow: security.monthlyLow,
        elapsed_min: Math.floor(elapsedMs / 60_000),
        remaining_min: Math.ceil(decision.remainingMs / 60_000),
      });
      return { status: 'cooling_down', security, price, elapsedMs };
    }

    if (dryRun) {
      this.logger.info('Dry run: notification skipped', { code, price, monthlyLow: security.monthlyLow });
      return { status: 'would_notify', security, price };
    }

    try {
      await this.notifier.notify(code);
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error('Notification failed, ledger unchanged', { code, price, reason });
      return { status: 'notify_failed', security, price, reason };
    }

    const notifiedAt = ledger.record(code, this.clock.now());
    this.logger.info('Breach notified', {
      code,
      name: security.name,
      price,
      monthlyLow: security.monthlyLow,
      previousState: decision.state,
    });
    return { status: 'notified', security, price, notifiedAt };
  }
}

function emptySummary(status: MonitorRunStatus): MonitorRunSummary {
  return { status, outcomes: [], counts: { ...EMPTY_MONITOR_COUNTS }, ledgerSaved: false };
}
