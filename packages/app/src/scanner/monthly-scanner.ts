/**
 * Monthly scan: walks the universe, runs the MACD detector on monthly bars
 * and, for securities that fire, the dividend eligibility filter.
 *
 * Each security ends in exactly one outcome; no per-security failure stops
 * the walk.
 */

import {
  countOutcomes,
  errorMessage,
  systemClock,
  toProviderSymbol,
  EMPTY_SCAN_COUNTS,
  type Clock,
  type DividendEvent,
  type MarketDataProvider,
  type PriceSeries,
  type ScanOutcome,
  type ScanOutcomeStatus,
  type ScanResult,
  type SecurityRef,
} from '@yieldwatch/contracts';
import {
  analyzeMonthlyMacd,
  buildDividendProfile,
  isEligible,
  type MacdParams,
} from '@yieldwatch/indicators';
import { startTimer, type Logger } from '@yieldwatch/logger';
import { rankResults } from '../report/report-format.js';
import type { UniverseSource } from '../universe/types.js';

export interface ScanSettings {
  minDividendYieldPct: number;
  yieldCeilingPct: number;
  macd: MacdParams;
}

export interface MonthlyScannerOptions {
  universe: UniverseSource;
  provider: MarketDataProvider;
  logger: Logger;
  settings: ScanSettings;
  clock?: Clock;
}

export type ScanRunStatus = 'empty_universe' | 'completed';

export interface ScanRunSummary {
  status: ScanRunStatus;
  outcomes: ScanOutcome[];

  /** Qualifying rows, ranked */
  results: ScanResult[];
  counts: Record<ScanOutcomeStatus, number>;
  durationMs: number;
}

export class MonthlyScanner {
  private readonly universe: UniverseSource;
  private readonly provider: MarketDataProvider;
  private readonly logger: Logger;
  private readonly settings: ScanSettings;
  private readonly clock: Clock;

  constructor(options: MonthlyScannerOptions) {
    this.universe = options.universe;
    this.provider = options.provider;
    this.logger = options.logger.child({ component: 'scanner' });
    this.settings = options.settings;
    this.clock = options.clock ?? systemClock;
  }

  async run(): Promise<ScanRunSummary> {
    const timer = startTimer();
    const outcomes: ScanOutcome[] = [];

    for await (const security of this.universe.securities()) {
      this.logger.debug('Scanning security', { code: security.code, index: outcomes.length + 1 });
      outcomes.push(await this.scanSecurity(security));
    }

    const counts = countOutcomes(outcomes, EMPTY_SCAN_COUNTS);
    if (outcomes.length === 0) {
      this.logger.warn('Universe is empty, nothing to scan');
      return { status: 'empty_universe', outcomes, results: [], counts, durationMs: timer.stop() };
    }

    const results = rankResults(
      outcomes.flatMap((outcome) => (outcome.status === 'qualified' ? [outcome.result] : []))
    );
    const durationMs = timer.stop();
    this.logger.info('Scan finished', { total: outcomes.length, ...counts, duration_ms: durationMs });

    return { status: 'completed', outcomes, results, counts, durationMs };
  }

  async scanSecurity(security: SecurityRef): Promise<ScanOutcome> {
    const symbol = toProviderSymbol(security);

    let bars: PriceSeries;
    try {
      bars = await this.provider.getMonthlyBars(symbol);
    } catch (error) {
      return this.fetchFailed(security, 'bars', error);
    }

    const analysis = analyzeMonthlyMacd(bars, this.settings.macd);
    if (analysis.kind === 'insufficient_history') {
      this.logger.debug('Not enough monthly bars', { code: security.code, bars: analysis.bars });
      return { status: 'insufficient_history', security, bars: analysis.bars };
    }

    const { event } = analysis;
    const latest = bars[bars.length - 1];
    if (!event.fired || latest === undefined) {
      return { status: 'no_signal', security };
    }

    let dividends: DividendEvent[];
    let closes: number[];
    try {
      dividends = await this.provider.getDividends(symbol);
      closes = await this.provider.getRecentCloses(symbol);
    } catch (error) {
      return this.fetchFailed(security, 'dividends', error);
    }

    const profile = buildDividendProfile(dividends, closes, this.clock.now(), {
      yieldCeilingPct: this.settings.yieldCeilingPct,
    });
    if (profile.yieldCapped) {
      this.logger.warn('Dividend yield above ceiling, treated as 0', {
        code: security.code,
        rawYieldPct: profile.rawYieldPct,
        ceilingPct: this.settings.yieldCeilingPct,
      });
    }

    if (!isEligible(profile, this.settings.minDividendYieldPct)) {
      return {
        status: 'not_eligible',
        security,
        yieldPct: profile.trailingYieldPct,
        yieldCapped: profile.yieldCapped,
      };
    }

    const result: ScanResult = {
      ...security,
      currentPrice: latest.close,
      monthlyLow: latest.low,
      trailingAnnualDividend: profile.trailingAnnualDividend,
      trailingYieldPct: profile.trailingYieldPct,
      regime: event.regime,
      currentHistogram: event.currentHistogram,
      previousHistogram: event.previousHistogram,
    };
    this.logger.info('Security qualified', {
      code: security.code,
      name: security.name,
      yieldPct: profile.trailingYieldPct,
      regime: event.regime,
    });
    return { status: 'qualified', security, result };
  }

  private fetchFailed(security: SecurityRef, stage: 'bars' | 'dividends', error: unknown): ScanOutcome {
    const reason = errorMessage(error);
    this.logger.debug('Fetch failed, security skipped', { code: security.code, stage, reason });
    return { status: 'fetch_failed', security, stage, reason };
  }
}
