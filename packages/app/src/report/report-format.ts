/**
 * Writer side of the hand-off report.
 *
 * Layout: a header block between `=` rules, a column header, a `-` rule,
 * one line per security and a closing `=` rule. Columns are separated by at
 * least two spaces, which is what the reader splits on.
 */

import moment from 'moment-timezone';
import type { ScanResult } from '@yieldwatch/contracts';
import { roundTo } from '@yieldwatch/indicators';

export const REPORT_TITLE = 'Monthly MACD first-positive-bar scan';
export const NO_MATCHES_LINE = 'No securities matched this month';
export const COLUMN_HEADER = 'Code  Name  Market  Price  Monthly low  Dividend  Yield  MACD  Histogram (cur / prev)';

const HEAVY_RULE = '='.repeat(60);
const LIGHT_RULE = '-'.repeat(80);
const COLUMN_GAP = '  ';

export interface ReportMeta {
  runAt: Date;

  /** Threshold quoted in the criteria line */
  minYieldPct: number;

  /** Zone the run time is printed in */
  timezone: string;
}

/**
 * Descending by trailing yield. The sort is stable, so equal yields keep
 * universe order.
 */
export function rankResults(results: readonly ScanResult[]): ScanResult[] {
  return [...results].sort((a, b) => b.trailingYieldPct - a.trailingYieldPct);
}

function fixed(value: number, decimals: number): string {
  return roundTo(value, decimals).toFixed(decimals);
}

export function formatRow(result: ScanResult): string {
  const histograms = `${fixed(result.currentHistogram, 4).padStart(8)} / ${fixed(result.previousHistogram, 4).padStart(8)}`;
  return [
    result.code.padEnd(6),
    // Runs of whitespace inside a name would read as a column break.
    result.name.replace(/\s+/g, ' ').padEnd(10),
    result.market.padEnd(6),
    fixed(result.currentPrice, 2).padStart(8),
    fixed(result.monthlyLow, 2).padStart(10),
    fixed(result.trailingAnnualDividend, 2).padStart(8),
    `${fixed(result.trailingYieldPct, 1)}%`.padStart(6),
    result.regime.padEnd(7),
    histograms,
  ].join(COLUMN_GAP);
}

/**
 * Renders the full report, newline-terminated.
 *
 * @example
 * ```typescript
 * const text = formatReport(results, {
 *   runAt: new Date(),
 *   minYieldPct: 3,
 *   timezone: 'Asia/Taipei',
 * });
 * ```
 */
export function formatReport(results: readonly ScanResult[], meta: ReportMeta): string {
  const lines = [
    HEAVY_RULE,
    REPORT_TITLE,
    `Run time: ${moment(meta.runAt).tz(meta.timezone).format('YYYY-MM-DD HH:mm')}`,
    `Criteria: first positive histogram bar + dividend paid + yield >= ${meta.minYieldPct}%`,
    `Matches: ${results.length}`,
    HEAVY_RULE,
  ];

  if (results.length === 0) {
    lines.push(NO_MATCHES_LINE);
  } else {
    lines.push(COLUMN_HEADER, LIGHT_RULE, ...rankResults(results).map(formatRow));
  }

  lines.push(HEAVY_RULE);
  return `${lines.join('\n')}\n`;
}
