/**
 * Reader side of the hand-off report.
 *
 * Tolerant by construction: anything that does not look like a data row is
 * skipped, never an error.
 */

import type { Market, MonitoredSecurity } from '@yieldwatch/contracts';

/** Lines containing any of these are header noise. */
export const HEADER_KEYWORDS: readonly string[] = [
  'Code',
  'Run time',
  'Criteria',
  'Matches',
  'Monthly MACD',
  'No securities',
];

const FIELD_SEPARATOR = /\s{2,}/;
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

function toMarket(label: string): Market {
  return label === 'listed' ? 'listed' : 'otc';
}

/**
 * Parses one line, or returns null when it is not a data row.
 *
 * Fields: code, name, market label, price, monthly low, then anything. The
 * row counts only when the fifth field is a decimal. Every literal `O` is
 * removed from the code.
 */
export function parseReportLine(line: string): MonitoredSecurity | null {
  const trimmed = line.trim();
  if (trimmed === '' || line.startsWith('=') || line.startsWith('-')) {
    return null;
  }
  if (HEADER_KEYWORDS.some((keyword) => line.includes(keyword))) {
    return null;
  }

  const [rawCode, name, marketLabel, , lowField] = trimmed.split(FIELD_SEPARATOR);
  if (rawCode === undefined || name === undefined || marketLabel === undefined || lowField === undefined) {
    return null;
  }
  if (!DECIMAL.test(lowField)) {
    return null;
  }
  const monthlyLow = Number(lowField);
  const code = rawCode.replace(/O/g, '');
  if (!Number.isFinite(monthlyLow) || code === '') {
    return null;
  }

  return { code, name, market: toMarket(marketLabel), monthlyLow };
}

/**
 * Data rows of a report, in file order.
 */
export function parseReport(content: string): MonitoredSecurity[] {
  const securities: MonitoredSecurity[] = [];
  for (const line of content.split(/\r?\n/)) {
    const security = parseReportLine(line);
    if (security !== null) {
      securities.push(security);
    }
  }
  return securities;
}
