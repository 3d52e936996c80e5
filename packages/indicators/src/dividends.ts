/**
 * Trailing dividend yield and the eligibility rule built on it.
 */

import type { DividendEvent } from '@yieldwatch/contracts';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DividendProfileOptions {
  /** Length of the trailing window ending at `asOf` */
  windowDays: number;

  /**
   * Yields above this percentage are treated as bad data and reset to 0,
   * which disqualifies the security.
   */
  yieldCeilingPct: number;
}

export const DEFAULT_DIVIDEND_OPTIONS: Readonly<DividendProfileOptions> = {
  windowDays: 365,
  yieldCeilingPct: 20,
};

export interface DividendProfile {
  /** trailingAnnualDividend > 0 */
  hasDividend: boolean;

  /** Sum of dividends inside the trailing window */
  trailingAnnualDividend: number;

  /** trailingAnnualDividend / referenceClose * 100, or 0 (see yieldCapped) */
  trailingYieldPct: number;

  /** The close the yield was computed from; null when none was available */
  referenceClose: number | null;

  /** Set when the raw yield exceeded the ceiling and was forced to 0 */
  yieldCapped: boolean;

  /** Raw yield before the ceiling was applied */
  rawYieldPct: number;
}

/**
 * Collapses events sharing a timestamp, keeping the last one seen.
 */
export function dedupeDividends(events: readonly DividendEvent[]): DividendEvent[] {
  const byTimestamp = new Map<string, DividendEvent>();
  for (const event of events) {
    byTimestamp.delete(event.timestamp);
    byTimestamp.set(event.timestamp, event);
  }
  return [...byTimestamp.values()];
}

/**
 * Builds the dividend profile of one security.
 *
 * @param dividends - Dividend events in any order
 * @param recentCloses - Closes of the last few sessions, oldest first; the
 *   last one is the reference price
 * @param asOf - Evaluation time; the window is `[asOf - windowDays, asOf]`
 *
 * @example
 * ```typescript
 * const profile = buildDividendProfile(
 *   [{ timestamp: '2026-07-10T00:00:00.000Z', amount: 3 }],
 *   [49.8, 50],
 *   new Date('2026-10-05T00:00:00Z')
 * );
 * // profile.trailingYieldPct === 6
 * ```
 */
export function buildDividendProfile(
  dividends: readonly DividendEvent[],
  recentCloses: readonly number[],
  asOf: Date,
  options: Partial<DividendProfileOptions> = {}
): DividendProfile {
  const { windowDays, yieldCeilingPct } = { ...DEFAULT_DIVIDEND_OPTIONS, ...options };
  const end = asOf.getTime();
  const start = end - windowDays * DAY_MS;

  const trailingAnnualDividend = dedupeDividends(dividends)
    .filter((event) => {
      const at = Date.parse(event.timestamp);
      return at >= start && at <= end;
    })
    .reduce((sum, event) => sum + event.amount, 0);

  const last = recentCloses[recentCloses.length - 1];
  const referenceClose = last !== undefined && Number.isFinite(last) ? last : null;

  const rawYieldPct =
    referenceClose !== null && referenceClose > 0 ? (trailingAnnualDividend / referenceClose) * 100 : 0;
  const yieldCapped = rawYieldPct > yieldCeilingPct;

  return {
    hasDividend: trailingAnnualDividend > 0,
    trailingAnnualDividend,
    trailingYieldPct: yieldCapped ? 0 : rawYieldPct,
    referenceClose,
    yieldCapped,
    rawYieldPct,
  };
}

/**
 * A security qualifies when it paid a dividend in the window and its yield
 * is at or above the threshold (inclusive).
 */
export function isEligible(profile: DividendProfile, minYieldPct: number = 3.0): boolean {
  return profile.hasDividend && profile.trailingYieldPct >= minYieldPct;
}
