/**
 * @fileoverview Per-item outcome types for the scan and monitor runs.
 *
 * Each security processed by a run produces exactly one outcome. Failures
 * are values here, never exceptions, so a batch always completes and every
 * skip can be counted.
 *
 * @module @yieldwatch/contracts/outcomes
 */

import type { MonitoredSecurity, ScanResult, SecurityRef } from './securities.js';

export type ScanOutcome =
  | { status: 'qualified'; security: SecurityRef; result: ScanResult }
  | { status: 'no_signal'; security: SecurityRef }
  | { status: 'insufficient_history'; security: SecurityRef; bars: number }
  | { status: 'not_eligible'; security: SecurityRef; yieldPct: number; yieldCapped: boolean }
  | { status: 'fetch_failed'; security: SecurityRef; stage: 'bars' | 'dividends'; reason: string };

export type ScanOutcomeStatus = ScanOutcome['status'];

export type MonitorOutcome =
  | { status: 'notified'; security: MonitoredSecurity; price: number; notifiedAt: string }
  /** Breach the gate let through in a dry run; nothing sent, ledger unchanged */
  | { status: 'would_notify'; security: MonitoredSecurity; price: number }
  | { status: 'notify_failed'; security: MonitoredSecurity; price: number; reason: string }
  | { status: 'cooling_down'; security: MonitoredSecurity; price: number; elapsedMs: number }
  | { status: 'ok'; security: MonitoredSecurity; price: number }
  | { status: 'no_quote'; security: MonitoredSecurity; reason: string };

export type MonitorOutcomeStatus = MonitorOutcome['status'];

/**
 * Tallies outcomes by status, starting from a zeroed record so every status
 * key is present.
 *
 * @example
 * ```typescript
 * countOutcomes(outcomes, EMPTY_MONITOR_COUNTS); // { notified: 1, ok: 3, ... }
 * ```
 */
export function countOutcomes<S extends string>(
  outcomes: ReadonlyArray<{ status: S }>,
  zero: Readonly<Record<S, number>>
): Record<S, number> {
  const counts: Record<S, number> = { ...zero };
  for (const outcome of outcomes) {
    counts[outcome.status] += 1;
  }
  return counts;
}

export const EMPTY_SCAN_COUNTS: Readonly<Record<ScanOutcomeStatus, number>> = {
  qualified: 0,
  no_signal: 0,
  insufficient_history: 0,
  not_eligible: 0,
  fetch_failed: 0,
};

export const EMPTY_MONITOR_COUNTS: Readonly<Record<MonitorOutcomeStatus, number>> = {
  notified: 0,
  would_notify: 0,
  notify_failed: 0,
  cooling_down: 0,
  ok: 0,
  no_quote: 0,
};
