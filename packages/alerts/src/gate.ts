/**
 * Alert gate: decides whether a breaching security may be notified now.
 *
 * States per code:
 * - never_alerted: no usable timestamp in the ledger -> notify
 * - cooling_down: last alert less than `cooldownMs` ago -> suppress
 * - eligible: last alert at least `cooldownMs` ago -> notify
 *
 * The gate only reads the ledger. Recording a new timestamp after a
 * successful notification is the caller's job.
 */

import { systemClock, type Clock } from '@yieldwatch/contracts';
import type { AlertLedger } from './ledger.js';

export type GateState = 'never_alerted' | 'cooling_down' | 'eligible';

export interface GateDecision {
  code: string;
  state: GateState;
  shouldNotify: boolean;

  /** Last successful notification, null when never alerted */
  lastAlertAt: Date | null;

  /** now - lastAlertAt; null when never alerted */
  elapsedMs: number | null;

  /** Time left before the code becomes eligible; 0 unless cooling down */
  remainingMs: number;
}

export interface AlertGateOptions {
  cooldownMs: number;
  clock?: Clock;
}

export const DEFAULT_COOLDOWN_MS = 60 * 60 * 1000;

export class AlertGate {
  private readonly cooldownMs: number;
  private readonly clock: Clock;

  constructor(
    private readonly ledger: AlertLedger,
    options: Partial<AlertGateOptions> = {}
  ) {
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.clock = options.clock ?? systemClock;

    if (!Number.isFinite(this.cooldownMs) || this.cooldownMs < 0) {
      throw new Error(`Invalid cooldown: ${this.cooldownMs}`);
    }
  }

  evaluate(code: string): GateDecision {
    const lastAlertAt = this.ledger.lastAlertAt(code);

    if (lastAlertAt === null) {
      return { code, state: 'never_alerted', shouldNotify: true, lastAlertAt, elapsedMs: null, remainingMs: 0 };
    }

    const elapsedMs = this.clock.now().getTime() - lastAlertAt.getTime();
    // Inclusive: exactly one cooldown after the last alert is eligible again.
    if (elapsedMs >= this.cooldownMs) {
      return { code, state: 'eligible', shouldNotify: true, lastAlertAt, elapsedMs, remainingMs: 0 };
    }

    return {
      code,
      state: 'cooling_down',
      shouldNotify: false,
      lastAlertAt,
      elapsedMs,
      remainingMs: this.cooldownMs - elapsedMs,
    };
  }

  shouldNotify(code: string): boolean {
    return this.evaluate(code).shouldNotify;
  }
}
