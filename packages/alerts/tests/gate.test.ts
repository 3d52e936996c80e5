/**
 * Alert gate tests
 *
 * Covers the three states, the inclusive cooldown boundary and the
 * fail-open handling of unparseable ledger values.
 */

import { describe, it, expect } from 'vitest';
import { fixedClock } from '@yieldwatch/contracts';
import { AlertGate, DEFAULT_COOLDOWN_MS } from '../src/gate.js';
import { AlertLedger } from '../src/ledger.js';

const HOUR_MS = 60 * 60 * 1000;

describe('AlertGate', () => {
  it('should notify a code absent from the ledger', () => {
    const gate = new AlertGate(new AlertLedger(), { clock: fixedClock('2026-10-19T02:00:00.000Z') });

    expect(gate.shouldNotify('2371')).toBe(true);
    expect(gate.evaluate('2371')).toEqual({
      code: '2371',
      state: 'never_alerted',
      shouldNotify: true,
      lastAlertAt: null,
      elapsedMs: null,
      remainingMs: 0,
    });
  });

  it('should notify exactly one cooldown after the last alert', () => {
    const ledger = new AlertLedger({ '2371': '2026-10-19T09:00:00+08:00' });
    const gate = new AlertGate(ledger, { cooldownMs: HOUR_MS, clock: fixedClock('2026-10-19T02:00:00.000Z') });

    const decision = gate.evaluate('2371');

    expect(decision.state).toBe('eligible');
    expect(decision.shouldNotify).toBe(true);
    expect(decision.elapsedMs).toBe(HOUR_MS);
  });

  it('should suppress one second before the cooldown ends', () => {
    const ledger = new AlertLedger({ '2371': '2026-10-19T09:00:00+08:00' });
    const gate = new AlertGate(ledger, { cooldownMs: HOUR_MS, clock: fixedClock('2026-10-19T01:59:59.000Z') });

    const decision = gate.evaluate('2371');

    expect(decision.state).toBe('cooling_down');
    expect(decision.shouldNotify).toBe(false);
    expect(decision.elapsedMs).toBe(HOUR_MS - 1000);
    expect(decision.remainingMs).toBe(1000);
    expect(decision.lastAlertAt?.toISOString()).toBe('2026-10-19T01:00:00.000Z');
  });

  it('should treat an unparseable timestamp as never alerted', () => {
    const ledger = new AlertLedger({ '2371': 'yesterday-ish' });
    const gate = new AlertGate(ledger, { clock: fixedClock('2026-10-19T01:05:00.000Z') });

    expect(gate.evaluate('2371').state).toBe('never_alerted');
    expect(gate.shouldNotify('2371')).toBe(true);
  });

  it('should treat a non-string value as never alerted', () => {
    const ledger = new AlertLedger({ '2371': 1760835600 });
    const gate = new AlertGate(ledger, { clock: fixedClock('2026-10-19T01:05:00.000Z') });

    expect(gate.shouldNotify('2371')).toBe(true);
  });

  it('should not mutate the ledger', () => {
    const ledger = new AlertLedger({ '2371': '2026-10-19T09:00:00+08:00' });
    const gate = new AlertGate(ledger, { clock: fixedClock('2026-10-19T03:00:00.000Z') });

    gate.evaluate('2371');
    gate.evaluate('1101');

    expect(ledger.isDirty).toBe(false);
    expect(ledger.toJSON()).toEqual({ '2371': '2026-10-19T09:00:00+08:00' });
  });

  it('should default the cooldown to one hour', () => {
    expect(DEFAULT_COOLDOWN_MS).toBe(HOUR_MS);

    const ledger = new AlertLedger({ '2371': '2026-10-19T09:00:00+08:00' });
    const gate = new AlertGate(ledger, { clock: fixedClock('2026-10-19T01:59:00.000Z') });

    expect(gate.shouldNotify('2371')).toBe(false);
  });

  it('should reject a negative cooldown', () => {
    expect(() => new AlertGate(new AlertLedger(), { cooldownMs: -1 })).toThrow('Invalid cooldown: -1');
  });
});
