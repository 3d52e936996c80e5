/**
 * Dividend profile and eligibility tests
 */

import { describe, it, expect } from 'vitest';
import { buildDividendProfile, dedupeDividends, isEligible, type DividendProfile } from '../src/dividends.js';
import { roundTo } from '../src/math.js';

const AS_OF = new Date('2026-10-05T00:00:00.000Z');

function profile(overrides: Partial<DividendProfile>): DividendProfile {
  return {
    hasDividend: true,
    trailingAnnualDividend: 1.5,
    trailingYieldPct: 3,
    referenceClose: 50,
    yieldCapped: false,
    rawYieldPct: 3,
    ...overrides,
  };
}

describe('buildDividendProfile', () => {
  it('should sum dividends inside the trailing 365 days and divide by the last close', () => {
    const result = buildDividendProfile(
      [
        { timestamp: '2026-07-10T00:00:00.000Z', amount: 1.5 },
        { timestamp: '2026-01-10T00:00:00.000Z', amount: 1.5 },
        { timestamp: '2025-08-01T00:00:00.000Z', amount: 2.0 },
      ],
      [49, 50],
      AS_OF
    );

    expect(result).toEqual({
      hasDividend: true,
      trailingAnnualDividend: 3,
      trailingYieldPct: 6,
      referenceClose: 50,
      yieldCapped: false,
      rawYieldPct: 6,
    });
  });

  it('should include an event exactly 365 days before evaluation', () => {
    const result = buildDividendProfile([{ timestamp: '2025-10-05T00:00:00.000Z', amount: 2.4 }], [80], AS_OF);

    expect(result.trailingAnnualDividend).toBe(2.4);
    expect(result.trailingYieldPct).toBe(3);
  });

  it('should ignore events dated after evaluation time', () => {
    const result = buildDividendProfile([{ timestamp: '2026-11-01T00:00:00.000Z', amount: 2 }], [50], AS_OF);

    expect(result.hasDividend).toBe(false);
    expect(result.trailingYieldPct).toBe(0);
  });

  it('should report no dividend when nothing was paid', () => {
    const result = buildDividendProfile([], [50], AS_OF);

    expect(result.hasDividend).toBe(false);
    expect(result.trailingAnnualDividend).toBe(0);
    expect(result.trailingYieldPct).toBe(0);
  });

  it('should give yield 0 when no recent close is available', () => {
    const result = buildDividendProfile([{ timestamp: '2026-07-10T00:00:00.000Z', amount: 3 }], [], AS_OF);

    expect(result.referenceClose).toBeNull();
    expect(result.trailingYieldPct).toBe(0);
    expect(isEligible(result)).toBe(false);
  });

  it('should force a yield above the 20% ceiling to 0 and flag it', () => {
    const result = buildDividendProfile([{ timestamp: '2026-07-10T00:00:00.000Z', amount: 12.5 }], [50], AS_OF);

    expect(result.rawYieldPct).toBe(25);
    expect(result.trailingYieldPct).toBe(0);
    expect(result.yieldCapped).toBe(true);
    expect(result.hasDividend).toBe(true);
    expect(isEligible(result)).toBe(false);
  });

  it('should keep a yield exactly at the ceiling', () => {
    const result = buildDividendProfile([{ timestamp: '2026-07-10T00:00:00.000Z', amount: 10 }], [50], AS_OF);

    expect(result.trailingYieldPct).toBe(20);
    expect(result.yieldCapped).toBe(false);
  });

  it('should count duplicated dividend dates once, keeping the last amount', () => {
    const result = buildDividendProfile(
      [
        { timestamp: '2026-07-10T00:00:00.000Z', amount: 1.0 },
        { timestamp: '2026-07-10T00:00:00.000Z', amount: 1.2 },
      ],
      [40],
      AS_OF
    );

    expect(result.trailingAnnualDividend).toBe(1.2);
    expect(result.trailingYieldPct).toBe(3);
  });
});

describe('dedupeDividends', () => {
  it('should keep the last event per timestamp in last-seen order', () => {
    expect(
      dedupeDividends([
        { timestamp: 'a', amount: 1 },
        { timestamp: 'b', amount: 2 },
        { timestamp: 'a', amount: 3 },
      ])
    ).toEqual([
      { timestamp: 'b', amount: 2 },
      { timestamp: 'a', amount: 3 },
    ]);
  });
});

describe('isEligible', () => {
  it('should qualify a yield exactly at the threshold', () => {
    expect(isEligible(profile({ trailingYieldPct: 3.0 }), 3.0)).toBe(true);
  });

  it('should reject a yield just below the threshold', () => {
    expect(isEligible(profile({ trailingYieldPct: 2.999 }), 3.0)).toBe(false);
  });

  it('should reject a security without dividends whatever its yield', () => {
    expect(isEligible(profile({ hasDividend: false, trailingYieldPct: 8 }))).toBe(false);
  });

  it('should default the threshold to 3%', () => {
    expect(isEligible(profile({ trailingYieldPct: 3 }))).toBe(true);
    expect(isEligible(profile({ trailingYieldPct: 2.99 }))).toBe(false);
  });
});

describe('roundTo', () => {
  it('should round half away from zero', () => {
    expect(roundTo(2.345, 1)).toBe(2.3);
    expect(roundTo(0.125, 2)).toBe(0.13);
    expect(roundTo(-0.125, 2)).toBe(-0.13);
    expect(roundTo(52.3, 2)).toBe(52.3);
  });
});
