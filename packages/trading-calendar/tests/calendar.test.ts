/**
 * Tests for trading-window checks
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_TRADING_WINDOW,
  isWithinTradingWindow,
  parseTimeOfDay,
  tradingWindowFor,
  validateTradingWindow,
} from '../src/calendar.js';
import type { TradingWindow } from '../src/types.js';

describe('isWithinTradingWindow', () => {
  // Taipei is UTC+8: 09:00 local = 01:00Z, 13:30 local = 05:30Z.

  it('should accept the opening minute', () => {
    expect(isWithinTradingWindow(new Date('2026-10-19T01:00:00.000Z'))).toBe(true);
  });

  it('should accept exactly 13:30', () => {
    expect(isWithinTradingWindow(new Date('2026-10-19T05:30:00.000Z'))).toBe(true);
  });

  it('should reject anything after 13:30', () => {
    expect(isWithinTradingWindow(new Date('2026-10-19T05:30:01.000Z'))).toBe(false);
  });

  it('should reject one second before the open', () => {
    expect(isWithinTradingWindow(new Date('2026-10-19T00:59:59.000Z'))).toBe(false);
  });

  it('should reject weekends', () => {
    expect(isWithinTradingWindow(new Date('2026-10-24T02:00:00.000Z'))).toBe(false);
    expect(isWithinTradingWindow(new Date('2026-10-25T02:00:00.000Z'))).toBe(false);
  });

  it('should use the exchange-local date, not the UTC date', () => {
    // Sunday 20:00Z is Monday 04:00 in Taipei: a weekday, but before the open.
    expect(isWithinTradingWindow(new Date('2026-10-18T20:00:00.000Z'))).toBe(false);
    // Friday 23:00Z is Saturday 07:00 in Taipei.
    expect(tradingWindowFor(new Date('2026-10-23T23:00:00.000Z'))).toBeNull();
  });

  it('should honour a custom window', () => {
    const window: TradingWindow = { timezone: 'UTC', days: [6, 7], open: '10:00', close: '11:00' };

    expect(isWithinTradingWindow(new Date('2026-10-24T10:30:00.000Z'), window)).toBe(true);
    expect(isWithinTradingWindow(new Date('2026-10-19T10:30:00.000Z'), window)).toBe(false);
  });
});

describe('tradingWindowFor', () => {
  it('should return the session bounds of a trading day', () => {
    const session = tradingWindowFor(new Date('2026-10-19T03:00:00.000Z'));

    expect(session?.start.toISOString()).toBe('2026-10-19T01:00:00.000Z');
    expect(session?.end.toISOString()).toBe('2026-10-19T05:30:00.000Z');
  });
});

describe('parseTimeOfDay', () => {
  it('should parse HH:mm', () => {
    expect(parseTimeOfDay('09:00')).toEqual({ hour: 9, minute: 0 });
    expect(parseTimeOfDay('23:59')).toEqual({ hour: 23, minute: 59 });
  });

  it('should reject malformed times', () => {
    expect(() => parseTimeOfDay('9:00')).toThrow('Invalid time of day: 9:00 (expected HH:mm)');
    expect(() => parseTimeOfDay('24:00')).toThrow();
    expect(() => parseTimeOfDay('13:60')).toThrow();
  });
});

describe('validateTradingWindow', () => {
  it('should accept the default window', () => {
    expect(() => validateTradingWindow(DEFAULT_TRADING_WINDOW)).not.toThrow();
  });

  it('should reject an unknown timezone', () => {
    expect(() => validateTradingWindow({ ...DEFAULT_TRADING_WINDOW, timezone: 'Mars/Olympus' })).toThrow(
      'Unknown timezone: Mars/Olympus'
    );
  });

  it('should reject a window that closes before it opens', () => {
    expect(() => validateTradingWindow({ ...DEFAULT_TRADING_WINDOW, open: '14:00' })).toThrow(
      'Trading window opens after it closes: 14:00 > 13:30'
    );
  });
});
