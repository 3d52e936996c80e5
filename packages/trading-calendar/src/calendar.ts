/**
 * Pure trading-window functions.
 *
 * Deterministic and free of I/O: the caller passes the instant to check,
 * so the same inputs always give the same answer.
 */

import moment from 'moment-timezone';
import type { TimeWindow, TradingWindow } from './types.js';

/**
 * Taiwan cash market: Monday to Friday, 09:00 to 13:30 Taipei time.
 */
export const DEFAULT_TRADING_WINDOW: Readonly<TradingWindow> = {
  timezone: 'Asia/Taipei',
  days: [1, 2, 3, 4, 5],
  open: '09:00',
  close: '13:30',
};

const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * Parses an `HH:mm` string into hours and minutes.
 *
 * @throws {Error} If the string is not a valid 24-hour time
 */
export function parseTimeOfDay(value: string): { hour: number; minute: number } {
  const match = TIME_OF_DAY.exec(value);
  if (!match) {
    throw new Error(`Invalid time of day: ${value} (expected HH:mm)`);
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

/**
 * Checks a window definition, throwing on the first problem found.
 */
export function validateTradingWindow(window: TradingWindow): void {
  if (moment.tz.zone(window.timezone) === null) {
    throw new Error(`Unknown timezone: ${window.timezone}`);
  }
  const open = parseTimeOfDay(window.open);
  const close = parseTimeOfDay(window.close);
  if (open.hour * 60 + open.minute > close.hour * 60 + close.minute) {
    throw new Error(`Trading window opens after it closes: ${window.open} > ${window.close}`);
  }
}

/**
 * The session on the exchange-local date that contains `at`, or null when
 * that date is not a trading day.
 *
 * @example
 * ```typescript
 * const session = tradingWindowFor(new Date('2026-10-19T03:00:00Z'));
 * // { start: 2026-10-19T01:00:00.000Z, end: 2026-10-19T05:30:00.000Z }
 * ```
 */
export function tradingWindowFor(at: Date, window: TradingWindow = DEFAULT_TRADING_WINDOW): TimeWindow | null {
  const local = moment.tz(at, window.timezone);
  const weekday = local.isoWeekday();
  if (!window.days.some((day) => day === weekday)) {
    return null;
  }

  const open = parseTimeOfDay(window.open);
  const close = parseTimeOfDay(window.close);
  const start = local.clone().set({ hour: open.hour, minute: open.minute, second: 0, millisecond: 0 });
  const end = local.clone().set({ hour: close.hour, minute: close.minute, second: 0, millisecond: 0 });

  return { start: start.toDate(), end: end.toDate() };
}

/**
 * True when `at` falls on a trading day between open and close, both
 * inclusive. A close of 13:30 admits 13:30:00.000 and nothing later.
 *
 * @example
 * ```typescript
 * isWithinTradingWindow(new Date('2026-10-19T05:30:00Z')); // true (13:30 Monday)
 * isWithinTradingWindow(new Date('2026-10-24T02:00:00Z')); // false (Saturday)
 * ```
 */
export function isWithinTradingWindow(at: Date, window: TradingWindow = DEFAULT_TRADING_WINDOW): boolean {
  const session = tradingWindowFor(at, window);
  if (session === null) {
    return false;
  }
  const time = at.getTime();
  return time >= session.start.getTime() && time <= session.end.getTime();
}
