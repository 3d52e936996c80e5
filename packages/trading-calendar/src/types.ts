/**
 * Type definitions for the trading-calendar package
 */

/**
 * ISO weekday: 1 = Monday ... 7 = Sunday
 */
export type IsoWeekday = 1 | 2 | 3 | 4 | 5 | 6 | 7;

/**
 * Daily session of one exchange, expressed in exchange-local time.
 */
export interface TradingWindow {
  /** IANA timezone of the exchange (e.g. 'Asia/Taipei') */
  timezone: string;

  /** Weekdays the exchange trades on */
  days: readonly IsoWeekday[];

  /** Local opening time, HH:mm */
  open: string;

  /** Local closing time, HH:mm; inclusive */
  close: string;
}

/**
 * A concrete session on one date
 */
export interface TimeWindow {
  /** Window start (UTC instant) */
  start: Date;

  /** Window end (UTC instant), inclusive */
  end: Date;
}
