/**
 * Trading-window checks for exchange sessions
 *
 * @packageDocumentation
 */

export {
  DEFAULT_TRADING_WINDOW,
  isWithinTradingWindow,
  tradingWindowFor,
  parseTimeOfDay,
  validateTradingWindow,
} from './calendar.js';

export type { IsoWeekday, TimeWindow, TradingWindow } from './types.js';
