/**
 * @fileoverview Main entry point for @yieldwatch/contracts.
 *
 * @module @yieldwatch/contracts
 */

// Market data types
export type { PriceBar, PriceSeries, DividendEvent, MarketDataProvider } from './market.js';

// Time source
export type { Clock } from './clock.js';
export { systemClock, fixedClock } from './clock.js';

// Securities and report rows
export type {
  Market,
  MacdRegime,
  SecurityRef,
  ScanResult,
  MonitoredSecurity,
} from './securities.js';
export { toProviderSymbol } from './securities.js';

// Per-item outcomes
export type {
  ScanOutcome,
  ScanOutcomeStatus,
  MonitorOutcome,
  MonitorOutcomeStatus,
} from './outcomes.js';
export { countOutcomes, EMPTY_SCAN_COUNTS, EMPTY_MONITOR_COUNTS } from './outcomes.js';

// Error classes and guards
export {
  WatchError,
  ProviderRequestError,
  ProviderResponseError,
  NotificationError,
  LedgerLockError,
  ConfigError,
  isWatchError,
  isProviderRequestError,
  isProviderResponseError,
  isNotificationError,
  isLedgerLockError,
  errorMessage,
} from './errors.js';
