/**
 * @fileoverview Public API of @yieldwatch/alerts.
 *
 * Alert gate, alert ledger and its file-backed store.
 */

export { AlertGate, DEFAULT_COOLDOWN_MS } from './gate.js';
export type { GateDecision, GateState, AlertGateOptions } from './gate.js';

export { AlertLedger } from './ledger.js';
export { FileLedgerStore, serializeLedger } from './ledger-store.js';
export type { LedgerStore, FileLedgerStoreOptions } from './ledger-store.js';

export { formatLedgerTimestamp, parseLedgerTimestamp, LEDGER_UTC_OFFSET_MINUTES } from './timestamps.js';
