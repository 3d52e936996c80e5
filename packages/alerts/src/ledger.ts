/**
 * In-memory alert ledger: security code -> time of the last successful
 * notification.
 *
 * Values are kept exactly as read. An unparseable value stays in the ledger
 * (and is written back unchanged) but reads as never alerted. Entries are
 * only ever added or overwritten.
 */

import { formatLedgerTimestamp, parseLedgerTimestamp } from './timestamps.js';

export class AlertLedger {
  private readonly entries: Map<string, unknown>;
  private dirty = false;

  constructor(entries: Record<string, unknown> = {}) {
    this.entries = new Map(Object.entries(entries));
  }

  /**
   * Last successful notification time, or null when the code is absent or
   * its stored value does not parse.
   */
  lastAlertAt(code: string): Date | null {
    return parseLedgerTimestamp(this.entries.get(code));
  }

  has(code: string): boolean {
    return this.entries.has(code);
  }

  /**
   * Records a successful notification and marks the ledger dirty.
   * Returns the stored string.
   */
  record(code: string, at: Date): string {
    const stamp = formatLedgerTimestamp(at);
    this.entries.set(code, stamp);
    this.dirty = true;
    return stamp;
  }

  /** True once any entry changed since construction. */
  get isDirty(): boolean {
    return this.dirty;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Plain object with keys sorted, ready to serialize.
   */
  toJSON(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const code of [...this.entries.keys()].sort()) {
      out[code] = this.entries.get(code);
    }
    return out;
  }
}
