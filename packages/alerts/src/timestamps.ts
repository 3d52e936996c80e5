/**
 * Ledger timestamp codec: ISO-8601 strings carrying a fixed UTC+8 offset.
 */

import moment from 'moment-timezone';

/** Taiwan time, fixed offset (no DST). */
export const LEDGER_UTC_OFFSET_MINUTES = 8 * 60;

const LEDGER_FORMAT = 'YYYY-MM-DDTHH:mm:ss.SSSZ';

/**
 * Milliseconds are kept so a timestamp read back equals the instant recorded.
 *
 * @example
 * ```typescript
 * formatLedgerTimestamp(new Date('2026-10-19T01:00:00.000Z'));
 * // '2026-10-19T09:00:00.000+08:00'
 * ```
 */
export function formatLedgerTimestamp(at: Date): string {
  return moment(at).utcOffset(LEDGER_UTC_OFFSET_MINUTES).format(LEDGER_FORMAT);
}

/**
 * Strict ISO-8601 parse. Anything else (wrong type, free text, impossible
 * dates) gives null.
 */
export function parseLedgerTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string') {
    return null;
  }
  const parsed = moment.parseZone(value, moment.ISO_8601, true);
  return parsed.isValid() ? parsed.toDate() : null;
}
