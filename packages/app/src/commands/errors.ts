/**
 * Error formatting for command failures
 */

import { isWatchError } from '@yieldwatch/contracts';

/**
 * Create a friendly error message from any error
 *
 * @example
 * ```typescript
 * formatCommandError(new LedgerLockError('Alert ledger is locked by another run', { lockPath }));
 * // Error: Alert ledger is locked by another run
 * // Code: LEDGER_LOCKED
 * // Context:
 * //   lockPath: "alert_log.json.lock"
 * ```
 */
export function formatCommandError(error: unknown, verbose: boolean = false): string {
  if (!(error instanceof Error)) {
    return `Error: ${String(error)}`;
  }

  const lines: string[] = [`Error: ${error.message}`];

  if (isWatchError(error)) {
    lines.push(`Code: ${error.code}`);
    if (error.data && Object.keys(error.data).length > 0) {
      lines.push('Context:');
      for (const [key, value] of Object.entries(error.data)) {
        if (value !== undefined) {
          lines.push(`  ${key}: ${JSON.stringify(value)}`);
        }
      }
    }
  }

  if (verbose && error.stack) {
    lines.push('Stack trace:');
    lines.push(error.stack);
  }

  return lines.join('\n');
}
