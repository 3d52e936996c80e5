/**
 * @fileoverview High-resolution timers for logging durations.
 */

export interface PerfTimer {
  /** Start time in milliseconds (performance.now()) */
  readonly startTime: number;

  /** Milliseconds since start, rounded; frozen once stopped */
  elapsed(): number;

  /** Stops the timer (idempotent) and returns the final duration */
  stop(): number;

  isRunning(): boolean;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * const outcomes = await scanner.run();
 * logger.info('Scan finished', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,

    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}
