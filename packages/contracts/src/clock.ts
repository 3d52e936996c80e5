/**
 * @fileoverview Injectable time source.
 *
 * @module @yieldwatch/contracts/clock
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * A clock pinned to the given instant, moved explicitly.
 *
 * @example
 * ```typescript
 * const clock = fixedClock('2026-10-19T01:00:00.000Z');
 * clock.advance(10 * 60 * 1000);
 * ```
 */
export function fixedClock(start: Date | string): Clock & { advance(ms: number): void; set(at: Date | string): void } {
  let current = new Date(start);
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current = new Date(current.getTime() + ms);
    },
    set(at: Date | string) {
      current = new Date(at);
    },
  };
}
