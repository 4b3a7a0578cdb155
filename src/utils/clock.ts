/**
 * Current-time source consumed by the store. Tests substitute a fixed or
 * stepping clock so timestamps can be asserted exactly.
 *
 * @module utils/clock
 */

export interface Clock {
  /** Milliseconds since epoch */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
