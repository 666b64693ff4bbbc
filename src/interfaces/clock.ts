/**
 * Monotonic clock used to bracket the timed region of a trial.
 * Never backed by time-of-day, which can jump when the system clock is adjusted.
 */
export interface MonotonicClock {
  /** Milliseconds with sub-millisecond resolution from an arbitrary origin. */
  now(): number;
}
