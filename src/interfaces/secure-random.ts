/**
 * Source of cryptographically secure randomness.
 *
 * Passed explicitly to the payload generator and the AEAD engine so tests can
 * substitute a seeded or recording provider. Implementations must be safe to
 * share across every trial in the process.
 * @module
 */

export interface SecureRandom {
  /** Fill a fresh buffer of `length` random bytes. */
  bytes(length: number): Uint8Array;
  /** Uniform integer in `[0, maxExclusive)`. */
  int(maxExclusive: number): number;
}
