/**
 * Sodium loader — initializes and caches the libsodium WASM build.
 *
 * libsodium-wrappers-sumo needs no C toolchain at install time. Loading is
 * asynchronous, so callers resolve it before entering any timed region.
 */

import type libsodiumSumo from "libsodium-wrappers-sumo";

export type Sodium = typeof libsodiumSumo;

let cached: Sodium | undefined;

/**
 * Returns an initialized libsodium instance.
 * The result is cached after the first successful call.
 */
export async function getSodium(): Promise<Sodium> {
  if (cached) return cached;

  const sodium = (await import("libsodium-wrappers-sumo")).default;
  await sodium.ready;
  cached = sodium;
  return sodium;
}
