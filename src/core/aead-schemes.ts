import { UnsupportedSchemeError } from "../errors.js";
import { SCHEMES, type SchemeId } from "../types/benchmark.js";

export const SCHEME_LABELS: Record<SchemeId, string> = {
  "aes-256-gcm": "AES-256-GCM",
  "chacha20-poly1305": "ChaCha20-Poly1305",
};

export function isSchemeId(value: unknown): value is SchemeId {
  return SCHEMES.some((scheme) => scheme === value);
}

/** Narrow an untyped selector to a SchemeId. */
export function parseScheme(value: unknown): SchemeId {
  if (!isSchemeId(value)) throw new UnsupportedSchemeError(value);
  return value;
}
