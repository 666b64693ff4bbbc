/**
 * Single-shot AEAD seal operations behind one interface.
 *
 * AES-256-GCM always runs on node:crypto (OpenSSL). ChaCha20-Poly1305 (IETF,
 * 96-bit nonce) runs on node:crypto or on libsodium. Both backends return
 * `ciphertext ‖ tag` and are byte-for-byte interchangeable.
 */

import { createCipheriv } from "node:crypto";
import type { SchemeId } from "../../types/benchmark.js";
import { getSodium, type Sodium } from "./sodium-loader.js";

export const AEAD_KEY_BYTES = 32;
export const AEAD_NONCE_BYTES = 12;
export const AEAD_TAG_BYTES = 16;

export const CHACHA_BACKENDS = ["node", "libsodium"] as const;

export type ChaChaBackend = (typeof CHACHA_BACKENDS)[number];

export interface AeadCipher {
  readonly scheme: SchemeId;
  readonly backend: ChaChaBackend;
  readonly keyBytes: number;
  readonly nonceBytes: number;
  readonly tagBytes: number;
  /** Encrypt and authenticate; returns ciphertext with the tag appended. */
  seal(
    key: Uint8Array,
    nonce: Uint8Array,
    plaintext: Uint8Array,
    associatedData: Uint8Array,
  ): Uint8Array;
}

export type CipherSuite = Readonly<Record<SchemeId, AeadCipher>>;

const SIZES = {
  keyBytes: AEAD_KEY_BYTES,
  nonceBytes: AEAD_NONCE_BYTES,
  tagBytes: AEAD_TAG_BYTES,
} as const;

export function createNodeAesGcmCipher(): AeadCipher {
  return {
    scheme: "aes-256-gcm",
    backend: "node",
    ...SIZES,
    seal(key, nonce, plaintext, associatedData) {
      const cipher = createCipheriv("aes-256-gcm", key, nonce, { authTagLength: AEAD_TAG_BYTES });
      cipher.setAAD(associatedData, { plaintextLength: plaintext.length });
      return Buffer.concat([cipher.update(plaintext), cipher.final(), cipher.getAuthTag()]);
    },
  };
}

export function createNodeChaChaCipher(): AeadCipher {
  return {
    scheme: "chacha20-poly1305",
    backend: "node",
    ...SIZES,
    seal(key, nonce, plaintext, associatedData) {
      const cipher = createCipheriv("chacha20-poly1305", key, nonce, {
        authTagLength: AEAD_TAG_BYTES,
      });
      cipher.setAAD(associatedData, { plaintextLength: plaintext.length });
      return Buffer.concat([cipher.update(plaintext), cipher.final(), cipher.getAuthTag()]);
    },
  };
}

export function createSodiumChaChaCipher(sodium: Sodium): AeadCipher {
  return {
    scheme: "chacha20-poly1305",
    backend: "libsodium",
    ...SIZES,
    seal(key, nonce, plaintext, associatedData) {
      return sodium.crypto_aead_chacha20poly1305_ietf_encrypt(
        plaintext,
        associatedData,
        null,
        nonce,
        key,
      );
    },
  };
}

export interface CipherSuiteOptions {
  chachaBackend?: ChaChaBackend;
}

/** Build the scheme → cipher table; loads libsodium only when it is selected. */
export async function loadCipherSuite(options: CipherSuiteOptions = {}): Promise<CipherSuite> {
  const chacha =
    options.chachaBackend === "libsodium"
      ? createSodiumChaChaCipher(await getSodium())
      : createNodeChaChaCipher();
  return {
    "aes-256-gcm": createNodeAesGcmCipher(),
    "chacha20-poly1305": chacha,
  };
}
