/**
 * AEAD engine — one freshly keyed encryption per call, timed in isolation.
 *
 * Key and nonce are drawn anew for every call; payload and metadata are
 * serialized independently into plaintext and associated data. The monotonic
 * clock brackets only the cipher's seal call: selector validation, backend
 * loading, key/nonce draws and serialization all happen before the first read.
 *
 * @module Encryption
 */

import { nodeSecureRandom } from "../adapters/node-secure-random.js";
import { performanceClock } from "../adapters/performance-clock.js";
import { CryptoFailureError, errorMessage } from "../errors.js";
import type { MonotonicClock } from "../interfaces/clock.js";
import type { Logger } from "../interfaces/logger.js";
import type { SecureRandom } from "../interfaces/secure-random.js";
import type { Metadata, Payload, SchemeId, TrialRecord } from "../types/benchmark.js";
import {
  type AeadCipher,
  type ChaChaBackend,
  type CipherSuite,
  loadCipherSuite,
} from "../utils/crypto/aead-ciphers.js";
import { noopLogger } from "../utils/noop-logger.js";
import { parseScheme } from "./aead-schemes.js";
import { serializeRecord } from "./serialization.js";

export interface AeadEngineOptions {
  random?: SecureRandom;
  clock?: MonotonicClock;
  logger?: Logger;
  /** Ignored when `suite` is given. */
  chachaBackend?: ChaChaBackend;
  /** Pre-built cipher table, mainly for tests. */
  suite?: CipherSuite;
}

interface TimedSeal {
  ciphertext: Uint8Array;
  elapsedMs: number;
}

export class AeadEngine {
  private readonly random: SecureRandom;
  private readonly clock: MonotonicClock;
  private readonly logger: Logger;
  private suite: Promise<CipherSuite> | undefined;
  private readonly chachaBackend: ChaChaBackend;

  constructor(options: AeadEngineOptions = {}) {
    this.random = options.random ?? nodeSecureRandom;
    this.clock = options.clock ?? performanceClock;
    this.logger = options.logger ?? noopLogger;
    this.chachaBackend = options.chachaBackend ?? "node";
    this.suite = options.suite ? Promise.resolve(options.suite) : undefined;
  }

  /**
   * Encrypt one (payload, metadata) pair under a fresh key and nonce.
   *
   * @throws UnsupportedSchemeError before any key or nonce material is drawn
   * @throws CryptoFailureError when the primitive rejects the call; never retried
   */
  async encrypt(scheme: SchemeId, payload: Payload, metadata: Metadata): Promise<TrialRecord> {
    const id = parseScheme(scheme);
    const cipher = (await this.loadSuite())[id];

    const key = this.random.bytes(cipher.keyBytes);
    const nonce = this.random.bytes(cipher.nonceBytes);
    const plaintext = serializeRecord(payload);
    const associatedData = serializeRecord(metadata);

    const { ciphertext, elapsedMs } = this.sealTimed(cipher, key, nonce, plaintext, associatedData);

    if (ciphertext.length !== plaintext.length + cipher.tagBytes) {
      throw new CryptoFailureError(
        `${id} produced ${ciphertext.length} bytes for a ${plaintext.length}-byte plaintext`,
      );
    }

    return Object.freeze({
      scheme: id,
      key,
      nonce,
      ciphertext,
      elapsedMs,
      payloadBytes: plaintext.length,
      metadataBytes: associatedData.length,
    });
  }

  private sealTimed(
    cipher: AeadCipher,
    key: Uint8Array,
    nonce: Uint8Array,
    plaintext: Uint8Array,
    associatedData: Uint8Array,
  ): TimedSeal {
    let ciphertext: Uint8Array;
    const start = this.clock.now();
    try {
      ciphertext = cipher.seal(key, nonce, plaintext, associatedData);
    } catch (err) {
      this.logger.error("AEAD primitive failed", {
        component: "engine",
        scheme: cipher.scheme,
        backend: cipher.backend,
        error: err,
      });
      throw new CryptoFailureError(`${cipher.scheme} encryption failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    const end = this.clock.now();
    return { ciphertext, elapsedMs: Math.max(0, end - start) };
  }

  private loadSuite(): Promise<CipherSuite> {
    this.suite ??= loadCipherSuite({ chachaBackend: this.chachaBackend });
    return this.suite;
  }
}
