import { type Cipher, createCipheriv, createHash } from "node:crypto";
import type { SecureRandom } from "../interfaces/secure-random.js";

const UINT32_RANGE = 2 ** 32;

/**
 * Deterministic SecureRandom for tests: an AES-256-CTR keystream keyed by
 * SHA-256 of the seed. Same seed, same sequence of draws.
 */
export class SeededRandom implements SecureRandom {
  private readonly keystream: Cipher;

  constructor(seed: string) {
    const key = createHash("sha256").update(seed).digest();
    this.keystream = createCipheriv("aes-256-ctr", key, Buffer.alloc(16));
  }

  bytes(length: number): Uint8Array {
    return new Uint8Array(this.keystream.update(Buffer.alloc(length)));
  }

  int(maxExclusive: number): number {
    if (!Number.isInteger(maxExclusive) || maxExclusive < 1 || maxExclusive > UINT32_RANGE) {
      throw new RangeError(`maxExclusive out of range: ${maxExclusive}`);
    }
    // Rejection sampling keeps the distribution uniform
    const limit = UINT32_RANGE - (UINT32_RANGE % maxExclusive);
    for (;;) {
      const value = Buffer.from(this.bytes(4)).readUInt32BE(0);
      if (value < limit) return value % maxExclusive;
    }
  }
}
