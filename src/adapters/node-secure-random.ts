import { randomBytes, randomInt } from "node:crypto";
import type { SecureRandom } from "../interfaces/secure-random.js";

/** Production randomness backed by the OS CSPRNG through node:crypto. */
export class NodeSecureRandom implements SecureRandom {
  bytes(length: number): Uint8Array {
    return new Uint8Array(randomBytes(length));
  }

  int(maxExclusive: number): number {
    return randomInt(maxExclusive);
  }
}

export const nodeSecureRandom: SecureRandom = new NodeSecureRandom();
