import { createDecipheriv, randomBytes } from "node:crypto";
import { describe, expect, it } from "vitest";
import {
  AEAD_TAG_BYTES,
  createNodeAesGcmCipher,
  createNodeChaChaCipher,
  createSodiumChaChaCipher,
  loadCipherSuite,
} from "./aead-ciphers.js";
import { getSodium } from "./sodium-loader.js";

const hex = (value: string) => new Uint8Array(Buffer.from(value, "hex"));
const toHex = (bytes: Uint8Array) => Buffer.from(bytes).toString("hex");

function open(
  algorithm: "aes-256-gcm" | "chacha20-poly1305",
  key: Uint8Array,
  nonce: Uint8Array,
  sealed: Uint8Array,
  associatedData: Uint8Array,
): Buffer {
  const body = sealed.subarray(0, sealed.length - AEAD_TAG_BYTES);
  const tag = sealed.subarray(sealed.length - AEAD_TAG_BYTES);
  const decipher =
    algorithm === "aes-256-gcm"
      ? createDecipheriv("aes-256-gcm", key, nonce, { authTagLength: AEAD_TAG_BYTES })
      : createDecipheriv("chacha20-poly1305", key, nonce, { authTagLength: AEAD_TAG_BYTES });
  decipher.setAAD(associatedData, { plaintextLength: body.length });
  decipher.setAuthTag(tag);
  return Buffer.concat([decipher.update(body), decipher.final()]);
}

describe("AES-256-GCM (node)", () => {
  const cipher = createNodeAesGcmCipher();
  const zeroKey = new Uint8Array(32);
  const zeroNonce = new Uint8Array(12);

  it("matches the GCM reference vector for an empty plaintext", () => {
    const sealed = cipher.seal(zeroKey, zeroNonce, new Uint8Array(0), new Uint8Array(0));
    expect(toHex(sealed)).toBe("530f8afbc74536b9a963b4f1c4cb738b");
  });

  it("matches the GCM reference vector for one zero block", () => {
    const sealed = cipher.seal(zeroKey, zeroNonce, new Uint8Array(16), new Uint8Array(0));
    expect(toHex(sealed)).toBe(
      "cea7403d4d606b6e074ec5d3baf39d18" + "d0d1c8a799996bf0265b98b5d48ab919",
    );
  });

  it("binds the associated data into the tag", () => {
    const key = new Uint8Array(randomBytes(32));
    const nonce = new Uint8Array(randomBytes(12));
    const plaintext = new TextEncoder().encode('{"kind":"sensor"}');
    const associatedData = new TextEncoder().encode('{"deviceId":"sensor-th-001"}');
    const sealed = cipher.seal(key, nonce, plaintext, associatedData);

    expect(open("aes-256-gcm", key, nonce, sealed, associatedData).toString()).toBe(
      '{"kind":"sensor"}',
    );
    const forged = new TextEncoder().encode('{"deviceId":"sensor-th-002"}');
    expect(() => open("aes-256-gcm", key, nonce, sealed, forged)).toThrow();
  });
});

describe("ChaCha20-Poly1305", () => {
  const key = hex("808182838485868788898a8b8c8d8e8f909192939495969798999a9b9c9d9e9f");
  const nonce = hex("070000004041424344454647");
  const plaintext = new TextEncoder().encode("sensor reading 21.5 celsius");
  const associatedData = hex("50515253c0c1c2c3c4c5c6c7");

  it("node backend output opens with the node decipher", () => {
    const sealed = createNodeChaChaCipher().seal(key, nonce, plaintext, associatedData);
    expect(sealed).toHaveLength(plaintext.length + AEAD_TAG_BYTES);
    expect(open("chacha20-poly1305", key, nonce, sealed, associatedData)).toEqual(
      Buffer.from(plaintext),
    );
  });

  it("libsodium backend produces the same bytes as the node backend", async () => {
    const sodium = await getSodium();
    const fromSodium = createSodiumChaChaCipher(sodium).seal(key, nonce, plaintext, associatedData);
    const fromNode = createNodeChaChaCipher().seal(key, nonce, plaintext, associatedData);
    expect(toHex(fromSodium)).toBe(toHex(fromNode));
  });

  it("libsodium backend appends a 16-byte tag to larger messages", async () => {
    const sodium = await getSodium();
    const message = new Uint8Array(randomBytes(64 * 1024));
    const sealed = createSodiumChaChaCipher(sodium).seal(key, nonce, message, associatedData);
    expect(sealed).toHaveLength(message.length + 16);
  });
});

describe("loadCipherSuite", () => {
  it("uses node for both schemes by default", async () => {
    const suite = await loadCipherSuite();
    expect(suite["aes-256-gcm"].backend).toBe("node");
    expect(suite["chacha20-poly1305"].backend).toBe("node");
  });

  it("switches ChaCha20-Poly1305 to libsodium on request", async () => {
    const suite = await loadCipherSuite({ chachaBackend: "libsodium" });
    expect(suite["aes-256-gcm"].backend).toBe("node");
    expect(suite["chacha20-poly1305"].backend).toBe("libsodium");
    expect(suite["chacha20-poly1305"].scheme).toBe("chacha20-poly1305");
  });

  it("declares 256-bit keys, 96-bit nonces and 128-bit tags", async () => {
    const suite = await loadCipherSuite();
    for (const cipher of Object.values(suite)) {
      expect(cipher.keyBytes).toBe(32);
      expect(cipher.nonceBytes).toBe(12);
      expect(cipher.tagBytes).toBe(16);
    }
  });
});
