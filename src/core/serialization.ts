/**
 * Byte encoding of generated inputs: canonical JSON in UTF-8.
 *
 * The engine encrypts exactly these bytes, so payload and metadata sizes in
 * every report refer to this form.
 */

import type { Metadata, Payload } from "../types/benchmark.js";
import { metadataSchema, payloadSchema } from "../types/payload-schema.js";
import { canonicalize } from "../utils/canonical-json.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export function serializeRecord(value: Payload | Metadata): Uint8Array {
  return encoder.encode(canonicalize(value));
}

/** Decode and validate bytes produced by serializeRecord for a payload. */
export function deserializePayload(bytes: Uint8Array): Payload {
  return payloadSchema.parse(JSON.parse(decoder.decode(bytes)));
}

/** Decode and validate bytes produced by serializeRecord for metadata. */
export function deserializeMetadata(bytes: Uint8Array): Metadata {
  return metadataSchema.parse(JSON.parse(decoder.decode(bytes)));
}
