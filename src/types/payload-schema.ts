/**
 * Zod schemas for decoding serialized payloads and metadata.
 *
 * Used to read back what the engine encrypted; the generator builds values
 * directly and never goes through these.
 */

import { z } from "zod";
import { DEVICE_STATUS, SENSOR_UNITS, STREAM_TYPES } from "./benchmark.js";

const isoTimestamp = z.string().datetime();

const base64 = z
  .string()
  .regex(/^[A-Za-z0-9+/]*={0,2}$/)
  .refine((value) => value.length % 4 === 0, "base64 length must be a multiple of 4");

export const sensorPayloadSchema = z.object({
  kind: z.literal("sensor"),
  reading: z.number().finite(),
  unit: z.enum(SENSOR_UNITS),
  data: base64,
});

export const otaUpdatePayloadSchema = z.object({
  kind: z.literal("ota_update"),
  firmwareVersion: z.string().regex(/^v\d+\.\d+\.\d+$/),
  checksum: z.string().regex(/^[0-9a-f]{64}$/),
  data: base64,
});

export const mediaStreamPayloadSchema = z.object({
  kind: z.literal("media_stream"),
  streamType: z.enum(STREAM_TYPES),
  timestamp: isoTimestamp,
  data: base64,
});

export const payloadSchema = z.discriminatedUnion("kind", [
  sensorPayloadSchema,
  otaUpdatePayloadSchema,
  mediaStreamPayloadSchema,
]);

export const metadataSchema = z.object({
  deviceId: z.string().min(1),
  timestamp: isoTimestamp,
  location: z.string().min(1),
  status: z.literal(DEVICE_STATUS),
});
