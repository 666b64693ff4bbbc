/**
 * Records flowing through a benchmark run: selectors, generated inputs,
 * per-trial results and per-run aggregates.
 * @module
 */

// ---------------------------------------------------------------------------
// Selectors
// ---------------------------------------------------------------------------

export const DEVICE_PROFILES = ["sensor", "ota_update", "media_stream"] as const;

export type DeviceProfile = (typeof DEVICE_PROFILES)[number];

export const SCHEMES = ["aes-256-gcm", "chacha20-poly1305"] as const;

export type SchemeId = (typeof SCHEMES)[number];

export const SENSOR_UNITS = ["celsius", "fahrenheit", "percent", "hpa"] as const;

export type SensorUnit = (typeof SENSOR_UNITS)[number];

export const STREAM_TYPES = ["video", "audio", "thermal", "depth"] as const;

export type StreamType = (typeof STREAM_TYPES)[number];

export const DEVICE_STATUS = "active";

// ---------------------------------------------------------------------------
// Generated inputs
// ---------------------------------------------------------------------------

export interface SensorPayload {
  kind: "sensor";
  reading: number;
  unit: SensorUnit;
  /** base64 of the profile's nominal byte count */
  data: string;
}

export interface OtaUpdatePayload {
  kind: "ota_update";
  firmwareVersion: string;
  /** hex SHA-256 of the raw firmware bytes */
  checksum: string;
  data: string;
}

export interface MediaStreamPayload {
  kind: "media_stream";
  streamType: StreamType;
  timestamp: string;
  data: string;
}

export type Payload = SensorPayload | OtaUpdatePayload | MediaStreamPayload;

/** Associated data bound into the authentication tag. */
export interface Metadata {
  deviceId: string;
  timestamp: string;
  location: string;
  status: typeof DEVICE_STATUS;
}

export interface GeneratedInput {
  payload: Payload;
  metadata: Metadata;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface TrialRecord {
  readonly scheme: SchemeId;
  readonly key: Uint8Array;
  readonly nonce: Uint8Array;
  /** ciphertext ‖ tag */
  readonly ciphertext: Uint8Array;
  readonly elapsedMs: number;
  readonly payloadBytes: number;
  readonly metadataBytes: number;
}

/** The parts of a trial the aggregate needs. */
export type TrialSample = Pick<TrialRecord, "elapsedMs" | "payloadBytes">;

export interface AggregateRecord {
  readonly scheme: SchemeId;
  readonly profile: DeviceProfile;
  readonly avgLatencyMs: number;
  readonly minLatencyMs: number;
  readonly maxLatencyMs: number;
  readonly throughputGiBps: number;
  readonly iterations: number;
  readonly totalPayloadBytes: number;
  readonly totalLatencyMs: number;
}
