/**
 * Device profiles — the three IoT device classes a benchmark can target.
 *
 * Each profile fixes the nominal size of the random bulk carried in a payload
 * and the pool of device identifiers its metadata draws from.
 *
 * @module PayloadGeneration
 */

import { InvalidProfileError } from "../errors.js";
import { DEVICE_PROFILES, type DeviceProfile } from "../types/benchmark.js";

export const KIB = 1024;
export const MIB = 1024 * KIB;

export interface DeviceProfileDefinition {
  readonly id: DeviceProfile;
  readonly label: string;
  /** Random bytes in the payload bulk, before base64 encoding. */
  readonly nominalBytes: number;
  readonly deviceIds: readonly string[];
}

const DEFINITIONS: Record<DeviceProfile, DeviceProfileDefinition> = {
  sensor: {
    id: "sensor",
    label: "Sensor",
    nominalBytes: 10 * KIB,
    deviceIds: ["sensor-th-001", "sensor-th-002", "sensor-hum-014", "sensor-prs-031", "sensor-co2-007"],
  },
  ota_update: {
    id: "ota_update",
    label: "OTA Update",
    nominalBytes: 1 * MIB,
    deviceIds: ["gateway-eu-01", "gateway-us-02", "edge-node-07", "edge-node-12"],
  },
  media_stream: {
    id: "media_stream",
    label: "Media Stream",
    nominalBytes: 20 * MIB,
    deviceIds: ["cam-lobby-01", "cam-dock-03", "cam-yard-04", "mic-hall-02"],
  },
};

/** Locations a metadata record can be tagged with. */
export const LOCATIONS: readonly string[] = [
  "warehouse-a",
  "warehouse-b",
  "factory-floor",
  "cold-storage",
  "rooftop",
  "loading-dock",
];

export function isDeviceProfile(value: unknown): value is DeviceProfile {
  return DEVICE_PROFILES.some((profile) => profile === value);
}

/** Narrow an untyped selector (CLI flag, config entry) to a DeviceProfile. */
export function parseDeviceProfile(value: unknown): DeviceProfile {
  if (!isDeviceProfile(value)) throw new InvalidProfileError(value);
  return value;
}

/** Look up a profile definition; also guards callers that bypass the type system. */
export function getDeviceProfile(profile: DeviceProfile): DeviceProfileDefinition {
  return DEFINITIONS[parseDeviceProfile(profile)];
}

/** Length of the base64 text produced for `byteLength` raw bytes. */
export function base64Length(byteLength: number): number {
  return Math.ceil(byteLength / 3) * 4;
}
