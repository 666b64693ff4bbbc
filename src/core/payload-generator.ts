/**
 * Payload generator — synthetic (payload, metadata) pairs shaped per device class.
 *
 * Every random choice (device id, location, readings, enumerations, bulk
 * bytes) is drawn from the injected SecureRandom. The bulk is base64-encoded,
 * so the serialized payload is roughly 4/3 of the profile's nominal size.
 *
 * @module PayloadGeneration
 */

import { createHash } from "node:crypto";
import { nodeSecureRandom } from "../adapters/node-secure-random.js";
import type { SecureRandom } from "../interfaces/secure-random.js";
import {
  DEVICE_STATUS,
  type DeviceProfile,
  type GeneratedInput,
  type Metadata,
  type Payload,
  SENSOR_UNITS,
  type SensorUnit,
  STREAM_TYPES,
} from "../types/benchmark.js";
import { type DeviceProfileDefinition, getDeviceProfile, LOCATIONS } from "./device-profiles.js";

/** Reading range per unit, in hundredths. */
const SENSOR_RANGES: Record<SensorUnit, { min: number; max: number }> = {
  celsius: { min: -4000, max: 12500 },
  fahrenheit: { min: -4000, max: 25700 },
  percent: { min: 0, max: 10000 },
  hpa: { min: 30000, max: 110000 },
};

const FIRMWARE_MAJOR_LIMIT = 5;
const FIRMWARE_MINOR_LIMIT = 20;
const FIRMWARE_PATCH_LIMIT = 100;

export interface PayloadGeneratorOptions {
  random?: SecureRandom;
  /** Wall clock for ISO-8601 timestamps. */
  now?: () => Date;
}

export class PayloadGenerator {
  private readonly random: SecureRandom;
  private readonly now: () => Date;

  constructor(options: PayloadGeneratorOptions = {}) {
    this.random = options.random ?? nodeSecureRandom;
    this.now = options.now ?? (() => new Date());
  }

  /** @throws InvalidProfileError before any randomness is consumed */
  generate(profile: DeviceProfile): GeneratedInput {
    const definition = getDeviceProfile(profile);
    const metadata = this.generateMetadata(definition);
    const payload = this.generatePayload(definition);
    return { payload, metadata };
  }

  private generateMetadata(definition: DeviceProfileDefinition): Metadata {
    return {
      deviceId: this.pick(definition.deviceIds),
      timestamp: this.now().toISOString(),
      location: this.pick(LOCATIONS),
      status: DEVICE_STATUS,
    };
  }

  private generatePayload(definition: DeviceProfileDefinition): Payload {
    const raw = this.random.bytes(definition.nominalBytes);
    const data = Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength).toString("base64");

    switch (definition.id) {
      case "sensor": {
        const unit = this.pick(SENSOR_UNITS);
        const { min, max } = SENSOR_RANGES[unit];
        const reading = (min + this.random.int(max - min + 1)) / 100;
        return { kind: "sensor", reading, unit, data };
      }
      case "ota_update": {
        const firmwareVersion = [
          this.random.int(FIRMWARE_MAJOR_LIMIT),
          this.random.int(FIRMWARE_MINOR_LIMIT),
          this.random.int(FIRMWARE_PATCH_LIMIT),
        ].join(".");
        const checksum = createHash("sha256").update(raw).digest("hex");
        return { kind: "ota_update", firmwareVersion: `v${firmwareVersion}`, checksum, data };
      }
      case "media_stream":
        return {
          kind: "media_stream",
          streamType: this.pick(STREAM_TYPES),
          timestamp: this.now().toISOString(),
          data,
        };
      default: {
        const unreachable: never = definition.id;
        throw new Error(`Unhandled device profile: ${String(unreachable)}`);
      }
    }
  }

  private pick<T>(items: readonly T[]): T {
    return items[this.random.int(items.length)];
  }
}
