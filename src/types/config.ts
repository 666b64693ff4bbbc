import type { LogLevelName } from "../adapters/structured-logger.js";
import { benchConfigSchema, type OUTPUT_FORMATS } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";
import type { ChaChaBackend } from "../utils/crypto/aead-ciphers.js";
import { DEVICE_PROFILES, type DeviceProfile, SCHEMES, type SchemeId } from "./benchmark.js";

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Benchmark configuration; every field falls back to DEFAULT_CONFIG. */
export interface BenchConfig {
  iterations?: number; // default: 10
  profiles?: DeviceProfile[]; // default: all three
  schemes?: SchemeId[]; // default: both
  chachaBackend?: ChaChaBackend; // default: "node"
  output?: OutputFormat; // default: "table"
  showTrials?: boolean; // default: false
  logLevel?: LogLevelName; // default: "info"
}

export type ResolvedConfig = Readonly<Required<BenchConfig>>;

export const DEFAULT_CONFIG: ResolvedConfig = {
  iterations: 10,
  profiles: [...DEVICE_PROFILES],
  schemes: [...SCHEMES],
  chachaBackend: "node",
  output: "table",
  showTrials: false,
  logLevel: "info",
};

/** @throws ConfigError when `config` does not match benchConfigSchema */
export function resolveConfig(config: BenchConfig = {}): ResolvedConfig {
  const validation = benchConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const data = validation.data;
  return Object.freeze({
    iterations: data.iterations ?? DEFAULT_CONFIG.iterations,
    profiles: data.profiles ?? DEFAULT_CONFIG.profiles,
    schemes: data.schemes ?? DEFAULT_CONFIG.schemes,
    chachaBackend: data.chachaBackend ?? DEFAULT_CONFIG.chachaBackend,
    output: data.output ?? DEFAULT_CONFIG.output,
    showTrials: data.showTrials ?? DEFAULT_CONFIG.showTrials,
    logLevel: data.logLevel ?? DEFAULT_CONFIG.logLevel,
  });
}
