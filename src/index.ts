/**
 * Public API barrel.
 *
 * Re-exports the payload generator, the AEAD engine, the benchmark harness,
 * their record types, configuration, errors and the default adapters.
 * @module
 */

// Adapters
export { NodeSecureRandom, nodeSecureRandom } from "./adapters/node-secure-random.js";
export { PerformanceClock, performanceClock } from "./adapters/performance-clock.js";
export type { LogLevelName, StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LOG_LEVEL_NAMES, LogLevel, logLevelFromName, StructuredLogger } from "./adapters/structured-logger.js";
// Config
export { benchConfigSchema, OUTPUT_FORMATS } from "./config/config-schema.js";
export type { AeadEngineOptions } from "./core/aead-engine.js";
// Core
export { AeadEngine } from "./core/aead-engine.js";
export { isSchemeId, parseScheme, SCHEME_LABELS } from "./core/aead-schemes.js";
export type {
  BenchmarkHarnessOptions,
  RunOptions,
  SuiteOptions,
} from "./core/benchmark-harness.js";
export {
  assertIterationCount,
  BenchmarkHarness,
  computeThroughputGiBps,
  LatencyAccumulator,
  summarizeTrials,
} from "./core/benchmark-harness.js";
export type { DeviceProfileDefinition } from "./core/device-profiles.js";
export {
  base64Length,
  getDeviceProfile,
  isDeviceProfile,
  KIB,
  LOCATIONS,
  MIB,
  parseDeviceProfile,
} from "./core/device-profiles.js";
export type { PayloadGeneratorOptions } from "./core/payload-generator.js";
export { PayloadGenerator } from "./core/payload-generator.js";
export { deserializeMetadata, deserializePayload, serializeRecord } from "./core/serialization.js";
// Errors
export {
  BenchError,
  ConfigError,
  CryptoFailureError,
  errorMessage,
  InvalidIterationCountError,
  InvalidProfileError,
  toBenchError,
  UnsupportedSchemeError,
} from "./errors.js";
// Interfaces
export type { MonotonicClock } from "./interfaces/clock.js";
export type { LogContext, Logger } from "./interfaces/logger.js";
export type { SecureRandom } from "./interfaces/secure-random.js";
// Reporting
export type { AggregateRow } from "./report/console-report.js";
export {
  formatByteSize,
  formatTrialLine,
  hexPreview,
  printAggregateTable,
  serializeAggregate,
  toAggregateRow,
} from "./report/console-report.js";
// Types
export type {
  AggregateRecord,
  DeviceProfile,
  GeneratedInput,
  MediaStreamPayload,
  Metadata,
  OtaUpdatePayload,
  Payload,
  SchemeId,
  SensorPayload,
  SensorUnit,
  StreamType,
  TrialRecord,
  TrialSample,
} from "./types/benchmark.js";
export {
  DEVICE_PROFILES,
  DEVICE_STATUS,
  SCHEMES,
  SENSOR_UNITS,
  STREAM_TYPES,
} from "./types/benchmark.js";
export type { BenchConfig, OutputFormat, ResolvedConfig } from "./types/config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./types/config.js";
export { metadataSchema, payloadSchema } from "./types/payload-schema.js";
// Crypto
export type { AeadCipher, ChaChaBackend, CipherSuite, CipherSuiteOptions } from "./utils/crypto/aead-ciphers.js";
export {
  AEAD_KEY_BYTES,
  AEAD_NONCE_BYTES,
  AEAD_TAG_BYTES,
  CHACHA_BACKENDS,
  createNodeAesGcmCipher,
  createNodeChaChaCipher,
  createSodiumChaChaCipher,
  loadCipherSuite,
} from "./utils/crypto/aead-ciphers.js";
export { getSodium } from "./utils/crypto/sodium-loader.js";
export { canonicalize } from "./utils/canonical-json.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
