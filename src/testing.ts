/**
 * Public test utilities — exported from the `"aead-iot-bench/testing"` entry point.
 * Deterministic randomness and clocks for reproducing benchmark runs in tests.
 */
export { RecordingRandom } from "./testing/recording-random.js";
export { SeededRandom } from "./testing/seeded-random.js";
export { ScriptedClock, SteppingClock } from "./testing/stepping-clock.js";
export { createFailingSuite, createSuiteWith } from "./testing/fake-ciphers.js";
