/**
 * Benchmark harness — repeats generate-then-encrypt trials for one
 * (profile, scheme) pair and aggregates their latencies.
 *
 * Trials run strictly one after another; each is awaited before the next is
 * generated. Ciphertexts are not retained past the `onTrial` callback, so a
 * long MediaStream run holds one trial's buffers at a time.
 *
 * @module Benchmark
 */

import { InvalidIterationCountError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type {
  AggregateRecord,
  DeviceProfile,
  SchemeId,
  TrialRecord,
  TrialSample,
} from "../types/benchmark.js";
import { noopLogger } from "../utils/noop-logger.js";
import { AeadEngine } from "./aead-engine.js";
import { parseScheme } from "./aead-schemes.js";
import { parseDeviceProfile } from "./device-profiles.js";
import { PayloadGenerator } from "./payload-generator.js";

const BYTES_PER_GIB = 1024 ** 3;
const MS_PER_SECOND = 1000;

/** @throws InvalidIterationCountError unless `iterations` is a positive integer */
export function assertIterationCount(iterations: number): void {
  if (!Number.isSafeInteger(iterations) || iterations < 1) {
    throw new InvalidIterationCountError(iterations);
  }
}

/** GiB/s over summed trial latency; 0 when no time was measured. */
export function computeThroughputGiBps(totalBytes: number, totalLatencyMs: number): number {
  if (totalLatencyMs === 0) return 0;
  return totalBytes / BYTES_PER_GIB / (totalLatencyMs / MS_PER_SECOND);
}

/** Running sums and extrema over trial samples. */
export class LatencyAccumulator {
  private count = 0;
  private totalLatencyMs = 0;
  private totalPayloadBytes = 0;
  private minLatencyMs = Number.POSITIVE_INFINITY;
  private maxLatencyMs = Number.NEGATIVE_INFINITY;

  get size(): number {
    return this.count;
  }

  add(sample: TrialSample): void {
    this.count++;
    this.totalLatencyMs += sample.elapsedMs;
    this.totalPayloadBytes += sample.payloadBytes;
    this.minLatencyMs = Math.min(this.minLatencyMs, sample.elapsedMs);
    this.maxLatencyMs = Math.max(this.maxLatencyMs, sample.elapsedMs);
  }

  summarize(scheme: SchemeId, profile: DeviceProfile): AggregateRecord {
    assertIterationCount(this.count);
    // Floating-point division can land a hair outside [min, max]
    const mean = this.totalLatencyMs / this.count;
    const avgLatencyMs = Math.min(this.maxLatencyMs, Math.max(this.minLatencyMs, mean));
    return Object.freeze({
      scheme,
      profile,
      avgLatencyMs,
      minLatencyMs: this.minLatencyMs,
      maxLatencyMs: this.maxLatencyMs,
      throughputGiBps: computeThroughputGiBps(this.totalPayloadBytes, this.totalLatencyMs),
      iterations: this.count,
      totalPayloadBytes: this.totalPayloadBytes,
      totalLatencyMs: this.totalLatencyMs,
    });
  }
}

/** Aggregate a finished list of samples. */
export function summarizeTrials(
  scheme: SchemeId,
  profile: DeviceProfile,
  samples: readonly TrialSample[],
): AggregateRecord {
  const accumulator = new LatencyAccumulator();
  for (const sample of samples) accumulator.add(sample);
  return accumulator.summarize(scheme, profile);
}

export interface BenchmarkHarnessOptions {
  generator?: PayloadGenerator;
  engine?: AeadEngine;
  logger?: Logger;
}

export interface RunOptions {
  /** Called after every trial, before the next one starts. */
  onTrial?: (trial: TrialRecord, index: number) => void;
}

export interface SuiteOptions extends RunOptions {
  /** Called once per finished (profile, scheme) pair. */
  onAggregate?: (record: AggregateRecord) => void;
}

export class BenchmarkHarness {
  private readonly generator: PayloadGenerator;
  private readonly engine: AeadEngine;
  private readonly logger: Logger;

  constructor(options: BenchmarkHarnessOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.generator = options.generator ?? new PayloadGenerator();
    this.engine = options.engine ?? new AeadEngine({ logger: this.logger });
  }

  /**
   * Run `iterations` sequential trials and aggregate them.
   *
   * Selectors and the iteration count are validated before the first trial.
   * Any trial failure aborts the run; no partial aggregate is returned.
   */
  async run(
    profile: DeviceProfile,
    scheme: SchemeId,
    iterations: number,
    options: RunOptions = {},
  ): Promise<AggregateRecord> {
    assertIterationCount(iterations);
    const profileId = parseDeviceProfile(profile);
    const schemeId = parseScheme(scheme);

    this.logger.info("Benchmark run started", {
      component: "harness",
      profile: profileId,
      scheme: schemeId,
      iterations,
    });

    const accumulator = new LatencyAccumulator();
    for (let index = 0; index < iterations; index++) {
      const { payload, metadata } = this.generator.generate(profileId);
      let trial: TrialRecord;
      try {
        trial = await this.engine.encrypt(schemeId, payload, metadata);
      } catch (err) {
        this.logger.error("Benchmark run aborted", {
          component: "harness",
          profile: profileId,
          scheme: schemeId,
          trial: index,
          error: err,
        });
        throw err;
      }
      accumulator.add(trial);
      this.logger.debug?.("Trial finished", {
        component: "harness",
        trial: index,
        elapsedMs: trial.elapsedMs,
        payloadBytes: trial.payloadBytes,
        metadataBytes: trial.metadataBytes,
        nonce: trial.nonce,
      });
      options.onTrial?.(trial, index);
    }

    const record = accumulator.summarize(schemeId, profileId);
    this.logger.info("Benchmark run finished", {
      component: "harness",
      profile: profileId,
      scheme: schemeId,
      avgLatencyMs: record.avgLatencyMs,
      throughputGiBps: record.throughputGiBps,
    });
    return record;
  }

  /** Run every (profile, scheme) pair one after another, profiles outermost. */
  async runSuite(
    profiles: readonly DeviceProfile[],
    schemes: readonly SchemeId[],
    iterations: number,
    options: SuiteOptions = {},
  ): Promise<AggregateRecord[]> {
    assertIterationCount(iterations);
    for (const profile of profiles) parseDeviceProfile(profile);
    for (const scheme of schemes) parseScheme(scheme);

    const records: AggregateRecord[] = [];
    for (const profile of profiles) {
      for (const scheme of schemes) {
        const record = await this.run(profile, scheme, iterations, { onTrial: options.onTrial });
        options.onAggregate?.(record);
        records.push(record);
      }
    }
    return records;
  }
}
