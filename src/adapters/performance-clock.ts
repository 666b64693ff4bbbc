import { performance } from "node:perf_hooks";
import type { MonotonicClock } from "../interfaces/clock.js";

export class PerformanceClock implements MonotonicClock {
  now(): number {
    return performance.now();
  }
}

export const performanceClock: MonotonicClock = new PerformanceClock();
