import { describe, expect, it, vi } from "vitest";
import type { AggregateRecord, TrialRecord } from "../types/benchmark.js";
import {
  formatByteSize,
  formatTrialLine,
  hexPreview,
  printAggregateTable,
  serializeAggregate,
  toAggregateRow,
} from "./console-report.js";

const aggregate: AggregateRecord = {
  scheme: "chacha20-poly1305",
  profile: "ota_update",
  avgLatencyMs: 1.23456,
  minLatencyMs: 1,
  maxLatencyMs: 2.5,
  throughputGiBps: 1.0606,
  iterations: 10,
  totalPayloadBytes: 13981040,
  totalLatencyMs: 12.3456,
};

describe("formatByteSize", () => {
  it("uses KB below one MiB", () => {
    expect(formatByteSize(13656)).toBe("13.34 KB");
    expect(formatByteSize(1024 * 1024 - 1)).toBe("1024.00 KB");
  });

  it("uses MB from one MiB", () => {
    expect(formatByteSize(1024 * 1024)).toBe("1.00 MB");
    expect(formatByteSize(27962028)).toBe("26.67 MB");
  });
});

describe("hexPreview", () => {
  it("cuts long buffers with an ellipsis", () => {
    expect(hexPreview(new Uint8Array([0xde, 0xad, 0xbe, 0xef]), 2)).toBe("dead…");
  });

  it("shows short buffers in full", () => {
    expect(hexPreview(new Uint8Array([0x0a, 0x0b]), 4)).toBe("0a0b");
  });
});

describe("formatTrialLine", () => {
  const trial: TrialRecord = {
    scheme: "aes-256-gcm",
    key: new Uint8Array(32).fill(0x11),
    nonce: new Uint8Array(12).fill(0x22),
    ciphertext: new Uint8Array(40).fill(0x33),
    elapsedMs: 0.04567,
    payloadBytes: 13718,
    metadataBytes: 112,
  };

  it("shows previews, timing and sizes", () => {
    expect(formatTrialLine(trial)).toBe(
      "[AES-256-GCM] key=1111111111111111… nonce=222222222222222222222222 " +
        "ct=33333333333333333333333333333333… time=0.0457ms payload=13.40 KB metadata=112 B",
    );
  });

  it("prefixes a one-based trial number", () => {
    expect(formatTrialLine(trial, 0).startsWith("#1 [AES-256-GCM]")).toBe(true);
  });
});

describe("aggregate rendering", () => {
  it("builds a table row with labels and fixed precision", () => {
    expect(toAggregateRow(aggregate)).toEqual({
      Scheme: "ChaCha20-Poly1305",
      Profile: "OTA Update",
      "Avg (ms)": "1.2346",
      "Min (ms)": "1.0000",
      "Max (ms)": "2.5000",
      "Throughput (GiB/s)": "1.061",
      Iterations: 10,
    });
  });

  it("prints one row per record", () => {
    const print = vi.fn();
    printAggregateTable([aggregate, { ...aggregate, scheme: "aes-256-gcm" }], print);
    expect(print).toHaveBeenCalledTimes(1);
    expect(print.mock.calls[0][0]).toHaveLength(2);
    expect(print.mock.calls[0][0][1].Scheme).toBe("AES-256-GCM");
  });

  it("serializes an aggregate as one NDJSON line", () => {
    const line = serializeAggregate(aggregate);
    expect(line.endsWith("\n")).toBe(true);
    expect(line.indexOf("\n")).toBe(line.length - 1);
    expect(JSON.parse(line)).toEqual(aggregate);
  });
});
