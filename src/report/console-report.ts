/**
 * Console rendering of trial and aggregate records.
 *
 * Key and ciphertext bytes are only ever shown as short hex previews.
 */

import { SCHEME_LABELS } from "../core/aead-schemes.js";
import { getDeviceProfile, KIB, MIB } from "../core/device-profiles.js";
import type { AggregateRecord, TrialRecord } from "../types/benchmark.js";

const KEY_PREVIEW_BYTES = 8;
const CIPHERTEXT_PREVIEW_BYTES = 16;

/** "<n> KB" below one MiB, "<n> MB" from there on (1024-based). */
export function formatByteSize(bytes: number): string {
  if (bytes < MIB) return `${(bytes / KIB).toFixed(2)} KB`;
  return `${(bytes / MIB).toFixed(2)} MB`;
}

/** First `length` bytes as lowercase hex, with an ellipsis when cut. */
export function hexPreview(bytes: Uint8Array, length: number): string {
  const head = Buffer.from(bytes.subarray(0, length)).toString("hex");
  return bytes.length > length ? `${head}…` : head;
}

export function formatTrialLine(trial: TrialRecord, index?: number): string {
  const prefix = index === undefined ? "" : `#${index + 1} `;
  return [
    `${prefix}[${SCHEME_LABELS[trial.scheme]}]`,
    `key=${hexPreview(trial.key, KEY_PREVIEW_BYTES)}`,
    `nonce=${hexPreview(trial.nonce, trial.nonce.length)}`,
    `ct=${hexPreview(trial.ciphertext, CIPHERTEXT_PREVIEW_BYTES)}`,
    `time=${trial.elapsedMs.toFixed(4)}ms`,
    `payload=${formatByteSize(trial.payloadBytes)}`,
    `metadata=${trial.metadataBytes} B`,
  ].join(" ");
}

export interface AggregateRow {
  Scheme: string;
  Profile: string;
  "Avg (ms)": string;
  "Min (ms)": string;
  "Max (ms)": string;
  "Throughput (GiB/s)": string;
  Iterations: number;
}

export function toAggregateRow(record: AggregateRecord): AggregateRow {
  return {
    Scheme: SCHEME_LABELS[record.scheme],
    Profile: getDeviceProfile(record.profile).label,
    "Avg (ms)": record.avgLatencyMs.toFixed(4),
    "Min (ms)": record.minLatencyMs.toFixed(4),
    "Max (ms)": record.maxLatencyMs.toFixed(4),
    "Throughput (GiB/s)": record.throughputGiBps.toFixed(3),
    Iterations: record.iterations,
  };
}

export function printAggregateTable(
  records: readonly AggregateRecord[],
  print: (rows: AggregateRow[]) => void = (rows) => console.table(rows),
): void {
  print(records.map(toAggregateRow));
}

/** One NDJSON line per aggregate, for piping into other tools. */
export function serializeAggregate(record: AggregateRecord): string {
  return `${JSON.stringify(record)}\n`;
}
