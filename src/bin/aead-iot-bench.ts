#!/usr/bin/env node
import { logLevelFromName, StructuredLogger } from "../adapters/structured-logger.js";
import { AeadEngine } from "../core/aead-engine.js";
import { BenchmarkHarness } from "../core/benchmark-harness.js";
import { BenchError } from "../errors.js";
import {
  formatTrialLine,
  printAggregateTable,
  serializeAggregate,
} from "../report/console-report.js";
import { resolveConfig } from "../types/config.js";
import { HELP_TEXT, parseCliArgs } from "./cli-args.js";

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.kind === "help") {
    console.log(HELP_TEXT);
    return;
  }
  if (command.kind === "error") {
    console.error(`Error: ${command.message}`);
    process.exitCode = 1;
    return;
  }

  const config = resolveConfig(command.config);
  const logger = new StructuredLogger({
    component: "aead-iot-bench",
    level: logLevelFromName(config.logLevel),
  });

  const harness = new BenchmarkHarness({
    engine: new AeadEngine({
      logger: logger.child("engine"),
      chachaBackend: config.chachaBackend,
    }),
    logger: logger.child("harness"),
  });

  const records = await harness.runSuite(config.profiles, config.schemes, config.iterations, {
    onTrial: config.showTrials
      ? (trial, index) => console.log(formatTrialLine(trial, index))
      : undefined,
    onAggregate:
      config.output === "ndjson"
        ? (record) => process.stdout.write(serializeAggregate(record))
        : undefined,
  });

  if (config.output === "table") {
    console.log(`\n=== AEAD benchmark (${config.iterations} iterations per pair) ===\n`);
    printAggregateTable(records);
  }
}

main().catch((err: unknown) => {
  if (err instanceof BenchError) {
    console.error(`Error [${err.code}]: ${err.message}`);
  } else {
    console.error("Fatal error:", err);
  }
  process.exitCode = 1;
});
