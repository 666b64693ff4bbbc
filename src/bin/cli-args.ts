import { isSchemeId } from "../core/aead-schemes.js";
import { isDeviceProfile } from "../core/device-profiles.js";
import type { DeviceProfile, SchemeId } from "../types/benchmark.js";
import type { BenchConfig } from "../types/config.js";
import { CHACHA_BACKENDS, type ChaChaBackend } from "../utils/crypto/aead-ciphers.js";

export type CliCommand =
  | { kind: "run"; config: BenchConfig }
  | { kind: "help" }
  | { kind: "error"; message: string };

export const HELP_TEXT = `
  aead-iot-bench — AEAD latency and throughput on synthetic IoT payloads

  Usage: aead-iot-bench [options]

  Options:
    --iterations, -n <n>     Trials per profile/scheme pair (default: 10)
    --profile <id>           sensor | ota_update | media_stream (repeatable, default: all)
    --scheme <id>            aes-256-gcm | chacha20-poly1305 (repeatable, default: all)
    --chacha-backend <name>  node | libsodium (default: node)
    --ndjson                 Print one JSON line per aggregate instead of a table
    --trials                 Print every trial (key, nonce and ciphertext previews)
    --verbose, -v            Debug logging on stderr
    --quiet, -q              Only log errors
    --help, -h               Show this help
`;

function isChaChaBackend(value: string | undefined): value is ChaChaBackend {
  return CHACHA_BACKENDS.some((backend) => backend === value);
}

/** Parse argv (without the node and script entries) into a command. */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const config: BenchConfig = {};
  const profiles: DeviceProfile[] = [];
  const schemes: SchemeId[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = (): string | undefined => argv[++i];

    switch (arg) {
      case "--iterations":
      case "-n": {
        const raw = next();
        const iterations = raw === undefined ? Number.NaN : Number(raw);
        if (!Number.isInteger(iterations)) {
          return { kind: "error", message: `${arg} requires an integer` };
        }
        config.iterations = iterations;
        break;
      }
      case "--profile": {
        const profile = next();
        if (!isDeviceProfile(profile)) {
          return { kind: "error", message: `Unknown profile: ${profile ?? "(missing)"}` };
        }
        profiles.push(profile);
        break;
      }
      case "--scheme": {
        const scheme = next();
        if (!isSchemeId(scheme)) {
          return { kind: "error", message: `Unknown scheme: ${scheme ?? "(missing)"}` };
        }
        schemes.push(scheme);
        break;
      }
      case "--chacha-backend": {
        const backend = next();
        if (!isChaChaBackend(backend)) {
          return { kind: "error", message: `Unknown ChaCha20 backend: ${backend ?? "(missing)"}` };
        }
        config.chachaBackend = backend;
        break;
      }
      case "--ndjson":
        config.output = "ndjson";
        break;
      case "--trials":
        config.showTrials = true;
        break;
      case "--verbose":
      case "-v":
        config.logLevel = "debug";
        break;
      case "--quiet":
      case "-q":
        config.logLevel = "error";
        break;
      case "--help":
      case "-h":
        return { kind: "help" };
      default:
        return { kind: "error", message: `Unknown option: ${arg}\nRun with --help for usage.` };
    }
  }

  if (profiles.length > 0) config.profiles = [...new Set(profiles)];
  if (schemes.length > 0) config.schemes = [...new Set(schemes)];
  return { kind: "run", config };
}
