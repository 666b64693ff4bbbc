import { z } from "zod";
import { LOG_LEVEL_NAMES } from "../adapters/structured-logger.js";
import { DEVICE_PROFILES, SCHEMES } from "../types/benchmark.js";
import { CHACHA_BACKENDS } from "../utils/crypto/aead-ciphers.js";

export const OUTPUT_FORMATS = ["table", "ndjson"] as const;

export const benchConfigSchema = z
  .object({
    iterations: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
    profiles: z.array(z.enum(DEVICE_PROFILES)).min(1),
    schemes: z.array(z.enum(SCHEMES)).min(1),
    chachaBackend: z.enum(CHACHA_BACKENDS),
    output: z.enum(OUTPUT_FORMATS),
    showTrials: z.boolean(),
    logLevel: z.enum(LOG_LEVEL_NAMES),
  })
  .partial()
  .strict();
