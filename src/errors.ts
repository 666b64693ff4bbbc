export class BenchError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BenchError";
    this.code = code;
  }
}

// ── Domain errors ──

export class InvalidProfileError extends BenchError {
  readonly profile: unknown;

  constructor(profile: unknown, options?: ErrorOptions) {
    super(`Invalid device profile: ${String(profile)}`, "INVALID_PROFILE", options);
    this.name = "InvalidProfileError";
    this.profile = profile;
  }
}

export class UnsupportedSchemeError extends BenchError {
  readonly scheme: unknown;

  constructor(scheme: unknown, options?: ErrorOptions) {
    super(`Unsupported AEAD scheme: ${String(scheme)}`, "UNSUPPORTED_SCHEME", options);
    this.name = "UnsupportedSchemeError";
    this.scheme = scheme;
  }
}

export class InvalidIterationCountError extends BenchError {
  readonly iterations: unknown;

  constructor(iterations: unknown, options?: ErrorOptions) {
    super(
      `Iteration count must be a positive integer, got ${String(iterations)}`,
      "INVALID_ITERATION_COUNT",
      options,
    );
    this.name = "InvalidIterationCountError";
    this.iterations = iterations;
  }
}

/** The AEAD primitive rejected a well-formed call. Fatal, never retried. */
export class CryptoFailureError extends BenchError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CRYPTO_FAILURE", options);
    this.name = "CryptoFailureError";
  }
}

export class ConfigError extends BenchError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to BenchError (preserves cause chain). */
export function toBenchError(value: unknown): BenchError {
  if (value instanceof BenchError) return value;
  if (value instanceof Error) return new BenchError(value.message, "UNKNOWN", { cause: value });
  return new BenchError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
