import type { Logger } from "../interfaces/logger.js";

export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/** Default for the harness, the engine and the CLI when no logger is injected. */
export const noopLogger: Logger = new NoopLogger();
