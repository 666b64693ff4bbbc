/**
 * Structured logger contract shared by the harness, the engine and the CLI.
 * StructuredLogger and noopLogger implement it.
 * @module
 */

export type LogContext = Record<string, unknown>;

/** Structured logger with optional debug level. */
export interface Logger {
  debug?(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}
