// =============================================================================
// Logger Implementations
// =============================================================================

import type { ErrorContext, LogContext, Logger } from "./types";

/**
 * No-op logger implementation that discards all log messages.
 * This is the default logger so nothing competes with a stdio transport.
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: LogContext): void {
    // No-op
  }

  info(_message: string, _context?: LogContext): void {
    // No-op
  }

  warn(_message: string, _context?: LogContext): void {
    // No-op
  }

  error(_message: string, _error: Error, _context?: ErrorContext): void {
    // No-op
  }
}

/**
 * Console-based logger implementation.
 *
 * Writes to standard error by default, which keeps standard output free for
 * the stdio transport's message stream.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly prefix = "[session]",
    private readonly output: Console = new console.Console({ stdout: process.stderr, stderr: process.stderr })
  ) {}

  debug(message: string, context?: LogContext): void {
    this.output.debug(`${this.prefix} [DEBUG] ${message}`, context ?? "");
  }

  info(message: string, context?: LogContext): void {
    this.output.info(`${this.prefix} [INFO] ${message}`, context ?? "");
  }

  warn(message: string, context?: LogContext): void {
    this.output.warn(`${this.prefix} [WARN] ${message}`, context ?? "");
  }

  error(message: string, error: Error, context?: ErrorContext): void {
    this.output.error(`${this.prefix} [ERROR] ${message}`, error, context ?? "");
  }
}
