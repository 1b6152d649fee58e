/**
 * Base structured metadata for log entries.
 * Extend this interface to add application-specific fields.
 *
 * @example
 * ```typescript
 * interface CalculatorLogContext extends BaseLogContext {
 *   operation: string;
 * }
 * ```
 */
export interface BaseLogContext {
  // ─────────────────────────────────────────────────────────────────────────────
  // Correlation
  // ─────────────────────────────────────────────────────────────────────────────
  /** Session ID for session-scoped logging */
  sessionId?: string;
  /** Correlation id of the request being handled, rendered as a string */
  requestId?: string;
  /** Connection the message arrived on */
  connectionId?: string;

  // ─────────────────────────────────────────────────────────────────────────────
  // Service Context
  // ─────────────────────────────────────────────────────────────────────────────
  /** Component or module name */
  component?: string;
  /** Service version */
  version?: string;

  // ─────────────────────────────────────────────────────────────────────────────
  // Request Context
  // ─────────────────────────────────────────────────────────────────────────────
  /** RPC method name */
  method?: string;
  /** Duration in milliseconds */
  durationMs?: number;
}

/**
 * Extended log context with index signature for dynamic fields.
 */
export interface LogContext extends BaseLogContext {
  [key: string]: string | number | boolean | string[] | null | undefined;
}

/**
 * Base error context for structured error logging.
 */
export interface BaseErrorContext extends BaseLogContext {
  /** JSON-RPC error code, when the error is answered to the peer */
  errorCode?: number;
  /** Whether the session keeps running after the error */
  recoverable?: boolean;
}

/**
 * Extended error context with index signature for dynamic fields.
 */
export interface ErrorContext extends BaseErrorContext {
  [key: string]: string | number | boolean | string[] | null | undefined;
}

/**
 * Logger used by the protocol, the server and the transports.
 *
 * Implementations can adapt any logging library to this interface. When the
 * session runs over stdio, the logger must not write to standard output.
 *
 * @example
 * ```typescript
 * const logger: Logger = {
 *   debug: (message, context) => sink.write({ level: "debug", message, ...context }),
 *   info: (message, context) => sink.write({ level: "info", message, ...context }),
 *   warn: (message, context) => sink.write({ level: "warn", message, ...context }),
 *   error: (message, error, context) => sink.write({ level: "error", message, stack: error.stack, ...context })
 * };
 * ```
 */
export interface Logger<TContext extends BaseLogContext = LogContext, TErrorContext extends BaseErrorContext = ErrorContext> {
  /**
   * Log a debug message.
   * Use for detailed diagnostic information during development.
   */
  debug(message: string, context?: TContext): void;

  /**
   * Log an informational message.
   */
  info(message: string, context?: TContext): void;

  /**
   * Log a warning message.
   * Use for recoverable faults such as undecodable records.
   */
  warn(message: string, context?: TContext): void;

  /**
   * Log an error message together with the error that caused it.
   */
  error(message: string, error: Error, context?: TErrorContext): void;
}
