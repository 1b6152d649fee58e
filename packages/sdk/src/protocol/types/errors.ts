/**
 * Protocol Errors
 *
 * Errors raised while decoding, routing and answering messages. Every error
 * that can reach the peer carries a JSON-RPC code and renders itself as the
 * wire error object through `toJSON()`.
 */

import {
  INTERNAL_ERROR,
  INVALID_PARAMS,
  METHOD_NOT_FOUND,
  PARSE_ERROR,
  SERVER_NOT_INITIALIZED,
  type ErrorObject,
  type RequestId
} from "../schema";

// =============================================================================
// Base Protocol Error
// =============================================================================

export abstract class ProtocolError extends Error {
  readonly code: number;
  readonly data?: unknown;

  constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
    this.data = data;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * The error object sent in an error response.
   */
  toJSON(): ErrorObject {
    return this.data === undefined ? { code: this.code, message: this.message } : { code: this.code, message: this.message, data: this.data };
  }
}

// =============================================================================
// Handler & Connection Errors
// =============================================================================

/**
 * Wraps an error thrown by a registered handler for logging.
 */
export class HandlerError extends ProtocolError {
  constructor(
    message: string,
    public readonly method: string,
    public readonly originalError: Error
  ) {
    super(INTERNAL_ERROR, message, { method, originalError: originalError.message });
    this.name = "HandlerError";
  }
}

/**
 * Error thrown when connection is closed unexpectedly.
 */
export class ConnectionClosedError extends ProtocolError {
  constructor(message = "Connection closed") {
    super(INTERNAL_ERROR, message);
    this.name = "ConnectionClosedError";
  }
}

// =============================================================================
// JSON-RPC Standard Errors
// =============================================================================

/**
 * Parse error (-32700).
 * Invalid JSON was received by the server.
 */
export class ParseError extends ProtocolError {
  constructor(message = "Parse error", data?: unknown) {
    super(PARSE_ERROR, message, data);
    this.name = "ParseError";
  }
}

/**
 * A record that could not be decoded into an envelope.
 *
 * `id` is set when the record was an object carrying a usable correlation id,
 * which lets the dispatcher answer it with a parse error.
 */
export class DecodeError extends ParseError {
  constructor(
    public readonly reason: string,
    public readonly id?: RequestId
  ) {
    super("Parse error", { reason });
    this.name = "DecodeError";
  }
}

/**
 * Method not found error (-32601).
 * The method does not exist or is not available.
 */
export class MethodNotFoundError extends ProtocolError {
  constructor(method: string, data?: unknown) {
    super(METHOD_NOT_FOUND, `Method not found: ${method}`, data);
    this.name = "MethodNotFoundError";
  }
}

/**
 * Invalid params error (-32602).
 * Invalid method parameter(s), or a named resource, tool or prompt that does not exist.
 */
export class InvalidParamsError extends ProtocolError {
  constructor(message = "Invalid params", data?: unknown) {
    super(INVALID_PARAMS, message, data);
    this.name = "InvalidParamsError";
  }
}

/**
 * Internal error (-32603).
 * Internal JSON-RPC error.
 */
export class InternalError extends ProtocolError {
  constructor(message = "Internal error", data?: unknown) {
    super(INTERNAL_ERROR, message, data);
    this.name = "InternalError";
  }
}

/**
 * Server not initialized (-32002).
 * A request other than `initialize` arrived before the handshake completed.
 */
export class ServerNotInitializedError extends ProtocolError {
  constructor(message = "Server not initialized") {
    super(SERVER_NOT_INITIALIZED, message);
    this.name = "ServerNotInitializedError";
  }
}

/**
 * Validation error.
 * Schema validation failed.
 */
export class ValidationError extends ProtocolError {
  readonly validationErrors: readonly ValidationErrorDetail[];

  constructor(message: string, errors: readonly ValidationErrorDetail[]) {
    super(
      INVALID_PARAMS,
      message,
      errors.map((e) => e.toJSON())
    );
    this.name = "ValidationError";
    this.validationErrors = errors;
  }
}

/**
 * Validation error detail.
 */
export interface ValidationErrorDetail {
  readonly path: string;
  readonly message: string;
  toJSON(): Record<string, unknown>;
}

/**
 * Create a validation error detail.
 */
export function createValidationErrorDetail(path: string, message: string): ValidationErrorDetail {
  return {
    path,
    message,
    toJSON() {
      return path ? { path, message } : { message };
    }
  };
}

// =============================================================================
// Transport Errors
// =============================================================================

/**
 * Transport error.
 * Stream-level I/O failures. These end the session.
 */
export class TransportError extends ProtocolError {
  constructor(message: string, data?: unknown) {
    super(INTERNAL_ERROR, message, data);
    this.name = "TransportError";
  }
}

/**
 * Connection error.
 */
export class ConnectionError extends TransportError {
  constructor(message = "Connection error", data?: unknown) {
    super(message, data);
    this.name = "ConnectionError";
  }
}

/**
 * Normalizes anything thrown into an Error instance.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
