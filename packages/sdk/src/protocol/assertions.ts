/**
 * Type Guards
 *
 * Runtime type checking utilities for JSON-RPC envelopes.
 */

import {
  JSONRPC_VERSION,
  RawNumericId,
  type CancelledNotification,
  type JSONRPCErrorResponse,
  type JSONRPCMessage,
  type JSONRPCNotification,
  type JSONRPCRequest,
  type JSONRPCResultResponse,
  type RequestId
} from "./schema";

// =============================================================================
// Basic Type Guards
// =============================================================================

/**
 * Checks if a value is a non-null, non-array object.
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Checks if a value can serve as a correlation id.
 */
export function isRequestId(value: unknown): value is RequestId {
  return typeof value === "string" || (typeof value === "number" && Number.isFinite(value)) || value instanceof RawNumericId;
}

// =============================================================================
// JSON-RPC Message Type Guards
// =============================================================================

/**
 * Checks if a value has the JSON-RPC version field.
 */
function hasJSONRPCVersion(value: unknown): value is Record<string, unknown> & { jsonrpc: typeof JSONRPC_VERSION } {
  return isObject(value) && value["jsonrpc"] === JSONRPC_VERSION;
}

/**
 * Params, if present, must be an object. Positional params are not used by this protocol.
 */
function hasValidParams(value: Record<string, unknown>): boolean {
  return value["params"] === undefined || isObject(value["params"]);
}

/**
 * Checks if a value is a JSON-RPC Request.
 */
export function isJSONRPCRequest(value: unknown): value is JSONRPCRequest {
  if (!hasJSONRPCVersion(value)) return false;
  if (!isRequestId(value["id"])) return false;
  if (typeof value["method"] !== "string") return false;
  return hasValidParams(value);
}

/**
 * Checks if a value is a JSON-RPC Notification.
 */
export function isJSONRPCNotification(value: unknown): value is JSONRPCNotification {
  if (!hasJSONRPCVersion(value)) return false;
  if ("id" in value) return false; // Notifications must NOT have id
  if (typeof value["method"] !== "string") return false;
  return hasValidParams(value);
}

/**
 * Checks if a value is a JSON-RPC result Response.
 */
export function isJSONRPCResponse(value: unknown): value is JSONRPCResultResponse {
  if (!hasJSONRPCVersion(value)) return false;
  if (!isRequestId(value["id"])) return false;
  if ("error" in value) return false; // Must not have error
  return isObject(value["result"]);
}

/**
 * Checks if a value is a JSON-RPC error Response.
 */
export function isJSONRPCError(value: unknown): value is JSONRPCErrorResponse {
  if (!hasJSONRPCVersion(value)) return false;
  if ("result" in value) return false;

  // id can be string, number, or null
  const id = value["id"];
  if (id !== null && !isRequestId(id)) return false;

  const error = value["error"];
  if (!isObject(error)) return false;
  if (typeof error["code"] !== "number") return false;
  if (typeof error["message"] !== "string") return false;

  return true;
}

/**
 * Checks if a value is any JSON-RPC Message.
 */
export function isJSONRPCMessage(value: unknown): value is JSONRPCMessage {
  return isJSONRPCRequest(value) || isJSONRPCNotification(value) || isJSONRPCResponse(value) || isJSONRPCError(value);
}

// =============================================================================
// Protocol-Specific Type Guards
// =============================================================================

/**
 * Checks if a notification is a cancelled notification.
 */
export function isCancelledNotification(value: unknown): value is CancelledNotification {
  if (!isJSONRPCNotification(value)) return false;
  if (value.method !== "notifications/cancelled") return false;

  const params = value.params;
  if (!isObject(params)) return false;

  return isRequestId(params["requestId"]);
}
