/**
 * capability-session-sdk
 *
 * Session engine for capability servers: JSON-RPC 2.0 envelope, transport
 * contract, dispatcher, capability registries and notifications.
 *
 * @packageDocumentation
 */

export * from "./protocol";
export * as server from "./server";
