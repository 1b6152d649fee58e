import { LATEST_PROTOCOL_VERSION } from "./schema";

/**
 * Protocol revisions this engine speaks. Only one is advertised; a client
 * asking for another still receives this one.
 */
export const SUPPORTED_PROTOCOL_VERSIONS: readonly string[] = [LATEST_PROTOCOL_VERSION];

// =============================================================================
// Capabilities
// =============================================================================

/**
 * Capability set advertised when the server is not given one.
 */
export const DEFAULT_SERVER_CAPABILITIES = {
  resources: {},
  tools: {},
  prompts: {},
  logging: {}
} as const;

// =============================================================================
// Limits
// =============================================================================

/**
 * Default bound on concurrently running message handlers (unbounded).
 */
export const DEFAULT_MAX_CONCURRENCY = Number.POSITIVE_INFINITY;

/**
 * Default maximum size of one framed record in bytes.
 */
export const DEFAULT_MAX_MESSAGE_SIZE = 4194304; // 4MB

/**
 * Number of decoded records a stream transport buffers before pausing its input.
 */
export const DEFAULT_RECEIVE_HIGH_WATER_MARK = 64;
