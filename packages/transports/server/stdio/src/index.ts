/**
 * capability-session-stdio-transport
 *
 * Newline-delimited JSON transport over standard input and output for the
 * capability session engine.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { server } from "capability-session-sdk";
 * import { StdioServerTransport } from "capability-session-stdio-transport";
 *
 * const instance = new server.Server({ serverInfo: { name: "demo", version: "1.0.0" } });
 * await instance.connect(new StdioServerTransport());
 * ```
 *
 * @module stdio-transport
 */

export { StdioServerTransport, type StdioServerTransportOptions } from "./transport";
export { ReadBuffer, type ReadBufferEvent } from "./read-buffer";
