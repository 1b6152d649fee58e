/**
 * Server Module Index
 *
 * Re-exports server components.
 *
 * @example
 * ```typescript
 * import { server } from "capability-session-sdk";
 *
 * const instance = new server.Server({ serverInfo: { name: "demo", version: "1.0.0" } });
 * ```
 */

// Server classes
export { Server } from "./server";
export { SimpleServer, type TextResourceHandler, type TextTemplateHandler, type TextToolHandler, type PromptMessagesHandler } from "./simple-server";

// Building blocks
export { Registry } from "./registry";
export { UriTemplate, type UriVariables } from "./uri-template";
export { NotificationEmitter, type NotificationSink } from "./notifications";
export { negotiateProtocolVersion, isProtocolVersionSupported } from "./lifecycle";

// Server types
export type {
  ServerOptions as Options,
  InitializeCallbackData,
  ResourceReader,
  ResourceTemplateReader,
  ToolCallback,
  PromptCallback,
  ResourceEntry,
  ResourceTemplateEntry,
  ToolEntry,
  PromptEntry,
  ClientRequestMethod,
  ServerResultMap,
  Route,
  RequestRoutes
} from "./types";

// Server features
export {
  ResourcesFeature,
  type TemplateMatch,
  ToolsFeature,
  PromptsFeature,
  LOGGING_LEVELS,
  isLevelEnabled,
  severityOf,
  handleSetLevel,
  handlePing
} from "./features";
