/**
 * Wire Schema
 *
 * TypeScript shapes of the JSON-RPC envelope and of the capability protocol
 * messages exchanged during a session (protocol revision 2024-11-05).
 */

// =============================================================================
// Constants
// =============================================================================

export const LATEST_PROTOCOL_VERSION = "2024-11-05";
export const JSONRPC_VERSION = "2.0";

// Standard JSON-RPC error codes
export const PARSE_ERROR = -32700;
export const INVALID_REQUEST = -32600;
export const METHOD_NOT_FOUND = -32601;
export const INVALID_PARAMS = -32602;
export const INTERNAL_ERROR = -32603;

// Implementation-defined server error codes
export const SERVER_NOT_INITIALIZED = -32002;

// =============================================================================
// JSON-RPC Envelope
// =============================================================================

/**
 * A numeric correlation id whose JSON spelling has no exact JavaScript number,
 * such as `9007199254740993`, `1.0` or `1e2`. The source text is kept and
 * written back unchanged.
 */
export class RawNumericId {
  constructor(readonly text: string) {}

  toString(): string {
    return this.text;
  }
}

/**
 * A correlation id. It is answered exactly as the peer wrote it: a numeric id
 * with the same number literal, a string id with the same string.
 */
export type RequestId = string | number | RawNumericId;

export type Cursor = string;

export interface Request {
  method: string;
  params?: { [key: string]: unknown };
}

export interface Notification {
  method: string;
  params?: { [key: string]: unknown };
}

export interface Result {
  _meta?: { [key: string]: unknown };
  [key: string]: unknown;
}

export interface JSONRPCRequest extends Request {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId;
}

export interface JSONRPCNotification extends Notification {
  jsonrpc: typeof JSONRPC_VERSION;
}

export interface JSONRPCResultResponse<TResult extends Result = Result> {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId;
  result: TResult;
}

/**
 * Error object carried by an error response.
 */
export interface ErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JSONRPCErrorResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId | null;
  error: ErrorObject;
}

export type JSONRPCResponse = JSONRPCResultResponse | JSONRPCErrorResponse;

export type JSONRPCMessage = JSONRPCRequest | JSONRPCNotification | JSONRPCResponse;

export type EmptyResult = Result;

// =============================================================================
// Lifecycle
// =============================================================================

export interface Implementation {
  name: string;
  version: string;
}

export interface ClientCapabilities {
  experimental?: { [key: string]: object };
  roots?: { listChanged?: boolean };
  sampling?: object;
  [key: string]: unknown;
}

export interface ServerCapabilities {
  experimental?: { [key: string]: object };
  logging?: object;
  prompts?: { listChanged?: boolean };
  resources?: { subscribe?: boolean; listChanged?: boolean };
  tools?: { listChanged?: boolean };
}

export type InitializeRequestParams = {
  protocolVersion?: string;
  capabilities?: ClientCapabilities;
  clientInfo?: Implementation;
};

export interface InitializeRequest extends JSONRPCRequest {
  method: "initialize";
  params: InitializeRequestParams;
}

export interface InitializeResult extends Result {
  protocolVersion: string;
  capabilities: ServerCapabilities;
  serverInfo: Implementation;
  instructions?: string;
}

export interface InitializedNotification extends JSONRPCNotification {
  method: "notifications/initialized";
}

export interface PingRequest extends JSONRPCRequest {
  method: "ping";
}

export interface CancelledNotification extends JSONRPCNotification {
  method: "notifications/cancelled";
  params: {
    requestId: RequestId;
    reason?: string;
  };
}

// =============================================================================
// Content
// =============================================================================

export interface TextContent {
  type: "text";
  text: string;
}

export interface ImageContent {
  type: "image";
  data: string;
  mimeType: string;
}

export interface ResourceContents {
  uri: string;
  mimeType?: string;
}

export interface TextResourceContents extends ResourceContents {
  text: string;
}

export interface BlobResourceContents extends ResourceContents {
  blob: string;
}

export interface EmbeddedResource {
  type: "resource";
  resource: TextResourceContents | BlobResourceContents;
}

export type ContentBlock = TextContent | ImageContent | EmbeddedResource;

// =============================================================================
// Resources
// =============================================================================

export interface Resource {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

export interface ResourceTemplate {
  uriTemplate: string;
  name: string;
  description?: string;
  mimeType?: string;
}

export type PaginatedRequestParams = {
  cursor?: Cursor;
};

export interface ListResourcesRequest extends JSONRPCRequest {
  method: "resources/list";
  params?: PaginatedRequestParams;
}

export interface ListResourcesResult extends Result {
  resources: Resource[];
  nextCursor?: Cursor;
}

export interface ListResourceTemplatesRequest extends JSONRPCRequest {
  method: "resources/templates/list";
  params?: PaginatedRequestParams;
}

export interface ListResourceTemplatesResult extends Result {
  resourceTemplates: ResourceTemplate[];
  nextCursor?: Cursor;
}

export interface ReadResourceRequest extends JSONRPCRequest {
  method: "resources/read";
  params: { uri: string };
}

export interface ReadResourceResult extends Result {
  contents: (TextResourceContents | BlobResourceContents)[];
}

export interface ResourceListChangedNotification extends JSONRPCNotification {
  method: "notifications/resources/list_changed";
}

export interface ResourceUpdatedNotification extends JSONRPCNotification {
  method: "notifications/resources/updated";
  params: { uri: string };
}

// =============================================================================
// Prompts
// =============================================================================

export interface PromptArgument {
  name: string;
  description?: string;
  required?: boolean;
}

export interface Prompt {
  name: string;
  description?: string;
  arguments?: PromptArgument[];
}

export type Role = "user" | "assistant";

export interface PromptMessage {
  role: Role;
  content: ContentBlock;
}

export interface ListPromptsRequest extends JSONRPCRequest {
  method: "prompts/list";
  params?: PaginatedRequestParams;
}

export interface ListPromptsResult extends Result {
  prompts: Prompt[];
  nextCursor?: Cursor;
}

export interface GetPromptRequest extends JSONRPCRequest {
  method: "prompts/get";
  params: {
    name: string;
    arguments?: { [key: string]: string };
  };
}

export interface GetPromptResult extends Result {
  description?: string;
  messages: PromptMessage[];
}

export interface PromptListChangedNotification extends JSONRPCNotification {
  method: "notifications/prompts/list_changed";
}

// =============================================================================
// Tools
// =============================================================================

/**
 * JSON Schema document describing a tool's arguments. Carried verbatim.
 */
export interface ToolInputSchema {
  type: "object";
  properties?: { [key: string]: unknown };
  required?: string[];
  [key: string]: unknown;
}

export interface Tool {
  name: string;
  description?: string;
  inputSchema: ToolInputSchema;
}

export interface ListToolsRequest extends JSONRPCRequest {
  method: "tools/list";
  params?: PaginatedRequestParams;
}

export interface ListToolsResult extends Result {
  tools: Tool[];
  nextCursor?: Cursor;
}

export interface CallToolRequest extends JSONRPCRequest {
  method: "tools/call";
  params: {
    name: string;
    arguments?: { [key: string]: unknown };
  };
}

export interface CallToolResult extends Result {
  content: ContentBlock[];
  isError?: boolean;
}

export interface ToolListChangedNotification extends JSONRPCNotification {
  method: "notifications/tools/list_changed";
}

// =============================================================================
// Logging
// =============================================================================

export type LoggingLevel = "debug" | "info" | "notice" | "warning" | "error" | "critical" | "alert" | "emergency";

export interface SetLevelRequest extends JSONRPCRequest {
  method: "logging/setLevel";
  params: { level: LoggingLevel };
}

export type LoggingMessageNotificationParams = {
  level: LoggingLevel;
  logger?: string;
  data: unknown;
};

export interface LoggingMessageNotification extends JSONRPCNotification {
  method: "notifications/message";
  params: LoggingMessageNotificationParams;
}

// =============================================================================
// Message Unions
// =============================================================================

export type ClientRequest =
  | InitializeRequest
  | PingRequest
  | ListResourcesRequest
  | ListResourceTemplatesRequest
  | ReadResourceRequest
  | ListToolsRequest
  | CallToolRequest
  | ListPromptsRequest
  | GetPromptRequest
  | SetLevelRequest;

export type ClientNotification = InitializedNotification | CancelledNotification;

export type ServerResult =
  | EmptyResult
  | InitializeResult
  | ListResourcesResult
  | ListResourceTemplatesResult
  | ReadResourceResult
  | ListToolsResult
  | CallToolResult
  | ListPromptsResult
  | GetPromptResult;

export type ServerNotification =
  | ResourceListChangedNotification
  | ResourceUpdatedNotification
  | ToolListChangedNotification
  | PromptListChangedNotification
  | LoggingMessageNotification;
