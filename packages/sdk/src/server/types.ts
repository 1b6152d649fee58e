/**
 * Server Types
 *
 * Handler shapes for registered capabilities, the typed route table and the
 * server options.
 */

import type {
  CallToolResult,
  ClientCapabilities,
  ClientRequest,
  EmptyResult,
  GetPromptResult,
  Implementation,
  InitializeResult,
  ListPromptsResult,
  ListResourcesResult,
  ListResourceTemplatesResult,
  ListToolsResult,
  MessageContext,
  MessageInfo,
  Prompt,
  ReadResourceResult,
  Resource,
  ResourceTemplate,
  ServerCapabilities,
  Tool
} from "../protocol/types";
import type { Session } from "../protocol/session";
import type { ProtocolOptions } from "../protocol/protocol";
import type { UriTemplate, UriVariables } from "./uri-template";

// =============================================================================
// Capability Handlers
// =============================================================================

/**
 * Produces the contents of a static resource.
 */
export type ResourceReader = (uri: string, context: MessageContext, info: MessageInfo) => Promise<ReadResourceResult>;

/**
 * Produces the contents of a resource addressed through a template.
 * `variables` holds the captured placeholder values.
 */
export type ResourceTemplateReader = (
  uri: string,
  variables: UriVariables,
  context: MessageContext,
  info: MessageInfo
) => Promise<ReadResourceResult>;

/**
 * Runs a tool. A thrown error is reported to the client as an error-flagged result.
 */
export type ToolCallback = (args: { [key: string]: unknown }, context: MessageContext, info: MessageInfo) => Promise<CallToolResult>;

/**
 * Renders a prompt from its arguments.
 */
export type PromptCallback = (args: { [key: string]: string }, context: MessageContext, info: MessageInfo) => Promise<GetPromptResult>;

// =============================================================================
// Registry Entries
// =============================================================================

export interface ResourceEntry {
  readonly resource: Resource;
  readonly read: ResourceReader;
}

export interface ResourceTemplateEntry {
  readonly template: ResourceTemplate;
  readonly matcher: UriTemplate;
  readonly read: ResourceTemplateReader;
}

export interface ToolEntry {
  readonly tool: Tool;
  readonly execute: ToolCallback;
}

export interface PromptEntry {
  readonly prompt: Prompt;
  readonly render: PromptCallback;
}

// =============================================================================
// Route Table
// =============================================================================

export type ClientRequestMethod = ClientRequest["method"];

/**
 * Result payload of every routed method. Indexing it with a method that has
 * no entry fails to compile, which keeps the route table exhaustive.
 */
export interface ServerResultMap {
  initialize: InitializeResult;
  ping: EmptyResult;
  "resources/list": ListResourcesResult;
  "resources/templates/list": ListResourceTemplatesResult;
  "resources/read": ReadResourceResult;
  "tools/list": ListToolsResult;
  "tools/call": CallToolResult;
  "prompts/list": ListPromptsResult;
  "prompts/get": GetPromptResult;
  "logging/setLevel": EmptyResult;
}

export type ParamsOf<M extends ClientRequestMethod> = Extract<ClientRequest, { method: M }>["params"];

export type ResultOf<M extends ClientRequestMethod> = ServerResultMap[M];

/**
 * One entry of the route table, tagged by its method. `dispatch` validates the
 * raw params before handing them to the typed handler.
 */
export interface Route<M extends ClientRequestMethod> {
  readonly method: M;
  readonly dispatch: (params: unknown, context: MessageContext, info: MessageInfo) => Promise<ResultOf<M>>;
}

export type RequestRoutes = { readonly [M in ClientRequestMethod]: Route<M> };

// =============================================================================
// Server Options
// =============================================================================

/**
 * Configuration options for the Server.
 */
export type ServerOptions = ProtocolOptions & {
  /**
   * Server implementation information.
   * Sent to clients during initialization.
   */
  readonly serverInfo: Implementation;

  /**
   * Server capabilities to advertise.
   * @default { resources: {}, tools: {}, prompts: {}, logging: {} }
   */
  readonly capabilities?: ServerCapabilities;

  /**
   * Optional instructions for the model using this server.
   * Included in the initialize response.
   */
  readonly instructions?: string;

  /**
   * Callback invoked once per session, by the initialize request that initialized it.
   */
  readonly onInitialize?: (data: InitializeCallbackData, session: Session) => Promise<void> | void;

  /**
   * Callback invoked for every `initialized` notification.
   */
  readonly onInitialized?: (session: Session) => Promise<void> | void;
};

/**
 * Data provided to the onInitialize callback.
 */
export interface InitializeCallbackData {
  /** Protocol version advertised back to the client */
  readonly protocolVersion: string;
  /** Protocol version the client asked for, if it named one */
  readonly requestedProtocolVersion?: string;
  /** Client implementation info, if the client sent it */
  readonly clientInfo?: Implementation;
  /** Client capabilities */
  readonly clientCapabilities: ClientCapabilities;
}
