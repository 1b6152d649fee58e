/**
 * Server
 *
 * Answers client requests for one session at a time.
 *
 * The Server class:
 * - Extends Protocol with the server's outgoing notification types
 * - Rejects every request except `initialize` until the session is initialized
 * - Routes requests through a fixed, compile-time exhaustive route table
 * - Owns the resource, template, tool and prompt registries
 */

import type {
  Implementation,
  JSONRPCNotification,
  JSONRPCRequest,
  MessageContext,
  MessageInfo,
  Result,
  ServerCapabilities,
  ServerNotification
} from "../protocol/types";
import {
  CallToolRequestParamsSchema,
  EmptyRequestParamsSchema,
  GetPromptRequestParamsSchema,
  InitializeRequestParamsSchema,
  MethodNotFoundError,
  PaginatedRequestParamsSchema,
  ReadResourceRequestParamsSchema,
  ServerNotInitializedError,
  SetLevelRequestParamsSchema
} from "../protocol/types";
import { Protocol } from "../protocol/protocol";
import { DEFAULT_SERVER_CAPABILITIES } from "../protocol/constants";
import type { JsonSchema } from "../protocol/schema-validator";
import type { RequestHandler } from "../protocol/types";
import type { ClientRequestMethod, ParamsOf, RequestRoutes, ResultOf, Route, ServerOptions } from "./types";
import { ResourcesFeature, ToolsFeature, PromptsFeature, handlePing, handleSetLevel } from "./features";
import { NotificationEmitter } from "./notifications";
import * as lifecycle from "./lifecycle";

// =============================================================================
// Server Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const server = new Server({
 *   serverInfo: { name: "my-server", version: "1.0.0" },
 *   instructions: "This server provides..."
 * });
 *
 * server.tools.registerTool(tool, async (args) => ({ content: [{ type: "text", text: "done" }] }));
 *
 * await server.connect(transport);
 * ```
 */
export class Server extends Protocol<ServerNotification> {
  /**
   * Server implementation info sent in the initialize result.
   */
  readonly serverInfo: Implementation;

  /**
   * Server capabilities advertised in the initialize result.
   */
  readonly capabilities: ServerCapabilities;

  /**
   * Optional model instructions sent in the initialize result.
   */
  readonly instructions?: string;

  readonly resources: ResourcesFeature;
  readonly tools: ToolsFeature;
  readonly prompts: PromptsFeature;

  /**
   * Server-initiated notifications for the attached session.
   */
  readonly notifications: NotificationEmitter;

  private readonly routes: RequestRoutes;

  constructor(readonly serverOptions: ServerOptions) {
    super(serverOptions);

    this.serverInfo = serverOptions.serverInfo;
    this.capabilities = serverOptions.capabilities ?? { ...DEFAULT_SERVER_CAPABILITIES };
    this.instructions = serverOptions.instructions;

    this.resources = new ResourcesFeature();
    this.tools = new ToolsFeature();
    this.prompts = new PromptsFeature();
    this.notifications = new NotificationEmitter(this);

    this.routes = this.createRoutes();
  }

  protected async handleRequest(request: JSONRPCRequest, context: MessageContext, info: MessageInfo): Promise<Result> {
    const method = request.method;

    if (isInitializedMethod(method)) {
      // sent as a request by some clients; acknowledged like the notification
      await lifecycle.handleInitialized(this, context);
      return {};
    }

    if (!context.session.isInitialized && method !== "initialize") {
      throw new ServerNotInitializedError();
    }

    if (!isRoutedMethod(this.routes, method)) {
      throw new MethodNotFoundError(method);
    }

    return await this.routes[method].dispatch(request.params, context, info);
  }

  protected async handleNotification(notification: JSONRPCNotification, context: MessageContext, info: MessageInfo): Promise<void> {
    if (isInitializedMethod(notification.method)) {
      await lifecycle.handleInitialized(this, context);
      return;
    }

    context.logger.debug("Ignoring unhandled notification", { sessionId: info.sessionId, method: notification.method });
  }

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  private createRoutes(): RequestRoutes {
    return {
      initialize: this.route("initialize", InitializeRequestParamsSchema, (params, context) => lifecycle.handleInitialize(this, params, context)),
      ping: this.route("ping", EmptyRequestParamsSchema, handlePing),
      "resources/list": this.route("resources/list", PaginatedRequestParamsSchema.optional(), async () => this.resources.listResources()),
      "resources/templates/list": this.route("resources/templates/list", PaginatedRequestParamsSchema.optional(), async () =>
        this.resources.listTemplates()
      ),
      "resources/read": this.route("resources/read", ReadResourceRequestParamsSchema, (params, context, info) =>
        this.resources.read(params.uri, context, info)
      ),
      "tools/list": this.route("tools/list", PaginatedRequestParamsSchema.optional(), async () => this.tools.listTools()),
      "tools/call": this.route("tools/call", CallToolRequestParamsSchema, (params, context, info) =>
        this.tools.call(params.name, params.arguments ?? {}, context, info)
      ),
      "prompts/list": this.route("prompts/list", PaginatedRequestParamsSchema.optional(), async () => this.prompts.listPrompts()),
      "prompts/get": this.route("prompts/get", GetPromptRequestParamsSchema, (params, context, info) =>
        this.prompts.get(params.name, params.arguments ?? {}, context, info)
      ),
      "logging/setLevel": this.route("logging/setLevel", SetLevelRequestParamsSchema, handleSetLevel)
    };
  }

  private route<M extends ClientRequestMethod>(
    method: M,
    schema: JsonSchema<unknown, ParamsOf<M>>,
    handle: RequestHandler<ParamsOf<M>, ResultOf<M>>
  ): Route<M> {
    return {
      method,
      dispatch: async (params, context, info) => handle(await this.validate(params, schema), context, info)
    };
  }
}

function isInitializedMethod(method: string): boolean {
  return method === "notifications/initialized" || method === "initialized";
}

function isRoutedMethod(routes: RequestRoutes, method: string): method is ClientRequestMethod {
  return Object.prototype.hasOwnProperty.call(routes, method);
}
