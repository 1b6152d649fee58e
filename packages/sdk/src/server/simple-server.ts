/**
 * Simple Server
 *
 * A thin facade over {@link Server} for capabilities that produce plain text.
 * Resource and template readers return the text of the single content item,
 * tool callbacks return the text of a single text block, and prompt callbacks
 * return the messages.
 *
 * @example
 * ```typescript
 * const server = new SimpleServer({ serverInfo: { name: "notes", version: "1.0.0" } });
 *
 * server.resourceTemplate({ name: "Note", uriTemplate: "note://{id}", mimeType: "text/plain" }, async ({ id }) => notes.get(id));
 * server.tool({ name: "echo", inputSchema: { type: "object" } }, async (args) => String(args["text"]));
 *
 * await server.connect(new StdioServerTransport());
 * ```
 */

import type { LoggingLevel, MessageInfo, Prompt, PromptMessage, Resource, ResourceTemplate, Tool } from "../protocol/types";
import type { Connection } from "../protocol/connection";
import type { ConnectOptions } from "../protocol/protocol";
import type { Transport } from "../protocol/transport";
import { Server } from "./server";
import type { ServerOptions } from "./types";
import type { UriVariables } from "./uri-template";

export type TextResourceHandler = (info: MessageInfo) => Promise<string>;

export type TextTemplateHandler = (variables: UriVariables, info: MessageInfo) => Promise<string>;

export type TextToolHandler = (args: { [key: string]: unknown }, info: MessageInfo) => Promise<string>;

export type PromptMessagesHandler = (args: { [key: string]: string }, info: MessageInfo) => Promise<PromptMessage[]>;

export class SimpleServer {
  readonly server: Server;

  constructor(options: ServerOptions) {
    this.server = new Server(options);
  }

  resource(resource: Resource, handler: TextResourceHandler): void {
    this.server.resources.registerResource(resource, async (uri, _context, info) => ({
      contents: [textContents(uri, await handler(info), resource.mimeType)]
    }));
  }

  resourceTemplate(template: ResourceTemplate, handler: TextTemplateHandler): void {
    this.server.resources.registerTemplate(template, async (uri, variables, _context, info) => ({
      contents: [textContents(uri, await handler(variables, info), template.mimeType)]
    }));
  }

  tool(tool: Tool, handler: TextToolHandler): void {
    this.server.tools.registerTool(tool, async (args, _context, info) => ({
      content: [{ type: "text", text: await handler(args, info) }]
    }));
  }

  prompt(prompt: Prompt, handler: PromptMessagesHandler): void {
    this.server.prompts.registerPrompt(prompt, async (args, _context, info) => {
      const messages = await handler(args, info);
      return prompt.description === undefined ? { messages } : { description: prompt.description, messages };
    });
  }

  connect(transport: Transport, options?: ConnectOptions): Promise<Connection> {
    return this.server.connect(transport, options);
  }

  close(): Promise<void> {
    return this.server.close();
  }

  log(level: LoggingLevel, data: unknown, logger?: string): Promise<boolean> {
    return this.server.notifications.logMessage(level, data, logger);
  }

  logDebug(data: unknown, logger?: string): Promise<boolean> {
    return this.server.notifications.debug(data, logger);
  }

  logInfo(data: unknown, logger?: string): Promise<boolean> {
    return this.server.notifications.info(data, logger);
  }

  logWarning(data: unknown, logger?: string): Promise<boolean> {
    return this.server.notifications.warning(data, logger);
  }

  logError(data: unknown, logger?: string): Promise<boolean> {
    return this.server.notifications.error(data, logger);
  }
}

function textContents(uri: string, text: string, mimeType: string | undefined): { uri: string; mimeType?: string; text: string } {
  return mimeType === undefined ? { uri, text } : { uri, mimeType, text };
}
