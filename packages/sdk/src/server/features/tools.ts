/**
 * Tools Feature
 *
 * Manages tool registration and execution.
 */

import type { CallToolResult, ListToolsResult, MessageContext, MessageInfo, Tool } from "../../protocol/types";
import { InvalidParamsError, toError } from "../../protocol/types";
import { Registry } from "../registry";
import type { ToolCallback, ToolEntry } from "../types";

export class ToolsFeature {
  readonly tools = new Registry<string, ToolEntry>();

  constructor(initialTools?: { tool: Tool; execute: ToolCallback }[]) {
    for (const { tool, execute } of initialTools ?? []) {
      this.registerTool(tool, execute);
    }
  }

  /**
   * Registers a tool. A tool already registered under the same name is replaced.
   */
  registerTool(tool: Tool, execute: ToolCallback): void {
    this.tools.register(tool.name, { tool, execute });
  }

  listTools(): ListToolsResult {
    return { tools: this.tools.list().map((entry) => entry.tool) };
  }

  /**
   * Runs a tool. A failure inside the tool is reported in the result with
   * `isError: true`; only an unknown name is a protocol error.
   */
  async call(name: string, args: { [key: string]: unknown }, context: MessageContext, info: MessageInfo): Promise<CallToolResult> {
    const entry = this.tools.lookup(name);
    if (!entry) {
      throw new InvalidParamsError(`Tool not found: ${name}`);
    }

    try {
      return await entry.execute(args, context, info);
    } catch (error) {
      context.logger.warn("Tool failed", { sessionId: context.session.id, method: "tools/call", tool: name });
      return {
        content: [
          {
            type: "text",
            text: `Error executing tool '${name}': ${toError(error).message}`
          }
        ],
        isError: true
      };
    }
  }
}
