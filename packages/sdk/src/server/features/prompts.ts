/**
 * Prompts Feature
 *
 * Manages prompt registration and rendering.
 */

import type { GetPromptResult, ListPromptsResult, MessageContext, MessageInfo, Prompt } from "../../protocol/types";
import { InternalError, InvalidParamsError, ProtocolError, toError } from "../../protocol/types";
import { Registry } from "../registry";
import type { PromptCallback, PromptEntry } from "../types";

export class PromptsFeature {
  readonly prompts = new Registry<string, PromptEntry>();

  constructor(initialPrompts?: { prompt: Prompt; render: PromptCallback }[]) {
    for (const { prompt, render } of initialPrompts ?? []) {
      this.registerPrompt(prompt, render);
    }
  }

  /**
   * Registers a prompt. A prompt already registered under the same name is replaced.
   */
  registerPrompt(prompt: Prompt, render: PromptCallback): void {
    this.prompts.register(prompt.name, { prompt, render });
  }

  listPrompts(): ListPromptsResult {
    return { prompts: this.prompts.list().map((entry) => entry.prompt) };
  }

  async get(name: string, args: { [key: string]: string }, context: MessageContext, info: MessageInfo): Promise<GetPromptResult> {
    const entry = this.prompts.lookup(name);
    if (!entry) {
      throw new InvalidParamsError(`Prompt not found: ${name}`);
    }

    for (const argument of entry.prompt.arguments ?? []) {
      if (argument.required && args[argument.name] === undefined) {
        throw new InvalidParamsError(`Missing required argument '${argument.name}' for prompt '${name}'`);
      }
    }

    try {
      return await entry.render(args, context, info);
    } catch (error) {
      if (error instanceof ProtocolError) {
        throw error;
      }
      throw new InternalError(`Error getting prompt '${name}': ${toError(error).message}`);
    }
  }
}
