/**
 * Resources Feature
 *
 * Static resources keyed by exact URI and resource templates keyed by their
 * pattern. Reads try the exact URI first and fall back to the templates.
 */

import type { ListResourcesResult, ListResourceTemplatesResult, MessageContext, MessageInfo, ReadResourceResult, Resource, ResourceTemplate } from "../../protocol/types";
import { InternalError, InvalidParamsError, ProtocolError, toError } from "../../protocol/types";
import { Registry } from "../registry";
import { UriTemplate, type UriVariables } from "../uri-template";
import type { ResourceEntry, ResourceReader, ResourceTemplateEntry, ResourceTemplateReader } from "../types";

/**
 * Result of matching a URI against the registered templates.
 */
export interface TemplateMatch {
  readonly entry: ResourceTemplateEntry;
  readonly variables: UriVariables;
}

export class ResourcesFeature {
  readonly resources = new Registry<string, ResourceEntry>();
  readonly templates = new Registry<string, ResourceTemplateEntry>();

  constructor(
    initialResources?: { resource: Resource; read: ResourceReader }[],
    initialTemplates?: { template: ResourceTemplate; read: ResourceTemplateReader }[]
  ) {
    for (const { resource, read } of initialResources ?? []) {
      this.registerResource(resource, read);
    }
    for (const { template, read } of initialTemplates ?? []) {
      this.registerTemplate(template, read);
    }
  }

  /**
   * Registers a static resource. A resource already registered under the same URI is replaced.
   */
  registerResource(resource: Resource, read: ResourceReader): void {
    this.resources.register(resource.uri, { resource, read });
  }

  /**
   * Registers a resource template. A template with the same pattern is replaced.
   */
  registerTemplate(template: ResourceTemplate, read: ResourceTemplateReader): void {
    this.templates.register(template.uriTemplate, {
      template,
      matcher: UriTemplate.compile(template.uriTemplate),
      read
    });
  }

  /**
   * Static resources followed by the templates, each template listed with its pattern as `uri`.
   */
  listResources(): ListResourcesResult {
    const resources = this.resources.list().map((entry) => entry.resource);
    const templates = this.templates.list().map((entry) => describeTemplate(entry.template));
    return { resources: [...resources, ...templates] };
  }

  listTemplates(): ListResourceTemplatesResult {
    return { resourceTemplates: this.templates.list().map((entry) => entry.template) };
  }

  /**
   * Finds the first template, in registration order, whose pattern matches the URI.
   * When several templates match, which one wins depends only on that order.
   */
  match(uri: string): TemplateMatch | undefined {
    for (const entry of this.templates.list()) {
      const variables = entry.matcher.match(uri);
      if (variables) {
        return { entry, variables };
      }
    }
    return undefined;
  }

  async read(uri: string, context: MessageContext, info: MessageInfo): Promise<ReadResourceResult> {
    const reader = this.resolve(uri);
    if (!reader) {
      throw new InvalidParamsError(`Resource not found: ${uri}`);
    }

    try {
      return await reader(context, info);
    } catch (error) {
      if (error instanceof ProtocolError) {
        throw error;
      }
      throw new InternalError(`Error reading resource '${uri}': ${toError(error).message}`);
    }
  }

  private resolve(uri: string): ((context: MessageContext, info: MessageInfo) => Promise<ReadResourceResult>) | undefined {
    const entry = this.resources.lookup(uri);
    if (entry) {
      return (context, info) => entry.read(uri, context, info);
    }

    const matched = this.match(uri);
    if (matched) {
      return (context, info) => matched.entry.read(uri, matched.variables, context, info);
    }

    return undefined;
  }
}

function describeTemplate(template: ResourceTemplate): Resource {
  const resource: Resource = { uri: template.uriTemplate, name: template.name };
  if (template.description !== undefined) {
    resource.description = template.description;
  }
  if (template.mimeType !== undefined) {
    resource.mimeType = template.mimeType;
  }
  return resource;
}
