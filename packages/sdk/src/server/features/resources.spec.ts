import { ResourcesFeature } from "./resources";
import { Session } from "../../protocol/session";
import { NoopLogger } from "../../protocol/logger";
import { DefaultIdGenerator } from "../../protocol/id";
import { InternalError, InvalidParamsError, type MessageContext, type MessageInfo } from "../../protocol/types";

const context: MessageContext = { session: new Session("session-1"), logger: new NoopLogger(), id: new DefaultIdGenerator() };
const info: MessageInfo = { method: "resources/read", requestId: 1, sessionId: "session-1", timestamp: new Date(0), signal: new AbortController().signal };

describe("ResourcesFeature", () => {
  let feature: ResourcesFeature;

  beforeEach(() => {
    feature = new ResourcesFeature();
  });

  it("prefers an exact resource over a matching template", async () => {
    feature.registerTemplate({ uriTemplate: "user://{userId}", name: "User" }, async (uri) => ({ contents: [{ uri, text: "template" }] }));
    feature.registerResource({ uri: "user://me", name: "Me" }, async (uri) => ({ contents: [{ uri, text: "exact" }] }));

    expect(await feature.read("user://me", context, info)).toEqual({ contents: [{ uri: "user://me", text: "exact" }] });
    expect(await feature.read("user://7", context, info)).toEqual({ contents: [{ uri: "user://7", text: "template" }] });
  });

  it("uses the first registered template when several match", () => {
    feature.registerTemplate({ uriTemplate: "doc://{id}", name: "Document" }, async (uri) => ({ contents: [{ uri, text: "doc" }] }));
    feature.registerTemplate({ uriTemplate: "doc://{slug}", name: "Slug" }, async (uri) => ({ contents: [{ uri, text: "slug" }] }));

    const matched = feature.match("doc://readme");

    expect(matched?.entry.template.name).toBe("Document");
    expect(matched?.variables).toEqual({ id: "readme" });
  });

  it("throws InvalidParamsError for an unknown uri", async () => {
    await expect(feature.read("nothing://here", context, info)).rejects.toThrow(new InvalidParamsError("Resource not found: nothing://here"));
  });

  it("wraps reader faults in an InternalError", async () => {
    feature.registerResource({ uri: "about://server", name: "About" }, async () => {
      throw new Error("unavailable");
    });

    const error = await feature.read("about://server", context, info).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InternalError);
    expect(error).toHaveProperty("message", "Error reading resource 'about://server': unavailable");
  });

  it("lets protocol errors from a reader through unchanged", async () => {
    feature.registerTemplate({ uriTemplate: "user://{userId}", name: "User" }, async (_uri, variables) => {
      throw new InvalidParamsError(`Unknown user ${variables["userId"]}`);
    });

    await expect(feature.read("user://9", context, info)).rejects.toThrow("Unknown user 9");
  });

  it("lists templates as resources after the static resources", () => {
    feature.registerTemplate(
      { uriTemplate: "greeting://{name}", name: "Greeting", description: "Greets by name", mimeType: "text/plain" },
      async (uri) => ({ contents: [{ uri, text: "hi" }] })
    );
    feature.registerResource({ uri: "about://server", name: "About" }, async (uri) => ({ contents: [{ uri, text: "about" }] }));

    expect(feature.listResources()).toEqual({
      resources: [
        { uri: "about://server", name: "About" },
        { uri: "greeting://{name}", name: "Greeting", description: "Greets by name", mimeType: "text/plain" }
      ]
    });
    expect(feature.listTemplates()).toEqual({
      resourceTemplates: [{ uriTemplate: "greeting://{name}", name: "Greeting", description: "Greets by name", mimeType: "text/plain" }]
    });
  });

  it("accepts initial entries", () => {
    const seeded = new ResourcesFeature([{ resource: { uri: "a://1", name: "One" }, read: async (uri) => ({ contents: [{ uri, text: "1" }] }) }]);

    expect(seeded.listResources().resources).toEqual([{ uri: "a://1", name: "One" }]);
  });
});
