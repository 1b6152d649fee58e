import { UriTemplate } from "./uri-template";

describe("UriTemplate", () => {
  it("captures a placeholder value", () => {
    const template = UriTemplate.compile("user://{userId}");

    expect(template.match("user://42")).toEqual({ userId: "42" });
  });

  it("does not let a placeholder span a slash", () => {
    expect(UriTemplate.compile("user://{userId}").match("user://42/extra")).toBeUndefined();
  });

  it("requires a non-empty segment", () => {
    expect(UriTemplate.compile("user://{userId}").match("user://")).toBeUndefined();
  });

  it("anchors the match at both ends", () => {
    const template = UriTemplate.compile("user://{userId}/profile");

    expect(template.match("x-user://42/profile")).toBeUndefined();
    expect(template.match("user://42/profile.json")).toBeUndefined();
    expect(template.match("user://42/profile")).toEqual({ userId: "42" });
  });

  it("captures several placeholders in declaration order", () => {
    const template = UriTemplate.compile("repo://{owner}/{name}/issues/{number}");

    expect(template.variableNames).toEqual(["owner", "name", "number"]);
    expect(Object.entries(template.match("repo://acme/widgets/issues/7") ?? {})).toEqual([
      ["owner", "acme"],
      ["name", "widgets"],
      ["number", "7"]
    ]);
  });

  it("matches regular expression characters literally", () => {
    const template = UriTemplate.compile("file:///logs/{day}.log?(raw)");

    expect(template.match("file:///logs/monday.log?(raw)")).toEqual({ day: "monday" });
    expect(template.match("file:///logs/mondayxlog(raw)")).toBeUndefined();
  });

  it("matches a pattern without placeholders only against itself", () => {
    const template = UriTemplate.compile("about://server");

    expect(template.match("about://server")).toEqual({});
    expect(template.match("about://server2")).toBeUndefined();
  });

  it("renders back to its source pattern", () => {
    expect(String(UriTemplate.compile("greeting://{name}"))).toBe("greeting://{name}");
  });
});
