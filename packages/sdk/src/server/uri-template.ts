/**
 * URI Template
 *
 * Compiles patterns such as `user://{userId}/posts/{postId}` into anchored
 * matchers. Each `{name}` placeholder captures one non-empty segment that
 * contains no "/"; every other character matches itself.
 *
 * @example
 * ```typescript
 * const template = UriTemplate.compile("user://{userId}");
 * template.match("user://42"); // { userId: "42" }
 * template.match("user://42/extra"); // undefined
 * ```
 */

export type UriVariables = Record<string, string>;

export class UriTemplate {
  private constructor(
    readonly template: string,
    readonly variableNames: readonly string[],
    private readonly pattern: RegExp
  ) {}

  static compile(template: string): UriTemplate {
    const names: string[] = [];
    let source = "^";
    let cursor = 0;

    const placeholder = /\{([^{}]+)\}/g;
    let match: RegExpExecArray | null;
    while ((match = placeholder.exec(template)) !== null) {
      source += escapeRegExp(template.slice(cursor, match.index));
      source += "([^/]+)";
      names.push(match[1]);
      cursor = match.index + match[0].length;
    }
    source += escapeRegExp(template.slice(cursor)) + "$";

    return new UriTemplate(template, Object.freeze(names), new RegExp(source));
  }

  /**
   * Matches the whole URI against the template.
   *
   * @returns the captured values keyed by placeholder name, in declaration order, or undefined.
   */
  match(uri: string): UriVariables | undefined {
    const result = this.pattern.exec(uri);
    if (!result) {
      return undefined;
    }

    const variables: UriVariables = {};
    this.variableNames.forEach((name, index) => {
      variables[name] = result[index + 1];
    });
    return variables;
  }

  toString(): string {
    return this.template;
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
