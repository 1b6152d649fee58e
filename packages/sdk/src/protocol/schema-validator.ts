// =============================================================================
// Schema Validator Interface
// =============================================================================

import type { StandardSchemaV1 } from "@standard-schema/spec";
import { createValidationErrorDetail, ValidationError } from "./types";

export type JsonSchema<TInput = unknown, TOutput = TInput> = StandardSchemaV1<TInput, TOutput>;

export interface SchemaValidator {
  /**
   * Validates a value against the schema and returns the parsed output.
   *
   * @throws ValidationError when the value does not match.
   */
  validate<TOutput>(value: unknown, schema: JsonSchema<unknown, TOutput>): Promise<TOutput>;
}

/**
 * Validates against any Standard Schema implementation (zod, valibot, arktype, ...).
 */
export class StandardSchemaValidator implements SchemaValidator {
  public async validate<TOutput>(value: unknown, schema: JsonSchema<unknown, TOutput>): Promise<TOutput> {
    let result = schema["~standard"].validate(value);
    if (result instanceof Promise) {
      result = await result;
    }

    if (result.issues) {
      const details = result.issues.map((issue: StandardSchemaV1.Issue) => {
        const path = (issue.path ?? [])
          .map((segment: PropertyKey | StandardSchemaV1.PathSegment) => (typeof segment === "object" ? segment.key : segment))
          .map((segment: PropertyKey) => String(segment))
          .join(".");
        return createValidationErrorDetail(path, issue.message);
      });
      const summary = details.map((detail) => (detail.path ? `${detail.path}: ${detail.message}` : detail.message)).join("; ");
      throw new ValidationError(`Invalid params: ${summary || "schema validation failed"}`, details);
    }

    return result.value;
  }
}
