import { StandardSchemaValidator } from "./schema-validator";
import { CallToolRequestParamsSchema, SetLevelRequestParamsSchema, ValidationError } from "./types";

describe("StandardSchemaValidator", () => {
  const validator = new StandardSchemaValidator();

  it("returns the parsed value", async () => {
    await expect(validator.validate({ name: "calculate", arguments: { a: 1 } }, CallToolRequestParamsSchema)).resolves.toEqual({
      name: "calculate",
      arguments: { a: 1 }
    });
  });

  it("throws a ValidationError with one detail per issue", async () => {
    const error = await validator.validate({ level: "loud" }, SetLevelRequestParamsSchema).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ValidationError);
    if (!(error instanceof ValidationError)) {
      return;
    }
    expect(error.code).toBe(-32602);
    expect(error.message).toMatch(/^Invalid params: level: /);
    expect(error.validationErrors.map((detail) => detail.path)).toEqual(["level"]);
  });

  it("reports an issue on the value itself without a path", async () => {
    const error = await validator.validate("text", CallToolRequestParamsSchema).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ValidationError);
    if (!(error instanceof ValidationError)) {
      return;
    }
    expect(error.validationErrors.map((detail) => detail.path)).toEqual([""]);
    expect(error.data).toEqual([{ message: error.validationErrors[0].message }]);
  });
});
