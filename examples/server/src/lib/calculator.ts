import { z } from "zod";
import type { server } from "capability-session-sdk";

export const CALCULATOR_INPUT_SCHEMA = {
  type: "object",
  properties: {
    operation: {
      type: "string",
      enum: ["add", "subtract", "multiply", "divide"],
      description: "Operation to perform"
    },
    a: { type: "number", description: "First operand" },
    b: { type: "number", description: "Second operand" }
  },
  required: ["operation", "a", "b"]
} as const;

const CalculateArgsSchema = z.object({
  operation: z.string(),
  a: z.number(),
  b: z.number()
});

export const calculate = (operation: string, a: number, b: number): number => {
  switch (operation) {
    case "add":
      return a + b;
    case "subtract":
      return a - b;
    case "multiply":
      return a * b;
    case "divide":
      if (b === 0) {
        throw new Error("division by zero");
      }
      return a / b;
    default:
      throw new Error(`unknown operation: ${operation}`);
  }
};

export const registerCalculator = (target: server.SimpleServer): void => {
  target.tool(
    {
      name: "calculate",
      description: "Perform a calculation",
      inputSchema: {
        type: "object",
        properties: CALCULATOR_INPUT_SCHEMA.properties,
        required: [...CALCULATOR_INPUT_SCHEMA.required]
      }
    },
    async (args) => {
      const parsed = CalculateArgsSchema.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
        throw new Error(`invalid arguments: ${issues.join("; ")}`);
      }

      const { operation, a, b } = parsed.data;
      return `Result: ${calculate(operation, a, b)}`;
    }
  );
};
