import { randomUUID } from "node:crypto";
import type { IdGenerator, IdGeneratorOptions } from "./types/id";

/**
 * Default implementation of IdGenerator using UUIDs.
 */
export class DefaultIdGenerator implements IdGenerator {
  generate(options?: IdGeneratorOptions): string {
    const id = randomUUID();
    return options?.prefix ? `${options.prefix}-${id}` : id;
  }
}
