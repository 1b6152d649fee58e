/**
 * Wire types, constants and runtime schemas shared by the session engine.
 *
 * @packageDocumentation
 */

export * from "./lib/schema";
export * from "./lib/zod";
