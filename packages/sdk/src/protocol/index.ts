export * from "./types";
export * from "./assertions";
export * from "./concurrency";
export * from "./connection";
export * from "./constants";
export * from "./envelope";
export * from "./id";
export * from "./in-memory-transport";
export * from "./logger";
export * from "./protocol";
export * from "./receive-queue";
export * from "./schema-validator";
export * from "./session";
export * from "./transport";
