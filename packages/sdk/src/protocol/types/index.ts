export * from "./schema";
export * from "./errors";
export * from "./logger";
export * from "./id";
export * from "./handler";
