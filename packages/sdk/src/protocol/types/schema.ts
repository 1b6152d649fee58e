export * from "../schema";

export type SessionId = string;
export type ConnectionId = string;
