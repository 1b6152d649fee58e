import { DEFAULT_MAX_CONCURRENCY, DEFAULT_MAX_MESSAGE_SIZE } from "capability-session-sdk";
import { isLogLevel, type LogLevel } from "./logger";

export type ServerConfig = {
  readonly name: string;
  readonly version: string;
  readonly logLevel: LogLevel;
  readonly maxConcurrency: number;
  readonly maxMessageSize: number;
};

type Environment = Record<string, string | undefined>;

const readNumber = (value: string | undefined, defaultValue: number): number => {
  if (!value) return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 1 ? parsed : defaultValue;
};

const readLogLevel = (value: string | undefined, defaultValue: LogLevel): LogLevel => {
  if (value === undefined) return defaultValue;
  const normalized = value.toLowerCase();
  return isLogLevel(normalized) ? normalized : defaultValue;
};

export const getServerConfig = (env: Environment = process.env): ServerConfig => {
  return {
    name: env.SESSION_SERVER_NAME ?? "Calculator",
    version: env.SESSION_SERVER_VERSION ?? "1.0.0",
    logLevel: readLogLevel(env.SESSION_LOG_LEVEL, "info"),
    maxConcurrency: readNumber(env.SESSION_MAX_CONCURRENCY, DEFAULT_MAX_CONCURRENCY),
    maxMessageSize: readNumber(env.SESSION_MAX_MESSAGE_SIZE, DEFAULT_MAX_MESSAGE_SIZE)
  };
};
