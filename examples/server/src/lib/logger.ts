import type { ErrorContext, LogContext, Logger } from "capability-session-sdk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const isLogLevel = (value: string): value is LogLevel => Object.prototype.hasOwnProperty.call(levelOrder, value);

type Output = Pick<Console, "error">;

/**
 * Level-filtered logger on standard error. Standard output belongs to the transport.
 */
export const createConsoleLogger = (level: LogLevel = "info", output: Output = console): Logger => {
  const min = levelOrder[level];

  const write = (lvl: LogLevel, message: string, meta?: LogContext | ErrorContext) => {
    if (levelOrder[lvl] < min) return;
    const prefix = `[session-example][${lvl}]`;
    if (meta === undefined) {
      output.error(prefix, message);
    } else {
      output.error(prefix, message, meta);
    }
  };

  return {
    debug: (m, meta) => write("debug", m, meta),
    info: (m, meta) => write("info", m, meta),
    warn: (m, meta) => write("warn", m, meta),
    error: (m, err, meta) => write("error", m, { ...meta, error: err.message })
  };
};
