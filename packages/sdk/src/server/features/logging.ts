/**
 * Logging Feature
 *
 * Severity ordering for `notifications/message` and the `logging/setLevel` handler.
 */

import type { EmptyResult, LoggingLevel, MessageContext } from "../../protocol/types";

/**
 * Levels from least to most severe.
 */
export const LOGGING_LEVELS: readonly LoggingLevel[] = ["debug", "info", "notice", "warning", "error", "critical", "alert", "emergency"];

export function severityOf(level: LoggingLevel): number {
  return LOGGING_LEVELS.indexOf(level);
}

/**
 * Whether a message at `level` passes the threshold. No threshold lets everything through.
 */
export function isLevelEnabled(level: LoggingLevel, threshold: LoggingLevel | undefined): boolean {
  return threshold === undefined || severityOf(level) >= severityOf(threshold);
}

export async function handleSetLevel(params: { level: LoggingLevel }, context: MessageContext): Promise<EmptyResult> {
  context.session.setLogLevel(params.level);
  context.logger.debug("Log level set", { sessionId: context.session.id, level: params.level });
  return {};
}
