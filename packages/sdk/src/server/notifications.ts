/**
 * Notification Emitter
 *
 * Server-initiated notifications. None of them carries an id and none is
 * answered. They may be sent any time a transport is attached, whether or not
 * the handshake has happened.
 */

import type { LoggingLevel, LoggingMessageNotificationParams, ServerNotification } from "../protocol/types";
import { JSONRPC_VERSION } from "../protocol/types";
import type { Connection } from "../protocol/connection";
import { isLevelEnabled } from "./features/logging";

/**
 * Where notifications go. The Server satisfies this.
 */
export interface NotificationSink {
  readonly connection: Connection | undefined;
  notify(notification: ServerNotification): Promise<void>;
}

export class NotificationEmitter {
  constructor(private readonly sink: NotificationSink) {}

  async resourceListChanged(): Promise<void> {
    await this.sink.notify({ jsonrpc: JSONRPC_VERSION, method: "notifications/resources/list_changed" });
  }

  async toolListChanged(): Promise<void> {
    await this.sink.notify({ jsonrpc: JSONRPC_VERSION, method: "notifications/tools/list_changed" });
  }

  async promptListChanged(): Promise<void> {
    await this.sink.notify({ jsonrpc: JSONRPC_VERSION, method: "notifications/prompts/list_changed" });
  }

  async resourceUpdated(uri: string): Promise<void> {
    await this.sink.notify({ jsonrpc: JSONRPC_VERSION, method: "notifications/resources/updated", params: { uri } });
  }

  /**
   * Sends a `notifications/message`, unless the client asked for a higher minimum level.
   *
   * @returns whether the message was sent.
   * @throws ConnectionError when no transport is attached.
   */
  async logMessage(level: LoggingLevel, data: unknown, logger?: string): Promise<boolean> {
    if (!isLevelEnabled(level, this.sink.connection?.session.logLevel)) {
      return false;
    }

    const params: LoggingMessageNotificationParams = logger === undefined ? { level, data } : { level, logger, data };
    await this.sink.notify({ jsonrpc: JSONRPC_VERSION, method: "notifications/message", params });
    return true;
  }

  debug(data: unknown, logger?: string): Promise<boolean> {
    return this.logMessage("debug", data, logger);
  }

  info(data: unknown, logger?: string): Promise<boolean> {
    return this.logMessage("info", data, logger);
  }

  warning(data: unknown, logger?: string): Promise<boolean> {
    return this.logMessage("warning", data, logger);
  }

  error(data: unknown, logger?: string): Promise<boolean> {
    return this.logMessage("error", data, logger);
  }
}
