/**
 * Session
 *
 * Per-connection state: the handshake flag, what the client told us during
 * `initialize` and the log level it asked for.
 */

import type { ClientCapabilities, Implementation, LoggingLevel, SessionId } from "./types";

export enum SessionState {
  Created = "created",
  Initialized = "initialized",
  Closed = "closed"
}

/**
 * Session initialization data.
 */
export interface SessionInitializeData {
  readonly protocolVersion: string;
  readonly clientInfo?: Implementation;
  readonly clientCapabilities: ClientCapabilities;
}

export class Session {
  private currentState = SessionState.Created;
  private initialized = false;
  private initializeData?: SessionInitializeData;
  private level?: LoggingLevel;

  constructor(readonly id: SessionId) {}

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * True once `initialize` has succeeded. Never returns to false, even after close.
   */
  get isInitialized(): boolean {
    return this.initialized;
  }

  get protocolVersion(): string | undefined {
    return this.initializeData?.protocolVersion;
  }

  get clientInfo(): Implementation | undefined {
    return this.initializeData?.clientInfo;
  }

  get clientCapabilities(): ClientCapabilities | undefined {
    return this.initializeData?.clientCapabilities;
  }

  /**
   * Minimum level of `notifications/message` the client wants; undefined sends everything.
   */
  get logLevel(): LoggingLevel | undefined {
    return this.level;
  }

  /**
   * Performs the one-time handshake transition.
   *
   * @returns true for the call that performed the transition, false for every later call.
   */
  markInitialized(data: SessionInitializeData): boolean {
    if (this.initialized || this.currentState === SessionState.Closed) {
      return false;
    }
    this.initialized = true;
    this.initializeData = data;
    this.currentState = SessionState.Initialized;
    return true;
  }

  setLogLevel(level: LoggingLevel): void {
    this.level = level;
  }

  close(): void {
    this.currentState = SessionState.Closed;
  }
}
