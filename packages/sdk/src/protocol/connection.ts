import type { ConnectionId } from "./types";
import type { Session } from "./session";
import type { Transport } from "./transport";

/**
 * Represents an attached transport and the session living on it.
 */
export interface Connection<TTransport extends Transport = Transport> {
  /**
   * Unique identifier for this connection.
   */
  readonly id: ConnectionId;

  readonly session: Session;

  /**
   * The underlying transport instance.
   */
  readonly transport: TTransport;

  /**
   * Settles once the receive loop has ended, in-flight handlers have finished
   * and the transport is disconnected. Never rejects.
   */
  readonly closed: Promise<void>;

  /**
   * Stops the receive loop, aborts the signal handed to in-flight handlers and
   * waits for `closed`.
   */
  close(): Promise<void>;
}
