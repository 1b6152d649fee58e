/**
 * Protocol Transport
 *
 * Duplex channel the Protocol pulls messages from and pushes messages to.
 * Implementations frame each message as one self-contained record.
 */

import type { DecodeError, JSONRPCMessage, RequestId, SessionId } from "./types";

export type IncomingMessageInfo<T extends object = object> = Readonly<T> & {
  readonly timestamp: Date;
};

/**
 * Outcome of one `receive` call.
 *
 * - `message`: a decoded envelope.
 * - `invalid`: a record that failed to decode; the session continues.
 * - `closed`: the stream ended or the wait was aborted; no further messages will arrive.
 */
export type ReceiveResult =
  | { readonly type: "message"; readonly message: JSONRPCMessage; readonly info: IncomingMessageInfo }
  | { readonly type: "invalid"; readonly error: DecodeError }
  | { readonly type: "closed" };

/**
 * Send options.
 */
export interface TransportSendOptions {
  readonly sessionId?: SessionId;
  readonly requestId?: RequestId;
}

export interface Transport<TOutgoingMessage extends JSONRPCMessage = JSONRPCMessage> {
  connect(): Promise<void>;

  /**
   * Writes one record. Concurrent calls never interleave their bytes.
   *
   * @throws TransportError when the underlying stream fails or is closed.
   */
  send(message: TOutgoingMessage, options?: TransportSendOptions): Promise<void>;

  /**
   * Waits for the next record. There is one logical reader per transport.
   *
   * @throws TransportError when the underlying stream fails.
   */
  receive(signal?: AbortSignal): Promise<ReceiveResult>;

  disconnect(): Promise<void>;
}
