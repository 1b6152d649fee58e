/**
 * In-Memory Transport
 *
 * Two linked transports in one process. Every message is encoded on send and
 * decoded on arrival, so ids, numbers and omitted fields behave as they would
 * on the wire.
 *
 * @example
 * ```typescript
 * const [clientSide, serverSide] = InMemoryTransport.createLinkedPair();
 * await server.connect(serverSide);
 * await clientSide.connect();
 * await clientSide.send({ jsonrpc: "2.0", id: 1, method: "ping" });
 * const reply = await clientSide.receive();
 * ```
 */

import { decode, encode } from "./envelope";
import { ReceiveQueue } from "./receive-queue";
import { DecodeError, TransportError } from "./types";
import type { JSONRPCMessage } from "./types";
import type { ReceiveResult, Transport } from "./transport";

export class InMemoryTransport implements Transport {
  private peer?: InMemoryTransport;
  private readonly inbox = new ReceiveQueue();
  private connected = false;
  private closed = false;

  /**
   * Links two transports together so they can communicate.
   */
  static createLinkedPair(): [InMemoryTransport, InMemoryTransport] {
    const a = new InMemoryTransport();
    const b = new InMemoryTransport();
    a.peer = b;
    b.peer = a;
    return [a, b];
  }

  async connect(): Promise<void> {
    if (this.closed) {
      throw new TransportError("Transport is closed");
    }
    this.connected = true;
  }

  async send(message: JSONRPCMessage): Promise<void> {
    if (!this.connected) {
      throw new TransportError("Transport is not connected");
    }
    const peer = this.peer;
    if (!peer || peer.closed) {
      throw new TransportError("Peer transport is closed");
    }

    const record = encode(message);

    // Simulate async message delivery
    await Promise.resolve();

    peer.pushRecord(record);
  }

  /**
   * Queues a raw record as if the peer had sent it. Records that fail to
   * decode surface as `invalid` receive results.
   */
  pushRecord(record: string): void {
    try {
      this.inbox.push({ type: "message", message: decode(record), info: { timestamp: new Date() } });
    } catch (error) {
      if (!(error instanceof DecodeError)) {
        throw error;
      }
      this.inbox.push({ type: "invalid", error });
    }
  }

  receive(signal?: AbortSignal): Promise<ReceiveResult> {
    return this.inbox.next(signal);
  }

  async disconnect(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.connected = false;
    this.inbox.end();
    this.peer?.inbox.end();
  }
}
