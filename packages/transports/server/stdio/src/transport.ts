/**
 * @fileoverview Stdio Server Transport
 *
 * Newline-delimited JSON over a readable and a writable stream, standard input
 * and standard output by default. Each message is one line of compact JSON
 * followed by `\n`.
 *
 * ## Reading
 *
 * Incoming bytes are split into lines as they arrive and decoded into a
 * receive queue. Input is paused while `highWaterMark` results are waiting and
 * resumed as the session takes them. A line that is not a JSON-RPC message, or
 * is longer than `maxMessageSize`, becomes an `invalid` receive result; the
 * stream keeps going.
 *
 * ## Writing
 *
 * Sends are serialized through a mutex and each one waits for its write to be
 * flushed, so records never interleave.
 *
 * @module transport
 */

import type { Readable, Writable } from "node:stream";

import {
  DEFAULT_MAX_MESSAGE_SIZE,
  DEFAULT_RECEIVE_HIGH_WATER_MARK,
  DecodeError,
  Mutex,
  NoopLogger,
  ReceiveQueue,
  TransportError,
  decode,
  encode,
  salvageId,
  toError,
  type JSONRPCMessage,
  type Logger,
  type ReceiveResult,
  type Transport
} from "capability-session-sdk";

import { ReadBuffer } from "./read-buffer";

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration options for the transport.
 */
export interface StdioServerTransportOptions {
  /** Stream messages are read from. Defaults to `process.stdin`. */
  readonly input?: Readable;

  /** Stream messages are written to. Defaults to `process.stdout`. */
  readonly output?: Writable;

  /** Longest accepted line in bytes, terminator excluded. */
  readonly maxMessageSize?: number;

  /** Decoded results buffered before input is paused. */
  readonly highWaterMark?: number;

  readonly logger?: Logger;
}

// =============================================================================
// Transport
// =============================================================================

export class StdioServerTransport implements Transport {
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly maxMessageSize: number;
  private readonly highWaterMark: number;
  private readonly logger: Logger;

  private readonly buffer: ReadBuffer;
  private readonly queue = new ReceiveQueue();
  private readonly mutex = new Mutex();

  private started = false;
  private closed = false;
  private paused = false;

  constructor(options: StdioServerTransportOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.maxMessageSize = options.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE;
    this.highWaterMark = options.highWaterMark ?? DEFAULT_RECEIVE_HIGH_WATER_MARK;
    this.logger = options.logger ?? new NoopLogger();
    this.buffer = new ReadBuffer(this.maxMessageSize);
  }

  async connect(): Promise<void> {
    if (this.closed) {
      throw new TransportError("Transport is closed");
    }
    if (this.started) {
      throw new TransportError("Transport already connected");
    }
    this.started = true;

    this.input.on("data", this.onData);
    this.input.on("end", this.onEnd);
    this.input.on("error", this.onInputError);
    this.output.on("error", this.onOutputError);

    this.logger.debug("Stdio transport connected", { component: "stdio-transport" });
  }

  async send(message: JSONRPCMessage): Promise<void> {
    if (!this.started || this.closed) {
      throw new TransportError("Transport is not connected");
    }

    const record = `${encode(message)}\n`;
    await this.mutex.runExclusive(() => this.write(record));
  }

  async receive(signal?: AbortSignal): Promise<ReceiveResult> {
    const result = await this.queue.next(signal);

    if (this.paused && this.queue.size < this.highWaterMark) {
      this.paused = false;
      this.input.resume();
      this.logger.debug("Input resumed", { component: "stdio-transport" });
    }

    return result;
  }

  async disconnect(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    this.input.off("data", this.onData);
    this.input.off("end", this.onEnd);
    this.input.off("error", this.onInputError);
    this.output.off("error", this.onOutputError);
    this.input.pause();
    this.buffer.clear();
    this.queue.end();

    this.logger.debug("Stdio transport disconnected", { component: "stdio-transport" });
  }

  // ---------------------------------------------------------------------------
  // Stream events
  // ---------------------------------------------------------------------------

  private readonly onData = (chunk: Buffer | string): void => {
    this.buffer.append(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);

    for (let event = this.buffer.next(); event; event = this.buffer.next()) {
      if (event.type === "overflow") {
        this.queue.push({
          type: "invalid",
          error: new DecodeError(`Message of ${event.size} bytes exceeds the maximum of ${this.maxMessageSize} bytes`)
        });
      } else {
        this.queue.push(this.decodeRecord(event.record));
      }
    }

    if (!this.paused && this.queue.size >= this.highWaterMark) {
      this.paused = true;
      this.input.pause();
      this.logger.debug("Input paused", { component: "stdio-transport", buffered: this.queue.size });
    }
  };

  private readonly onEnd = (): void => {
    const rest = this.buffer.flush();
    if (rest !== undefined) {
      this.queue.push({ type: "invalid", error: new DecodeError("Unterminated record at end of stream", salvageId(rest)) });
    }
    this.queue.end();
    this.logger.debug("Input ended", { component: "stdio-transport" });
  };

  private readonly onInputError = (error: Error): void => {
    this.queue.fail(new TransportError(`Input stream failed: ${error.message}`));
  };

  private readonly onOutputError = (error: Error): void => {
    // the pending write reports the failure to its sender
    this.logger.warn("Output stream error", { component: "stdio-transport", reason: error.message });
  };

  private decodeRecord(record: string): ReceiveResult {
    try {
      return { type: "message", message: decode(record), info: { timestamp: new Date() } };
    } catch (error) {
      const decodeError = error instanceof DecodeError ? error : new DecodeError(toError(error).message, salvageId(record));
      return { type: "invalid", error: decodeError };
    }
  }

  private write(record: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.output.write(record, "utf8", (error) => {
        if (error) {
          reject(new TransportError(`Failed to write message: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }
}
