/**
 * Receive Queue
 *
 * Bridges a push-based source (stream events, a linked peer) to the pull-based
 * `Transport.receive()`. Holds decoded results until the single reader asks
 * for them.
 */

import { TransportError } from "./types";
import type { ReceiveResult } from "./transport";

const CLOSED: ReceiveResult = { type: "closed" };

type Waiter = {
  readonly resolve: (result: ReceiveResult) => void;
  readonly reject: (error: Error) => void;
};

export class ReceiveQueue {
  private readonly items: ReceiveResult[] = [];
  private waiter?: Waiter;
  private ended = false;
  private failure?: Error;

  /** Results buffered and not yet received. */
  get size(): number {
    return this.items.length;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  push(result: ReceiveResult): void {
    if (this.ended) {
      return;
    }

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter.resolve(result);
    } else {
      this.items.push(result);
    }
  }

  /**
   * Marks the source as finished. Buffered results are still handed out, then `closed`.
   */
  end(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter.resolve(CLOSED);
    }
  }

  /**
   * Marks the source as failed. Buffered results are still handed out, then `error` is thrown.
   */
  fail(error: Error): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.failure = error;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter.reject(error);
    }
  }

  next(signal?: AbortSignal): Promise<ReceiveResult> {
    const item = this.items.shift();
    if (item) {
      return Promise.resolve(item);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended || signal?.aborted) {
      return Promise.resolve(CLOSED);
    }
    if (this.waiter) {
      return Promise.reject(new TransportError("Another receive() call is already waiting"));
    }

    return new Promise<ReceiveResult>((resolve, reject) => {
      const onAbort = (): void => {
        if (this.waiter === waiter) {
          this.waiter = undefined;
        }
        resolve(CLOSED);
      };

      const waiter: Waiter = {
        resolve: (result) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(result);
        },
        reject: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        }
      };

      this.waiter = waiter;
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
