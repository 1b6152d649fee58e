import { ReceiveQueue } from "./receive-queue";
import type { ReceiveResult } from "./transport";
import { DecodeError, TransportError } from "./types";

const message = (id: number): ReceiveResult => ({
  type: "message",
  message: { jsonrpc: "2.0", id, method: "ping" },
  info: { timestamp: new Date(0) }
});

describe("ReceiveQueue", () => {
  it("hands out buffered results in push order", async () => {
    const queue = new ReceiveQueue();
    queue.push(message(1));
    queue.push(message(2));

    expect(queue.size).toBe(2);
    expect(await queue.next()).toEqual(message(1));
    expect(await queue.next()).toEqual(message(2));
    expect(queue.size).toBe(0);
  });

  it("resolves a waiting reader on push", async () => {
    const queue = new ReceiveQueue();
    const pending = queue.next();

    queue.push(message(3));

    expect(await pending).toEqual(message(3));
  });

  it("passes invalid results through", async () => {
    const queue = new ReceiveQueue();
    const error = new DecodeError("Unexpected token", 4);
    queue.push({ type: "invalid", error });

    expect(await queue.next()).toEqual({ type: "invalid", error });
  });

  it("drains buffered results before reporting closed", async () => {
    const queue = new ReceiveQueue();
    queue.push(message(1));
    queue.end();
    queue.push(message(2));

    expect(queue.isEnded).toBe(true);
    expect(await queue.next()).toEqual(message(1));
    expect(await queue.next()).toEqual({ type: "closed" });
    expect(await queue.next()).toEqual({ type: "closed" });
  });

  it("reports closed to a waiting reader when ended", async () => {
    const queue = new ReceiveQueue();
    const pending = queue.next();

    queue.end();

    expect(await pending).toEqual({ type: "closed" });
  });

  it("rejects with the failure once the buffer is drained", async () => {
    const queue = new ReceiveQueue();
    queue.push(message(1));
    queue.fail(new TransportError("Input stream failed: reset"));

    expect(await queue.next()).toEqual(message(1));
    await expect(queue.next()).rejects.toThrow("Input stream failed: reset");
  });

  it("rejects a waiting reader when failed", async () => {
    const queue = new ReceiveQueue();
    const pending = queue.next();

    queue.fail(new TransportError("broken pipe"));

    await expect(pending).rejects.toThrow(TransportError);
  });

  it("reports closed when the signal aborts", async () => {
    const queue = new ReceiveQueue();
    const controller = new AbortController();
    const pending = queue.next(controller.signal);

    controller.abort();

    expect(await pending).toEqual({ type: "closed" });
    queue.push(message(5));
    expect(await queue.next()).toEqual(message(5));
  });

  it("returns closed at once for an already aborted signal", async () => {
    const queue = new ReceiveQueue();

    expect(await queue.next(AbortSignal.abort())).toEqual({ type: "closed" });
  });

  it("allows only one waiting reader", async () => {
    const queue = new ReceiveQueue();
    const first = queue.next();

    await expect(queue.next()).rejects.toThrow("Another receive() call is already waiting");

    queue.end();
    expect(await first).toEqual({ type: "closed" });
  });
});
