import { PassThrough, Writable } from "node:stream";

import { TransportError, isJSONRPCRequest, type DecodeError, type ReceiveResult } from "capability-session-sdk";

import { StdioServerTransport, type StdioServerTransportOptions } from "./transport";

// =============================================================================
// Test Helpers
// =============================================================================

function setup(options: Partial<StdioServerTransportOptions> = {}) {
  const input = new PassThrough();
  const output = new PassThrough();
  const chunks: Buffer[] = [];
  output.on("data", (chunk: Buffer) => chunks.push(chunk));

  const transport = new StdioServerTransport({ input, output, ...options });
  const written = (): string[] => Buffer.concat(chunks).toString("utf8").split("\n");
  return { input, transport, written };
}

function invalidError(result: ReceiveResult): DecodeError {
  if (result.type !== "invalid") {
    throw new Error(`Expected an invalid result, got ${result.type}`);
  }
  return result.error;
}

const ping = (id: number): string => `{"jsonrpc":"2.0","id":${id},"method":"ping"}\n`;

// =============================================================================
// Tests
// =============================================================================

describe("StdioServerTransport", () => {
  describe("receive", () => {
    it("decodes one message per line", async () => {
      const { input, transport } = setup();
      await transport.connect();

      input.write(ping(1) + ping(2));

      expect(await transport.receive()).toEqual({
        type: "message",
        message: { jsonrpc: "2.0", id: 1, method: "ping" },
        info: { timestamp: expect.any(Date) }
      });
      expect(await transport.receive()).toMatchObject({ type: "message", message: { id: 2 } });
      await transport.disconnect();
    });

    it("returns an invalid result for a line that is not a message and keeps reading", async () => {
      const { input, transport } = setup();
      await transport.connect();

      input.write('{"jsonrpc":"2.0","id":7}\n' + ping(8));

      const error = invalidError(await transport.receive());
      expect(error.id).toBe(7);
      expect(error.reason).toBe("Not a JSON-RPC 2.0 message");
      expect(await transport.receive()).toMatchObject({ type: "message", message: { id: 8 } });
      await transport.disconnect();
    });

    it("rejects lines over the size limit", async () => {
      const { input, transport } = setup({ maxMessageSize: 10 });
      await transport.connect();

      input.write(`${"x".repeat(20)}\n`);

      const error = invalidError(await transport.receive());
      expect(error.reason).toBe("Message of 20 bytes exceeds the maximum of 10 bytes");
      expect(error.id).toBeUndefined();
      await transport.disconnect();
    });

    it("reports unterminated data at end of stream, then closed", async () => {
      const { input, transport } = setup();
      await transport.connect();

      input.end('{"jsonrpc":"2.0","id":3,"method":"ping"}');

      const error = invalidError(await transport.receive());
      expect(error.reason).toBe("Unterminated record at end of stream");
      expect(error.id).toBe(3);
      expect(await transport.receive()).toEqual({ type: "closed" });
    });

    it("fails receive with a TransportError when input errors", async () => {
      const { input, transport } = setup();
      await transport.connect();

      input.destroy(new Error("reset by peer"));

      await expect(transport.receive()).rejects.toThrow(new TransportError("Input stream failed: reset by peer"));
    });

    it("pauses input while too many results are buffered", async () => {
      const { input, transport } = setup({ highWaterMark: 2 });
      await transport.connect();

      input.write(ping(1) + ping(2) + ping(3));

      expect(await transport.receive()).toMatchObject({ message: { id: 1 } });
      expect(input.isPaused()).toBe(true);

      expect(await transport.receive()).toMatchObject({ message: { id: 2 } });
      expect(input.isPaused()).toBe(false);

      expect(await transport.receive()).toMatchObject({ message: { id: 3 } });
      await transport.disconnect();
    });

    it("returns closed when the signal aborts", async () => {
      const { transport } = setup();
      await transport.connect();
      const controller = new AbortController();

      const pending = transport.receive(controller.signal);
      controller.abort();

      expect(await pending).toEqual({ type: "closed" });
      await transport.disconnect();
    });
  });

  describe("send", () => {
    it("writes one compact JSON line per message", async () => {
      const { transport, written } = setup();
      await transport.connect();

      await transport.send({ jsonrpc: "2.0", id: 1, result: { text: "a\nb" } });

      expect(written()).toEqual(['{"jsonrpc":"2.0","id":1,"result":{"text":"a\\nb"}}', ""]);
      await transport.disconnect();
    });

    it("answers with the id literal exactly as it was received", async () => {
      const { input, transport, written } = setup();
      await transport.connect();

      input.write('{"jsonrpc":"2.0","id":9007199254740993,"method":"tools/list"}\n{"jsonrpc":"2.0","id":1.0,"method":"ping"}\n');

      for (let received = 0; received < 2; received++) {
        const result = await transport.receive();
        if (result.type !== "message" || !isJSONRPCRequest(result.message)) {
          throw new Error(`Expected a request, got ${result.type}`);
        }
        await transport.send({ jsonrpc: "2.0", id: result.message.id, result: {} });
      }

      expect(written()).toEqual(['{"jsonrpc":"2.0","id":9007199254740993,"result":{}}', '{"jsonrpc":"2.0","id":1.0,"result":{}}', ""]);
      await transport.disconnect();
    });

    it("never interleaves concurrent sends", async () => {
      const { transport, written } = setup();
      await transport.connect();

      await Promise.all(
        Array.from({ length: 20 }, (_, index) =>
          transport.send({ jsonrpc: "2.0", method: "notifications/message", params: { level: "info", data: "y".repeat(1000 + index) } })
        )
      );

      const lines = written().filter((line) => line !== "");
      expect(lines).toHaveLength(20);
      lines.forEach((line, index) => {
        expect(JSON.parse(line)).toEqual({ jsonrpc: "2.0", method: "notifications/message", params: { level: "info", data: "y".repeat(1000 + index) } });
      });
      await transport.disconnect();
    });

    it("rejects with a TransportError when the write fails", async () => {
      const output = new Writable({
        write(_chunk, _encoding, callback) {
          callback(new Error("EPIPE"));
        }
      });
      const transport = new StdioServerTransport({ input: new PassThrough(), output });
      await transport.connect();

      await expect(transport.send({ jsonrpc: "2.0", method: "notifications/tools/list_changed" })).rejects.toThrow(
        new TransportError("Failed to write message: EPIPE")
      );
      await transport.disconnect();
    });
  });

  describe("lifecycle", () => {
    it("refuses a second connect", async () => {
      const { transport } = setup();
      await transport.connect();

      await expect(transport.connect()).rejects.toThrow("Transport already connected");
      await transport.disconnect();
    });

    it("stops reading and sending on disconnect", async () => {
      const { input, transport } = setup();
      await transport.connect();

      await transport.disconnect();
      input.write(ping(1));

      expect(await transport.receive()).toEqual({ type: "closed" });
      await expect(transport.send({ jsonrpc: "2.0", method: "notifications/tools/list_changed" })).rejects.toThrow("Transport is not connected");
      expect(input.listenerCount("data")).toBe(0);
    });

    it("removes its stream listeners on disconnect", async () => {
      const input = new PassThrough();
      const output = new PassThrough();
      const transport = new StdioServerTransport({ input, output });
      await transport.connect();

      expect(output.listenerCount("error")).toBe(1);
      await transport.disconnect();

      expect(input.listenerCount("end")).toBe(0);
      expect(input.listenerCount("error")).toBe(0);
      expect(output.listenerCount("error")).toBe(0);
    });
  });
});
