import { isJSONRPCRequest } from "./assertions";
import { decode, encode, extractCorrelationKey, salvageId } from "./envelope";
import { DecodeError, InternalError, RawNumericId } from "./types";

function decodeError(record: string): DecodeError {
  try {
    decode(record);
  } catch (error) {
    if (error instanceof DecodeError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected decode to fail");
}

describe("envelope", () => {
  describe("decode", () => {
    it("keeps the JSON type of the id", () => {
      expect(decode('{"jsonrpc":"2.0","id":7,"method":"ping"}')).toEqual({ jsonrpc: "2.0", id: 7, method: "ping" });
      expect(decode('{"jsonrpc":"2.0","id":"7","method":"ping"}')).toEqual({ jsonrpc: "2.0", id: "7", method: "ping" });
    });

    it("keeps numeric ids without an exact number as their source text", () => {
      expect(decode('{"jsonrpc":"2.0","id":9007199254740993,"method":"tools/list"}')).toStrictEqual({
        jsonrpc: "2.0",
        id: new RawNumericId("9007199254740993"),
        method: "tools/list"
      });
      expect(decode('{"jsonrpc":"2.0","id":9007199254740992,"method":"tools/list"}')).toStrictEqual({
        jsonrpc: "2.0",
        id: 9007199254740992,
        method: "tools/list"
      });
    });

    it.each(["1.0", "1e2", "-0", "1E+2", "1e400"])("keeps the id literal %s", (literal) => {
      expect(decode(`{"jsonrpc":"2.0","id":${literal},"method":"ping"}`)).toStrictEqual({
        jsonrpc: "2.0",
        id: new RawNumericId(literal),
        method: "ping"
      });
    });

    it("reads the top-level id past nested members, escaped keys and whitespace", () => {
      const record = '{ "jsonrpc":"2.0", "params":{"note":"}\\"{","id":5}, "method":"tools/call", "\\u0069d" : 1e2 }';

      expect(decode(record)).toStrictEqual({
        jsonrpc: "2.0",
        params: { note: '}"{', id: 5 },
        method: "tools/call",
        id: new RawNumericId("1e2")
      });
    });

    it("keeps the request id literal of a cancellation", () => {
      expect(decode('{"jsonrpc":"2.0","method":"notifications/cancelled","params":{"requestId":9007199254740993}}')).toStrictEqual({
        jsonrpc: "2.0",
        method: "notifications/cancelled",
        params: { requestId: new RawNumericId("9007199254740993") }
      });
    });

    it("decodes notifications without an id", () => {
      const message = decode('{"jsonrpc":"2.0","method":"notifications/initialized"}');

      expect(message).toEqual({ jsonrpc: "2.0", method: "notifications/initialized" });
      expect("id" in message).toBe(false);
    });

    it("rejects text that is not JSON without an id", () => {
      const error = decodeError("{oops");

      expect(error.code).toBe(-32700);
      expect(error.id).toBeUndefined();
    });

    it("rejects batches", () => {
      const error = decodeError('[{"jsonrpc":"2.0","id":1,"method":"ping"}]');

      expect(error.reason).toBe("Batch messages are not supported");
      expect(error.id).toBeUndefined();
    });

    it("salvages the id of a malformed message", () => {
      const error = decodeError('{"jsonrpc":"2.0","id":"abc","method":5}');

      expect(error.reason).toBe("Not a JSON-RPC 2.0 message");
      expect(error.id).toBe("abc");
      expect(error.toJSON()).toEqual({ code: -32700, message: "Parse error", data: { reason: "Not a JSON-RPC 2.0 message" } });
    });

    it("salvages a numeric id literal exactly", () => {
      expect(decodeError('{"jsonrpc":"2.0","id":1.50,"method":5}').id).toStrictEqual(new RawNumericId("1.50"));
    });

    it("rejects the wrong protocol version", () => {
      expect(decodeError('{"jsonrpc":"1.0","id":1,"method":"ping"}').id).toBe(1);
    });

    it("rejects positional params", () => {
      expect(decodeError('{"jsonrpc":"2.0","id":2,"method":"ping","params":[1,2]}').id).toBe(2);
    });
  });

  describe("encode", () => {
    it("produces a single JSON record without a terminator", () => {
      expect(encode({ jsonrpc: "2.0", id: 1, result: { text: "line one\nline two" } })).toBe(
        '{"jsonrpc":"2.0","id":1,"result":{"text":"line one\\nline two"}}'
      );
    });

    it("writes raw numeric ids back as their source text", () => {
      expect(encode({ jsonrpc: "2.0", id: new RawNumericId("9007199254740993"), result: {} })).toBe('{"jsonrpc":"2.0","id":9007199254740993,"result":{}}');
      expect(encode({ jsonrpc: "2.0", id: new RawNumericId("1.0"), error: { code: -32601, message: "Method not found: foo" } })).toBe(
        '{"jsonrpc":"2.0","id":1.0,"error":{"code":-32601,"message":"Method not found: foo"}}'
      );
    });

    it("echoes the id of a decoded request byte for byte", () => {
      const request = decode('{"jsonrpc":"2.0","id":1e2,"method":"ping"}');
      if (!isJSONRPCRequest(request)) {
        throw new Error("Expected a request");
      }

      expect(encode({ jsonrpc: "2.0", id: request.id, result: {} })).toBe('{"jsonrpc":"2.0","id":1e2,"result":{}}');
    });

    it("reports values JSON cannot represent as an internal error", () => {
      expect(() => encode({ jsonrpc: "2.0", id: 1, result: { big: BigInt(1) } })).toThrow(InternalError);
    });
  });

  describe("salvageId", () => {
    it("reads string and numeric ids", () => {
      expect(salvageId('{"id":3}')).toBe(3);
      expect(salvageId('{"id":"3"}')).toBe("3");
    });

    it("keeps a numeric id literal without an exact number", () => {
      expect(salvageId('{"id":9007199254740993}')).toStrictEqual(new RawNumericId("9007199254740993"));
    });

    it("returns undefined when no usable id exists", () => {
      expect(salvageId('{"id":null}')).toBeUndefined();
      expect(salvageId('{"id":{"nested":1}}')).toBeUndefined();
      expect(salvageId("not json")).toBeUndefined();
    });
  });

  describe("extractCorrelationKey", () => {
    it("keeps numeric and string ids apart", () => {
      expect(extractCorrelationKey(1)).toBe("n:1");
      expect(extractCorrelationKey("1")).toBe("s:1");
    });

    it("reads the id of a message", () => {
      expect(extractCorrelationKey({ id: 42 })).toBe("n:42");
      expect(extractCorrelationKey({ id: new RawNumericId("1.0") })).toBe("n:1.0");
    });

    it("keys numeric ids by their literal", () => {
      expect(extractCorrelationKey(new RawNumericId("9007199254740993"))).toBe("n:9007199254740993");
      expect(extractCorrelationKey(9007199254740992)).toBe("n:9007199254740992");
    });
  });
});
