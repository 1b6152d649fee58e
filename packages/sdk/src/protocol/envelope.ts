/**
 * Message Envelope
 *
 * Converts between one framed record and a JSON-RPC message. Correlation ids
 * survive a decode/encode cycle byte for byte: the response to a request with
 * id `7` carries `7`, never `"7"`, and an id such as `9007199254740993` or
 * `1.0`, which no JavaScript number holds exactly, is kept as a
 * {@link RawNumericId} and written back as it arrived.
 */

import { randomUUID } from "node:crypto";

import { isJSONRPCMessage, isObject, isRequestId } from "./assertions";
import { DecodeError, InternalError, RawNumericId } from "./types";
import type { JSONRPCMessage, RequestId } from "./types";

/**
 * Decodes one record into a message.
 *
 * @throws DecodeError when the record is not JSON or not a JSON-RPC 2.0 message.
 *   The error carries the record's id when one could be read from it.
 */
export function decode(record: string): JSONRPCMessage {
  let value: unknown;
  try {
    value = JSON.parse(record);
  } catch (error) {
    throw new DecodeError(error instanceof Error ? error.message : String(error));
  }

  if (Array.isArray(value)) {
    throw new DecodeError("Batch messages are not supported");
  }

  if (isObject(value)) {
    keepIdText(value, record);
  }

  if (!isJSONRPCMessage(value)) {
    throw new DecodeError("Not a JSON-RPC 2.0 message", readId(value));
  }

  return value;
}

/**
 * Encodes a message as one record, without a terminator.
 * JSON text never contains a raw line feed, so the record is always a single line.
 */
export function encode(message: JSONRPCMessage): string {
  const texts: string[] = [];
  let marker = "";
  let json: string;

  try {
    // Raw ids are serialized as unique placeholder strings, then swapped for their source text.
    json = JSON.stringify(message, (_key, value: unknown) => {
      if (!(value instanceof RawNumericId)) {
        return value;
      }
      if (marker === "") {
        marker = randomUUID();
      }
      texts.push(value.text);
      return `${marker}:${texts.length - 1}`;
    });
  } catch (error) {
    throw new InternalError(`Message is not serializable: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (texts.length === 0) {
    return json;
  }
  for (const [index, text] of texts.entries()) {
    json = json.split(`"${marker}:${index}"`).join(text);
  }
  return json;
}

/**
 * Reads the correlation id out of a record that failed to decode, if it is
 * well-formed JSON with a string or numeric id.
 */
export function salvageId(record: string): RequestId | undefined {
  let value: unknown;
  try {
    value = JSON.parse(record);
  } catch {
    return undefined;
  }
  if (isObject(value)) {
    keepIdText(value, record);
  }
  return readId(value);
}

/**
 * Normalizes a correlation id into a lookup key.
 *
 * Numbers and strings get distinct prefixes so `1` and `"1"` never collide.
 * Numeric ids are keyed by their literal, so `9007199254740993` and
 * `9007199254740992` stay apart. The key is only for internal maps; responses
 * always echo the original id.
 */
export function extractCorrelationKey(source: RequestId | { readonly id: RequestId }): string {
  const id = typeof source === "object" && !(source instanceof RawNumericId) ? source.id : source;
  if (typeof id === "string") {
    return `s:${id}`;
  }
  return `n:${id instanceof RawNumericId ? id.text : String(id)}`;
}

function readId(value: unknown): RequestId | undefined {
  const id = isObject(value) ? value["id"] : undefined;
  return isRequestId(id) ? id : undefined;
}

/**
 * Replaces the numeric `id`, and the `requestId` of a cancellation, with a
 * {@link RawNumericId} when the parsed number does not print back as the
 * literal in the record.
 */
function keepIdText(value: Record<string, unknown>, record: string): void {
  const id = value["id"];
  if (typeof id === "number") {
    value["id"] = exactId(id, record, ["id"]);
  }

  const params = value["params"];
  if (value["method"] === "notifications/cancelled" && isObject(params)) {
    const requestId = params["requestId"];
    if (typeof requestId === "number") {
      params["requestId"] = exactId(requestId, record, ["params", "requestId"]);
    }
  }
}

function exactId(parsed: number, record: string, path: readonly string[]): RequestId {
  const text = memberText(record, path);
  return text === undefined || text === String(parsed) ? parsed : new RawNumericId(text);
}

// -----------------------------------------------------------------------------
// Source text lookup
//
// These helpers only run on records JSON.parse has accepted, so they skip
// tokens without validating them.
// -----------------------------------------------------------------------------

/**
 * Returns the source text of the member at `path`, descending through nested
 * objects. A repeated key resolves to its last occurrence, as in JSON.parse.
 */
function memberText(record: string, path: readonly string[]): string | undefined {
  let start = 0;
  let end = record.length;
  for (const key of path) {
    const span = findMember(record, start, key);
    if (span === undefined) {
      return undefined;
    }
    [start, end] = span;
  }
  return record.slice(start, end);
}

function findMember(text: string, objectStart: number, key: string): [number, number] | undefined {
  let index = skipWhitespace(text, objectStart);
  if (text.charAt(index) !== "{") {
    return undefined;
  }

  let found: [number, number] | undefined;
  index = skipWhitespace(text, index + 1);
  while (text.charAt(index) === '"') {
    const keyEnd = skipString(text, index);
    const name: unknown = JSON.parse(text.slice(index, keyEnd));
    const valueStart = skipWhitespace(text, skipWhitespace(text, keyEnd) + 1);
    const valueEnd = skipValue(text, valueStart);
    if (name === key) {
      found = [valueStart, valueEnd];
    }
    index = skipWhitespace(text, valueEnd);
    if (text.charAt(index) === ",") {
      index = skipWhitespace(text, index + 1);
    }
  }
  return found;
}

function skipWhitespace(text: string, index: number): number {
  while (index < text.length && " \t\r\n".includes(text.charAt(index))) {
    index++;
  }
  return index;
}

function skipString(text: string, start: number): number {
  let index = start + 1;
  while (index < text.length && text.charAt(index) !== '"') {
    index += text.charAt(index) === "\\" ? 2 : 1;
  }
  return index + 1;
}

function skipValue(text: string, start: number): number {
  const first = text.charAt(start);
  if (first === '"') {
    return skipString(text, start);
  }

  if (first === "{" || first === "[") {
    let depth = 0;
    let index = start;
    while (index < text.length) {
      const char = text.charAt(index);
      if (char === '"') {
        index = skipString(text, index);
        continue;
      }
      if (char === "{" || char === "[") {
        depth++;
      } else if (char === "}" || char === "]") {
        depth--;
        if (depth === 0) {
          return index + 1;
        }
      }
      index++;
    }
    return index;
  }

  let index = start;
  while (index < text.length && !",}] \t\r\n".includes(text.charAt(index))) {
    index++;
  }
  return index;
}
