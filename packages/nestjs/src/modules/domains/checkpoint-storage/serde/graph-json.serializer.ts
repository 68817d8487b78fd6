import {
  MemorySaver,
  type SerializerProtocol as GraphSerializerProtocol,
} from "@langchain/langgraph-checkpoint";

import {
  DecodeError,
  describeError,
  InvalidArgumentError,
} from "../errors/checkpoint.errors";
import type { SerializerProtocol } from "./serializer.port";

const PROTO_KEY = "__proto__";
// stands in for "__proto__" while a payload passes through the reviver
const ESCAPED_PROTO_KEY = "__proto__\u0000";

const QUOTE = 0x22;

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

// copies plain objects and arrays, renaming own `from` keys to `to`
function renameKey(value: unknown, from: string, to: string): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => renameKey(item, from, to));
  }
  if (!isPlainObject(value)) {
    return value;
  }

  const renamed: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    Object.defineProperty(renamed, key === from ? to : key, {
      value: renameKey(entry, from, to),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return renamed;
}

/**
 * Primary codec: the JSON-plus serializer every LangGraph saver starts with,
 * restricted to its `json` payloads.
 *
 * Plain values are written as plain JSON, so metadata stays queryable with
 * SQLite's JSON functions. `Set`, `Map`, `RegExp` and `Error` travel in the
 * library's constructor envelopes.
 */
export class GraphJsonSerializer implements SerializerProtocol {
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });

  constructor(
    private readonly serde: GraphSerializerProtocol = new MemorySaver().serde,
  ) {}

  async dumps(value: unknown): Promise<Uint8Array> {
    const [type, data] = await this.serde.dumpsTyped(value);
    if (type !== "json") {
      throw new InvalidArgumentError(
        `Expected a JSON payload, the serializer produced "${type}".`,
      );
    }
    // an object written as a bare string is the stringifier's fallback text
    if (typeof value === "object" && value !== null && data[0] === QUOTE) {
      throw new InvalidArgumentError("Value cannot be represented as JSON.");
    }
    return data;
  }

  async loads(data: Uint8Array): Promise<unknown> {
    let text: string;
    try {
      text = this.decoder.decode(data);
    } catch (error) {
      throw new DecodeError(
        `Payload is not valid UTF-8: ${describeError(error)}`,
        { cause: error },
      );
    }

    // the reviver assigns keys, which would turn "__proto__" into a prototype
    const escaped = text.includes(`"${PROTO_KEY}"`);
    try {
      const payload = escaped
        ? JSON.stringify(
            renameKey(JSON.parse(text), PROTO_KEY, ESCAPED_PROTO_KEY),
          )
        : text;
      const value: unknown = await this.serde.loadsTyped("json", payload);
      return escaped ? renameKey(value, ESCAPED_PROTO_KEY, PROTO_KEY) : value;
    } catch (error) {
      throw new DecodeError(
        `Payload is not valid JSON: ${describeError(error)}`,
        { cause: error },
      );
    }
  }
}
