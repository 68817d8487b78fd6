import { DecodeError, describeError } from "../errors/checkpoint.errors";

const OP = {
  MARK: 0x28, // (
  STOP: 0x2e, // .
  POP: 0x30, // 0
  POP_MARK: 0x31, // 1
  DUP: 0x32, // 2
  REDUCE: 0x52, // R
  GLOBAL: 0x63, // c
  BINBYTES: 0x42, // B
  SHORT_BINBYTES: 0x43, // C
  BINFLOAT: 0x47, // G
  BININT: 0x4a, // J
  BININT1: 0x4b, // K
  BININT2: 0x4d, // M
  NONE: 0x4e, // N
  BINUNICODE: 0x58, // X
  EMPTY_LIST: 0x5d, // ]
  APPEND: 0x61, // a
  DICT: 0x64, // d
  APPENDS: 0x65, // e
  BINGET: 0x68, // h
  LONG_BINGET: 0x6a, // j
  LIST: 0x6c, // l
  BINPUT: 0x71, // q
  LONG_BINPUT: 0x72, // r
  SETITEM: 0x73, // s
  TUPLE: 0x74, // t
  SETITEMS: 0x75, // u
  EMPTY_DICT: 0x7d, // }
  EMPTY_TUPLE: 0x29, // )
  PROTO: 0x80,
  TUPLE1: 0x85,
  TUPLE2: 0x86,
  TUPLE3: 0x87,
  NEWTRUE: 0x88,
  NEWFALSE: 0x89,
  LONG1: 0x8a,
  LONG4: 0x8b,
  SHORT_BINUNICODE: 0x8c,
  BINUNICODE8: 0x8d,
  BINBYTES8: 0x8e,
  EMPTY_SET: 0x8f,
  ADDITEMS: 0x90,
  FROZENSET: 0x91,
  STACK_GLOBAL: 0x93,
  MEMOIZE: 0x94,
  FRAME: 0x95,
  BYTEARRAY8: 0x96,
} as const;

// Opcodes that build arbitrary objects. Never honoured.
const CODE_OPCODES = new Map<number, string>([
  [0x62, "BUILD"],
  [0x81, "NEWOBJ"],
  [0x92, "NEWOBJ_EX"],
  [0x69, "INST"],
  [0x6f, "OBJ"],
  [0x82, "EXT1"],
  [0x83, "EXT2"],
  [0x84, "EXT4"],
  [0x50, "PERSID"],
  [0x51, "BINPERSID"],
]);

export const PICKLE_HIGHEST_PROTOCOL = 5;

/**
 * A payload in the legacy binary pickle layout starts with the PROTO opcode
 * and ends with STOP.
 */
export const isLegacyPayload = (data: Uint8Array): boolean =>
  data.length >= 2 && data[0] === OP.PROTO && data[data.length - 1] === OP.STOP;

class PickleReader {
  private readonly view: DataView;
  private readonly text = new TextDecoder("utf-8", { fatal: true });
  pos = 0;

  constructor(private readonly data: Uint8Array) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  private require(size: number): number {
    const start = this.pos;
    if (size < 0 || start + size > this.data.length) {
      throw new DecodeError(
        `Truncated pickle payload: needed ${size} byte(s) at offset ${start}`,
      );
    }
    this.pos += size;
    return start;
  }

  byte(): number {
    return this.view.getUint8(this.require(1));
  }

  uint16(): number {
    return this.view.getUint16(this.require(2), true);
  }

  int32(): number {
    return this.view.getInt32(this.require(4), true);
  }

  uint32(): number {
    return this.view.getUint32(this.require(4), true);
  }

  uint64(): number {
    const value = this.view.getBigUint64(this.require(8), true);
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new DecodeError(`Pickle length ${value} is out of range`);
    }
    return Number(value);
  }

  float64(): number {
    // BINFLOAT is the only big-endian field in the format
    return this.view.getFloat64(this.require(8), false);
  }

  bytes(size: number): Uint8Array {
    const start = this.require(size);
    return this.data.slice(start, start + size);
  }

  /** Text up to the next newline, as GLOBAL writes its operands */
  line(): string {
    const end = this.data.indexOf(0x0a, this.pos);
    if (end < 0) {
      throw new DecodeError(`Unterminated pickle line at offset ${this.pos}`);
    }
    const value = this.utf8(end - this.pos);
    this.pos += 1;
    return value;
  }

  utf8(size: number): string {
    try {
      return this.text.decode(this.bytes(size));
    } catch (error) {
      if (error instanceof DecodeError) {
        throw error;
      }
      throw new DecodeError(
        `Invalid UTF-8 string in pickle payload: ${describeError(error)}`,
        { cause: error },
      );
    }
  }
}

function decodeLong(bytes: Uint8Array): number | bigint {
  if (bytes.length === 0) {
    return 0;
  }
  let value = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) {
    value = (value << 8n) | BigInt(bytes[i]);
  }
  if (bytes[bytes.length - 1] & 0x80) {
    value -= 1n << BigInt(bytes.length * 8);
  }
  const safe =
    value >= BigInt(Number.MIN_SAFE_INTEGER) &&
    value <= BigInt(Number.MAX_SAFE_INTEGER);
  return safe ? Number(value) : value;
}

type DataFactory = (args: unknown[]) => unknown;

/**
 * A global the decoder resolved to one of the allowed data types. Calling it
 * through REDUCE builds a plain value.
 */
class AllowedGlobal {
  constructor(
    readonly qualifiedName: string,
    readonly build: DataFactory,
  ) {}
}

const isDict = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  !(value instanceof Set) &&
  !(value instanceof Uint8Array) &&
  !(value instanceof AllowedGlobal);

function toKey(key: unknown): string {
  switch (typeof key) {
    case "string":
      return key;
    case "number":
    case "bigint":
    case "boolean":
      return String(key);
  }
  if (key === null) {
    return "null";
  }
  throw new DecodeError("Unsupported dictionary key in pickle payload");
}

function setEntry(dict: unknown, key: unknown, value: unknown): void {
  if (!isDict(dict)) {
    throw new DecodeError("SETITEM target is not a dictionary");
  }
  // defineProperty keeps a "__proto__" key from rewiring the prototype
  Object.defineProperty(dict, toKey(key), {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

function dictFromPairs(pairs: unknown): Record<string, unknown> {
  const dict = {};
  if (pairs === undefined) {
    return dict;
  }
  if (!Array.isArray(pairs)) {
    throw new DecodeError("Dictionary items in pickle payload are not a list");
  }
  for (const pair of pairs) {
    if (!Array.isArray(pair) || pair.length !== 2) {
      throw new DecodeError("Dictionary item in pickle payload is not a pair");
    }
    setEntry(dict, pair[0], pair[1]);
  }
  return dict;
}

function encodeText(text: string, encoding: unknown): Uint8Array {
  const name =
    typeof encoding === "string"
      ? encoding.toLowerCase().replace(/[-_]/g, "")
      : "utf8";
  switch (name) {
    case "utf8":
      return new TextEncoder().encode(text);
    case "latin1":
    case "iso88591":
    case "ascii": {
      const limit = name === "ascii" ? 0x7f : 0xff;
      return Uint8Array.from(text, (char) => {
        const code = char.charCodeAt(0);
        if (code > limit) {
          throw new DecodeError(`Character outside ${name} in pickle bytes`);
        }
        return code;
      });
    }
    default:
      throw new DecodeError(`Unsupported text encoding "${String(encoding)}"`);
  }
}

function toBytes([source, encoding]: unknown[]): Uint8Array {
  if (source === undefined) {
    return new Uint8Array(0);
  }
  if (source instanceof Uint8Array) {
    return source.slice();
  }
  if (typeof source === "string") {
    return encodeText(source, encoding);
  }
  if (
    Array.isArray(source) &&
    source.every(
      (item: unknown) =>
        typeof item === "number" &&
        Number.isInteger(item) &&
        item >= 0 &&
        item <= 0xff,
    )
  ) {
    return Uint8Array.from(source);
  }
  throw new DecodeError("Unsupported bytes source in pickle payload");
}

function toSet([items]: unknown[]): Set<unknown> {
  if (items === undefined) {
    return new Set();
  }
  if (!Array.isArray(items) && !(items instanceof Set)) {
    throw new DecodeError("Set items in pickle payload are not a list");
  }
  return new Set(items);
}

function toList([items]: unknown[]): unknown[] {
  if (items === undefined) {
    return [];
  }
  if (!Array.isArray(items)) {
    throw new DecodeError("List items in pickle payload are not a list");
  }
  return [...items];
}

const emptyValue =
  (value: () => unknown): DataFactory =>
  (args) => {
    if (args.length > 0) {
      throw new DecodeError("Only the empty form of a scalar type is supported");
    }
    return value();
  };

// Python 2 names resolve like their builtins counterparts
const BUILTIN_MODULES = new Set(["builtins", "__builtin__"]);

const BUILTIN_FACTORIES = new Map<string, DataFactory>([
  ["bytes", toBytes],
  ["bytearray", toBytes],
  ["set", toSet],
  ["frozenset", toSet],
  ["list", toList],
  ["tuple", toList],
  ["dict", ([pairs]) => dictFromPairs(pairs)],
  ["str", emptyValue(() => "")],
  ["int", emptyValue(() => 0)],
  ["float", emptyValue(() => 0)],
  ["bool", emptyValue(() => false)],
]);

const MODULE_FACTORIES = new Map<string, DataFactory>([
  ["collections.OrderedDict", ([pairs]) => dictFromPairs(pairs)],
  // the default factory is dropped; entries arrive through SETITEMS
  ["collections.defaultdict", () => ({})],
  ["_codecs.encode", toBytes],
]);

function resolveGlobal(
  module: unknown,
  name: unknown,
  opcode: string,
  offset: number,
): AllowedGlobal {
  if (typeof module !== "string" || typeof name !== "string") {
    throw new DecodeError(
      `Pickle opcode ${opcode} at offset ${offset} needs a module and a name`,
    );
  }
  const build = BUILTIN_MODULES.has(module)
    ? BUILTIN_FACTORIES.get(name)
    : MODULE_FACTORIES.get(`${module}.${name}`);
  if (!build) {
    throw new DecodeError(
      `Pickle opcode ${opcode} at offset ${offset} references ${module}.${name}, which is not an allowed data type`,
    );
  }
  return new AllowedGlobal(`${module}.${name}`, build);
}

/**
 * Decodes data-only pickle streams (protocols 2 to 5) into plain values:
 * dicts become objects, lists and tuples become arrays, sets and frozensets
 * become `Set`s, bytes become `Uint8Array`s and integers outside the safe
 * range become `bigint`s.
 *
 * GLOBAL and STACK_GLOBAL resolve only a fixed set of container and scalar
 * types, and REDUCE only calls those: `OrderedDict` and `defaultdict` become
 * objects, protocol 2 `bytes` (`_codecs.encode`) become `Uint8Array`s.
 */
export class PickleDecoder {
  decode(data: Uint8Array): unknown {
    const reader = new PickleReader(data);
    const stack: unknown[] = [];
    const marks: number[] = [];
    const memo = new Map<number, unknown>();

    const pop = (): unknown => {
      if (stack.length === 0 || stack.length === marks[marks.length - 1]) {
        throw new DecodeError("Pickle stack underflow");
      }
      return stack.pop();
    };
    const top = (): unknown => {
      if (stack.length === 0) {
        throw new DecodeError("Pickle stack underflow");
      }
      return stack[stack.length - 1];
    };
    const popMark = (): unknown[] => {
      const mark = marks.pop();
      if (mark === undefined) {
        throw new DecodeError("Pickle MARK missing");
      }
      return stack.splice(mark);
    };
    const recall = (index: number): unknown => {
      if (!memo.has(index)) {
        throw new DecodeError(`Pickle memo entry ${index} missing`);
      }
      return memo.get(index);
    };

    for (;;) {
      const offset = reader.pos;
      const op = reader.byte();

      switch (op) {
        case OP.PROTO: {
          const protocol = reader.byte();
          if (protocol < 2 || protocol > PICKLE_HIGHEST_PROTOCOL) {
            throw new DecodeError(`Unsupported pickle protocol ${protocol}`);
          }
          break;
        }
        case OP.FRAME:
          reader.uint64();
          break;
        case OP.STOP: {
          const result = pop();
          if (result instanceof AllowedGlobal) {
            throw new DecodeError(
              `Pickle payload is the type ${result.qualifiedName}, not a value`,
            );
          }
          return result;
        }

        case OP.NONE:
          stack.push(null);
          break;
        case OP.NEWTRUE:
          stack.push(true);
          break;
        case OP.NEWFALSE:
          stack.push(false);
          break;
        case OP.BININT:
          stack.push(reader.int32());
          break;
        case OP.BININT1:
          stack.push(reader.byte());
          break;
        case OP.BININT2:
          stack.push(reader.uint16());
          break;
        case OP.LONG1:
          stack.push(decodeLong(reader.bytes(reader.byte())));
          break;
        case OP.LONG4:
          stack.push(decodeLong(reader.bytes(reader.int32())));
          break;
        case OP.BINFLOAT:
          stack.push(reader.float64());
          break;

        case OP.SHORT_BINUNICODE:
          stack.push(reader.utf8(reader.byte()));
          break;
        case OP.BINUNICODE:
          stack.push(reader.utf8(reader.uint32()));
          break;
        case OP.BINUNICODE8:
          stack.push(reader.utf8(reader.uint64()));
          break;
        case OP.SHORT_BINBYTES:
          stack.push(reader.bytes(reader.byte()));
          break;
        case OP.BINBYTES:
          stack.push(reader.bytes(reader.uint32()));
          break;
        case OP.BINBYTES8:
        case OP.BYTEARRAY8:
          stack.push(reader.bytes(reader.uint64()));
          break;

        case OP.EMPTY_DICT:
          stack.push({});
          break;
        case OP.EMPTY_LIST:
        case OP.EMPTY_TUPLE:
          stack.push([]);
          break;
        case OP.EMPTY_SET:
          stack.push(new Set());
          break;

        case OP.MARK:
          marks.push(stack.length);
          break;
        case OP.POP_MARK:
          popMark();
          break;
        case OP.POP:
          pop();
          break;
        case OP.DUP:
          stack.push(top());
          break;

        case OP.SETITEM: {
          const value = pop();
          const key = pop();
          setEntry(top(), key, value);
          break;
        }
        case OP.SETITEMS: {
          const items = popMark();
          if (items.length % 2 !== 0) {
            throw new DecodeError("SETITEMS needs key/value pairs");
          }
          const dict = top();
          for (let i = 0; i < items.length; i += 2) {
            setEntry(dict, items[i], items[i + 1]);
          }
          break;
        }
        case OP.DICT: {
          const items = popMark();
          if (items.length % 2 !== 0) {
            throw new DecodeError("DICT needs key/value pairs");
          }
          const dict = {};
          for (let i = 0; i < items.length; i += 2) {
            setEntry(dict, items[i], items[i + 1]);
          }
          stack.push(dict);
          break;
        }
        case OP.APPEND: {
          const value = pop();
          const list = top();
          if (!Array.isArray(list)) {
            throw new DecodeError("APPEND target is not a list");
          }
          list.push(value);
          break;
        }
        case OP.APPENDS: {
          const items = popMark();
          const list = top();
          if (!Array.isArray(list)) {
            throw new DecodeError("APPENDS target is not a list");
          }
          list.push(...items);
          break;
        }
        case OP.LIST:
        case OP.TUPLE:
          stack.push(popMark());
          break;
        case OP.TUPLE1:
          stack.push([pop()]);
          break;
        case OP.TUPLE2: {
          const second = pop();
          stack.push([pop(), second]);
          break;
        }
        case OP.TUPLE3: {
          const third = pop();
          const second = pop();
          stack.push([pop(), second, third]);
          break;
        }
        case OP.ADDITEMS: {
          const items = popMark();
          const set = top();
          if (!(set instanceof Set)) {
            throw new DecodeError("ADDITEMS target is not a set");
          }
          for (const item of items) {
            set.add(item);
          }
          break;
        }
        case OP.FROZENSET:
          stack.push(new Set(popMark()));
          break;

        case OP.GLOBAL: {
          const module = reader.line();
          stack.push(resolveGlobal(module, reader.line(), "GLOBAL", offset));
          break;
        }
        case OP.STACK_GLOBAL: {
          const name = pop();
          stack.push(resolveGlobal(pop(), name, "STACK_GLOBAL", offset));
          break;
        }
        case OP.REDUCE: {
          const args = pop();
          const callable = pop();
          if (!(callable instanceof AllowedGlobal)) {
            throw new DecodeError(
              `Pickle opcode REDUCE at offset ${offset} calls something other than an allowed data type`,
            );
          }
          if (!Array.isArray(args)) {
            throw new DecodeError(
              `Pickle opcode REDUCE at offset ${offset} has no argument tuple`,
            );
          }
          stack.push(callable.build(args));
          break;
        }

        case OP.MEMOIZE:
          memo.set(memo.size, top());
          break;
        case OP.BINPUT:
          memo.set(reader.byte(), top());
          break;
        case OP.LONG_BINPUT:
          memo.set(reader.uint32(), top());
          break;
        case OP.BINGET:
          stack.push(recall(reader.byte()));
          break;
        case OP.LONG_BINGET:
          stack.push(recall(reader.uint32()));
          break;

        default: {
          const name = CODE_OPCODES.get(op);
          throw new DecodeError(
            name
              ? `Pickle opcode ${name} at offset ${offset} references code and is not supported`
              : `Unknown pickle opcode 0x${op.toString(16)} at offset ${offset}`,
          );
        }
      }
    }
  }
}
