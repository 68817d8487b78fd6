import { describe, expect, it } from "vitest";

import { DecodeError } from "../../errors/checkpoint.errors";
import { isLegacyPayload, PickleDecoder } from "../pickle.decoder";

const ascii = (value: string): number[] => Array.from(Buffer.from(value, "latin1"));

const payload = (...parts: Array<number | number[]>): Uint8Array =>
  Uint8Array.from(parts.flat());

describe("isLegacyPayload", () => {
  it("should recognise the PROTO ... STOP framing", () => {
    expect(isLegacyPayload(payload(0x80, 0x04, 0x4e, 0x2e))).toBe(true);
    expect(isLegacyPayload(payload(ascii('{"a":1}')))).toBe(false);
    expect(isLegacyPayload(payload(0x80))).toBe(false);
    expect(isLegacyPayload(payload(0x80, 0x04, 0x4e))).toBe(false);
  });
});

describe("PickleDecoder", () => {
  const decoder = new PickleDecoder();

  it("should decode a framed protocol 4 dictionary", () => {
    const data = payload(
      [0x80, 0x04],
      [0x95, 0x12, 0, 0, 0, 0, 0, 0, 0], // FRAME
      [0x7d, 0x94], // EMPTY_DICT MEMOIZE
      [0x8c, 3, ...ascii("key"), 0x94],
      [0x8c, 5, ...ascii("value"), 0x94],
      [0x73, 0x2e], // SETITEM STOP
    );

    expect(decoder.decode(data)).toEqual({ key: "value" });
  });

  it("should decode a protocol 2 dictionary with BINPUT", () => {
    const data = payload(
      [0x80, 0x02, 0x7d, 0x71, 0],
      [0x58, 1, 0, 0, 0, ...ascii("a"), 0x71, 1], // BINUNICODE
      [0x4b, 1, 0x73, 0x2e],
    );

    expect(decoder.decode(data)).toEqual({ a: 1 });
  });

  it("should decode scalars, lists and tuples", () => {
    const data = payload(
      [0x80, 0x02, 0x5d, 0x28], // EMPTY_LIST MARK
      [0x4b, 1], // 1
      [0x4a, 0xff, 0xff, 0xff, 0xff], // -1
      [0x4d, 0x2c, 0x01], // 300
      [0x4a, 0x70, 0x11, 0x01, 0x00], // 70000
      [0x8a, 6, 0, 0, 0, 0, 0, 1], // 2 ** 40
      [0x47, 0x3f, 0xf8, 0, 0, 0, 0, 0, 0], // 1.5
      [0x4e, 0x88, 0x89], // None True False
      [0x4b, 1, 0x4b, 2, 0x86], // (1, 2)
      [0x65, 0x2e], // APPENDS STOP
    );

    expect(decoder.decode(data)).toEqual([
      1,
      -1,
      300,
      70000,
      1099511627776,
      1.5,
      null,
      true,
      false,
      [1, 2],
    ]);
  });

  it("should decode integers outside the safe range as bigint", () => {
    expect(
      decoder.decode(payload(0x80, 0x02, 0x8a, 9, [0, 0, 0, 0, 0, 0, 0, 0, 1], 0x2e)),
    ).toBe(18446744073709551616n);
    expect(decoder.decode(payload(0x80, 0x02, 0x8a, 1, 0xff, 0x2e))).toBe(-1);
    expect(decoder.decode(payload(0x80, 0x02, 0x8a, 0, 0x2e))).toBe(0);
  });

  it("should decode bytes and sets", () => {
    expect(decoder.decode(payload(0x80, 0x03, 0x43, 2, 1, 2, 0x2e))).toEqual(
      new Uint8Array([1, 2]),
    );
    expect(
      decoder.decode(payload(0x80, 0x04, 0x8f, 0x28, 0x4b, 1, 0x4b, 2, 0x90, 0x2e)),
    ).toEqual(new Set([1, 2]));
    expect(
      decoder.decode(payload(0x80, 0x04, 0x28, 0x4b, 3, 0x91, 0x2e)),
    ).toEqual(new Set([3]));
  });

  it("should resolve memo references", () => {
    const data = payload(
      [0x80, 0x04, 0x8c, 1, ...ascii("x"), 0x94],
      [0x68, 0, 0x86, 0x2e], // BINGET 0, TUPLE2
    );

    expect(decoder.decode(data)).toEqual(["x", "x"]);
  });

  it("should decode a DICT built from a MARK", () => {
    const data = payload(
      [0x80, 0x02, 0x28],
      [0x8c, 1, ...ascii("n"), 0x4e],
      [0x64, 0x2e], // DICT STOP
    );

    expect(decoder.decode(data)).toEqual({ n: null });
  });

  it("should refuse globals outside the allowed data types", () => {
    const data = payload(
      [0x80, 0x02, 0x63],
      ascii("os\nsystem\n"),
      [0x2e],
    );

    expect(() => decoder.decode(data)).toThrow(
      "Pickle opcode GLOBAL at offset 2 references os.system, which is not an allowed data type",
    );
  });

  it("should refuse a stacked global outside the allowed data types", () => {
    const data = payload(
      [0x80, 0x04],
      [0x8c, 8, ...ascii("builtins")],
      [0x8c, 4, ...ascii("eval")],
      [0x93, 0x2e], // STACK_GLOBAL STOP
    );

    expect(() => decoder.decode(data)).toThrow(
      "Pickle opcode STACK_GLOBAL at offset 18 references builtins.eval, which is not an allowed data type",
    );
  });

  it("should refuse opcodes that build arbitrary objects", () => {
    const data = payload([0x80, 0x02, 0x7d, 0x7d, 0x62, 0x2e]); // BUILD

    expect(() => decoder.decode(data)).toThrow(
      "Pickle opcode BUILD at offset 4 references code and is not supported",
    );
  });

  it("should refuse REDUCE on anything but an allowed type", () => {
    const data = payload([0x80, 0x02, 0x5d, 0x29, 0x52, 0x2e]);

    expect(() => decoder.decode(data)).toThrow(
      "Pickle opcode REDUCE at offset 4 calls something other than an allowed data type",
    );
  });

  it("should refuse a bare type as the result", () => {
    const data = payload([0x80, 0x02, 0x63], ascii("__builtin__\nint\n"), [0x2e]);

    expect(() => decoder.decode(data)).toThrow(
      "Pickle payload is the type __builtin__.int, not a value",
    );
  });

  describe("allowed data types", () => {
    it("should decode an OrderedDict written with STACK_GLOBAL", () => {
      const data = payload(
        [0x80, 0x04],
        [0x8c, 11, ...ascii("collections")],
        [0x8c, 11, ...ascii("OrderedDict")],
        [0x93, 0x29, 0x52], // STACK_GLOBAL EMPTY_TUPLE REDUCE
        [0x8c, 1, ...ascii("a"), 0x4b, 1, 0x73, 0x2e],
      );

      expect(decoder.decode(data)).toEqual({ a: 1 });
    });

    it("should decode an OrderedDict built from its item pairs", () => {
      const data = payload(
        [0x80, 0x02, 0x63],
        ascii("collections\nOrderedDict\n"),
        [0x5d, 0x8c, 1, ...ascii("k"), 0x4e, 0x86, 0x61], // [("k", None)]
        [0x85, 0x52, 0x2e], // TUPLE1 REDUCE STOP
      );

      expect(decoder.decode(data)).toEqual({ k: null });
    });

    it("should decode a defaultdict and drop its factory", () => {
      const data = payload(
        [0x80, 0x02, 0x63],
        ascii("collections\ndefaultdict\n"),
        [0x63],
        ascii("__builtin__\nint\n"),
        [0x85, 0x52], // TUPLE1 REDUCE
        [0x58, 1, 0, 0, 0, ...ascii("a"), 0x4b, 1, 0x73, 0x2e],
      );

      expect(decoder.decode(data)).toEqual({ a: 1 });
    });

    it("should decode protocol 2 bytes from _codecs.encode", () => {
      const data = payload(
        [0x80, 0x02, 0x63],
        ascii("_codecs\nencode\n"),
        [0x58, 3, 0, 0, 0, 0x00, 0xc3, 0xbf], // "\u0000\u00ff"
        [0x58, 6, 0, 0, 0, ...ascii("latin1")],
        [0x86, 0x52, 0x2e], // TUPLE2 REDUCE STOP
      );

      expect(decoder.decode(data)).toEqual(new Uint8Array([0x00, 0xff]));
    });

    it("should decode empty bytes from a bare bytes call", () => {
      const data = payload(
        [0x80, 0x02, 0x63],
        ascii("__builtin__\nbytes\n"),
        [0x29, 0x52, 0x2e],
      );

      expect(decoder.decode(data)).toEqual(new Uint8Array(0));
    });

    it("should decode a protocol 2 set", () => {
      const data = payload(
        [0x80, 0x02, 0x63],
        ascii("__builtin__\nset\n"),
        [0x5d, 0x28, 0x4b, 1, 0x4b, 2, 0x65], // [1, 2]
        [0x85, 0x52, 0x2e],
      );

      expect(decoder.decode(data)).toEqual(new Set([1, 2]));
    });

    it("should reject arguments to a scalar factory", () => {
      const data = payload(
        [0x80, 0x02, 0x63],
        ascii("builtins\nint\n"),
        [0x4b, 5, 0x85, 0x52, 0x2e],
      );

      expect(() => decoder.decode(data)).toThrow(
        "Only the empty form of a scalar type is supported",
      );
    });
  });

  it("should refuse unknown opcodes", () => {
    expect(() => decoder.decode(payload(0x80, 0x02, 0xff, 0x2e))).toThrow(
      "Unknown pickle opcode 0xff at offset 2",
    );
  });

  it("should refuse unsupported protocols", () => {
    expect(() => decoder.decode(payload(0x80, 0x01, 0x4e, 0x2e))).toThrow(
      "Unsupported pickle protocol 1",
    );
  });

  it("should reject truncated payloads", () => {
    expect(() =>
      decoder.decode(payload(0x80, 0x02, 0x8c, 10, ...ascii("a"), 0x2e)),
    ).toThrow(DecodeError);
    expect(() => decoder.decode(payload(0x80, 0x02, 0x4e))).toThrow(
      "Truncated pickle payload",
    );
  });

  it("should reject an empty stack at STOP", () => {
    expect(() => decoder.decode(payload(0x80, 0x02, 0x2e))).toThrow(
      "Pickle stack underflow",
    );
  });
});
