import { describe, expect, it, vi } from "vitest";

import { DecodeError } from "../../errors/checkpoint.errors";
import {
  type LegacyDecoder,
  LegacyCompatSerializer,
} from "../legacy-compat.serializer";
import type { SerializerProtocol } from "../serializer.port";

const bytes = (value: string): Uint8Array => new TextEncoder().encode(value);

// {"key": "value"} at protocol 4
const LEGACY_DICT = Uint8Array.from([
  0x80, 0x04, 0x7d, 0x94, 0x8c, 0x03, 0x6b, 0x65, 0x79, 0x94, 0x8c, 0x05, 0x76,
  0x61, 0x6c, 0x75, 0x65, 0x94, 0x73, 0x2e,
]);

describe("LegacyCompatSerializer", () => {
  it("should read JSON payloads with the primary codec", async () => {
    const legacy: LegacyDecoder = { decode: vi.fn() };
    const serde = new LegacyCompatSerializer(undefined, legacy);

    await expect(serde.loads(bytes('{"a":1}'))).resolves.toEqual({ a: 1 });
    expect(legacy.decode).not.toHaveBeenCalled();
  });

  it("should read legacy pickle payloads", async () => {
    const serde = new LegacyCompatSerializer();

    await expect(serde.loads(LEGACY_DICT)).resolves.toEqual({ key: "value" });
  });

  it("should write with the primary codec only", async () => {
    const primary: SerializerProtocol = {
      dumps: vi.fn(async () => bytes("encoded")),
      loads: vi.fn(),
    };
    const serde = new LegacyCompatSerializer(primary);

    await expect(serde.dumps({ a: 1 })).resolves.toEqual(bytes("encoded"));
    expect(primary.dumps).toHaveBeenCalledWith({ a: 1 });
  });

  it("should fall back to the primary codec when the legacy decoder fails", async () => {
    const primary: SerializerProtocol = {
      dumps: vi.fn(),
      loads: vi.fn(async () => "from primary"),
    };
    const legacy: LegacyDecoder = {
      decode: vi.fn(() => {
        throw new DecodeError("not a pickle");
      }),
    };
    const serde = new LegacyCompatSerializer(primary, legacy);

    await expect(serde.loads(LEGACY_DICT)).resolves.toBe("from primary");
    expect(legacy.decode).toHaveBeenCalledWith(LEGACY_DICT);
  });

  it("should raise the legacy error when both codecs fail", async () => {
    const serde = new LegacyCompatSerializer();
    const unsafe = Uint8Array.from([
      0x80, 0x02, 0x63, ...Buffer.from("os\nsystem\n", "latin1"), 0x2e,
    ]);

    await expect(serde.loads(unsafe)).rejects.toThrow(
      "Pickle opcode GLOBAL at offset 2 references os.system, which is not an allowed data type",
    );
  });
});
