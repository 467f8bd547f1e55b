import { describe, it, expect } from "vitest";
import { decode } from "./decoder.ts";
import { encode } from "./encoder.ts";
import { ConvertError } from "./errors.ts";
import { ExtensionRegistry, Handle, decodeHandle, encodeHandle, handleCodec, type ExtensionCodec } from "./extension.ts";
import { ExtensionValue } from "./types.ts";

class Buf extends Handle {}
class Win extends Handle {}

const extensions = new ExtensionRegistry([handleCodec(0, Buf), handleCodec(1, Win)]);

describe("handle payloads", () => {
  it("always encode as int32", () => {
    expect(Array.from(encodeHandle(1))).toEqual([0xd2, 0x00, 0x00, 0x00, 0x01]);
    expect(Array.from(encodeHandle(-2))).toEqual([0xd2, 0xff, 0xff, 0xff, 0xfe]);
  });

  it("decode every integer form up to 32 bits", () => {
    expect(decodeHandle(Uint8Array.of(0x05))).toBe(5);
    expect(decodeHandle(Uint8Array.of(0xff))).toBe(-1);
    expect(decodeHandle(Uint8Array.of(0xcc, 0xc8))).toBe(200);
    expect(decodeHandle(Uint8Array.of(0xcd, 0x01, 0x00))).toBe(256);
    expect(decodeHandle(Uint8Array.of(0xce, 0x00, 0x01, 0x00, 0x00))).toBe(65536);
    expect(decodeHandle(Uint8Array.of(0xd0, 0x80))).toBe(-128);
    expect(decodeHandle(Uint8Array.of(0xd1, 0x80, 0x00))).toBe(-32768);
    expect(decodeHandle(Uint8Array.of(0xd2, 0xff, 0xff, 0xff, 0xfe))).toBe(-2);
  });

  it("reject anything else", () => {
    expect(() => decodeHandle(new Uint8Array(0), "Buf")).toThrow(ConvertError);
    expect(() => decodeHandle(Uint8Array.of(0xcc), "Buf")).toThrow(
      "msgpack: cannot convert Extension to Buf (invalid handle payload cc)",
    );
    expect(() => decodeHandle(Uint8Array.of(0xa1, 0x61))).toThrow(ConvertError);
  });
});

describe("ExtensionRegistry", () => {
  it("round trips registered handles", () => {
    const bytes = encode([new Buf(3), new Win(1000)], { extensions });
    expect(Array.from(bytes.subarray(0, 9))).toEqual([0x92, 0xc7, 0x05, 0x00, 0xd2, 0x00, 0x00, 0x00, 0x03]);
    expect(decode(bytes, { extensions })).toEqual([new Buf(3), new Win(1000)]);
  });

  it("decodes handles written in a short form", () => {
    expect(decode(Uint8Array.of(0xd4, 0x01, 0x07), { extensions })).toEqual(new Win(7));
  });

  it("falls back to ExtensionValue for unknown tags", () => {
    expect(decode(Uint8Array.of(0xd4, 0x09, 0x07), { extensions })).toEqual(
      new ExtensionValue(9, Uint8Array.of(0x07)),
    );
  });

  it("round trips payloads at every length class boundary", () => {
    for (const n of [1, 2, 4, 8, 16, 17, 255, 256, 65535, 65536]) {
      const data = new Uint8Array(n).fill(0xab);
      const decoded = decode(encode(new ExtensionValue(-5, data)));
      expect(decoded).toEqual(new ExtensionValue(-5, data));
    }
  });

  it("hands codecs a copy of the payload", () => {
    const kept: Uint8Array[] = [];
    const blob: ExtensionCodec<Uint8Array> = {
      type: 3,
      name: "Blob",
      is: (value): value is Uint8Array => value instanceof Uint8Array,
      encode: (value) => value,
      decode: (data) => {
        kept.push(data);
        return data;
      },
    };
    const bytes = encode([new ExtensionValue(3, Uint8Array.of(1, 2)), "tail"]);

    decode(bytes, { extensions: new ExtensionRegistry([blob]) });
    expect(Array.from(kept[0])).toEqual([1, 2]);
    expect(kept[0].buffer.byteLength).toBe(2);
  });

  it("replaces a codec registered for the same tag", () => {
    const registry = new ExtensionRegistry([handleCodec(0, Buf)]);
    registry.register(handleCodec(0, Win));
    expect(registry.size).toBe(1);
    expect(registry.forType(0)?.name).toBe("Win");
    expect(registry.forValue(new Buf(1))).toBeUndefined();
  });

  it("rejects tags outside the signed byte range", () => {
    expect(() => new ExtensionRegistry([handleCodec(200, Buf)])).toThrow(
      "extension type 200 is outside -128..127",
    );
  });
});

describe("Handle", () => {
  it("compares by class and id", () => {
    expect(new Buf(1).equals(new Buf(1))).toBe(true);
    expect(new Buf(1).equals(new Win(1))).toBe(false);
    expect(new Buf(1).equals(new Buf(2))).toBe(false);
  });
});
