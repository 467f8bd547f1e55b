import { describe, it, expect } from "vitest";
import { Decoder, decode } from "./decoder.ts";
import { encode } from "./encoder.ts";
import { ConvertError, IncompleteError, MalformedError } from "./errors.ts";
import { ExtensionRegistry, Handle, handleCodec } from "./extension.ts";
import { ExtensionValue, ValueType } from "./types.ts";

function decoder(...bytes: number[]): Decoder {
  return new Decoder(Uint8Array.from(bytes));
}

describe("Decoder.unpack", () => {
  it("reports unsigned and signed integer forms", () => {
    const dec = decoder(0x05, 0xcc, 0x80, 0xd0, 0xdf, 0xe0);
    dec.next();
    expect([dec.type, dec.int()]).toEqual([ValueType.Int, 5]);
    dec.next();
    expect([dec.type, dec.int()]).toEqual([ValueType.Uint, 128]);
    dec.next();
    expect([dec.type, dec.int()]).toEqual([ValueType.Int, -33]);
    dec.next();
    expect([dec.type, dec.int()]).toEqual([ValueType.Int, -32]);
    expect(dec.unpack()).toBe(false);
  });

  it("records where each value starts", () => {
    const dec = decoder(0x01, 0xa2, 0x68, 0x69, 0x92, 0x02, 0x03);
    dec.next();
    expect(dec.valueStart).toBe(0);
    dec.next();
    expect(dec.valueStart).toBe(1);
    dec.next();
    expect(dec.valueStart).toBe(4);
    dec.skip();
    expect(dec.valueStart).toBe(4);
    expect(Array.from(dec.raw())).toEqual([0x92, 0x02, 0x03]);
  });

  it("returns false on an empty buffer", () => {
    expect(decoder().unpack()).toBe(false);
  });

  it("throws IncompleteError when a value is cut short", () => {
    expect(() => decoder(0xcd, 0x01).next()).toThrow(IncompleteError);
    expect(() => decoder(0xa3, 0x61).next()).toThrow("msgpack: unexpected end of buffer at offset 0");
  });

  it("throws MalformedError on 0xc1", () => {
    const dec = decoder(0x01, 0xc1);
    dec.next();
    expect(() => dec.next()).toThrow(MalformedError);
    expect(() => decoder(0xc1).next()).toThrow("msgpack: invalid code 0xc1 at offset 0");
  });

  it("keeps 64-bit integers outside the safe range as bigint", () => {
    const dec = decoder(0xcf, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff);
    dec.next();
    expect(dec.bigint()).toBe(18446744073709551615n);
    expect(() => dec.int()).toThrow("msgpack: cannot convert Uint to number (18446744073709551615 exceeds the safe integer range)");
  });

  it("widens float32 and integers to number", () => {
    const dec = decoder(0xca, 0x3f, 0xc0, 0x00, 0x00, 0x07);
    dec.next();
    expect(dec.float()).toBe(1.5);
    dec.next();
    expect(dec.float()).toBe(7);
  });
});

describe("conversion errors", () => {
  it("leave the decoder at the next value after a scalar", () => {
    const dec = decoder(0xa3, 0x61, 0x62, 0x63, 0x05);
    dec.next();
    expect(() => dec.int()).toThrow("msgpack: cannot convert String to number");
    dec.next();
    expect(dec.int()).toBe(5);
  });

  it("skip the whole array when an array is read as a scalar", () => {
    const dec = decoder(0x92, 0x01, 0x92, 0x02, 0x03, 0x07);
    dec.next();
    expect(() => dec.bool()).toThrow(ConvertError);
    dec.next();
    expect(dec.int()).toBe(7);
  });

  it("reject negative values for uint", () => {
    const dec = decoder(0xff);
    dec.next();
    expect(() => dec.uint()).toThrow("msgpack: cannot convert Int to unsigned number (-1 is negative)");
  });

  it("keep alignment when a nested extension fails to decode", () => {
    class Buf extends Handle {}
    const extensions = new ExtensionRegistry([handleCodec(0, Buf)]);
    const dec = new Decoder(Uint8Array.of(0x93, 0x01, 0xd4, 0x00, 0xc0, 0x02, 0x05), 0, { extensions });
    dec.next();
    expect(() => dec.value()).toThrow("msgpack: cannot convert Extension to Buf (invalid handle payload c0)");
    dec.next();
    expect(dec.int()).toBe(5);
  });
});

describe("Decoder.skip", () => {
  it("skips nested members and exposes the raw bytes", () => {
    const dec = decoder(0x92, 0x91, 0x01, 0x81, 0xa1, 0x6b, 0x02, 0x03);
    dec.next();
    expect(dec.len()).toBe(2);
    dec.skip();
    expect(Array.from(dec.raw())).toEqual([0x92, 0x91, 0x01, 0x81, 0xa1, 0x6b, 0x02]);
    dec.next();
    expect(dec.int()).toBe(3);
  });

  it("skips strings, binary and extensions with their payload", () => {
    const dec = decoder(0xa2, 0x68, 0x69, 0xc4, 0x01, 0xff, 0xd4, 0x01, 0x00, 0xc0);
    dec.skipValues(3);
    dec.next();
    expect(dec.type).toBe(ValueType.Nil);
  });
});

describe("decode", () => {
  it("builds plain objects for string-keyed maps", () => {
    expect(decode(encode({ a: 1, b: [true, null] }))).toEqual({ a: 1, b: [true, null] });
  });

  it("builds a Map when any key is not a string", () => {
    expect(decode(Uint8Array.of(0x82, 0x01, 0xa1, 0x78, 0xa1, 0x79, 0x02))).toEqual(
      new Map<unknown, unknown>([
        [1, "x"],
        ["y", 2],
      ]),
    );
  });

  it("keeps a __proto__ key as an own property", () => {
    const value = decode(Uint8Array.of(0x81, 0xa9, ...new TextEncoder().encode("__proto__"), 0x01));
    expect(Object.getOwnPropertyNames(value)).toEqual(["__proto__"]);
  });

  it("copies binary payloads out of the input", () => {
    const input = Uint8Array.of(0xc4, 0x02, 0x0a, 0x0b);
    const value = decode(input);
    input[2] = 0;
    expect(value).toEqual(Uint8Array.of(0x0a, 0x0b));
  });

  it("wraps unregistered extensions", () => {
    expect(decode(Uint8Array.of(0xd5, 0x07, 0x01, 0x02))).toEqual(new ExtensionValue(7, Uint8Array.of(1, 2)));
  });
});
