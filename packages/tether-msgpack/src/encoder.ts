// MessagePack encoder.
//
// Every pack method picks the shortest wire form that holds the value.
// Bytes accumulate in a growable buffer until `bytes()` is taken.

import { EncodeError } from "./errors.ts";
import type { ExtensionRegistry } from "./extension.ts";
import { ExtensionValue, RawValue } from "./types.ts";

const MAX_DEPTH = 512;
const UINT64_MAX = 0xffff_ffff_ffff_ffffn;
const INT64_MIN = -0x8000_0000_0000_0000n;

const textEncoder = new TextEncoder();

export interface EncoderOptions {
  /** Codecs consulted by `encode()` for domain values. */
  extensions?: ExtensionRegistry;
  /** Initial buffer capacity in bytes. */
  initialCapacity?: number;
}

export class Encoder {
  private buf: Uint8Array;
  private view: DataView;
  private pos = 0;
  private readonly extensions: ExtensionRegistry | undefined;

  constructor(options: EncoderOptions = {}) {
    this.buf = new Uint8Array(options.initialCapacity ?? 256);
    this.view = new DataView(this.buf.buffer);
    this.extensions = options.extensions;
  }

  /** Number of bytes written so far. */
  get length(): number {
    return this.pos;
  }

  /** Copy of the bytes written so far. */
  bytes(): Uint8Array {
    return this.buf.slice(0, this.pos);
  }

  /** Discard everything written so far, keeping the allocation. */
  reset(): void {
    this.pos = 0;
  }

  packNil(): void {
    this.writeByte(0xc0);
  }

  packBool(value: boolean): void {
    this.writeByte(value ? 0xc3 : 0xc2);
  }

  packUint(value: number | bigint): void {
    if (typeof value === "bigint") {
      if (value < 0n || value > UINT64_MAX) {
        throw new EncodeError(`${value} is outside the uint64 range`);
      }
      if (value <= BigInt(Number.MAX_SAFE_INTEGER)) {
        this.packUint(Number(value));
        return;
      }
      this.ensure(9);
      this.buf[this.pos] = 0xcf;
      this.view.setBigUint64(this.pos + 1, value);
      this.pos += 9;
      return;
    }
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new EncodeError(`${value} is not a non-negative safe integer`);
    }
    if (value <= 0x7f) {
      this.writeByte(value);
    } else if (value <= 0xff) {
      this.ensure(2);
      this.buf[this.pos] = 0xcc;
      this.buf[this.pos + 1] = value;
      this.pos += 2;
    } else if (value <= 0xffff) {
      this.ensure(3);
      this.buf[this.pos] = 0xcd;
      this.view.setUint16(this.pos + 1, value);
      this.pos += 3;
    } else if (value <= 0xffff_ffff) {
      this.ensure(5);
      this.buf[this.pos] = 0xce;
      this.view.setUint32(this.pos + 1, value);
      this.pos += 5;
    } else {
      this.ensure(9);
      this.buf[this.pos] = 0xcf;
      this.view.setBigUint64(this.pos + 1, BigInt(value));
      this.pos += 9;
    }
  }

  packInt(value: number | bigint): void {
    if (typeof value === "bigint") {
      if (value >= 0n) {
        this.packUint(value);
        return;
      }
      if (value < INT64_MIN) {
        throw new EncodeError(`${value} is outside the int64 range`);
      }
      if (value >= BigInt(Number.MIN_SAFE_INTEGER)) {
        this.packInt(Number(value));
        return;
      }
      this.ensure(9);
      this.buf[this.pos] = 0xd3;
      this.view.setBigInt64(this.pos + 1, value);
      this.pos += 9;
      return;
    }
    if (!Number.isSafeInteger(value)) {
      throw new EncodeError(`${value} is not a safe integer`);
    }
    if (value >= 0) {
      this.packUint(value);
    } else if (value >= -32) {
      this.writeByte(value & 0xff);
    } else if (value >= -0x80) {
      this.ensure(2);
      this.buf[this.pos] = 0xd0;
      this.view.setInt8(this.pos + 1, value);
      this.pos += 2;
    } else if (value >= -0x8000) {
      this.ensure(3);
      this.buf[this.pos] = 0xd1;
      this.view.setInt16(this.pos + 1, value);
      this.pos += 3;
    } else if (value >= -0x8000_0000) {
      this.ensure(5);
      this.buf[this.pos] = 0xd2;
      this.view.setInt32(this.pos + 1, value);
      this.pos += 5;
    } else {
      this.ensure(9);
      this.buf[this.pos] = 0xd3;
      this.view.setBigInt64(this.pos + 1, BigInt(value));
      this.pos += 9;
    }
  }

  /** Pack a double-precision float. */
  packFloat(value: number): void {
    this.ensure(9);
    this.buf[this.pos] = 0xcb;
    this.view.setFloat64(this.pos + 1, value);
    this.pos += 9;
  }

  /** Pack a single-precision float (precision is lost for most values). */
  packFloat32(value: number): void {
    this.ensure(5);
    this.buf[this.pos] = 0xca;
    this.view.setFloat32(this.pos + 1, value);
    this.pos += 5;
  }

  packString(value: string): void {
    const data = textEncoder.encode(value);
    const n = data.length;
    if (n < 32) {
      this.writeByte(0xa0 | n);
    } else {
      this.writeLengthHeader(n, 0xd9, 0xda, 0xdb);
    }
    this.writeBytes(data);
  }

  packBinary(data: Uint8Array): void {
    this.writeLengthHeader(data.length, 0xc4, 0xc5, 0xc6);
    this.writeBytes(data);
  }

  packArrayLen(n: number): void {
    checkLength(n);
    if (n < 16) {
      this.writeByte(0x90 | n);
    } else {
      this.writeLengthHeader(n, null, 0xdc, 0xdd);
    }
  }

  packMapLen(n: number): void {
    checkLength(n);
    if (n < 16) {
      this.writeByte(0x80 | n);
    } else {
      this.writeLengthHeader(n, null, 0xde, 0xdf);
    }
  }

  /** Pack an extension value: tag byte plus opaque payload. */
  packExtension(type: number, data: Uint8Array): void {
    if (!Number.isInteger(type) || type < -128 || type > 127) {
      throw new EncodeError(`extension type ${type} is outside -128..127`);
    }
    const tag = type & 0xff;
    const fixed = FIXEXT_CODES.get(data.length);
    if (fixed !== undefined) {
      this.ensure(2);
      this.buf[this.pos] = fixed;
      this.buf[this.pos + 1] = tag;
      this.pos += 2;
    } else {
      this.writeLengthHeader(data.length, 0xc7, 0xc8, 0xc9);
      this.writeByte(tag);
    }
    this.writeBytes(data);
  }

  /** Copy already-encoded bytes to the output. */
  packRaw(data: Uint8Array): void {
    this.writeBytes(data);
  }

  /** Encode an arbitrary JavaScript value. */
  encode(value: unknown): void {
    this.encodeValue(value, 0);
  }

  private encodeValue(value: unknown, depth: number): void {
    if (depth > MAX_DEPTH) {
      throw new EncodeError(`nesting deeper than ${MAX_DEPTH} levels`);
    }
    if (value === null || value === undefined) {
      this.packNil();
      return;
    }
    switch (typeof value) {
      case "boolean":
        this.packBool(value);
        return;
      case "number":
        if (Number.isSafeInteger(value) && !Object.is(value, -0)) this.packInt(value);
        else this.packFloat(value);
        return;
      case "bigint":
        this.packInt(value);
        return;
      case "string":
        this.packString(value);
        return;
    }
    if (typeof value !== "object") {
      throw new EncodeError(`cannot encode a ${typeof value}`);
    }

    const ext = this.extensions?.encode(value);
    if (ext) {
      this.packExtension(ext.type, ext.data);
      return;
    }
    if (value instanceof Uint8Array) {
      this.packBinary(value);
    } else if (value instanceof RawValue) {
      this.packRaw(value.bytes);
    } else if (value instanceof ExtensionValue) {
      this.packExtension(value.type, value.data);
    } else if (Array.isArray(value)) {
      this.packArrayLen(value.length);
      for (const item of value) this.encodeValue(item, depth + 1);
    } else if (value instanceof Map) {
      this.packMapLen(value.size);
      for (const [k, v] of value) {
        this.encodeValue(k, depth + 1);
        this.encodeValue(v, depth + 1);
      }
    } else if (isPlainObject(value)) {
      const entries = Object.entries(value);
      this.packMapLen(entries.length);
      for (const [k, v] of entries) {
        this.packString(k);
        this.encodeValue(v, depth + 1);
      }
    } else {
      throw new EncodeError(`cannot encode ${value.constructor?.name ?? "object"}`);
    }
  }

  private writeLengthHeader(n: number, code8: number | null, code16: number, code32: number): void {
    checkLength(n);
    if (code8 !== null && n <= 0xff) {
      this.ensure(2);
      this.buf[this.pos] = code8;
      this.buf[this.pos + 1] = n;
      this.pos += 2;
    } else if (n <= 0xffff) {
      this.ensure(3);
      this.buf[this.pos] = code16;
      this.view.setUint16(this.pos + 1, n);
      this.pos += 3;
    } else {
      this.ensure(5);
      this.buf[this.pos] = code32;
      this.view.setUint32(this.pos + 1, n);
      this.pos += 5;
    }
  }

  private writeByte(b: number): void {
    this.ensure(1);
    this.buf[this.pos++] = b;
  }

  private writeBytes(data: Uint8Array): void {
    this.ensure(data.length);
    this.buf.set(data, this.pos);
    this.pos += data.length;
  }

  private ensure(n: number): void {
    const needed = this.pos + n;
    if (needed <= this.buf.length) return;
    let cap = this.buf.length * 2;
    while (cap < needed) cap *= 2;
    const next = new Uint8Array(cap);
    next.set(this.buf.subarray(0, this.pos));
    this.buf = next;
    this.view = new DataView(next.buffer);
  }
}

const FIXEXT_CODES = new Map<number, number>([
  [1, 0xd4],
  [2, 0xd5],
  [4, 0xd6],
  [8, 0xd7],
  [16, 0xd8],
]);

function checkLength(n: number): void {
  if (!Number.isInteger(n) || n < 0 || n > 0xffff_ffff) {
    throw new EncodeError(`length ${n} is outside the uint32 range`);
  }
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Encode a single value to bytes. */
export function encode(value: unknown, options: EncoderOptions = {}): Uint8Array {
  const enc = new Encoder(options);
  enc.encode(value);
  return enc.bytes();
}
