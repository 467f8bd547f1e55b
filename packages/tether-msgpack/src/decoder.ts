// Pull-style MessagePack decoder.
//
// `unpack()` reads one value header, plus the payload of strings, binary and
// extensions. Callers inspect `type` and then call the matching accessor.
// Arrays and maps are headers only: the caller walks the declared number of
// members or calls `skip()`.

import { ConvertError, IncompleteError, MalformedError } from "./errors.ts";
import type { ExtensionRegistry } from "./extension.ts";
import { ExtensionValue, ValueType } from "./types.ts";

const MAX_DEPTH = 512;
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

const textDecoder = new TextDecoder();

export interface DecoderOptions {
  /** Codecs used by `value()` to turn extension payloads into domain values. */
  extensions?: ExtensionRegistry;
}

export class Decoder {
  private pos: number;
  private start: number;
  private _type: ValueType = ValueType.Invalid;
  private n = 0;
  private num: number | bigint = 0;
  private flt = 0;
  private payload: Uint8Array = new Uint8Array(0);
  private extType = 0;
  private membersConsumed = false;
  private dv: DataView | undefined;
  readonly extensions: ExtensionRegistry | undefined;

  constructor(
    readonly buf: Uint8Array,
    offset = 0,
    options: DecoderOptions = {},
  ) {
    this.pos = offset;
    this.start = offset;
    this.extensions = options.extensions;
  }

  /** Position of the next unread byte. */
  get offset(): number {
    return this.pos;
  }

  /** Position where the current value starts. */
  get valueStart(): number {
    return this.start;
  }

  /** Type of the current value. */
  get type(): ValueType {
    return this._type;
  }

  /** Whether unread bytes remain. */
  get remaining(): number {
    return this.buf.length - this.pos;
  }

  /**
   * Read the next value header.
   *
   * Returns false when the buffer ends exactly at a value boundary.
   * @throws IncompleteError if the buffer ends inside the value.
   * @throws MalformedError on a byte that is never valid MessagePack.
   */
  unpack(): boolean {
    this.membersConsumed = false;
    if (this.pos >= this.buf.length) {
      this._type = ValueType.Invalid;
      return false;
    }
    this.start = this.pos;
    const code = this.buf[this.pos++];

    if (code <= 0x7f) return this.setInt(ValueType.Int, code);
    if (code >= 0xe0) return this.setInt(ValueType.Int, code - 0x100);
    if (code <= 0x8f) return this.setLen(ValueType.MapLen, code & 0x0f);
    if (code <= 0x9f) return this.setLen(ValueType.ArrayLen, code & 0x0f);
    if (code <= 0xbf) return this.setPayload(ValueType.String, code & 0x1f);

    switch (code) {
      case 0xc0:
        this._type = ValueType.Nil;
        return true;
      case 0xc2:
      case 0xc3:
        this._type = ValueType.Bool;
        this.num = code === 0xc3 ? 1 : 0;
        return true;
      case 0xc4:
        return this.setPayload(ValueType.Binary, this.readUint(1));
      case 0xc5:
        return this.setPayload(ValueType.Binary, this.readUint(2));
      case 0xc6:
        return this.setPayload(ValueType.Binary, this.readUint(4));
      case 0xc7:
        return this.setExtension(this.readUint(1));
      case 0xc8:
        return this.setExtension(this.readUint(2));
      case 0xc9:
        return this.setExtension(this.readUint(4));
      case 0xca:
        this.need(4);
        this.flt = this.view().getFloat32(this.pos);
        this.pos += 4;
        this._type = ValueType.Float;
        return true;
      case 0xcb:
        this.need(8);
        this.flt = this.view().getFloat64(this.pos);
        this.pos += 8;
        this._type = ValueType.Float;
        return true;
      case 0xcc:
        return this.setInt(ValueType.Uint, this.readUint(1));
      case 0xcd:
        return this.setInt(ValueType.Uint, this.readUint(2));
      case 0xce:
        return this.setInt(ValueType.Uint, this.readUint(4));
      case 0xcf: {
        this.need(8);
        const v = this.view().getBigUint64(this.pos);
        this.pos += 8;
        return this.setInt(ValueType.Uint, v <= MAX_SAFE ? Number(v) : v);
      }
      case 0xd0:
        this.need(1);
        return this.setInt(ValueType.Int, this.view().getInt8(this.pos++));
      case 0xd1: {
        this.need(2);
        const v = this.view().getInt16(this.pos);
        this.pos += 2;
        return this.setInt(ValueType.Int, v);
      }
      case 0xd2: {
        this.need(4);
        const v = this.view().getInt32(this.pos);
        this.pos += 4;
        return this.setInt(ValueType.Int, v);
      }
      case 0xd3: {
        this.need(8);
        const v = this.view().getBigInt64(this.pos);
        this.pos += 8;
        return this.setInt(ValueType.Int, v >= MIN_SAFE && v <= MAX_SAFE ? Number(v) : v);
      }
      case 0xd4:
        return this.setExtension(1);
      case 0xd5:
        return this.setExtension(2);
      case 0xd6:
        return this.setExtension(4);
      case 0xd7:
        return this.setExtension(8);
      case 0xd8:
        return this.setExtension(16);
      case 0xd9:
        return this.setPayload(ValueType.String, this.readUint(1));
      case 0xda:
        return this.setPayload(ValueType.String, this.readUint(2));
      case 0xdb:
        return this.setPayload(ValueType.String, this.readUint(4));
      case 0xdc:
        return this.setLen(ValueType.ArrayLen, this.readUint(2));
      case 0xdd:
        return this.setLen(ValueType.ArrayLen, this.readUint(4));
      case 0xde:
        return this.setLen(ValueType.MapLen, this.readUint(2));
      case 0xdf:
        return this.setLen(ValueType.MapLen, this.readUint(4));
      default:
        throw new MalformedError(code, this.start);
    }
  }

  /**
   * Read the next value header, which must exist.
   * @throws IncompleteError if the buffer is exhausted.
   */
  next(): void {
    if (!this.unpack()) throw new IncompleteError(this.pos);
  }

  /**
   * Discard the current value. For array and map headers this also discards
   * the declared number of members, recursively.
   */
  skip(): void {
    if (this._type !== ValueType.ArrayLen && this._type !== ValueType.MapLen) return;
    if (this.membersConsumed) return;

    const saved = { type: this._type, n: this.n, start: this.start };
    let remaining = this._type === ValueType.MapLen ? this.n * 2 : this.n;
    while (remaining > 0) {
      this.next();
      remaining--;
      if (this._type === ValueType.ArrayLen) remaining += this.n;
      else if (this._type === ValueType.MapLen) remaining += this.n * 2;
    }
    this._type = saved.type;
    this.n = saved.n;
    this.start = saved.start;
    this.membersConsumed = true;
  }

  /** Encoded bytes of the current value. Call after `skip()` for composites. */
  raw(): Uint8Array {
    return this.buf.subarray(this.start, this.pos);
  }

  /**
   * Skip the current value and build a conversion error for it. The decoder
   * is left at the next value.
   */
  mismatch(destType: string, detail?: string): ConvertError {
    const type = this._type;
    this.skip();
    return new ConvertError(type, destType, detail);
  }

  bool(): boolean {
    if (this._type !== ValueType.Bool) throw this.mismatch("boolean");
    return this.num === 1;
  }

  /** Integer as a number. Values outside the safe integer range are an error. */
  int(): number {
    if (this._type !== ValueType.Int && this._type !== ValueType.Uint) {
      throw this.mismatch("number");
    }
    if (typeof this.num === "bigint") {
      throw new ConvertError(this._type, "number", `${this.num} exceeds the safe integer range`);
    }
    return this.num;
  }

  /** Non-negative integer as a number. */
  uint(): number {
    const v = this.int();
    if (v < 0) throw new ConvertError(this._type, "unsigned number", `${v} is negative`);
    return v;
  }

  bigint(): bigint {
    if (this._type !== ValueType.Int && this._type !== ValueType.Uint) {
      throw this.mismatch("bigint");
    }
    return BigInt(this.num);
  }

  /** Float, widening integers. */
  float(): number {
    switch (this._type) {
      case ValueType.Float:
        return this.flt;
      case ValueType.Int:
      case ValueType.Uint:
        return Number(this.num);
      default:
        throw this.mismatch("float");
    }
  }

  /** UTF-8 text of a String, Binary or Extension payload. */
  string(): string {
    return textDecoder.decode(this.payloadOf("string"));
  }

  /** Payload of a String, Binary or Extension value, without copying. */
  bytes(): Uint8Array {
    return this.payloadOf("bytes");
  }

  /** Declared member count of an array or map header. */
  len(): number {
    if (this._type !== ValueType.ArrayLen && this._type !== ValueType.MapLen) {
      throw this.mismatch("length");
    }
    return this.n;
  }

  extensionType(): number {
    if (this._type !== ValueType.Extension) throw this.mismatch("extension");
    return this.extType;
  }

  /**
   * Decode the current value and all of its members into plain JavaScript.
   *
   * Integers become numbers (bigints outside the safe range). Maps become
   * plain objects when every key is a string, otherwise `Map`. Extensions go
   * through the registry, falling back to `ExtensionValue`.
   */
  value(depth = 0): unknown {
    if (depth > MAX_DEPTH) throw this.mismatch("value", `nesting deeper than ${MAX_DEPTH}`);
    switch (this._type) {
      case ValueType.Nil:
        return null;
      case ValueType.Bool:
        return this.num === 1;
      case ValueType.Int:
      case ValueType.Uint:
        return this.num;
      case ValueType.Float:
        return this.flt;
      case ValueType.String:
        return this.string();
      case ValueType.Binary:
        return this.payload.slice();
      case ValueType.Extension:
        return this.extensions
          ? this.extensions.decode(this.extType, this.payload.slice())
          : new ExtensionValue(this.extType, this.payload.slice());
      case ValueType.ArrayLen:
        return this.members(this.n, depth);
      case ValueType.MapLen: {
        const flat = this.members(this.n * 2, depth);
        const entries: Array<[unknown, unknown]> = [];
        for (let i = 0; i < flat.length; i += 2) entries.push([flat[i], flat[i + 1]]);
        return toMapValue(entries);
      }
      default:
        throw new ConvertError(this._type, "value");
    }
  }

  /** Decode `count` member values; on failure the rest are skipped. */
  private members(count: number, depth: number): unknown[] {
    this.membersConsumed = true;
    const out: unknown[] = [];
    for (let i = 0; i < count; i++) {
      this.next();
      try {
        out.push(this.value(depth + 1));
      } catch (e) {
        if (e instanceof ConvertError) this.skipValues(count - i - 1);
        throw e;
      }
    }
    return out;
  }

  /** Skip `count` complete values. */
  skipValues(count: number): void {
    for (let i = 0; i < count; i++) {
      this.next();
      this.skip();
    }
  }

  private payloadOf(destType: string): Uint8Array {
    switch (this._type) {
      case ValueType.String:
      case ValueType.Binary:
      case ValueType.Extension:
        return this.payload;
      default:
        throw this.mismatch(destType);
    }
  }

  private setInt(type: ValueType, v: number | bigint): true {
    this._type = type;
    this.num = v;
    return true;
  }

  private setLen(type: ValueType, n: number): true {
    this._type = type;
    this.n = n;
    return true;
  }

  private setPayload(type: ValueType, n: number): true {
    this.need(n);
    this._type = type;
    this.n = n;
    this.payload = this.buf.subarray(this.pos, this.pos + n);
    this.pos += n;
    return true;
  }

  private setExtension(n: number): true {
    this.need(1);
    this.extType = this.view().getInt8(this.pos++);
    return this.setPayload(ValueType.Extension, n);
  }

  private readUint(size: 1 | 2 | 4): number {
    this.need(size);
    const view = this.view();
    const v =
      size === 1
        ? view.getUint8(this.pos)
        : size === 2
          ? view.getUint16(this.pos)
          : view.getUint32(this.pos);
    this.pos += size;
    return v;
  }

  private need(n: number): void {
    if (this.pos + n > this.buf.length) throw new IncompleteError(this.start);
  }

  private view(): DataView {
    this.dv ??= new DataView(this.buf.buffer, this.buf.byteOffset, this.buf.byteLength);
    return this.dv;
  }
}

function toMapValue(entries: Array<[unknown, unknown]>): Map<unknown, unknown> | Record<string, unknown> {
  if (!entries.every(([k]) => typeof k === "string")) return new Map(entries);
  const obj: Record<string, unknown> = {};
  for (const [k, v] of entries) {
    Object.defineProperty(obj, String(k), {
      value: v,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return obj;
}

/** Decode the first complete value in `bytes`. */
export function decode(bytes: Uint8Array, options: DecoderOptions = {}): unknown {
  const dec = new Decoder(bytes, 0, options);
  dec.next();
  return dec.value();
}
