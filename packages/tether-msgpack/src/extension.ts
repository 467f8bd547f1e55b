// Extension registry: maps extension type tags to domain values.
//
// The core codec treats extension payloads as opaque bytes. Applications
// register a codec per tag to turn those payloads into their own types (for
// example opaque handles to objects that live in the peer) and back.

import { ConvertError } from "./errors.ts";
import { ExtensionValue, ValueType } from "./types.ts";

/** Two-way mapping between an extension tag's payload and a domain type. */
export interface ExtensionCodec<T> {
  /** Extension type tag, -128..127. */
  readonly type: number;
  /** Name used in conversion errors. */
  readonly name: string;
  /** Whether `value` is handled by this codec when encoding. */
  is(value: unknown): value is T;
  encode(value: T): Uint8Array;
  decode(data: Uint8Array): T;
}

/** Registry of extension codecs, keyed by type tag. */
export class ExtensionRegistry {
  private byType = new Map<number, ExtensionCodec<unknown>>();

  constructor(codecs: Iterable<ExtensionCodec<unknown>> = []) {
    for (const codec of codecs) this.register(codec);
  }

  /** Register a codec. A codec already registered for the same tag is replaced. */
  register(codec: ExtensionCodec<unknown>): this {
    if (!Number.isInteger(codec.type) || codec.type < -128 || codec.type > 127) {
      throw new RangeError(`extension type ${codec.type} is outside -128..127`);
    }
    this.byType.set(codec.type, codec);
    return this;
  }

  /** Look up the codec for a tag. */
  forType(type: number): ExtensionCodec<unknown> | undefined {
    return this.byType.get(type);
  }

  /** Find the codec that claims a value, if any. */
  forValue(value: unknown): ExtensionCodec<unknown> | undefined {
    for (const codec of this.byType.values()) {
      if (codec.is(value)) return codec;
    }
    return undefined;
  }

  /** Decode a payload with the registered codec, or wrap it as an ExtensionValue. */
  decode(type: number, data: Uint8Array): unknown {
    const codec = this.byType.get(type);
    return codec ? codec.decode(data) : new ExtensionValue(type, data.slice());
  }

  /** Encode a value claimed by a registered codec. */
  encode(value: unknown): ExtensionValue | undefined {
    const codec = this.forValue(value);
    if (!codec) return undefined;
    return new ExtensionValue(codec.type, codec.encode(value));
  }

  get size(): number {
    return this.byType.size;
  }
}

/**
 * Base class for opaque handles: integers naming an object owned by the peer.
 */
export class Handle {
  constructor(readonly id: number) {}

  equals(other: Handle): boolean {
    return other.constructor === this.constructor && other.id === this.id;
  }
}

/**
 * Codec for a handle class whose payload is a MessagePack-encoded integer.
 *
 * @example
 * ```typescript
 * class Buffer extends Handle {}
 * const registry = new ExtensionRegistry([handleCodec(0, Buffer)]);
 * ```
 */
export function handleCodec<H extends Handle>(
  type: number,
  ctor: new (id: number) => H,
): ExtensionCodec<H> {
  return {
    type,
    name: ctor.name,
    is: (value: unknown): value is H => value instanceof ctor,
    encode: (value) => encodeHandle(value.id),
    decode: (data) => new ctor(decodeHandle(data, ctor.name)),
  };
}

/** Encode a handle id as a 5-byte int32. */
export function encodeHandle(id: number): Uint8Array {
  return Uint8Array.of(0xd2, (id >>> 24) & 0xff, (id >>> 16) & 0xff, (id >>> 8) & 0xff, id & 0xff);
}

/** Decode a handle payload written in any integer form up to 32 bits. */
export function decodeHandle(p: Uint8Array, name = "handle"): number {
  const view = new DataView(p.buffer, p.byteOffset, p.byteLength);
  const head = p[0];
  switch (true) {
    case p.length === 1 && head <= 0x7f:
      return head;
    case p.length === 1 && head >= 0xe0:
      return view.getInt8(0);
    case p.length === 2 && head === 0xcc:
      return view.getUint8(1);
    case p.length === 3 && head === 0xcd:
      return view.getUint16(1);
    case p.length === 5 && head === 0xce:
      return view.getUint32(1);
    case p.length === 2 && head === 0xd0:
      return view.getInt8(1);
    case p.length === 3 && head === 0xd1:
      return view.getInt16(1);
    case p.length === 5 && head === 0xd2:
      return view.getInt32(1);
    default:
      throw new ConvertError(ValueType.Extension, name, `invalid handle payload ${hex(p)}`);
  }
}

function hex(p: Uint8Array): string {
  return Array.from(p, (b) => b.toString(16).padStart(2, "0")).join("");
}
