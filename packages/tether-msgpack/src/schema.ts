// Schemas: typed decode targets and encoders.
//
// A schema reads the value the decoder is positioned on (the header has
// already been unpacked) and consumes all of it, members included, whether
// it succeeds or throws a ConvertError.

import { Decoder, type DecoderOptions } from "./decoder.ts";
import { Encoder, type EncoderOptions } from "./encoder.ts";
import { ConvertError } from "./errors.ts";
import type { ExtensionCodec } from "./extension.ts";
import { RawValue, ValueType } from "./types.ts";

export type SchemaKind =
  | "nil"
  | "bool"
  | "int"
  | "uint"
  | "bigint"
  | "float"
  | "string"
  | "bytes"
  | "any"
  | "raw"
  | "array"
  | "tuple"
  | "map"
  | "record"
  | "struct"
  | "optional"
  | "ext";

/** Describes how one value is read from and written to MessagePack. */
export interface Schema<T> {
  readonly kind: SchemaKind;
  /** Type name used in conversion errors. */
  readonly name: string;
  /** Whether a trailing value may be absent altogether (argument lists, struct fields). */
  readonly optional?: boolean;
  read(dec: Decoder): T;
  write(enc: Encoder, value: T): void;
}

/** The value type a schema produces. */
export type Infer<S> = S extends Schema<infer T> ? T : never;

/** Whether `value` looks like a schema. */
export function isSchema(value: unknown): value is Schema<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    typeof value.kind === "string" &&
    "read" in value &&
    typeof value.read === "function" &&
    "write" in value &&
    typeof value.write === "function"
  );
}

/**
 * Run `fn` for each of `count` members, unpacking each header first.
 * A ConvertError skips the members that were not reached yet.
 */
export function eachMember(dec: Decoder, count: number, fn: (index: number) => void): void {
  for (let i = 0; i < count; i++) {
    dec.next();
    try {
      fn(i);
    } catch (e) {
      if (e instanceof ConvertError) dec.skipValues(count - i - 1);
      throw e;
    }
  }
}

function scalar<T>(
  kind: SchemaKind,
  read: (dec: Decoder) => T,
  write: (enc: Encoder, value: T) => void,
): Schema<T> {
  return { kind, name: kind, read, write };
}

const nilSchema = scalar<null>(
  "nil",
  (dec) => {
    if (dec.type !== ValueType.Nil) throw dec.mismatch("nil");
    return null;
  },
  (enc) => enc.packNil(),
);
const boolSchema = scalar<boolean>("bool", (dec) => dec.bool(), (enc, v) => enc.packBool(v));
const intSchema = scalar<number>("int", (dec) => dec.int(), (enc, v) => enc.packInt(v));
const uintSchema = scalar<number>("uint", (dec) => dec.uint(), (enc, v) => enc.packUint(v));
const bigintSchema = scalar<bigint>("bigint", (dec) => dec.bigint(), (enc, v) => enc.packInt(v));
const floatSchema = scalar<number>("float", (dec) => dec.float(), (enc, v) => enc.packFloat(v));
const stringSchema = scalar<string>("string", (dec) => dec.string(), (enc, v) => enc.packString(v));
const bytesSchema = scalar<Uint8Array>(
  "bytes",
  (dec) => dec.bytes().slice(),
  (enc, v) => enc.packBinary(v),
);
const anySchema = scalar<unknown>("any", (dec) => dec.value(), (enc, v) => enc.encode(v));
const rawSchema = scalar<RawValue>(
  "raw",
  (dec) => {
    dec.skip();
    return new RawValue(dec.raw().slice());
  },
  (enc, v) => enc.packRaw(v.bytes),
);

function array<T>(element: Schema<T>): Schema<T[]> {
  const name = `array<${element.name}>`;
  return {
    kind: "array",
    name,
    read(dec) {
      if (dec.type === ValueType.Nil) return [];
      if (dec.type !== ValueType.ArrayLen) throw dec.mismatch(name);
      const out: T[] = [];
      eachMember(dec, dec.len(), () => out.push(element.read(dec)));
      return out;
    },
    write(enc, value) {
      enc.packArrayLen(value.length);
      for (const item of value) element.write(enc, item);
    },
  };
}

function tuple(...elements: Array<Schema<unknown>>): Schema<unknown[]> {
  const name = `tuple<${elements.map((e) => e.name).join(", ")}>`;
  return {
    kind: "tuple",
    name,
    read(dec) {
      if (dec.type !== ValueType.ArrayLen) throw dec.mismatch(name);
      const n = dec.len();
      if (n !== elements.length) throw dec.mismatch(name, `got ${n} elements`);
      const out: unknown[] = [];
      eachMember(dec, n, (i) => out.push(elements[i].read(dec)));
      return out;
    },
    write(enc, value) {
      if (value.length !== elements.length) {
        throw new ConvertError(ValueType.ArrayLen, name, `got ${value.length} elements`);
      }
      enc.packArrayLen(elements.length);
      elements.forEach((schema, i) => schema.write(enc, value[i]));
    },
  };
}

function map<K, V>(key: Schema<K>, value: Schema<V>): Schema<Map<K, V>> {
  const name = `map<${key.name}, ${value.name}>`;
  return {
    kind: "map",
    name,
    read(dec) {
      const out = new Map<K, V>();
      if (dec.type === ValueType.Nil) return out;
      if (dec.type !== ValueType.MapLen) throw dec.mismatch(name);
      let pending: { key: K } | undefined;
      eachMember(dec, dec.len() * 2, (i) => {
        if (i % 2 === 0) {
          pending = { key: key.read(dec) };
        } else if (pending) {
          out.set(pending.key, value.read(dec));
        }
      });
      return out;
    },
    write(enc, v) {
      enc.packMapLen(v.size);
      for (const [k, item] of v) {
        key.write(enc, k);
        value.write(enc, item);
      }
    },
  };
}

function record<V>(value: Schema<V>): Schema<Record<string, V>> {
  const name = `record<${value.name}>`;
  return {
    kind: "record",
    name,
    read(dec) {
      const out: Record<string, V> = {};
      if (dec.type === ValueType.Nil) return out;
      if (dec.type !== ValueType.MapLen) throw dec.mismatch(name);
      let k = "";
      eachMember(dec, dec.len() * 2, (i) => {
        if (i % 2 === 0) {
          k = dec.type === ValueType.String ? dec.string() : String(dec.value());
        } else {
          Object.defineProperty(out, k, {
            value: value.read(dec),
            enumerable: true,
            writable: true,
            configurable: true,
          });
        }
      });
      return out;
    },
    write(enc, v) {
      const entries = Object.entries(v);
      enc.packMapLen(entries.length);
      for (const [k, item] of entries) {
        enc.packString(k);
        value.write(enc, item);
      }
    },
  };
}

/** Field schemas of a struct whose decoded type is `T`. */
export type StructFields<T> = { [K in keyof T]: Schema<T[K]> };

export interface StructOptions {
  /** Encode as a positional array instead of a map keyed by field name. */
  array?: boolean;
}

interface FieldEntry<T> {
  readonly name: string;
  readonly schema: Schema<unknown>;
  read(dec: Decoder, out: Partial<T>): void;
  write(enc: Encoder, value: T): void;
  present(value: T): boolean;
}

function fieldEntry<T, K extends keyof T & string>(key: K, schema: Schema<T[K]>): FieldEntry<T> {
  return {
    name: key,
    schema,
    read(dec, out) {
      out[key] = schema.read(dec);
    },
    write(enc, value) {
      schema.write(enc, value[key]);
    },
    present: (value) => value[key] !== undefined,
  };
}

function isComplete<T>(out: Partial<T>, fields: ReadonlyArray<FieldEntry<T>>): out is T {
  return fields.every((f) => f.schema.optional === true || Object.hasOwn(out, f.name));
}

/**
 * Struct schema. Map form matches fields by name and skips unknown keys;
 * array form matches them by position and skips extra elements. Missing
 * fields are an error unless their schema is optional.
 */
function struct<T extends object>(fields: StructFields<T>, options: StructOptions = {}): Schema<T> {
  const entries: Array<FieldEntry<T>> = [];
  for (const key in fields) entries.push(fieldEntry<T, typeof key>(key, fields[key]));
  const byName = new Map(entries.map((e) => [e.name, e]));
  const name = `struct{${entries.map((e) => e.name).join(", ")}}`;

  return {
    kind: "struct",
    name,
    read(dec) {
      const out: Partial<T> = {};
      const src = dec.type;
      if (src === ValueType.MapLen) {
        let field: FieldEntry<T> | undefined;
        eachMember(dec, dec.len() * 2, (i) => {
          if (i % 2 === 0) {
            field = dec.type === ValueType.String ? byName.get(dec.string()) : undefined;
            dec.skip();
          } else if (field) {
            field.read(dec, out);
          } else {
            dec.skip();
          }
        });
      } else if (src === ValueType.ArrayLen) {
        eachMember(dec, dec.len(), (i) => {
          const field = entries[i];
          if (field) field.read(dec, out);
          else dec.skip();
        });
      } else {
        throw dec.mismatch(name);
      }
      if (!isComplete(out, entries)) {
        const missing = entries.find((f) => f.schema.optional !== true && !Object.hasOwn(out, f.name));
        throw new ConvertError(src, name, `missing field ${missing?.name ?? "?"}`);
      }
      return out;
    },
    write(enc, value) {
      if (options.array) {
        enc.packArrayLen(entries.length);
        for (const field of entries) field.write(enc, value);
        return;
      }
      const present = entries.filter((f) => f.schema.optional !== true || f.present(value));
      enc.packMapLen(present.length);
      for (const field of present) {
        enc.packString(field.name);
        field.write(enc, value);
      }
    },
  };
}

/** Nil decodes as `undefined`; the value may also be left out at the end of an argument list. */
function optional<T>(inner: Schema<T>): Schema<T | undefined> {
  return {
    kind: "optional",
    name: `${inner.name}?`,
    optional: true,
    read(dec) {
      return dec.type === ValueType.Nil ? undefined : inner.read(dec);
    },
    write(enc, value) {
      if (value === undefined) enc.packNil();
      else inner.write(enc, value);
    },
  };
}

function ext<T>(codec: ExtensionCodec<T>): Schema<T> {
  return {
    kind: "ext",
    name: codec.name,
    read(dec) {
      if (dec.type !== ValueType.Extension || dec.extensionType() !== codec.type) {
        throw dec.mismatch(codec.name);
      }
      return codec.decode(dec.bytes());
    },
    write(enc, value) {
      enc.packExtension(codec.type, codec.encode(value));
    },
  };
}

/** Schema constructors. */
export const t = {
  nil: (): Schema<null> => nilSchema,
  bool: (): Schema<boolean> => boolSchema,
  int: (): Schema<number> => intSchema,
  uint: (): Schema<number> => uintSchema,
  bigint: (): Schema<bigint> => bigintSchema,
  float: (): Schema<number> => floatSchema,
  string: (): Schema<string> => stringSchema,
  bytes: (): Schema<Uint8Array> => bytesSchema,
  any: (): Schema<unknown> => anySchema,
  raw: (): Schema<RawValue> => rawSchema,
  array,
  tuple,
  map,
  record,
  struct,
  optional,
  ext,
};

/** Decode the first value in `bytes` with a schema. */
export function decodeWithSchema<T>(bytes: Uint8Array, schema: Schema<T>, options: DecoderOptions = {}): T {
  const dec = new Decoder(bytes, 0, options);
  dec.next();
  return schema.read(dec);
}

/** Encode a value with a schema. */
export function encodeWithSchema<T>(value: T, schema: Schema<T>, options: EncoderOptions = {}): Uint8Array {
  const enc = new Encoder(options);
  schema.write(enc, value);
  return enc.bytes();
}
