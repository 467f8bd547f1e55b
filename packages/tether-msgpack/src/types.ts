// Value types exposed by the pull decoder.
//
// The decoder reports the wire type of the next value before the caller
// commits to an accessor, so callers branch on `type` first.

/** Discriminant of a decoded MessagePack value. */
export const ValueType = {
  Invalid: 0,
  Nil: 1,
  Bool: 2,
  Int: 3,
  Uint: 4,
  Float: 5,
  ArrayLen: 6,
  MapLen: 7,
  String: 8,
  Binary: 9,
  Extension: 10,
} as const;

export type ValueType = (typeof ValueType)[keyof typeof ValueType];

const VALUE_TYPE_NAMES: Record<ValueType, string> = {
  [ValueType.Invalid]: "Invalid",
  [ValueType.Nil]: "Nil",
  [ValueType.Bool]: "Bool",
  [ValueType.Int]: "Int",
  [ValueType.Uint]: "Uint",
  [ValueType.Float]: "Float",
  [ValueType.ArrayLen]: "ArrayLen",
  [ValueType.MapLen]: "MapLen",
  [ValueType.String]: "String",
  [ValueType.Binary]: "Binary",
  [ValueType.Extension]: "Extension",
};

/** Human-readable name of a value type. */
export function valueTypeName(type: ValueType): string {
  return VALUE_TYPE_NAMES[type];
}

/**
 * An extension value whose tag has no registered codec.
 *
 * The payload is kept as-is; the codec never looks inside it.
 */
export class ExtensionValue {
  constructor(
    readonly type: number,
    readonly data: Uint8Array,
  ) {}
}

/**
 * Bytes that already hold one or more encoded values.
 *
 * The encoder copies them to the output verbatim.
 */
export class RawValue {
  constructor(readonly bytes: Uint8Array) {}
}
