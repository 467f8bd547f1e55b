import { type ValueType, valueTypeName } from "./types.ts";

/**
 * A decoded value could not be converted to the requested type.
 *
 * The offending value has been consumed before this is thrown, so the
 * decoder is positioned at the next value.
 */
export class ConvertError extends Error {
  constructor(
    readonly srcType: ValueType,
    readonly destType: string,
    detail?: string,
  ) {
    super(
      `msgpack: cannot convert ${valueTypeName(srcType)} to ${destType}` +
        (detail ? ` (${detail})` : ""),
    );
    this.name = "ConvertError";
  }
}

/** A value cannot be represented in MessagePack. */
export class EncodeError extends Error {
  constructor(message: string) {
    super(`msgpack: ${message}`);
    this.name = "EncodeError";
  }
}

/** The buffer ends in the middle of a value. */
export class IncompleteError extends Error {
  constructor(readonly offset: number) {
    super(`msgpack: unexpected end of buffer at offset ${offset}`);
    this.name = "IncompleteError";
  }
}

/** The bytes are not MessagePack; the stream position is lost. */
export class MalformedError extends Error {
  constructor(
    readonly byte: number,
    readonly offset: number,
  ) {
    super(`msgpack: invalid code 0x${byte.toString(16).padStart(2, "0")} at offset ${offset}`);
    this.name = "MalformedError";
  }
}
