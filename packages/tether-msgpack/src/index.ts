// MessagePack value codec
//
// This package contains the encoder, the pull-style decoder, schemas that
// describe typed decode targets, and the extension registry.

// ============================================================================
// Values
// ============================================================================

export { ValueType, valueTypeName, ExtensionValue, RawValue } from "./types.ts";
export { ConvertError, EncodeError, IncompleteError, MalformedError } from "./errors.ts";

// ============================================================================
// Encoding and decoding
// ============================================================================

export { Encoder, encode, type EncoderOptions } from "./encoder.ts";
export { Decoder, decode, type DecoderOptions } from "./decoder.ts";

// ============================================================================
// Schemas
// ============================================================================

export {
  t,
  isSchema,
  eachMember,
  decodeWithSchema,
  encodeWithSchema,
  type Schema,
  type SchemaKind,
  type Infer,
  type StructFields,
  type StructOptions,
} from "./schema.ts";

// ============================================================================
// Extensions
// ============================================================================

export {
  ExtensionRegistry,
  Handle,
  handleCodec,
  encodeHandle,
  decodeHandle,
  type ExtensionCodec,
} from "./extension.ts";
