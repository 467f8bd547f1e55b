// Envelope encoding and decoding.
//
// decodeMessage first walks the whole envelope, so a malformed message is
// always consumed in full and the next one starts at `next`. Only bytes that
// are not MessagePack at all (MalformedError) lose the stream position.

import {
  ConvertError,
  Decoder,
  Encoder,
  EncodeError,
  ValueType,
  valueTypeName,
} from "@tether/msgpack";
import {
  MessageKind,
  messageNotification,
  messageRequest,
  messageResponse,
  type Message,
} from "./types.ts";

const NIL = Uint8Array.of(0xc0);

/** A well-formed MessagePack value that is not a valid envelope. */
export class FrameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FrameError";
  }
}

/** Outcome of decoding one envelope. `next` is the offset after it either way. */
export type DecodeMessageResult =
  | { ok: true; message: Message; next: number }
  | { ok: false; error: FrameError; next: number };

// ============================================================================
// Encoding
// ============================================================================

/**
 * Encode one complete envelope.
 *
 * @throws EncodeError if `params` is not an encoded array or an id is out of range.
 */
export function encodeMessage(message: Message): Uint8Array {
  const enc = new Encoder({ initialCapacity: 64 });
  switch (message.kind) {
    case MessageKind.Request:
      checkParams(message.params);
      enc.packArrayLen(4);
      enc.packUint(MessageKind.Request);
      enc.packUint(message.id);
      enc.packString(message.method);
      enc.packRaw(message.params);
      break;
    case MessageKind.Response:
      enc.packArrayLen(4);
      enc.packUint(MessageKind.Response);
      enc.packUint(message.id);
      enc.packRaw(message.error ?? NIL);
      enc.packRaw(message.result);
      break;
    case MessageKind.Notification:
      checkParams(message.params);
      enc.packArrayLen(3);
      enc.packUint(MessageKind.Notification);
      enc.packString(message.method);
      enc.packRaw(message.params);
      break;
  }
  return enc.bytes();
}

export function encodeRequest(id: number, method: string, params: Uint8Array): Uint8Array {
  return encodeMessage(messageRequest(id, method, params));
}

export function encodeResponse(id: number, error: Uint8Array | null, result: Uint8Array): Uint8Array {
  return encodeMessage(messageResponse(id, error, result));
}

export function encodeNotification(method: string, params: Uint8Array): Uint8Array {
  return encodeMessage(messageNotification(method, params));
}

function checkParams(params: Uint8Array): void {
  const head = params[0];
  const isArray = head !== undefined && ((head >= 0x90 && head <= 0x9f) || head === 0xdc || head === 0xdd);
  if (!isArray) throw new EncodeError("params must be an encoded array");
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decode the envelope that starts at `offset`.
 *
 * @throws IncompleteError when `buf` ends inside the envelope.
 * @throws MalformedError when the bytes are not MessagePack.
 */
export function decodeMessage(buf: Uint8Array, offset = 0): DecodeMessageResult {
  const dec = new Decoder(buf, offset);
  dec.next();

  if (dec.type !== ValueType.ArrayLen) {
    const type = dec.type;
    dec.skip();
    return failure(`message is ${valueTypeName(type)}, not an array`, dec.offset);
  }

  const count = dec.len();
  const fields: Uint8Array[] = [];
  for (let i = 0; i < count; i++) {
    dec.next();
    dec.skip();
    fields.push(dec.raw());
  }
  const next = dec.offset;

  try {
    return { ok: true, message: parseFields(fields), next };
  } catch (e) {
    if (e instanceof FrameError) return { ok: false, error: e, next };
    if (e instanceof ConvertError) return failure(e.message, next);
    throw e;
  }
}

function failure(message: string, next: number): DecodeMessageResult {
  return { ok: false, error: new FrameError(message), next };
}

function parseFields(fields: Uint8Array[]): Message {
  if (fields.length === 0) throw new FrameError("empty message");
  const kind = field(fields[0]).uint();

  switch (kind) {
    case MessageKind.Request:
      expectArity("request", fields, 4);
      return messageRequest(field(fields[1]).uint(), field(fields[2]).string(), params(fields[3]));
    case MessageKind.Response: {
      expectArity("response", fields, 4);
      const error = field(fields[2]).type === ValueType.Nil ? null : fields[2];
      return messageResponse(field(fields[1]).uint(), error, fields[3]);
    }
    case MessageKind.Notification:
      expectArity("notification", fields, 3);
      return messageNotification(field(fields[1]).string(), params(fields[2]));
    default:
      throw new FrameError(`unknown message kind ${kind}`);
  }
}

function field(bytes: Uint8Array): Decoder {
  const dec = new Decoder(bytes);
  dec.next();
  return dec;
}

function params(bytes: Uint8Array): Uint8Array {
  const dec = field(bytes);
  if (dec.type !== ValueType.ArrayLen) {
    throw new FrameError(`params is ${valueTypeName(dec.type)}, not an array`);
  }
  return bytes;
}

function expectArity(name: string, fields: Uint8Array[], want: number): void {
  if (fields.length !== want) {
    throw new FrameError(`${name} has ${fields.length} fields, want ${want}`);
  }
}
