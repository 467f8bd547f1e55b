// MessagePack-RPC wire format
//
// Envelope types, their encoding, and incremental decoding of a byte stream
// into envelopes.

// ============================================================================
// Message Types
// ============================================================================

export {
  MessageKind,
  messageRequest,
  messageResponse,
  messageNotification,
  type Message,
  type RequestMessage,
  type ResponseMessage,
  type NotificationMessage,
} from "./types.ts";

// ============================================================================
// Codec
// ============================================================================

export {
  FrameError,
  encodeMessage,
  encodeRequest,
  encodeResponse,
  encodeNotification,
  decodeMessage,
  type DecodeMessageResult,
} from "./codec.ts";

export { MessageReader } from "./reader.ts";
