// MessagePack-RPC envelope types.
//
// Every message is an array whose first element is the kind discriminant.
// Argument lists, errors and results stay encoded: the receiver decodes them
// against whatever schema it expects.

/** Envelope discriminants. */
export const MessageKind = {
  Request: 0,
  Response: 1,
  Notification: 2,
} as const;

export type MessageKind = (typeof MessageKind)[keyof typeof MessageKind];

/** `[0, id, method, params]` */
export interface RequestMessage {
  kind: typeof MessageKind.Request;
  id: number;
  method: string;
  /** Encoded argument array. */
  params: Uint8Array;
}

/** `[1, id, error, result]` */
export interface ResponseMessage {
  kind: typeof MessageKind.Response;
  id: number;
  /** Encoded error value, or null when the error slot is nil. */
  error: Uint8Array | null;
  /** Encoded result value. */
  result: Uint8Array;
}

/** `[2, method, params]` */
export interface NotificationMessage {
  kind: typeof MessageKind.Notification;
  method: string;
  /** Encoded argument array. */
  params: Uint8Array;
}

export type Message = RequestMessage | ResponseMessage | NotificationMessage;

// ============================================================================
// Factory Functions
// ============================================================================

export function messageRequest(id: number, method: string, params: Uint8Array): RequestMessage {
  return { kind: MessageKind.Request, id, method, params };
}

export function messageResponse(id: number, error: Uint8Array | null, result: Uint8Array): ResponseMessage {
  return { kind: MessageKind.Response, id, error, result };
}

export function messageNotification(method: string, params: Uint8Array): NotificationMessage {
  return { kind: MessageKind.Notification, method, params };
}
