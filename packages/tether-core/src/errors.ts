import { inspect } from "node:util";

export type ConnectionErrorKind = "transport" | "protocol" | "closed";

/**
 * Connection-level failure.
 *
 * - `transport`: I/O failure or a byte stream that can no longer be parsed.
 *   Global: it ends `serve()` and fails every pending and later call.
 * - `protocol`: a well-formed value that is not a valid envelope, or a
 *   response for an unknown id. Logged; the connection stays up.
 * - `closed`: the endpoint was closed while the call was pending.
 */
export class ConnectionError extends Error {
  constructor(
    public kind: ConnectionErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConnectionError";
  }

  static transport(message: string, cause?: unknown): ConnectionError {
    return new ConnectionError("transport", message, cause === undefined ? undefined : { cause });
  }

  static protocol(message: string): ConnectionError {
    return new ConnectionError("protocol", message);
  }

  static closed(): ConnectionError {
    return new ConnectionError("closed", "connection closed");
  }
}

export type ApplicationErrorKind = "exception" | "validation" | "remote";

const KIND_CODES = { exception: 0, validation: 1 } as const;

/**
 * Error reported by the peer's handler, or thrown by a local handler to
 * control what the peer sees.
 *
 * On the wire an error is `[0, message]` for an exception and
 * `[1, message]` for a validation failure. Any other error value decodes
 * with kind `remote` and keeps the raw value.
 */
export class ApplicationError extends Error {
  constructor(
    readonly method: string,
    readonly kind: ApplicationErrorKind,
    readonly detail: string,
    readonly value?: unknown,
  ) {
    super(kind === "remote" ? `${method}: ${detail}` : `${method} ${kind}: ${detail}`);
    this.name = "ApplicationError";
  }

  /** A handler failure; the method is filled in when the error reaches the wire. */
  static exception(detail: string): ApplicationError {
    return new ApplicationError("", "exception", detail);
  }

  /** Bad arguments; the method is filled in when the error reaches the wire. */
  static validation(detail: string): ApplicationError {
    return new ApplicationError("", "validation", detail);
  }

  /** Interpret the decoded error slot of a response. */
  static fromWire(method: string, value: unknown): ApplicationError {
    if (Array.isArray(value) && value.length === 2 && typeof value[1] === "string") {
      if (value[0] === KIND_CODES.exception) return new ApplicationError(method, "exception", value[1], value);
      if (value[0] === KIND_CODES.validation) return new ApplicationError(method, "validation", value[1], value);
    }
    return new ApplicationError(method, "remote", describe(value), value);
  }

  /** Same error, attributed to `method`. */
  withMethod(method: string): ApplicationError {
    return new ApplicationError(method, this.kind, this.detail, this.value);
  }

  /** The `[kind, message]` pair sent to the peer. Remote errors go out as exceptions. */
  toWire(): [number, string] {
    return [this.kind === "validation" ? KIND_CODES.validation : KIND_CODES.exception, this.detail];
  }
}

/** A sub-call of an atomic batch failed. Results before `index` were delivered. */
export class BatchError extends Error {
  constructor(
    readonly index: number,
    readonly err: ApplicationError,
  ) {
    super(err.message);
    this.name = "BatchError";
  }
}

function describe(value: unknown): string {
  return typeof value === "string" ? value : inspect(value, { depth: 4, breakLength: Infinity });
}

/** Message of an unknown thrown value. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
