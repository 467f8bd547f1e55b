// MessagePack-RPC endpoint.
//
// One endpoint is both client and server over a single byte transport.
// `serve()` is the only reader; any number of callers may call, notify or
// run batches concurrently. Writes go through one queue so envelopes never
// interleave on the wire.

import {
  MalformedError,
  decode,
  decodeWithSchema,
  encode,
  t,
  type ExtensionRegistry,
  type Schema,
} from "@tether/msgpack";
import {
  MessageKind,
  MessageReader,
  encodeNotification,
  encodeRequest,
  encodeResponse,
  type Message,
  type NotificationMessage,
  type RequestMessage,
  type ResponseMessage,
} from "@tether/wire";
import { Batch } from "./batch.ts";
import { ApplicationError, ConnectionError, errorMessage } from "./errors.ts";
import { stderrLogf, type Logf } from "./logging.ts";
import {
  Extensions,
  RejectionError,
  type CallContext,
  type CallMiddleware,
  type CallOutcome,
  type CallRequest,
} from "./middleware.ts";
import {
  HandlerRegistry,
  type ArgsOf,
  type HandlerContext,
  type HandlerFunction,
  type HandlerSignature,
} from "./registry.ts";
import type { ByteTransport } from "./transport.ts";

const NIL = Uint8Array.of(0xc0);

export interface EndpointOptions {
  /** Sink for protocol errors and handler failures. Defaults to standard error. */
  logf?: Logf;
  /** Extension codecs used for arguments, results and error values. */
  extensions?: ExtensionRegistry;
  /** Call middleware, outermost first. */
  middleware?: CallMiddleware[];
  /** Method a batch is sent as. Defaults to "call_atomic". */
  batchMethod?: string;
  /** Bound on each step of `close()`, in milliseconds. Defaults to 10000. */
  closeGraceMs?: number;
}

export type EndpointState = "open" | "closing" | "closed";

interface PendingCall {
  resolve: (message: ResponseMessage) => void;
  reject: (error: Error) => void;
}

/**
 * A MessagePack-RPC endpoint.
 *
 * @example
 * ```typescript
 * const endpoint = new Endpoint(transport);
 * endpoint.registerHandler("add", { params: [t.int(), t.int()] }, (a, b) => a + b);
 * const serving = endpoint.serve();
 * const sum = await endpoint.call("add", [1, 2], t.int());
 * await endpoint.close();
 * await serving;
 * ```
 */
export class Endpoint {
  readonly logf: Logf;
  readonly extensions: ExtensionRegistry | undefined;
  readonly batchMethod: string;
  readonly closeGraceMs: number;
  readonly handlers = new HandlerRegistry();

  private middleware: CallMiddleware[];
  private nextId = 1;
  private pending = new Map<number, PendingCall>();
  private writeQueue: Promise<void> = Promise.resolve();
  private inFlight = new Set<Promise<void>>();
  private exclusiveTail: Promise<void> = Promise.resolve();
  private _state: EndpointState = "open";
  private failure: ConnectionError | null = null;
  private ended = false;
  private serving: Promise<void> | null = null;
  private closing: Promise<void> | null = null;

  constructor(
    readonly transport: ByteTransport,
    options: EndpointOptions = {},
  ) {
    this.logf = options.logf ?? stderrLogf;
    this.extensions = options.extensions;
    this.middleware = [...(options.middleware ?? [])];
    this.batchMethod = options.batchMethod ?? "call_atomic";
    this.closeGraceMs = options.closeGraceMs ?? 10_000;
  }

  get state(): EndpointState {
    return this._state;
  }

  /** Number of calls waiting for a response. */
  get pendingCount(): number {
    return this.pending.size;
  }

  /** Append a middleware; it runs after the ones already installed. */
  use(middleware: CallMiddleware): this {
    this.middleware.push(middleware);
    return this;
  }

  // ==========================================================================
  // Serving
  // ==========================================================================

  /**
   * Read and dispatch messages until end of input or `close()`.
   *
   * Rejects with a transport ConnectionError on an I/O failure or a stream
   * that is no longer aligned; every pending call fails with the same error.
   */
  serve(): Promise<void> {
    if (this.serving) return Promise.reject(new Error("serve was already called"));
    if (this._state !== "open") return Promise.reject(ConnectionError.closed());
    this.serving = this.readLoop();
    return this.serving;
  }

  private async readLoop(): Promise<void> {
    const reader = new MessageReader();
    try {
      for (;;) {
        let chunk: Uint8Array | null;
        try {
          chunk = await this.transport.read();
        } catch (e) {
          if (this._state !== "open") return;
          throw ConnectionError.transport(`read failed: ${errorMessage(e)}`, e);
        }

        if (chunk === null) {
          if (reader.buffered > 0 && this._state === "open") {
            throw ConnectionError.transport(`unexpected end of input inside a message (${reader.buffered} bytes)`);
          }
          this.end();
          await Promise.all(this.inFlight);
          return;
        }

        reader.push(chunk);
        for (let result = reader.next(); result !== null; result = reader.next()) {
          if (result.ok) this.route(result.message);
          else this.logf("tether: protocol error: %s", result.error.message);
        }
      }
    } catch (e) {
      const error =
        e instanceof ConnectionError
          ? e
          : e instanceof MalformedError
            ? ConnectionError.transport(`stream is no longer aligned: ${e.message}`, e)
            : ConnectionError.transport(errorMessage(e), e);
      this.fail(error);
      throw error;
    } finally {
      this.end();
    }
  }

  /** No more responses can arrive: fail what is pending and refuse new calls. */
  private end(): void {
    this.ended = true;
    this.releasePending(this.failure ?? ConnectionError.closed());
  }

  private route(message: Message): void {
    switch (message.kind) {
      case MessageKind.Response: {
        const pending = this.pending.get(message.id);
        if (!pending) {
          this.logf("tether: protocol error: %s", ConnectionError.protocol(`response for unknown id ${message.id}`).message);
          return;
        }
        this.pending.delete(message.id);
        pending.resolve(message);
        return;
      }
      case MessageKind.Request:
      case MessageKind.Notification: {
        const task = this.dispatch(message).catch((e: unknown) => {
          this.logf("tether: %s: %s", message.method, errorMessage(e));
        });
        this.inFlight.add(task);
        void task.finally(() => this.inFlight.delete(task));
        return;
      }
    }
  }

  private async dispatch(message: RequestMessage | NotificationMessage): Promise<void> {
    const kind = message.kind === MessageKind.Request ? "request" : "notification";
    const ctx: HandlerContext = { endpoint: this, method: message.method, kind };
    await this.exclusiveTail;
    const outcome = await this.handlers.invoke(message.params, ctx, this.extensions);

    if (message.kind === MessageKind.Notification) {
      if (!outcome.ok) this.logf("tether: notification %s", outcome.error.message);
      return;
    }

    const frame = outcome.ok
      ? encodeResponse(message.id, null, outcome.result)
      : encodeResponse(message.id, encode(outcome.error.toWire()), NIL);
    await this.write(frame);
  }

  /**
   * Run `fn` while holding inbound dispatch. Requests and notifications that
   * arrive meanwhile start their handlers only after `fn` settles, and
   * exclusive sections run one at a time in the order they were requested.
   *
   * A handler inside `fn` that waits on a call the peer can only answer by
   * calling back into this endpoint never completes.
   */
  exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.exclusiveTail.then(fn);
    this.exclusiveTail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  // ==========================================================================
  // Handlers
  // ==========================================================================

  /**
   * Register a handler. Without a signature the handler receives every
   * argument decoded dynamically, then the HandlerContext.
   */
  registerHandler(method: string, fn: (...args: unknown[]) => unknown): void;
  /**
   * Register a handler whose arguments are decoded with `params`, and any
   * extra ones with `rest`. The handler receives the params in order, the
   * extra arguments as one array, then the HandlerContext.
   */
  registerHandler<P extends Array<Schema<unknown>>, E, R>(
    method: string,
    signature: { params: [...P]; rest: Schema<E>; result?: Schema<R> },
    fn: (...args: [...ArgsOf<P>, E[], HandlerContext]) => R | Promise<R>,
  ): void;
  /**
   * Register a handler whose arguments are decoded with `params`. The
   * handler receives them in order, then the HandlerContext.
   */
  registerHandler<P extends Array<Schema<unknown>>, R>(
    method: string,
    signature: { params: [...P]; rest?: never; result?: Schema<R> },
    fn: (...args: [...ArgsOf<P>, HandlerContext]) => R | Promise<R>,
  ): void;
  registerHandler(
    method: string,
    signatureOrFn: HandlerSignature | HandlerFunction,
    fn?: HandlerFunction,
  ): void {
    if (typeof signatureOrFn === "function") {
      this.handlers.register(method, signatureOrFn);
    } else if (fn !== undefined) {
      this.handlers.register(method, fn, signatureOrFn);
    } else {
      throw new TypeError(`handler for ${method} is not a function`);
    }
  }

  // ==========================================================================
  // Calling
  // ==========================================================================

  /** Call `method` and decode the result dynamically. */
  call(method: string, args?: unknown[]): Promise<unknown>;
  /** Call `method` and decode the result with `schema`. */
  call<T>(method: string, args: unknown[], schema: Schema<T>): Promise<T>;
  async call(method: string, args: unknown[] = [], schema: Schema<unknown> = t.any()): Promise<unknown> {
    const ctx: CallContext = { extensions: new Extensions() };
    const request: CallRequest = { method, args: [...args] };

    for (const mw of this.middleware) {
      if (!mw.pre) continue;
      const rejection = await mw.pre(ctx, request);
      if (rejection) {
        const error = new RejectionError(method, rejection);
        await this.runPostHooks(ctx, request, { ok: false, error });
        throw error;
      }
    }

    let outcome: CallOutcome;
    try {
      outcome = { ok: true, value: await this.roundTrip(request.method, request.args, schema) };
    } catch (e) {
      outcome = { ok: false, error: e instanceof Error ? e : new Error(String(e)) };
    }
    await this.runPostHooks(ctx, request, outcome);

    if (!outcome.ok) throw outcome.error;
    return outcome.value;
  }

  /**
   * Send one request and wait for its response. The pending entry exists
   * before the request is written.
   */
  private async roundTrip<T>(method: string, args: unknown[], schema: Schema<T>): Promise<T> {
    this.assertUsable();
    const id = this.nextId++;
    const frame = encodeRequest(id, method, encode(args, { extensions: this.extensions }));

    const response = new Promise<ResponseMessage>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
    });
    const [, message] = await Promise.all([this.write(frame), response]);

    if (message.error !== null) {
      throw ApplicationError.fromWire(method, decode(message.error, { extensions: this.extensions }));
    }
    return decodeWithSchema(message.result, schema, { extensions: this.extensions });
  }

  private async runPostHooks(ctx: CallContext, request: CallRequest, outcome: CallOutcome): Promise<void> {
    for (let i = this.middleware.length - 1; i >= 0; i--) {
      const mw = this.middleware[i];
      if (!mw.post) continue;
      try {
        await mw.post(ctx, request, outcome);
      } catch (e) {
        this.logf("tether: middleware post hook for %s: %s", request.method, errorMessage(e));
      }
    }
  }

  /** Send a notification. Resolves once it is written; there is no reply. */
  async notify(method: string, args: unknown[] = []): Promise<void> {
    this.assertUsable();
    await this.write(encodeNotification(method, encode(args, { extensions: this.extensions })));
  }

  /** Start an empty batch sent as `batchMethod`. */
  newBatch(): Batch {
    return new Batch(this);
  }

  // ==========================================================================
  // Writing
  // ==========================================================================

  private write(frame: Uint8Array): Promise<void> {
    const written = this.writeQueue.then(async () => {
      if (this.failure) throw this.failure;
      try {
        await this.transport.write(frame);
      } catch (e) {
        const error =
          this._state === "open" ? ConnectionError.transport(`write failed: ${errorMessage(e)}`, e) : ConnectionError.closed();
        this.fail(error);
        throw error;
      }
    });
    this.writeQueue = written.catch(() => undefined);
    return written;
  }

  private assertUsable(): void {
    if (this.failure) throw this.failure;
    if (this._state !== "open" || this.ended) throw ConnectionError.closed();
  }

  private fail(error: ConnectionError): void {
    this.failure ??= error;
    this.releasePending(error);
  }

  private releasePending(error: Error): void {
    const pending = [...this.pending.values()];
    this.pending.clear();
    for (const call of pending) call.reject(error);
  }

  // ==========================================================================
  // Closing
  // ==========================================================================

  /**
   * Close the endpoint: release pending calls, close the transport, wait for
   * the transport's process and for `serve()` to return. Every step runs;
   * the first error is thrown. Repeated calls return the same promise.
   */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this._state = "closing";
    this.releasePending(ConnectionError.closed());
    const errors: unknown[] = [];

    try {
      await this.transport.close();
    } catch (e) {
      errors.push(e);
    }

    try {
      await this.transport.wait?.(this.closeGraceMs);
    } catch (e) {
      errors.push(e);
    }

    if (this.serving) {
      try {
        await withTimeout(this.serving, this.closeGraceMs, "serve did not exit");
      } catch (e) {
        errors.push(e);
      }
    }

    this._state = "closed";
    if (errors.length > 0) throw errors[0];
  }
}

function withTimeout(promise: Promise<void>, ms: number, message: string): Promise<void> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(ConnectionError.transport(message)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
