// Client-side call middleware.
//
// Middleware wraps outgoing calls: `pre` hooks run in order before the
// request is encoded and may rewrite arguments or reject the call; `post`
// hooks run in reverse order once the outcome is known.

/**
 * Typed key for per-call middleware state.
 *
 * @example
 * ```typescript
 * const STARTED = new ExtensionKey<number>("started");
 * ctx.extensions.set(STARTED, performance.now());
 * const started = ctx.extensions.get(STARTED); // number | undefined
 * ```
 */
export class ExtensionKey<T> {
  private readonly values = new WeakMap<Extensions, T>();

  constructor(readonly description: string) {}

  /** @internal */
  lookup(owner: Extensions): T | undefined {
    return this.values.get(owner);
  }

  /** @internal */
  has(owner: Extensions): boolean {
    return this.values.has(owner);
  }

  /** @internal */
  store(owner: Extensions, value: T): void {
    this.values.set(owner, value);
  }

  /** @internal */
  remove(owner: Extensions): boolean {
    return this.values.delete(owner);
  }
}

/** Per-call storage shared by the pre and post hooks of one call. */
export class Extensions {
  set<T>(key: ExtensionKey<T>, value: T): void {
    key.store(this, value);
  }

  get<T>(key: ExtensionKey<T>): T | undefined {
    return key.lookup(this);
  }

  has<T>(key: ExtensionKey<T>): boolean {
    return key.has(this);
  }

  delete<T>(key: ExtensionKey<T>): boolean {
    return key.remove(this);
  }
}

export interface CallContext {
  extensions: Extensions;
}

/** An outgoing call as middleware sees it. */
export interface CallRequest {
  readonly method: string;
  /** Positional arguments. Middleware may replace or edit them. */
  args: unknown[];
}

export type CallOutcome = { ok: true; value: unknown } | { ok: false; error: Error };

/**
 * Returned by a `pre` hook to abort the call. `code` is free-form
 * ("unauthenticated", "rate-limited", ...); callers switch on it.
 */
export interface Rejection {
  code: string;
  message: string;
}

/** A call that middleware refused to send. */
export class RejectionError extends Error {
  readonly code: string;

  constructor(
    readonly method: string,
    rejection: Rejection,
  ) {
    super(`${method} rejected: ${rejection.message}`);
    this.name = "RejectionError";
    this.code = rejection.code;
  }
}

export interface CallMiddleware {
  /**
   * Called before the request is written. Return a Rejection to abort.
   */
  pre?(ctx: CallContext, request: CallRequest): Promise<Rejection | void> | Rejection | void;

  /**
   * Called with the outcome, including rejections and connection errors.
   */
  post?(ctx: CallContext, request: CallRequest, outcome: CallOutcome): Promise<void> | void;
}
