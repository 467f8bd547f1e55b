// Handler registry and argument binding.
//
// Handlers are stored type-erased. A signature, when given, fixes how the
// request's argument array is decoded; without one every argument is decoded
// dynamically.

import {
  ConvertError,
  Decoder,
  EncodeError,
  Encoder,
  eachMember,
  isSchema,
  type ExtensionRegistry,
  type Infer,
  type Schema,
} from "@tether/msgpack";
import { ApplicationError, errorMessage } from "./errors.ts";
import type { Endpoint } from "./endpoint.ts";

/** Passed to every handler after its arguments. */
export interface HandlerContext {
  endpoint: Endpoint;
  method: string;
  kind: "request" | "notification";
}

/** Decoded value types of a parameter schema list. */
export type ArgsOf<P extends Array<Schema<unknown>>> = { [K in keyof P]: Infer<P[K]> };

/** Declares how a handler's arguments are decoded and its result encoded. */
export interface HandlerSignature {
  /** Positional parameters. Trailing `t.optional` parameters may be left out by the caller. */
  params?: Array<Schema<unknown>>;
  /** Extra arguments past `params`, passed to the handler as one array. */
  rest?: Schema<unknown>;
  /** Result encoding. Defaults to dynamic encoding of the returned value. */
  result?: Schema<unknown>;
}

/** Any handler function; arity and types are checked against the signature. */
export type HandlerFunction = (...args: never[]) => unknown;

interface ErasedHandler {
  invoke(...args: unknown[]): unknown;
}

interface Registration {
  handler: ErasedHandler;
  signature: HandlerSignature;
}

export type InvokeOutcome = { ok: true; result: Uint8Array } | { ok: false; error: ApplicationError };

/** Method name to handler mapping. Registering a method again replaces it. */
export class HandlerRegistry {
  private handlers = new Map<string, Registration>();

  /**
   * Register `fn` for `method`.
   *
   * @throws TypeError if `fn` is not a function, a declared parameter is not
   * a schema, or `fn` takes more arguments than the signature provides.
   */
  register(method: string, fn: HandlerFunction, signature: HandlerSignature = {}): void {
    if (typeof method !== "string" || method === "") {
      throw new TypeError("method name must be a non-empty string");
    }
    if (typeof fn !== "function") {
      throw new TypeError(`handler for ${method} is not a function`);
    }
    const { params, rest, result } = signature;
    if (params !== undefined) {
      if (!Array.isArray(params)) throw new TypeError(`handler for ${method}: params must be an array of schemas`);
      params.forEach((p, i) => {
        if (!isSchema(p)) throw new TypeError(`handler for ${method}: parameter ${i} is not a schema`);
      });
      const provided = params.length + (rest ? 1 : 0) + 1;
      if (fn.length > provided) {
        throw new TypeError(`handler for ${method} takes ${fn.length} arguments, signature provides ${provided}`);
      }
    }
    if (rest !== undefined && !isSchema(rest)) throw new TypeError(`handler for ${method}: rest is not a schema`);
    if (result !== undefined && !isSchema(result)) throw new TypeError(`handler for ${method}: result is not a schema`);

    this.handlers.set(method, { handler: { invoke: fn }, signature });
  }

  has(method: string): boolean {
    return this.handlers.has(method);
  }

  unregister(method: string): boolean {
    return this.handlers.delete(method);
  }

  get methods(): string[] {
    return [...this.handlers.keys()];
  }

  /**
   * Decode `params`, run the handler and encode its result. Never throws:
   * every failure becomes an ApplicationError attributed to `ctx.method`.
   */
  async invoke(params: Uint8Array, ctx: HandlerContext, extensions?: ExtensionRegistry): Promise<InvokeOutcome> {
    const method = ctx.method;
    const registration = this.handlers.get(method);
    if (!registration) {
      return { ok: false, error: new ApplicationError(method, "exception", `unknown method: ${method}`) };
    }
    const { handler, signature } = registration;

    let args: unknown[];
    try {
      args = bindArguments(params, signature, extensions);
    } catch (e) {
      return { ok: false, error: asApplicationError(method, e) };
    }

    let value: unknown;
    try {
      value = await handler.invoke(...args, ctx);
    } catch (e) {
      return { ok: false, error: asApplicationError(method, e) };
    }

    try {
      const enc = new Encoder({ extensions });
      if (signature.result) signature.result.write(enc, value);
      else enc.encode(value);
      return { ok: true, result: enc.bytes() };
    } catch (e) {
      if (e instanceof EncodeError || e instanceof ConvertError) {
        return { ok: false, error: new ApplicationError(method, "exception", `cannot encode result: ${e.message}`) };
      }
      return { ok: false, error: asApplicationError(method, e) };
    }
  }
}

/**
 * Decode a request's argument array against a signature.
 *
 * @throws ApplicationError (validation) on a count or type mismatch.
 */
export function bindArguments(params: Uint8Array, signature: HandlerSignature, extensions?: ExtensionRegistry): unknown[] {
  const dec = new Decoder(params, 0, { extensions });
  dec.next();
  let count: number;
  try {
    count = dec.len();
  } catch (e) {
    throw ApplicationError.validation(`arguments must be an array: ${errorMessage(e)}`);
  }

  const args: unknown[] = [];
  let index = 0;
  const fail = (e: unknown): never => {
    if (e instanceof ConvertError) throw ApplicationError.validation(`argument ${index}: ${e.message}`);
    throw e;
  };

  const fixed = signature.params ?? (signature.rest ? [] : undefined);
  if (fixed === undefined) {
    try {
      eachMember(dec, count, (i) => {
        index = i;
        args.push(dec.value());
      });
    } catch (e) {
      fail(e);
    }
    return args;
  }

  let required = fixed.length;
  while (required > 0 && fixed[required - 1].optional === true) required--;
  const max = signature.rest ? Infinity : fixed.length;
  if (count < required || count > max) {
    throw ApplicationError.validation(`wrong number of arguments: got ${count}, want ${arity(required, max)}`);
  }

  const rest: unknown[] = [];
  try {
    eachMember(dec, count, (i) => {
      index = i;
      if (i < fixed.length) args.push(fixed[i].read(dec));
      else if (signature.rest) rest.push(signature.rest.read(dec));
    });
  } catch (e) {
    fail(e);
  }
  while (args.length < fixed.length) args.push(undefined);
  if (signature.rest) args.push(rest);
  return args;
}

function arity(required: number, max: number): string {
  if (max === Infinity) return `at least ${required}`;
  if (required === max) return String(required);
  return `${required} to ${max}`;
}

function asApplicationError(method: string, e: unknown): ApplicationError {
  if (e instanceof ApplicationError) {
    return e.kind === "remote"
      ? new ApplicationError(method, "exception", e.message, e.value)
      : e.withMethod(method);
  }
  return new ApplicationError(method, "exception", errorMessage(e));
}
