import { describe, it, expect } from "vitest";
import { decode, encode, t } from "@tether/msgpack";
import { memoryPipe } from "./transport.ts";
import { Endpoint } from "./endpoint.ts";
import { ApplicationError } from "./errors.ts";
import { noopLogf } from "./logging.ts";
import { HandlerRegistry, bindArguments, type HandlerContext } from "./registry.ts";

function context(method: string): HandlerContext {
  const [transport] = memoryPipe();
  return { endpoint: new Endpoint(transport, { logf: noopLogf }), method, kind: "request" };
}

function validation(fn: () => unknown): string {
  try {
    fn();
  } catch (e) {
    if (e instanceof ApplicationError && e.kind === "validation") return e.detail;
    throw e;
  }
  throw new Error("expected a validation error");
}

describe("bindArguments", () => {
  it("decodes every argument dynamically without params", () => {
    expect(bindArguments(encode([1, "a", [true]]), {})).toEqual([1, "a", [true]]);
  });

  it("decodes positional parameters with their schemas", () => {
    const args = bindArguments(encode(["n", 3]), { params: [t.string(), t.int()] });
    expect(args).toEqual(["n", 3]);
  });

  it("pads trailing optional parameters", () => {
    const signature = { params: [t.string(), t.optional(t.int()), t.optional(t.bool())] };
    expect(bindArguments(encode(["n"]), signature)).toEqual(["n", undefined, undefined]);
    expect(bindArguments(encode(["n", 2]), signature)).toEqual(["n", 2, undefined]);
  });

  it("collects extra arguments into one array", () => {
    const signature = { params: [t.string()], rest: t.int() };
    expect(bindArguments(encode(["sum", 1, 2, 3]), signature)).toEqual(["sum", [1, 2, 3]]);
    expect(bindArguments(encode(["sum"]), signature)).toEqual(["sum", []]);
  });

  it("accepts a rest parameter without positional ones", () => {
    expect(bindArguments(encode(["a", "b"]), { rest: t.string() })).toEqual([["a", "b"]]);
  });

  it("reports the accepted argument count", () => {
    expect(validation(() => bindArguments(encode([1, 2, 3]), { params: [t.int(), t.int()] }))).toBe(
      "wrong number of arguments: got 3, want 2",
    );
    expect(validation(() => bindArguments(encode([]), { params: [t.int(), t.optional(t.int())] }))).toBe(
      "wrong number of arguments: got 0, want 1 to 2",
    );
    expect(validation(() => bindArguments(encode([]), { params: [t.int()], rest: t.int() }))).toBe(
      "wrong number of arguments: got 0, want at least 1",
    );
  });

  it("names the argument that fails to convert", () => {
    expect(validation(() => bindArguments(encode([1, "two"]), { params: [t.int(), t.int()] }))).toBe(
      "argument 1: msgpack: cannot convert String to number",
    );
    expect(validation(() => bindArguments(encode([1, true]), { params: [t.int()], rest: t.int() }))).toBe(
      "argument 1: msgpack: cannot convert Bool to number",
    );
  });

  it("rejects arguments that are not an array", () => {
    expect(validation(() => bindArguments(encode("x"), {}))).toBe(
      "arguments must be an array: msgpack: cannot convert String to length",
    );
  });
});

describe("HandlerRegistry", () => {
  it("validates registrations", () => {
    const registry = new HandlerRegistry();
    expect(() => registry.register("", () => 1)).toThrow("method name must be a non-empty string");
    expect(() => registry.register("x", (a: never, b: never, c: never) => [a, b, c], { params: [t.int()] })).toThrow(
      "handler for x takes 3 arguments, signature provides 2",
    );
  });

  it("replaces and removes registrations", () => {
    const registry = new HandlerRegistry();
    registry.register("a", () => 1);
    registry.register("b", () => 2);
    registry.register("a", () => 3);
    expect(registry.methods).toEqual(["a", "b"]);
    expect(registry.unregister("a")).toBe(true);
    expect(registry.unregister("a")).toBe(false);
    expect(registry.has("b")).toBe(true);
  });

  it("encodes the result with the result schema", async () => {
    const registry = new HandlerRegistry();
    registry.register("pair", () => ({ key: "k", count: 2 }), {
      params: [],
      result: t.struct({ key: t.string(), count: t.int() }, { array: true }),
    });

    const outcome = await registry.invoke(encode([]), context("pair"));
    expect(outcome.ok && decode(outcome.result)).toEqual(["k", 2]);
  });

  it("turns an unencodable result into an exception", async () => {
    const registry = new HandlerRegistry();
    registry.register("fn", () => () => 1);

    const outcome = await registry.invoke(encode([]), context("fn"));
    expect(outcome).toMatchObject({ ok: false, error: { kind: "exception", detail: "cannot encode result: msgpack: cannot encode a function" } });
  });

  it("treats a remote error rethrown by a handler as its own exception", async () => {
    const registry = new HandlerRegistry();
    registry.register("relay", () => {
      throw ApplicationError.fromWire("inner", "gone");
    });

    const outcome = await registry.invoke(encode([]), context("relay"));
    expect(outcome.ok ? null : outcome.error.toWire()).toEqual([0, "inner: gone"]);
  });
});
