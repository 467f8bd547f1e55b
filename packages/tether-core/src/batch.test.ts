import { describe, it, expect, afterEach } from "vitest";
import { EncodeError, t } from "@tether/msgpack";
import { registerAtomicHandler } from "./atomic.ts";
import { resultTarget } from "./batch.ts";
import { Endpoint, type EndpointOptions } from "./endpoint.ts";
import { ApplicationError, BatchError } from "./errors.ts";
import { noopLogf } from "./logging.ts";
import { memoryPipe } from "./transport.ts";

const open: Endpoint[] = [];

afterEach(async () => {
  await Promise.allSettled(open.splice(0).map((e) => e.close()));
});

function setup(clientOptions: EndpointOptions = {}) {
  const [a, b] = memoryPipe();
  const client = new Endpoint(a, { logf: noopLogf, ...clientOptions });
  const server = new Endpoint(b, { logf: noopLogf });
  open.push(client, server);
  void Promise.allSettled([client.serve(), server.serve()]);

  const calls: string[] = [];
  server.registerHandler("add", { params: [t.int(), t.int()] }, (x, y, ctx) => {
    calls.push(ctx.method);
    return x + y;
  });
  server.registerHandler("greet", { params: [t.string()] }, (name) => `hello ${name}`);
  server.registerHandler("fail", () => {
    throw new Error("out of paper");
  });
  return { client, server, calls };
}

describe("Batch", () => {
  it("fills every target on success", async () => {
    const { client, server } = setup();
    registerAtomicHandler(server);

    const batch = client.newBatch();
    const sum = resultTarget(t.int(), 0);
    const greeting = resultTarget(t.string(), "");
    batch.call("add", [1, 2], sum);
    batch.call("greet", ["bob"], greeting);
    batch.call("add", [3, 4]);
    expect(batch.size).toBe(3);

    await batch.execute();
    expect(sum.value).toBe(3);
    expect(greeting.value).toBe("hello bob");
    expect(batch.size).toBe(0);
  });

  it("stops at the first failure and fills only the targets before it", async () => {
    const { client, server, calls } = setup();
    registerAtomicHandler(server);

    const batch = client.newBatch();
    const first = resultTarget(t.int(), -1);
    const third = resultTarget(t.int(), -1);
    batch.call("add", [1, 2], first);
    batch.call("add", ["x"]);
    batch.call("add", [5, 5], third);

    const error = await batch.execute().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(BatchError);
    expect(error).toMatchObject({ index: 1, message: "add validation: wrong number of arguments: got 1, want 2" });
    expect(error instanceof BatchError && error.err).toMatchObject({ method: "add", kind: "validation" });
    expect(first.value).toBe(3);
    expect(third.value).toBe(-1);
    expect(calls).toEqual(["add"]);
  });

  it("reports exceptions and unknown methods with the sub-call's method", async () => {
    const { client, server } = setup();
    registerAtomicHandler(server);

    const batch = client.newBatch();
    batch.call("fail");
    await expect(batch.execute()).rejects.toMatchObject({ index: 0, message: "fail exception: out of paper" });

    batch.call("greet", ["ann"]);
    batch.call("nope");
    await expect(batch.execute()).rejects.toMatchObject({ index: 1, message: "nope exception: unknown method: nope" });
  });

  it("throws the encode error of a poisoned batch without sending it", async () => {
    const { client, server, calls } = setup();
    registerAtomicHandler(server);

    const batch = client.newBatch();
    batch.call("add", [1, 2]);
    batch.call("add", [() => 1]);
    batch.call("add", [3, 4]);
    expect(batch.size).toBe(2);

    await expect(batch.execute()).rejects.toThrow(EncodeError);
    expect(client.pendingCount).toBe(0);
    expect(calls).toEqual([]);

    const sum = resultTarget(t.int(), 0);
    batch.call("add", [20, 22], sum);
    await batch.execute();
    expect(sum.value).toBe(42);
    expect(calls).toEqual(["add"]);
  });

  it("rejects a failure index outside the batch", async () => {
    const { client, server } = setup();
    server.registerHandler("call_atomic", () => [[], [5, 0, "boom"]]);

    const batch = client.newBatch();
    batch.call("add", [1, 2]);
    const error = await batch.execute().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ApplicationError);
    expect(error).toMatchObject({ method: "call_atomic", kind: "remote", message: "call_atomic: 5 0 boom" });
  });

  it("rejects an unknown failure type", async () => {
    const { client, server } = setup();
    server.registerHandler("call_atomic", () => [[], [0, 7, "odd"]]);

    const batch = client.newBatch();
    batch.call("add", [1, 2]);
    await expect(batch.execute()).rejects.toMatchObject({ kind: "remote", message: "call_atomic: 0 7 odd" });
  });

  it("holds other inbound requests until the batch is done", async () => {
    const { client, server } = setup();
    registerAtomicHandler(server);
    const order: string[] = [];
    let entered: (value: void) => void = () => {};
    const started = new Promise<void>((resolve) => {
      entered = resolve;
    });
    server.registerHandler("step", { params: [t.string()] }, async (name) => {
      order.push(`start ${name}`);
      entered();
      await new Promise((resolve) => setTimeout(resolve, 20));
      order.push(`end ${name}`);
    });
    server.registerHandler("mark", () => {
      order.push("mark");
    });

    const batch = client.newBatch();
    batch.call("step", ["a"]);
    batch.call("step", ["b"]);
    const executing = batch.execute();
    await started;
    expect(order).toEqual(["start a"]);

    await Promise.all([executing, client.call("mark")]);
    expect(order).toEqual(["start a", "end a", "start b", "end b", "mark"]);
  });

  it("sends the batch as the configured method", async () => {
    const { client, server } = setup({ batchMethod: "multi" });
    registerAtomicHandler(server, "multi");

    const batch = client.newBatch();
    const greeting = resultTarget(t.string(), "");
    batch.call("greet", ["eve"], greeting);
    await batch.execute();
    expect(greeting.value).toBe("hello eve");
    expect(server.handlers.has("call_atomic")).toBe(false);
  });
});
