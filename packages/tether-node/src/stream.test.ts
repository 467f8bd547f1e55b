import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import { Endpoint, noopLogf } from "@tether/core";
import { t } from "@tether/msgpack";
import { StreamTransport } from "./stream.ts";

function streams() {
  const input = new PassThrough();
  const output = new PassThrough();
  return { input, output, transport: new StreamTransport(input, output) };
}

describe("StreamTransport", () => {
  it("reads chunks in order, then null at end of input", async () => {
    const { input, transport } = streams();
    const first = transport.read();
    input.write(Uint8Array.of(1, 2));

    expect(await first).toEqual(Uint8Array.of(1, 2));
    input.end(Uint8Array.of(3));
    expect(await transport.read()).toEqual(Uint8Array.of(3));
    expect(await transport.read()).toBeNull();
    expect(await transport.read()).toBeNull();
  });

  it("writes to the output stream", async () => {
    const { output, transport } = streams();
    await transport.write(Uint8Array.of(0x92, 0x01, 0x02));

    expect(output.read()).toEqual(Buffer.from([0x92, 0x01, 0x02]));
  });

  it("reports an input error once, then end of input", async () => {
    const { input, transport } = streams();
    const pending = transport.read();
    input.destroy(new Error("connection reset"));

    await expect(pending).rejects.toThrow("connection reset");
    expect(await transport.read()).toBeNull();
  });

  it("ends input and output on close", async () => {
    const { output, transport } = streams();
    const pending = transport.read();
    await transport.close();

    expect(await pending).toBeNull();
    expect(output.writableEnded).toBe(true);
    await expect(transport.write(Uint8Array.of(1))).rejects.toThrow("write after close");
  });

  it("runs the closer instead when one is given", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    let closed = 0;
    const transport = new StreamTransport(input, output, () => {
      closed++;
    });

    await transport.close();
    await transport.close();
    expect(closed).toBe(1);
    expect(output.writableEnded).toBe(false);
  });

  it("carries calls between two endpoints", async () => {
    const aToB = new PassThrough();
    const bToA = new PassThrough();
    const client = new Endpoint(new StreamTransport(bToA, aToB), { logf: noopLogf });
    const server = new Endpoint(new StreamTransport(aToB, bToA), { logf: noopLogf });
    const serving = Promise.all([client.serve(), server.serve()]);
    server.registerHandler("concat", { params: [t.string()], rest: t.string() }, (first, rest) => [first, ...rest].join(""));

    expect(await client.call("concat", ["a", "b", "c"], t.string())).toBe("abc");

    await client.close();
    await server.close();
    await serving;
  });
});
