// Node.js stream transport.
//
// Adapts a Readable/Writable pair (or one Duplex such as a socket) to the
// pull-style ByteTransport an endpoint reads from.

import type { Readable, Writable } from "node:stream";
import type { ByteTransport } from "@tether/core";

/** Chunks buffered before the input stream is paused. */
const HIGH_WATER_CHUNKS = 16;

/**
 * A byte transport over Node streams.
 *
 * `closer` runs on `close()`. Without one the output is ended and the input
 * destroyed (a single Duplex is destroyed).
 */
export class StreamTransport implements ByteTransport {
  private chunks: Uint8Array[] = [];
  private waiting: { resolve: (chunk: Uint8Array | null) => void; reject: (error: Error) => void } | null = null;
  private ended = false;
  private error: Error | null = null;
  private outputError: Error | null = null;
  private closing: Promise<void> | null = null;

  constructor(
    readonly input: Readable,
    readonly output: Writable,
    private readonly closer?: () => void | Promise<void>,
  ) {
    input.on("data", (chunk: Buffer | string) => {
      this.deliver(typeof chunk === "string" ? Buffer.from(chunk) : new Uint8Array(chunk));
    });
    input.on("end", () => this.finish(null));
    input.on("close", () => this.finish(null));
    input.on("error", (err: Error) => this.finish(err));
    if (!sameStream(input, output)) {
      output.on("error", (err: Error) => {
        this.outputError ??= err;
      });
    }
  }

  private deliver(chunk: Uint8Array): void {
    if (this.waiting) {
      this.waiting.resolve(chunk);
      this.waiting = null;
      return;
    }
    this.chunks.push(chunk);
    if (this.chunks.length >= HIGH_WATER_CHUNKS) this.input.pause();
  }

  private finish(error: Error | null): void {
    if (this.ended) return;
    this.ended = true;
    this.error = error;
    if (!this.waiting) return;
    if (error) this.waiting.reject(error);
    else this.waiting.resolve(null);
    this.waiting = null;
    this.error = null;
  }

  read(): Promise<Uint8Array | null> {
    const chunk = this.chunks.shift();
    if (chunk) {
      if (this.chunks.length < HIGH_WATER_CHUNKS && this.input.isPaused() && !this.ended) this.input.resume();
      return Promise.resolve(chunk);
    }
    if (this.error) {
      const error = this.error;
      this.error = null;
      return Promise.reject(error);
    }
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }

  write(bytes: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.outputError) {
        reject(this.outputError);
        return;
      }
      if (this.output.destroyed || this.output.writableEnded) {
        reject(new Error("write after close"));
        return;
      }
      this.output.write(bytes, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    if (this.closer) {
      await this.closer();
      return;
    }
    if (sameStream(this.input, this.output)) {
      this.input.destroy();
      return;
    }
    if (!this.output.writableEnded && !this.output.destroyed) this.output.end();
    this.input.destroy();
  }
}

function sameStream(a: object, b: object): boolean {
  return a === b;
}
