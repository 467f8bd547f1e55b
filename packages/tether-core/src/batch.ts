// Atomic call batches.
//
// A batch encodes `[method, args]` pairs into one buffer as they are added
// and sends them as the single argument of one request. The peer runs them
// in order and stops at the first failure.

import { Encoder, RawValue, decodeWithSchema, t, type Schema } from "@tether/msgpack";
import { ApplicationError, BatchError } from "./errors.ts";
import type { Endpoint } from "./endpoint.ts";

/** Where a batched call's result lands once the batch executes. */
export interface ResultTarget<T> {
  readonly schema: Schema<T>;
  value: T;
}

export function resultTarget<T>(schema: Schema<T>, initial: T): ResultTarget<T> {
  return { schema, value: initial };
}

const failureSchema = t.struct({ index: t.int(), type: t.int(), message: t.string() }, { array: true });

const replySchema = t.struct(
  {
    results: t.array(t.raw()),
    error: t.optional(failureSchema),
  },
  { array: true },
);

type Assign = (result: Uint8Array) => void;

/**
 * Collects calls and executes them atomically on the peer.
 *
 * Not safe for concurrent use. The batch is empty again after every
 * `execute()`, whether it succeeded or not.
 *
 * @example
 * ```typescript
 * const batch = endpoint.newBatch();
 * const sum = resultTarget(t.int(), 0);
 * batch.call("add", [1, 2], sum);
 * batch.call("log", ["done"]);
 * await batch.execute();
 * sum.value; // 3
 * ```
 */
export class Batch {
  private enc: Encoder;
  private methods: string[] = [];
  private assigns: Array<Assign | null> = [];
  private poison: Error | null = null;

  constructor(private readonly endpoint: Endpoint) {
    this.enc = new Encoder({ extensions: endpoint.extensions });
  }

  /** Number of calls added since the last execute. */
  get size(): number {
    return this.methods.length;
  }

  /**
   * Add a call. If its arguments cannot be encoded the batch is poisoned:
   * later calls are ignored and `execute()` throws the encode error.
   */
  call<T>(method: string, args: unknown[] = [], target?: ResultTarget<T>): void {
    if (this.poison) return;
    this.methods.push(method);
    this.assigns.push(target ? this.assigner(target) : null);
    try {
      this.enc.packArrayLen(2);
      this.enc.packString(method);
      this.enc.encode(args);
    } catch (e) {
      this.poison = e instanceof Error ? e : new Error(String(e));
    }
  }

  private assigner<T>(target: ResultTarget<T>): Assign {
    const extensions = this.endpoint.extensions;
    return (result) => {
      target.value = decodeWithSchema(result, target.schema, { extensions });
    };
  }

  /**
   * Send the batch and fill in result targets.
   *
   * @throws BatchError when a call fails; targets of the calls before it are set
   */
  async execute(): Promise<void> {
    try {
      if (this.poison) throw this.poison;

      const payload = new Encoder();
      payload.packArrayLen(this.methods.length);
      payload.packRaw(this.enc.bytes());

      const method = this.endpoint.batchMethod;
      const reply = await this.endpoint.call(method, [new RawValue(payload.bytes())], replySchema);
      const failure = reply.error;

      const delivered = failure ? Math.min(failure.index, reply.results.length) : reply.results.length;
      for (let i = 0; i < delivered && i < this.assigns.length; i++) {
        this.assigns[i]?.(reply.results[i].bytes);
      }
      if (!failure) return;

      if (failure.index < 0 || failure.index >= this.methods.length || (failure.type !== 0 && failure.type !== 1)) {
        throw new ApplicationError(method, "remote", `${failure.index} ${failure.type} ${failure.message}`, failure);
      }
      const kind = failure.type === 1 ? "validation" : "exception";
      throw new BatchError(failure.index, new ApplicationError(this.methods[failure.index], kind, failure.message));
    } finally {
      this.reset();
    }
  }

  private reset(): void {
    this.enc.reset();
    this.methods = [];
    this.assigns = [];
    this.poison = null;
  }
}
