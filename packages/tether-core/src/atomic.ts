import { RawValue, t } from "@tether/msgpack";
import type { Endpoint } from "./endpoint.ts";

const subCall = t.struct({ method: t.string(), params: t.raw() }, { array: true });

type Failure = [index: number, type: number, message: string];

/**
 * Serve batches sent by a peer's `Batch.execute()`.
 *
 * Sub-calls run one after another against `endpoint.handlers`, inside
 * `endpoint.exclusive()`: no other inbound request or notification starts
 * until the batch is done. The first failure stops the batch; the reply
 * carries the results before it and `[index, type, message]`.
 */
export function registerAtomicHandler(endpoint: Endpoint, method: string = endpoint.batchMethod): void {
  endpoint.registerHandler(method, { params: [t.array(subCall)] }, (calls, ctx) =>
    endpoint.exclusive(async () => {
      const results: RawValue[] = [];
      for (const [index, call] of calls.entries()) {
        const outcome = await endpoint.handlers.invoke(
          call.params.bytes,
          { ...ctx, method: call.method },
          endpoint.extensions,
        );
        if (!outcome.ok) {
          const [type, message] = outcome.error.toWire();
          const failure: Failure = [index, type, message];
          return [results, failure];
        }
        results.push(new RawValue(outcome.result));
      }
      return [results, null];
    }),
  );
}
