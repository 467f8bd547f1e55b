// Call tracing middleware.
//
// Logs each call and its outcome with timing. Output is enabled per
// namespace through DEBUG (see logging.ts).

import { ApplicationError, ConnectionError } from "./errors.ts";
import { isEnabled, stderrLogf, type Logf } from "./logging.ts";
import { ExtensionKey, type CallMiddleware } from "./middleware.ts";

const START_TIME = new ExtensionKey<number>("tracing:start-time");

export interface TracingOptions {
  /**
   * Namespace matched against DEBUG. Defaults to "tether:rpc".
   */
  namespace?: string;

  /**
   * Log call arguments. Defaults to true.
   */
  logArgs?: boolean;

  /**
   * Log result values. Defaults to true.
   */
  logResults?: boolean;

  /**
   * Calls faster than this many milliseconds are not logged on completion.
   * Defaults to 0.
   */
  minDuration?: number;

  /**
   * Sink for the log lines. Defaults to standard error.
   */
  logf?: Logf;
}

/**
 * Create a middleware that logs every call with its duration.
 *
 * @example
 * ```typescript
 * // DEBUG=tether:rpc node app.js
 * const endpoint = new Endpoint(transport, { middleware: [tracingMiddleware()] });
 * ```
 */
export function tracingMiddleware(options: TracingOptions = {}): CallMiddleware {
  const namespace = options.namespace ?? "tether:rpc";
  const logArgs = options.logArgs ?? true;
  const logResults = options.logResults ?? true;
  const minDuration = options.minDuration ?? 0;
  const logf = options.logf ?? stderrLogf;

  return {
    pre(ctx, request) {
      ctx.extensions.set(START_TIME, performance.now());
      if (!isEnabled(namespace)) return;

      const logObj: Record<string, unknown> = { type: "request", method: request.method };
      if (logArgs && request.args.length > 0) logObj.args = request.args;

      logf("→ %s %o", request.method, logObj);
    },

    post(ctx, request, outcome) {
      const startTime = ctx.extensions.get(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;
      if (!isEnabled(namespace)) return;

      const logObj: Record<string, unknown> = {
        type: "response",
        method: request.method,
        duration: `${duration.toFixed(2)}ms`,
        ok: outcome.ok,
      };

      if (outcome.ok) {
        if (logResults && outcome.value !== undefined) logObj.result = outcome.value;
        logf("← %s: ✓ %s %o", request.method, logObj.duration, logObj);
        return;
      }

      const error = outcome.error;
      if (error instanceof ApplicationError) {
        logObj.errorKind = error.kind;
        logObj.error = error.detail;
      } else if (error instanceof ConnectionError) {
        logObj.errorKind = error.kind;
        logObj.error = error.message;
      } else {
        logObj.error = { name: error.name, message: error.message };
      }
      logf("← %s: ✗ %s %o", request.method, logObj.duration, logObj);
    },
  };
}
