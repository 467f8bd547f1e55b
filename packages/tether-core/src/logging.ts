// Log sinks.
//
// Everything in this package logs through a printf-style `Logf`. Debug
// output is gated by the DEBUG environment variable, matched the same way
// as the `debug` package: comma or space separated namespace patterns with
// `*` wildcards and `-` exclusions (DEBUG=tether:*,-tether:rpc).

/** printf-style log function (`%s`, `%d`, `%o`, ...). */
export type Logf = (format: string, ...args: unknown[]) => void;

/** Writes to standard error. The default sink. */
export const stderrLogf: Logf = (format, ...args) => {
  console.error(format, ...args);
};

/** Discards everything. */
export const noopLogf: Logf = () => {};

/**
 * Check if a namespace is enabled by a DEBUG pattern list.
 * Later patterns override earlier ones.
 */
export function isEnabled(namespace: string, debug: string | undefined = process.env.DEBUG): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) enabled = false;
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
export function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // escape everything but *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * A Logf that writes `<namespace> <message>` to `sink` while DEBUG enables
 * the namespace. DEBUG is read on every call.
 *
 * @example
 * ```typescript
 * const endpoint = new Endpoint(transport, { logf: debugLogf("tether:endpoint") });
 * ```
 */
export function debugLogf(namespace: string, sink: Logf = stderrLogf): Logf {
  return (format, ...args) => {
    if (isEnabled(namespace)) sink(`${namespace} ${format}`, ...args);
  };
}
