// Child process transport and spawning.

import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import { Endpoint, errorMessage, type EndpointOptions } from "@tether/core";
import { StreamTransport } from "./stream.ts";

/** The part of a ChildProcess the transport uses. */
export interface ChildProcessLike {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: "spawn", listener: () => void): this;
  once(event: "error", listener: (err: Error) => void): this;
}

interface Exit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Talks to a child over its stdin and stdout.
 *
 * `close()` ends the child's stdin; the child is expected to exit. `wait()`
 * then waits for the exit and kills the child once the grace period is over.
 */
export class ChildProcessTransport extends StreamTransport {
  private readonly exited: Promise<Exit>;

  constructor(readonly child: ChildProcessLike) {
    const { stdin, stdout } = child;
    if (!stdin || !stdout) throw new TypeError("child process must be spawned with piped stdin and stdout");
    super(stdout, stdin, () => {
      stdin.end();
    });

    if (child.exitCode !== null || child.signalCode !== null) {
      this.exited = Promise.resolve({ code: child.exitCode, signal: child.signalCode });
    } else {
      this.exited = new Promise((resolve) => {
        child.once("exit", (code, signal) => resolve({ code, signal }));
      });
    }
  }

  /**
   * Wait for the child to exit, sending SIGKILL after `graceMs`.
   *
   * @throws Error if the child exits with a non-zero code or on a signal
   */
  async wait(graceMs: number): Promise<void> {
    const timer = setTimeout(() => this.child.kill("SIGKILL"), graceMs);
    let exit: Exit;
    try {
      exit = await this.exited;
    } finally {
      clearTimeout(timer);
    }
    if (exit.signal !== null) throw new Error(`child exited on signal ${exit.signal}`);
    if (exit.code !== null && exit.code !== 0) throw new Error(`child exited with code ${exit.code}`);
  }
}

export interface SpawnChildOptions extends EndpointOptions {
  /** Program to run. */
  command: string;
  args?: string[];
  /** Working directory. Defaults to the current one. */
  cwd?: string;
  /** Environment. Defaults to the current process's. */
  env?: NodeJS.ProcessEnv;
  /** Start serving right away. Defaults to true. */
  serve?: boolean;
  /** Starts the process; defaults to `child_process.spawn`. */
  spawn?: (command: string, args: string[], options: { cwd?: string; env?: NodeJS.ProcessEnv }) => ChildProcessLike;
}

/**
 * Start a child process and return an endpoint connected to its stdin and
 * stdout. The child's stderr is inherited.
 *
 * @example
 * ```typescript
 * const endpoint = await spawnChild({ command: "worker", args: ["--rpc"] });
 * const version = await endpoint.call("version", [], t.string());
 * await endpoint.close();
 * ```
 */
export async function spawnChild(options: SpawnChildOptions): Promise<Endpoint> {
  const { command, args = [], cwd, env, serve = true, spawn: start = spawnPiped, ...endpointOptions } = options;
  const child = start(command, args, { cwd, env });

  await new Promise<void>((resolve, reject) => {
    child.once("spawn", resolve);
    child.once("error", (err) => reject(new Error(`spawn ${command}: ${err.message}`, { cause: err })));
  });

  const endpoint = new Endpoint(new ChildProcessTransport(child), endpointOptions);
  if (serve) startServing(endpoint);
  return endpoint;
}

function spawnPiped(command: string, args: string[], options: { cwd?: string; env?: NodeJS.ProcessEnv }): ChildProcessLike {
  return spawn(command, args, { ...options, stdio: ["pipe", "pipe", "inherit"] });
}

/** Run `serve()` in the background, logging how it ended. */
export function startServing(endpoint: Endpoint): void {
  void endpoint.serve().catch((e: unknown) => {
    endpoint.logf("tether: serve: %s", errorMessage(e));
  });
}
