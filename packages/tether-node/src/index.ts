// Node.js transports
//
// Stream and socket transports, child processes and stdio for @tether/core
// endpoints.

export { StreamTransport } from "./stream.ts";
export {
  ChildProcessTransport,
  spawnChild,
  startServing,
  type ChildProcessLike,
  type SpawnChildOptions,
} from "./child.ts";
export { attachStdio, dial, parseAddress, type Address, type AttachStdioOptions, type DialOptions } from "./dial.ts";
