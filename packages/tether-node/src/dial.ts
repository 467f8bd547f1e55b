// Socket dialing and stdio attach.

import net from "node:net";
import type { Duplex, Readable, Writable } from "node:stream";
import { ConnectionError, Endpoint, type EndpointOptions } from "@tether/core";
import { startServing } from "./child.ts";
import { StreamTransport } from "./stream.ts";

export type Address = { network: "tcp"; host: string; port: number } | { network: "unix"; path: string };

/**
 * Parse a listen address: `host:port` (the last colon separates the port)
 * is TCP, anything without a colon is a Unix socket path.
 */
export function parseAddress(address: string): Address {
  const lastColon = address.lastIndexOf(":");
  if (lastColon < 0) {
    if (address === "") throw new Error("invalid address: empty");
    return { network: "unix", path: address };
  }
  const host = address.slice(0, lastColon).replace(/^\[(.*)\]$/, "$1");
  const portText = address.slice(lastColon + 1);
  const port = Number(portText);
  if (!/^\d+$/.test(portText) || port > 65535) {
    throw new Error(`invalid address: ${address}`);
  }
  return { network: "tcp", host: host === "" ? "localhost" : host, port };
}

export interface DialOptions extends EndpointOptions {
  /** Start serving right away. Defaults to true. */
  serve?: boolean;
  /** Opens the connection; defaults to `net.createConnection`. */
  connect?: (address: Address) => Promise<Duplex>;
}

/**
 * Connect to a listening peer and return an endpoint over the socket.
 *
 * @example
 * ```typescript
 * const endpoint = await dial("127.0.0.1:7777");
 * const endpoint = await dial("/tmp/peer.sock", { serve: false });
 * ```
 */
export async function dial(address: string, options: DialOptions = {}): Promise<Endpoint> {
  const { serve = true, connect = connectSocket, ...endpointOptions } = options;
  const socket = await connect(parseAddress(address));
  const endpoint = new Endpoint(new StreamTransport(socket, socket), endpointOptions);
  if (serve) startServing(endpoint);
  return endpoint;
}

function connectSocket(address: Address): Promise<Duplex> {
  return new Promise((resolve, reject) => {
    const target = address.network === "tcp" ? { host: address.host, port: address.port } : { path: address.path };
    const socket = net.createConnection(target);
    const onError = (err: Error) => {
      reject(ConnectionError.transport(`dial: ${err.message}`, err));
    };
    socket.once("error", onError);
    socket.once("connect", () => {
      socket.off("error", onError);
      resolve(socket);
    });
  });
}

export interface AttachStdioOptions extends EndpointOptions {
  /** Start serving right away. Defaults to true. */
  serve?: boolean;
  /** Defaults to `process.stdin`. */
  stdin?: Readable;
  /** Defaults to `process.stdout`. */
  stdout?: Writable;
}

/**
 * An endpoint over this process's stdin and stdout, for programs started
 * by a peer. Nothing else may write to stdout; log to stderr.
 */
export function attachStdio(options: AttachStdioOptions = {}): Endpoint {
  const { serve = true, stdin = process.stdin, stdout = process.stdout, ...endpointOptions } = options;
  const transport = new StreamTransport(stdin, stdout, () => {
    stdin.destroy();
  });
  const endpoint = new Endpoint(transport, endpointOptions);
  if (serve) startServing(endpoint);
  return endpoint;
}
