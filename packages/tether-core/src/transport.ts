/**
 * Byte transport abstraction.
 *
 * An endpoint needs only an ordered, reliable byte stream: MessagePack
 * values are self-delimiting, so there is no framing layer below the
 * envelope. Implementations:
 * - StreamTransport (@tether/node) over Node streams, sockets and stdio
 * - ChildProcessTransport (@tether/node) over a child's stdin/stdout
 * - memoryPipe() for in-process use and tests
 */
export interface ByteTransport {
  /**
   * Read the next chunk of bytes. Resolves `null` at end of input.
   */
  read(): Promise<Uint8Array | null>;

  /**
   * Write bytes. Callers serialize writes; a transport never sees two
   * overlapping calls.
   */
  write(bytes: Uint8Array): Promise<void>;

  /**
   * Close both directions. A pending `read()` resolves `null`.
   */
  close(): Promise<void>;

  /**
   * Wait for a resource owned by the transport (a child process) to go
   * away, forcing it after `graceMs`.
   */
  wait?(graceMs: number): Promise<void>;
}

/** One direction of a memory pipe. */
class Channel {
  private chunks: Uint8Array[] = [];
  private waitingResolve: ((chunk: Uint8Array | null) => void) | null = null;
  private ended = false;

  push(chunk: Uint8Array): void {
    if (this.ended) throw new Error("write on closed pipe");
    const copy = chunk.slice();
    if (this.waitingResolve) {
      this.waitingResolve(copy);
      this.waitingResolve = null;
    } else {
      this.chunks.push(copy);
    }
  }

  end(): void {
    this.ended = true;
    if (this.waitingResolve) {
      this.waitingResolve(null);
      this.waitingResolve = null;
    }
  }

  read(): Promise<Uint8Array | null> {
    const chunk = this.chunks.shift();
    if (chunk) return Promise.resolve(chunk);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waitingResolve = resolve;
    });
  }
}

/** In-process transport backed by a pair of channels. */
class MemoryTransport implements ByteTransport {
  constructor(
    private readonly inbound: Channel,
    private readonly outbound: Channel,
  ) {}

  read(): Promise<Uint8Array | null> {
    return this.inbound.read();
  }

  async write(bytes: Uint8Array): Promise<void> {
    this.outbound.push(bytes);
  }

  async close(): Promise<void> {
    this.outbound.end();
    this.inbound.end();
  }
}

/**
 * Two connected transports: bytes written to one are read from the other.
 * Closing either side ends input on both.
 */
export function memoryPipe(): [ByteTransport, ByteTransport] {
  const ab = new Channel();
  const ba = new Channel();
  return [new MemoryTransport(ba, ab), new MemoryTransport(ab, ba)];
}
