import { Decoder, IncompleteError, ValueType } from "@tether/msgpack";
import { decodeMessage, type DecodeMessageResult } from "./codec.ts";

const INITIAL_CAPACITY = 4096;

/**
 * Buffers transport chunks and yields one envelope at a time.
 *
 * Messages are self-delimiting, so there is no length prefix: an envelope
 * is available once its last byte has arrived. Headers of a partial
 * envelope are walked once; later calls resume where the walk stopped.
 *
 * Decoded envelopes hold views into the buffer, so bytes already written are
 * never moved or overwritten: compaction copies the undecoded tail into a
 * new buffer.
 */
export class MessageReader {
  private buf = new Uint8Array(INITIAL_CAPACITY);
  private offset = 0;
  private end = 0;
  /** End of the headers walked so far in the current envelope, or -1. */
  private scanned = -1;
  /** Values the current envelope still needs before it is complete. */
  private needed = 0;

  /** Append bytes read from the transport. */
  push(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    if (this.end + chunk.length > this.buf.length) {
      const live = this.end - this.offset;
      let capacity = Math.max(this.buf.length, INITIAL_CAPACITY);
      while (capacity < (live + chunk.length) * 2) capacity *= 2;
      const grown = new Uint8Array(capacity);
      grown.set(this.buf.subarray(this.offset, this.end));
      if (this.scanned >= 0) this.scanned -= this.offset;
      this.buf = grown;
      this.offset = 0;
      this.end = live;
    }
    this.buf.set(chunk, this.end);
    this.end += chunk.length;
  }

  /**
   * Decode the next buffered envelope, or return null until more bytes arrive.
   *
   * @throws MalformedError when the buffered bytes are not MessagePack.
   */
  next(): DecodeMessageResult | null {
    if (this.offset >= this.end) return null;
    if (!this.complete()) return null;

    const result = decodeMessage(this.buf.subarray(0, this.scanned), this.offset);
    this.offset = result.next;
    this.scanned = -1;
    return result;
  }

  /** Walk value headers until the envelope at `offset` is complete. */
  private complete(): boolean {
    if (this.scanned < 0) {
      this.scanned = this.offset;
      this.needed = 1;
    }
    const dec = new Decoder(this.buf.subarray(0, this.end), this.scanned);
    try {
      while (this.needed > 0) {
        dec.next();
        this.needed--;
        if (dec.type === ValueType.ArrayLen) this.needed += dec.len();
        else if (dec.type === ValueType.MapLen) this.needed += dec.len() * 2;
        this.scanned = dec.offset;
      }
    } catch (e) {
      if (e instanceof IncompleteError) return false;
      throw e;
    }
    return true;
  }

  /** Bytes received but not yet decoded. */
  get buffered(): number {
    return this.end - this.offset;
  }
}
