/**
 * Length-prefixed message framing over a ByteDuplex.
 *
 * Wire format:
 *   [4-byte little-endian unsigned payload length][payload]
 *
 * The stream reads into one caller-owned buffer and never grows it, so the
 * buffer must be sized for the largest frame the peer will send. `start` is the
 * first unconsumed byte and `pos` the first empty one.
 */

import { FRAME_HEADER_BYTES, MAX_FRAME_PAYLOAD } from "../shared/constants.js";
import { FrameError } from "../shared/errors.js";
import type { ByteDuplex } from "./duplex.js";

export class JsonStream {
  private readonly buf: Buffer;
  private startOffset = 0;
  private posOffset = 0;

  constructor(buf: Buffer) {
    this.buf = buf;
  }

  get start(): number {
    return this.startOffset;
  }

  get pos(): number {
    return this.posOffset;
  }

  get capacity(): number {
    return this.buf.length;
  }

  /**
   * Reads the next complete message payload. The returned Buffer is a view into
   * the stream's buffer and is overwritten by the next read; copy it out first.
   * Throws FrameError("Closed") when the peer ends the stream.
   */
  async readMessage(duplex: ByteDuplex): Promise<Buffer> {
    for (;;) {
      const message = this.bufferedMessage();
      if (message !== null) return message;

      const n = await duplex.read(this.buf.subarray(this.posOffset));
      if (n === 0) {
        throw new FrameError("Closed", "Connection closed by peer");
      }
      this.posOffset += n;
    }
  }

  private bufferedMessage(): Buffer | null {
    const unread = this.posOffset - this.startOffset;
    if (unread < FRAME_HEADER_BYTES) {
      this.ensureSpace(FRAME_HEADER_BYTES);
      return null;
    }

    const length = this.buf.readUInt32LE(this.startOffset);
    const total = length + FRAME_HEADER_BYTES;
    if (unread < total) {
      this.ensureSpace(total);
      return null;
    }

    const payload = this.buf.subarray(this.startOffset + FRAME_HEADER_BYTES, this.startOffset + total);
    this.startOffset += total;
    return payload;
  }

  /**
   * Makes room for `required` bytes counted from `start`. Compacts the unread
   * region to the front of the buffer when the tail is too short.
   */
  ensureSpace(required: number): void {
    if (this.buf.length < required) {
      throw new FrameError(
        "BufferTooSmall",
        `Frame needs ${required} bytes but the buffer holds ${this.buf.length}`
      );
    }
    if (this.buf.length - this.startOffset >= required) return;

    this.buf.copy(this.buf, 0, this.startOffset, this.posOffset);
    this.posOffset -= this.startOffset;
    this.startOffset = 0;
  }

  /** Writes the length prefix and payload, retrying short writes until both are flushed. */
  async writeMessage(payload: Uint8Array, duplex: ByteDuplex): Promise<void> {
    if (payload.length > MAX_FRAME_PAYLOAD) {
      throw new FrameError("MessageTooLarge", `Payload of ${payload.length} bytes exceeds the frame limit`);
    }
    const header = Buffer.alloc(FRAME_HEADER_BYTES);
    header.writeUInt32LE(payload.length, 0);
    await writeAllVectored(duplex, [header, payload]);
  }
}

async function writeAllVectored(duplex: ByteDuplex, segments: Uint8Array[]): Promise<void> {
  const remaining = [...segments];
  let i = 0;
  for (;;) {
    let n = await duplex.writev(remaining.slice(i));
    if (n === 0) {
      throw new FrameError("WriteZero", "Transport accepted no bytes");
    }
    while (n >= remaining[i].length) {
      n -= remaining[i].length;
      i += 1;
      if (i >= remaining.length) return;
    }
    remaining[i] = remaining[i].subarray(n);
  }
}
