import type { Socket } from "node:net";

/** Byte-oriented duplex connection the frame codec reads from and writes to. */
export interface ByteDuplex {
  /** Copies up to `into.length` bytes into `into`. Resolves 0 once the peer has closed. */
  read(into: Uint8Array): Promise<number>;
  /** Writes a prefix of the concatenated segments; resolves with how many bytes went out. */
  writev(segments: readonly Uint8Array[]): Promise<number>;
  close(): void;
}

/**
 * Pull-based adapter over a net.Socket. The socket is paused while received
 * chunks wait to be read, so the kernel applies backpressure to the peer.
 */
export class SocketDuplex implements ByteDuplex {
  private readonly chunks: Buffer[] = [];
  private ended = false;
  private closing = false;
  private failure: Error | undefined;
  private wake: (() => void) | undefined;

  constructor(private readonly socket: Socket) {
    socket.on("data", (chunk: Buffer) => {
      if (this.closing) return;
      this.chunks.push(chunk);
      socket.pause();
      this.notify();
    });
    socket.on("end", () => {
      this.ended = true;
      this.notify();
    });
    socket.on("close", () => {
      this.ended = true;
      this.notify();
    });
    socket.on("error", (err: Error) => {
      this.failure = err;
      this.notify();
    });
  }

  get remote(): string {
    return `${this.socket.remoteAddress ?? "local"}:${this.socket.remotePort ?? 0}`;
  }

  async read(into: Uint8Array): Promise<number> {
    for (;;) {
      const head = this.chunks[0];
      if (head !== undefined) {
        const n = Math.min(head.length, into.length);
        into.set(head.subarray(0, n), 0);
        if (n === head.length) this.chunks.shift();
        else this.chunks[0] = head.subarray(n);
        return n;
      }
      if (this.failure) throw this.failure;
      if (this.ended) return 0;
      await new Promise<void>((resolve) => {
        this.wake = resolve;
        this.socket.resume();
      });
    }
  }

  writev(segments: readonly Uint8Array[]): Promise<number> {
    if (this.failure) return Promise.reject(this.failure);
    const pending = segments.filter((segment) => segment.length > 0);
    if (pending.length === 0) return Promise.resolve(0);
    const total = pending.reduce((sum, segment) => sum + segment.length, 0);
    return new Promise<number>((resolve, reject) => {
      this.socket.cork();
      pending.forEach((segment, i) => {
        if (i === pending.length - 1) {
          this.socket.write(segment, (err) => (err ? reject(err) : resolve(total)));
        } else {
          this.socket.write(segment);
        }
      });
      this.socket.uncork();
    });
  }

  /**
   * Ends our side and discards anything still arriving, so the peer's FIN is
   * read and the socket closes even when nobody reads again.
   */
  close(): void {
    this.closing = true;
    this.chunks.length = 0;
    if (this.socket.destroyed) return;
    this.socket.end();
    this.socket.resume();
  }

  destroy(): void {
    this.socket.destroy();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = undefined;
    wake?.();
  }
}
