import type { ByteDuplex } from "../../src/transport/duplex.js";

/** Encodes one frame the way a peer would put it on the wire. */
export function frame(payload: string): Buffer {
  const body = Buffer.from(payload, "utf8");
  const header = Buffer.alloc(4);
  header.writeUInt32LE(body.length, 0);
  return Buffer.concat([header, body]);
}

/**
 * In-process ByteDuplex. Serves `incoming` at most `readChunk` bytes per read,
 * then reports end of stream; accepts at most `writeChunk` bytes per writev.
 */
export class MemoryDuplex implements ByteDuplex {
  private offset = 0;
  private readonly sent: Buffer[] = [];
  writevCalls = 0;
  closed = false;

  constructor(
    private readonly incoming: Uint8Array = new Uint8Array(0),
    private readonly readChunk = Number.POSITIVE_INFINITY,
    private readonly writeChunk = Number.POSITIVE_INFINITY
  ) {}

  async read(into: Uint8Array): Promise<number> {
    if (this.offset >= this.incoming.length) return 0;
    const n = Math.min(this.readChunk, into.length, this.incoming.length - this.offset);
    into.set(this.incoming.subarray(this.offset, this.offset + n), 0);
    this.offset += n;
    return n;
  }

  async writev(segments: readonly Uint8Array[]): Promise<number> {
    this.writevCalls += 1;
    let budget = this.writeChunk;
    let written = 0;
    for (const segment of segments) {
      const n = Math.min(budget, segment.length);
      this.sent.push(Buffer.from(segment.subarray(0, n)));
      written += n;
      budget -= n;
      if (budget === 0) break;
    }
    return written;
  }

  close(): void {
    this.closed = true;
  }

  get output(): Buffer {
    return Buffer.concat(this.sent);
  }
}
