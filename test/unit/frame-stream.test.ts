import { describe, it, expect } from "vitest";
import { JsonStream } from "../../src/transport/frame-stream.js";
import { MemoryDuplex, frame } from "../helpers/memory-duplex.js";
import { asyncFaultOf } from "../helpers/faults.js";

describe("JsonStream.readMessage", () => {
  it("returns the payload of a single frame", async () => {
    const duplex = new MemoryDuplex(frame('{"a":1}'));
    const stream = new JsonStream(Buffer.alloc(64));
    const message = await stream.readMessage(duplex);
    expect(message.toString("utf8")).toBe('{"a":1}');
    expect(stream.start).toBe(11);
    expect(stream.pos).toBe(11);
  });

  it("reassembles frames delivered one byte at a time", async () => {
    const payloads = ['{"jsonrpc":"2.0","method":"a"}', "x", '{"jsonrpc":"2.0","id":7,"result":[1,2,3]}'];
    const duplex = new MemoryDuplex(Buffer.concat(payloads.map(frame)), 1);
    const stream = new JsonStream(Buffer.alloc(64));

    const received: string[] = [];
    for (let i = 0; i < payloads.length; i++) {
      received.push((await stream.readMessage(duplex)).toString("utf8"));
    }
    expect(received).toEqual(payloads);
  });

  it("returns several frames buffered by one read without reading again", async () => {
    const duplex = new MemoryDuplex(Buffer.concat([frame("first"), frame("second")]));
    const stream = new JsonStream(Buffer.alloc(64));
    expect((await stream.readMessage(duplex)).toString("utf8")).toBe("first");
    expect((await stream.readMessage(duplex)).toString("utf8")).toBe("second");
  });

  it("returns an empty payload for a zero-length frame", async () => {
    const stream = new JsonStream(Buffer.alloc(8));
    const message = await stream.readMessage(new MemoryDuplex(Buffer.from([0, 0, 0, 0])));
    expect(message.length).toBe(0);
  });

  it("reports Closed when the peer ends between frames", async () => {
    const duplex = new MemoryDuplex(frame("only"));
    const stream = new JsonStream(Buffer.alloc(32));
    await stream.readMessage(duplex);
    expect(await asyncFaultOf(stream.readMessage(duplex))).toBe("Closed");
  });

  it("reports Closed when the peer ends mid-frame", async () => {
    const truncated = frame("0123456789").subarray(0, 7);
    const stream = new JsonStream(Buffer.alloc(32));
    expect(await asyncFaultOf(stream.readMessage(new MemoryDuplex(truncated)))).toBe("Closed");
  });

  it("fails with BufferTooSmall when a frame exceeds the buffer", async () => {
    const stream = new JsonStream(Buffer.alloc(8));
    expect(await asyncFaultOf(stream.readMessage(new MemoryDuplex(frame("0123456789"))))).toBe(
      "BufferTooSmall"
    );
  });

  it("fits a frame exactly as large as the buffer", async () => {
    const stream = new JsonStream(Buffer.alloc(14));
    const message = await stream.readMessage(new MemoryDuplex(frame("0123456789"), 3));
    expect(message.toString("utf8")).toBe("0123456789");
  });
});

describe("JsonStream.ensureSpace", () => {
  it("compacts the unread region to the front and keeps its bytes", async () => {
    // 20 bytes on the wire, 16 fit in the first read.
    const duplex = new MemoryDuplex(Buffer.concat([frame("abcdef"), frame("ghijkl")]));
    const stream = new JsonStream(Buffer.alloc(16));

    expect((await stream.readMessage(duplex)).toString("utf8")).toBe("abcdef");
    expect(stream.start).toBe(10);
    expect(stream.pos).toBe(16);

    stream.ensureSpace(10);
    expect(stream.start).toBe(0);
    expect(stream.pos).toBe(6);

    expect((await stream.readMessage(duplex)).toString("utf8")).toBe("ghijkl");
    expect(stream.start).toBe(10);
    expect(stream.pos).toBe(10);
  });

  it("leaves the cursors alone when the tail already has room", async () => {
    const duplex = new MemoryDuplex(Buffer.concat([frame("ab"), frame("cd")]), 8);
    const stream = new JsonStream(Buffer.alloc(32));
    await stream.readMessage(duplex);
    stream.ensureSpace(6);
    expect(stream.start).toBe(6);
    expect(stream.pos).toBe(8);
  });

  it("throws BufferTooSmall when the request exceeds capacity", () => {
    const stream = new JsonStream(Buffer.alloc(16));
    expect(() => stream.ensureSpace(17)).toThrow(/buffer holds 16/);
  });
});

describe("JsonStream.writeMessage", () => {
  it("writes a little-endian length prefix followed by the payload", async () => {
    const duplex = new MemoryDuplex();
    await new JsonStream(Buffer.alloc(0)).writeMessage(Buffer.from("hello"), duplex);
    expect([...duplex.output]).toEqual([5, 0, 0, 0, 104, 101, 108, 108, 111]);
    expect(duplex.writevCalls).toBe(1);
  });

  it("retries short writes until both segments are flushed", async () => {
    const duplex = new MemoryDuplex(new Uint8Array(0), Number.POSITIVE_INFINITY, 3);
    await new JsonStream(Buffer.alloc(0)).writeMessage(Buffer.from("hello"), duplex);
    expect(duplex.output.equals(frame("hello"))).toBe(true);
    expect(duplex.writevCalls).toBe(3);
  });

  it("writes a bare header for an empty payload", async () => {
    const duplex = new MemoryDuplex();
    await new JsonStream(Buffer.alloc(0)).writeMessage(new Uint8Array(0), duplex);
    expect([...duplex.output]).toEqual([0, 0, 0, 0]);
  });

  it("fails with WriteZero when the transport accepts nothing", async () => {
    const duplex = new MemoryDuplex(new Uint8Array(0), Number.POSITIVE_INFINITY, 0);
    expect(await asyncFaultOf(new JsonStream(Buffer.alloc(0)).writeMessage(Buffer.from("x"), duplex))).toBe(
      "WriteZero"
    );
  });

  it("produces frames a reader decodes back", async () => {
    const writer = new MemoryDuplex(new Uint8Array(0), Number.POSITIVE_INFINITY, 2);
    const stream = new JsonStream(Buffer.alloc(0));
    await stream.writeMessage(Buffer.from('{"n":1}'), writer);
    await stream.writeMessage(Buffer.from('{"n":2}'), writer);

    const reader = new MemoryDuplex(writer.output, 5);
    const readStream = new JsonStream(Buffer.alloc(16));
    expect((await readStream.readMessage(reader)).toString("utf8")).toBe('{"n":1}');
    expect((await readStream.readMessage(reader)).toString("utf8")).toBe('{"n":2}');
  });
});
