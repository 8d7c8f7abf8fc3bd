import net from "node:net";
import { batchLength, decodeResponses, encodeRequests, type MaybeBatch } from "../protocols/jsonrpc/batch.js";
import { serializeRequest } from "../protocols/jsonrpc/request.js";
import type { RequestObject, ResponseObject } from "../protocols/jsonrpc/types.js";
import { DEFAULT_BUFFER_SIZE } from "../shared/constants.js";
import { getLogger } from "../shared/logging.js";
import { SocketDuplex } from "../transport/duplex.js";
import { JsonStream } from "../transport/frame-stream.js";

export type RpcAddress = { host: string; port: number } | { path: string };

export type RpcClientOptions = {
  address: RpcAddress;
  /** Frame buffer capacity; bounds the largest response frame a call can read. */
  bufferSize?: number;
};

function describe(address: RpcAddress): string {
  return "path" in address ? address.path : `${address.host}:${address.port}`;
}

/**
 * JSON-RPC client that opens a fresh connection for every call or cast.
 * There is no timeout: a peer that never replies keeps `call` pending.
 */
export class RpcClient {
  private readonly address: RpcAddress;
  private readonly bufferSize: number;

  constructor(opts: RpcClientOptions) {
    this.address = opts.address;
    this.bufferSize = opts.bufferSize ?? DEFAULT_BUFFER_SIZE;
  }

  /**
   * Sends a request or batch and reads exactly one reply frame, even when every
   * member is a notification.
   */
  async call(request: MaybeBatch<RequestObject>): Promise<MaybeBatch<ResponseObject>> {
    // Throws on an empty batch before any connection is made.
    const payload = encodeRequests(request);
    const logger = getLogger().child({ component: "client", address: describe(this.address) });

    const duplex = await this.connect();
    try {
      const stream = new JsonStream(Buffer.alloc(this.bufferSize));
      await stream.writeMessage(Buffer.from(payload, "utf8"), duplex);
      logger.debug({ requests: batchLength(request) }, "request frame sent");
      const reply = await stream.readMessage(duplex);
      logger.debug({ bytes: reply.length }, "reply frame received");
      return decodeResponses(reply.toString("utf8"));
    } finally {
      duplex.close();
    }
  }

  /** Fire-and-forget: writes the request and closes without reading. */
  async cast(request: RequestObject): Promise<void> {
    const duplex = await this.connect();
    try {
      const stream = new JsonStream(Buffer.alloc(this.bufferSize));
      await stream.writeMessage(Buffer.from(serializeRequest(request), "utf8"), duplex);
    } finally {
      duplex.close();
    }
  }

  private connect(): Promise<SocketDuplex> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection(this.address);
      socket.once("error", reject);
      socket.once("connect", () => {
        socket.off("error", reject);
        resolve(new SocketDuplex(socket));
      });
    });
  }
}
