import net from "node:net";
import { batchItems, decodeRequests, encodeResponses, fromItems } from "../protocols/jsonrpc/batch.js";
import { errorResponse, okResponse } from "../protocols/jsonrpc/response.js";
import type { RequestId, ResponseObject } from "../protocols/jsonrpc/types.js";
import { DEFAULT_BUFFER_SIZE, DEFAULT_HOST, DEFAULT_PORT } from "../shared/constants.js";
import { isClosed } from "../shared/errors.js";
import { getLogger } from "../shared/logging.js";
import { SocketDuplex, type ByteDuplex } from "../transport/duplex.js";
import { JsonStream } from "../transport/frame-stream.js";
import type { Dispatch, DispatchOutcome } from "./dispatch.js";

export interface ServeOptions {
  dispatch: Dispatch;
  /** Frame buffer capacity per connection; bounds the largest accepted request frame. */
  bufferSize?: number;
}

export interface ServerOptions extends ServeOptions {
  host?: string;
  port?: number;
  /** Listen on a Unix domain socket (or Windows pipe) instead of TCP. */
  path?: string;
}

export interface ServerHandle {
  host: string;
  port: number;
  path?: string;
  /** Number of connections currently open. */
  connections: () => number;
  close: () => Promise<void>;
}

function toResponse(id: RequestId, outcome: DispatchOutcome): ResponseObject {
  switch (outcome.kind) {
    case "result":
      return okResponse(id, outcome.result);
    case "error":
      return errorResponse(id, outcome.error);
  }
}

/**
 * Handles one inbound frame payload. Every request is dispatched in arrival
 * order; only requests with an id contribute a response. Returns the reply
 * payload, or null when the frame held nothing but notifications.
 */
export async function processFrame(payload: string, dispatch: Dispatch): Promise<string | null> {
  const requests = decodeRequests(payload);
  const responses: ResponseObject[] = [];
  for (const request of batchItems(requests)) {
    const outcome = await dispatch(request);
    if (request.id === undefined) continue;
    responses.push(toResponse(request.id, outcome));
  }
  if (responses.length === 0) return null;
  return encodeResponses(fromItems(responses));
}

/**
 * Serves one connection, one frame at a time, until the peer closes it.
 * Decode and dispatch faults reject and leave the caller to tear the connection down.
 */
export async function serveConnection(duplex: ByteDuplex, options: ServeOptions): Promise<void> {
  const logger = getLogger().child({ component: "server" });
  const stream = new JsonStream(Buffer.alloc(options.bufferSize ?? DEFAULT_BUFFER_SIZE));
  try {
    for (;;) {
      let frame: Buffer;
      try {
        frame = await stream.readMessage(duplex);
      } catch (err) {
        if (isClosed(err)) return;
        throw err;
      }
      logger.debug({ bytes: frame.length }, "frame received");
      const reply = await processFrame(frame.toString("utf8"), options.dispatch);
      if (reply !== null) {
        await stream.writeMessage(Buffer.from(reply, "utf8"), duplex);
      }
    }
  } finally {
    duplex.close();
  }
}

export async function startServer(options: ServerOptions): Promise<ServerHandle> {
  const logger = getLogger().child({ component: "server" });
  const sockets = new Set<net.Socket>();

  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.once("close", () => sockets.delete(socket));
    const duplex = new SocketDuplex(socket);
    const remote = duplex.remote;
    logger.debug({ remote }, "connection accepted");
    void serveConnection(duplex, options).then(
      () => logger.debug({ remote }, "connection closed"),
      (err: unknown) => {
        logger.warn({ err, remote }, "connection terminated");
        duplex.destroy();
      }
    );
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    const onListening = () => {
      server.off("error", reject);
      resolve();
    };
    if (options.path) server.listen(options.path, onListening);
    else server.listen(options.port ?? DEFAULT_PORT, options.host ?? DEFAULT_HOST, onListening);
  });
  server.on("error", (err) => logger.error({ err }, "listener error"));

  const address = server.address();
  const host = address !== null && typeof address === "object" ? address.address : options.host ?? DEFAULT_HOST;
  const port = address !== null && typeof address === "object" ? address.port : 0;
  logger.info({ host, port, path: options.path }, "server listening");

  return {
    host,
    port,
    ...(options.path !== undefined && { path: options.path }),
    connections: () => sockets.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const socket of sockets) socket.destroy();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
