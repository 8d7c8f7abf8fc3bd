export * from "./protocols/jsonrpc/types.js";
export { ErrorCode, SERVER_ERROR_MAX, SERVER_ERROR_MIN } from "./protocols/jsonrpc/error-code.js";
export {
  arrayParams,
  createRequest,
  isNotification,
  objectParams,
  parseRequest,
  parseVersion,
  requestId,
  serializeRequest,
} from "./protocols/jsonrpc/request.js";
export {
  errorObject,
  errorResponse,
  okResponse,
  parseErrorObject,
  parseResponse,
  serializeResponse,
} from "./protocols/jsonrpc/response.js";
export * from "./protocols/jsonrpc/batch.js";
export { JsonStream } from "./transport/frame-stream.js";
export { SocketDuplex, type ByteDuplex } from "./transport/duplex.js";
export { RpcClient, type RpcAddress, type RpcClientOptions } from "./rpc/client.js";
export * from "./rpc/dispatch.js";
export {
  processFrame,
  serveConnection,
  startServer,
  type ServeOptions,
  type ServerHandle,
  type ServerOptions,
} from "./rpc/server.js";
export * from "./shared/errors.js";
export { initLogger, getLogger, log, type LogFormat, type LogLevel } from "./shared/logging.js";
