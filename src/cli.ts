import { Command } from "commander";
import { resolveConfig, type CliOverrides, type RuntimeConfig } from "./config.js";
import { EXIT, exit } from "./exit-codes.js";
import { batchItems, fromItems } from "./protocols/jsonrpc/batch.js";
import { parseJsonText } from "./protocols/jsonrpc/codec.js";
import { arrayParams, createRequest, objectParams, requestId } from "./protocols/jsonrpc/request.js";
import { serializeResponse } from "./protocols/jsonrpc/response.js";
import { isJsonObject, type Params, type RequestId } from "./protocols/jsonrpc/types.js";
import { RpcClient, type RpcAddress } from "./rpc/client.js";
import { echoDispatch } from "./rpc/dispatch.js";
import { startServer } from "./rpc/server.js";
import { VERSION } from "./shared/constants.js";
import { EnvelopeError } from "./shared/errors.js";
import { initLogger } from "./shared/logging.js";

interface RequestFlags extends CliOverrides {
  params?: string;
  id?: string;
}

/** Digits only means an integer id; anything else is sent as a string id. */
export function parseIdOption(raw: string): RequestId {
  return /^-?\d+$/.test(raw) ? requestId(Number(raw)) : requestId(raw);
}

/** Ids for a multi-method call: the first as given, then counted up (or suffixed). */
export function nthId(first: RequestId, n: number): RequestId {
  if (n === 0) return first;
  switch (first.kind) {
    case "number":
      return requestId(first.value + n);
    case "string":
      return requestId(`${first.value}-${n}`);
  }
}

export function parseParamsOption(raw: string): Params {
  const value = parseJsonText(raw);
  if (Array.isArray(value)) return arrayParams(value);
  if (isJsonObject(value)) return objectParams(value);
  throw new EnvelopeError("InvalidParams", "--params must be a JSON array or object");
}

function clientAddress(config: RuntimeConfig): RpcAddress {
  return config.path !== undefined ? { path: config.path } : { host: config.host, port: config.port };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function addClientOptions(command: Command): Command {
  return command
    .option("--params <json>", "Request params (JSON array or object)")
    .option("--address <host:port>", "Server address")
    .option("--socket <path>", "Connect to a Unix domain socket instead of TCP")
    .option("--buffer-size <bytes>", "Frame buffer size in bytes")
    .option("--log-level <level>", "Log level: error, warn, info, debug")
    .option("--log-format <format>", "Log format: text, json or plain");
}

export function createProgram(): Command {
  const program = new Command();
  program
    .name("framed-jsonrpc")
    .description("JSON-RPC 2.0 over length-prefixed frames: echo server, call and cast")
    .version(VERSION);

  // ---- framed-jsonrpc serve ----
  program
    .command("serve")
    .description("Run the echo server (result = method name)")
    .option("--listen <host:port>", "Listen address")
    .option("--socket <path>", "Listen on a Unix domain socket instead of TCP")
    .option("--buffer-size <bytes>", "Frame buffer size per connection")
    .option("--log-level <level>", "Log level: error, warn, info, debug")
    .option("--log-format <format>", "Log format: text, json or plain")
    .action(async (opts: CliOverrides) => {
      const config = resolveConfig("server", opts);
      initLogger(config.logLevel, config.logFormat);
      try {
        const handle = await startServer({
          host: config.host,
          port: config.port,
          ...(config.path !== undefined && { path: config.path }),
          bufferSize: config.bufferSize,
          dispatch: echoDispatch,
        });
        await new Promise<void>((_, reject) => {
          const stop = () => {
            handle.close().then(() => process.exit(EXIT.SUCCESS)).catch(reject);
          };
          process.on("SIGINT", stop);
          process.on("SIGTERM", stop);
        });
      } catch (err) {
        exit(EXIT.SERVER_FAILURE, errorMessage(err));
      }
    });

  // ---- framed-jsonrpc call ----
  addClientOptions(
    program
      .command("call")
      .description("Call one or more methods (several make a batch) and print the responses")
      .argument("<methods...>", "Method names")
      .option("--id <id>", "Id of the first request", "1")
  ).action(async (methods: string[], opts: RequestFlags) => {
    const config = resolveConfig("client", opts);
    initLogger(config.logLevel, config.logFormat);
    const params = opts.params !== undefined ? parseParamsOption(opts.params) : undefined;
    const firstId = parseIdOption(opts.id ?? "1");
    const requests = methods.map((method, i) =>
      createRequest(method, { ...(params !== undefined && { params }), id: nthId(firstId, i) })
    );
    const envelope = fromItems(requests);

    const client = new RpcClient({ address: clientAddress(config), bufferSize: config.bufferSize });
    try {
      const responses = await client.call(envelope);
      for (const response of batchItems(responses)) {
        process.stdout.write(serializeResponse(response) + "\n");
      }
    } catch (err) {
      exit(EXIT.CALL_FAILURE, errorMessage(err));
    }
  });

  // ---- framed-jsonrpc cast ----
  addClientOptions(
    program
      .command("cast")
      .description("Send a notification without waiting for a reply")
      .argument("<method>", "Method name")
  ).action(async (method: string, opts: RequestFlags) => {
    const config = resolveConfig("client", opts);
    initLogger(config.logLevel, config.logFormat);
    const params = opts.params !== undefined ? parseParamsOption(opts.params) : undefined;
    const client = new RpcClient({ address: clientAddress(config), bufferSize: config.bufferSize });
    try {
      await client.cast(createRequest(method, params !== undefined ? { params } : {}));
    } catch (err) {
      exit(EXIT.CALL_FAILURE, errorMessage(err));
    }
  });

  return program;
}
