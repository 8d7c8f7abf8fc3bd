import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, parseBufferSize, resolveConfig } from "../../src/config.js";
import { RPC_ENV } from "../../src/shared/env.js";

const saved = new Map<string, string | undefined>();

beforeEach(() => {
  for (const name of Object.values(RPC_ENV)) {
    saved.set(name, process.env[name]);
    delete process.env[name];
  }
});

afterEach(() => {
  for (const [name, value] of saved) {
    if (value === undefined) delete process.env[name];
    else process.env[name] = value;
  }
  saved.clear();
});

describe("parseBufferSize", () => {
  it("accepts sizes from one header upwards", () => {
    expect(parseBufferSize("4")).toBe(4);
    expect(parseBufferSize(" 1024 ")).toBe(1024);
  });

  it.each(["3", "abc", "1.5", "-64", "4294967300"])("rejects %s", (raw) => {
    expect(() => parseBufferSize(raw)).toThrow(ConfigError);
  });
});

describe("resolveConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(resolveConfig("server")).toEqual({
      host: "127.0.0.1",
      port: 4100,
      bufferSize: 65536,
      logLevel: "info",
      logFormat: "text",
    });
  });

  it("reads the listen address for servers and the call address for clients", () => {
    process.env.FRAMED_RPC_LISTEN = "0.0.0.0:4200";
    process.env.FRAMED_RPC_ADDRESS = "10.1.2.3:4300";
    expect(resolveConfig("server")).toMatchObject({ host: "0.0.0.0", port: 4200 });
    expect(resolveConfig("client")).toMatchObject({ host: "10.1.2.3", port: 4300 });
  });

  it("prefers flags over environment variables", () => {
    process.env.FRAMED_RPC_BUFFER_SIZE = "512";
    process.env.FRAMED_RPC_LOG_LEVEL = "warn";
    const config = resolveConfig("client", { address: "4400", bufferSize: "2048", logLevel: "debug" });
    expect(config).toMatchObject({ host: "127.0.0.1", port: 4400, bufferSize: 2048, logLevel: "debug" });
  });

  it("takes buffer size and log format from the environment", () => {
    process.env.FRAMED_RPC_BUFFER_SIZE = "512";
    process.env.FRAMED_RPC_LOG_FORMAT = "json";
    expect(resolveConfig("server")).toMatchObject({ bufferSize: 512, logFormat: "json" });
  });

  it("carries a socket path when one is given", () => {
    expect(resolveConfig("server", { socket: "/tmp/rpc.sock" }).path).toBe("/tmp/rpc.sock");
  });

  it("rejects unknown log levels and formats", () => {
    expect(() => resolveConfig("server", { logLevel: "verbose" })).toThrow(ConfigError);
    expect(() => resolveConfig("server", { logFormat: "xml" })).toThrow(ConfigError);
  });

  it("rejects an invalid buffer size from the environment", () => {
    process.env.FRAMED_RPC_BUFFER_SIZE = "2";
    expect(() => resolveConfig("client")).toThrow("Invalid buffer size: 2");
  });
});
