import { type } from "arktype";
import { DEFAULT_BUFFER_SIZE, DEFAULT_LISTEN, FRAME_HEADER_BYTES, MAX_FRAME_PAYLOAD } from "./shared/constants.js";
import { getEnv } from "./shared/env.js";
import type { LogFormat, LogLevel } from "./shared/logging.js";
import { parseListen } from "./shared/net.js";

const LogLevelSchema = type("'error' | 'warn' | 'info' | 'debug'");
const LogFormatSchema = type("'text' | 'json' | 'plain'");

export interface CliOverrides {
  listen?: string;
  address?: string;
  socket?: string;
  bufferSize?: string;
  logLevel?: string;
  logFormat?: string;
}

export interface RuntimeConfig {
  host: string;
  port: number;
  /** Unix socket path; takes precedence over host/port when set. */
  path?: string;
  bufferSize: number;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Frame buffer must at least hold a header and at most the largest encodable frame. */
export function parseBufferSize(raw: string): number {
  const size = Number(raw.trim());
  if (!Number.isInteger(size) || size < FRAME_HEADER_BYTES || size > MAX_FRAME_PAYLOAD + FRAME_HEADER_BYTES) {
    throw new ConfigError(`Invalid buffer size: ${raw}`);
  }
  return size;
}

function parseLogLevel(raw: string): LogLevel {
  const out = LogLevelSchema(raw);
  if (out instanceof type.errors) throw new ConfigError(`Invalid log level: ${out.summary}`);
  return out;
}

function parseLogFormat(raw: string): LogFormat {
  const out = LogFormatSchema(raw);
  if (out instanceof type.errors) throw new ConfigError(`Invalid log format: ${out.summary}`);
  return out;
}

export type Role = "server" | "client";

/**
 * Resolve runtime settings. Precedence: CLI flag, then environment, then default.
 * Servers read `listen`, clients read `address`; both use the host:port syntax.
 */
export function resolveConfig(role: Role, overrides: CliOverrides = {}): RuntimeConfig {
  const hostPort =
    role === "server"
      ? overrides.listen ?? getEnv("LISTEN")
      : overrides.address ?? getEnv("ADDRESS");
  const { host, port } = parseListen(hostPort ?? DEFAULT_LISTEN);
  const bufferSizeRaw = overrides.bufferSize ?? getEnv("BUFFER_SIZE");
  return {
    host,
    port,
    ...(overrides.socket !== undefined && { path: overrides.socket }),
    bufferSize: bufferSizeRaw === undefined ? DEFAULT_BUFFER_SIZE : parseBufferSize(bufferSizeRaw),
    logLevel: parseLogLevel(overrides.logLevel ?? getEnv("LOG_LEVEL") ?? "info"),
    logFormat: parseLogFormat(overrides.logFormat ?? getEnv("LOG_FORMAT") ?? "text"),
  };
}
