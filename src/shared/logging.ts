import { Writable } from "node:stream";
import pino from "pino";
import pinoPretty from "pino-pretty";
import { getEnv } from "./env.js";

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

const LOGGER_NAME = "framed-jsonrpc";

export function isLogLevel(s: string): s is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(s);
}

function stderrStream(): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      process.stderr.write(chunk);
      cb();
    },
  });
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        try {
          const o = JSON.parse(line) as { msg?: string };
          if (typeof o.msg === "string") process.stderr.write(o.msg + "\n");
        } catch {
          process.stderr.write(line + "\n");
        }
      }
      cb();
    },
  });
}

let rootLogger: pino.Logger | null = null;

export function initLogger(level = "info", format: LogFormat = "text"): void {
  const logLevel = isLogLevel(level) ? level : "info";
  if (format === "plain") {
    rootLogger = pino({ level: logLevel, name: LOGGER_NAME }, plainMessageStderr());
  } else if (format === "text") {
    const prettyStream = pinoPretty({ colorize: true, destination: stderrStream() });
    rootLogger = pino({ level: logLevel, name: LOGGER_NAME }, prettyStream);
  } else {
    rootLogger = pino({ level: logLevel, name: LOGGER_NAME }, stderrStream());
  }
}

function ensureLogger(): pino.Logger {
  if (!rootLogger) {
    const level = getEnv("LOG_LEVEL") ?? "info";
    const logger = pino(
      { level: isLogLevel(level) ? level : "info", name: LOGGER_NAME },
      plainMessageStderr()
    );
    rootLogger = logger;
    return logger;
  }
  return rootLogger;
}

export function getLogger(): pino.Logger {
  return ensureLogger();
}

/** Root-logger shorthand for code that has no component of its own. */
export const log = {
  info: (...args: Parameters<pino.Logger["info"]>) => ensureLogger().info(...args),
  warn: (...args: Parameters<pino.Logger["warn"]>) => ensureLogger().warn(...args),
  error: (...args: Parameters<pino.Logger["error"]>) => ensureLogger().error(...args),
  debug: (...args: Parameters<pino.Logger["debug"]>) => ensureLogger().debug(...args),
};
