import { DEFAULT_HOST, DEFAULT_PORT } from "./constants.js";

/**
 * Parse --listen value (e.g. "127.0.0.1:4100" or "4100") into host and port.
 */
export function parseListen(listen: string): { host: string; port: number } {
  if (!listen || listen === "") return { host: DEFAULT_HOST, port: DEFAULT_PORT };
  const colon = listen.lastIndexOf(":");
  if (colon === -1) {
    const port = parseInt(listen, 10);
    if (Number.isNaN(port) || port <= 0 || port > 65535)
      return { host: DEFAULT_HOST, port: DEFAULT_PORT };
    return { host: DEFAULT_HOST, port };
  }
  const host = listen.slice(0, colon).trim() || DEFAULT_HOST;
  const port = parseInt(listen.slice(colon + 1), 10);
  if (Number.isNaN(port) || port <= 0 || port > 65535)
    return { host, port: DEFAULT_PORT };
  return { host, port };
}
