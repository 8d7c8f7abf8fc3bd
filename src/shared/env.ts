/** Environment variable names read by the CLI. */
export const RPC_ENV = {
  LISTEN: "FRAMED_RPC_LISTEN",
  ADDRESS: "FRAMED_RPC_ADDRESS",
  BUFFER_SIZE: "FRAMED_RPC_BUFFER_SIZE",
  LOG_LEVEL: "FRAMED_RPC_LOG_LEVEL",
  LOG_FORMAT: "FRAMED_RPC_LOG_FORMAT",
} as const;

export function getEnv(key: keyof typeof RPC_ENV): string | undefined {
  return process.env[RPC_ENV[key]];
}
