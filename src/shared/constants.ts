export const DEFAULT_LISTEN = "127.0.0.1:4100";
export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 4100;

/** Default frame buffer capacity; also the largest frame a peer can send us. */
export const DEFAULT_BUFFER_SIZE = 64 * 1024;

export const FRAME_HEADER_BYTES = 4;
export const MAX_FRAME_PAYLOAD = 0xffffffff;

export const VERSION = "0.1.0";
