/** Named validation failures raised while reading or building JSON-RPC envelopes. */
export type EnvelopeFault =
  | "ParseError"
  | "NotAnObject"
  | "MissingProtocolVersion"
  | "ProtocolVersionShouldBeString"
  | "UnsupportedVersion"
  | "MissingMethod"
  | "MethodShouldBeString"
  | "EmptyMethod"
  | "InvalidParams"
  | "InvalidID"
  | "MissingID"
  | "MissingResult"
  | "InvalidErrorObject"
  | "MissingErrorCode"
  | "InvalidErrorCode"
  | "ReservedErrorCode"
  | "MissingErrorMessage"
  | "InvalidErrorMessage"
  | "EmptyBatch";

export type FrameFault = "Closed" | "BufferTooSmall" | "MessageTooLarge" | "WriteZero";

export type UsageFault = "EmptyBatch";

export class EnvelopeError extends Error {
  readonly fault: EnvelopeFault;

  constructor(fault: EnvelopeFault, message: string) {
    super(message);
    this.name = "EnvelopeError";
    this.fault = fault;
  }
}

/** Thrown by the frame codec. `Closed` means the peer ended the stream. */
export class FrameError extends Error {
  readonly fault: FrameFault;

  constructor(fault: FrameFault, message: string) {
    super(message);
    this.name = "FrameError";
    this.fault = fault;
  }
}

export class UsageError extends Error {
  readonly fault: UsageFault;

  constructor(fault: UsageFault, message: string) {
    super(message);
    this.name = "UsageError";
    this.fault = fault;
  }
}

export function isClosed(err: unknown): boolean {
  return err instanceof FrameError && err.fault === "Closed";
}
