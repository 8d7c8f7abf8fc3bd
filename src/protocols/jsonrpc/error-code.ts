import { EnvelopeError } from "../../shared/errors.js";
import type { ErrorCode as ErrorCodeType } from "./types.js";

export type ErrorCode = ErrorCodeType;

type FixedKind = Exclude<ErrorCodeType["kind"], "serverError">;

const FIXED_CODES = {
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603,
} as const satisfies Record<FixedKind, number>;

export const SERVER_ERROR_MIN = -32099;
export const SERVER_ERROR_MAX = -32000;
const RESERVED_MIN = -32768;

function isServerErrorValue(code: number): boolean {
  return SERVER_ERROR_MIN <= code && code <= SERVER_ERROR_MAX;
}

function server(value: number): ErrorCodeType {
  if (!Number.isInteger(value) || !isServerErrorValue(value)) {
    throw new EnvelopeError(
      "InvalidErrorCode",
      `Server error code must be an integer in [${SERVER_ERROR_MIN}, ${SERVER_ERROR_MAX}], got ${value}`
    );
  }
  return { kind: "serverError", value };
}

/** Numeric value of an error code as sent on the wire. */
function value(code: ErrorCodeType): number {
  switch (code.kind) {
    case "parseError":
    case "invalidRequest":
    case "methodNotFound":
    case "invalidParams":
    case "internalError":
      return FIXED_CODES[code.kind];
    case "serverError":
      return code.value;
  }
}

/**
 * Decodes a wire integer. Fixed codes and the server range decode; the rest of
 * -32768..-32001 is reserved; anything else is invalid.
 */
function fromValue(code: number): ErrorCodeType {
  switch (code) {
    case FIXED_CODES.parseError:
      return { kind: "parseError" };
    case FIXED_CODES.invalidRequest:
      return { kind: "invalidRequest" };
    case FIXED_CODES.methodNotFound:
      return { kind: "methodNotFound" };
    case FIXED_CODES.invalidParams:
      return { kind: "invalidParams" };
    case FIXED_CODES.internalError:
      return { kind: "internalError" };
  }
  if (!Number.isInteger(code)) {
    throw new EnvelopeError("InvalidErrorCode", `Error code must be an integer, got ${code}`);
  }
  if (isServerErrorValue(code)) return { kind: "serverError", value: code };
  if (RESERVED_MIN <= code && code < SERVER_ERROR_MAX) {
    throw new EnvelopeError("ReservedErrorCode", `Error code ${code} is reserved`);
  }
  throw new EnvelopeError("InvalidErrorCode", `Error code ${code} is outside the JSON-RPC range`);
}

/** Fixed codes are frozen singletons shared by every caller. */
export const ErrorCode = {
  parseError: Object.freeze({ kind: "parseError" }) satisfies ErrorCodeType,
  invalidRequest: Object.freeze({ kind: "invalidRequest" }) satisfies ErrorCodeType,
  methodNotFound: Object.freeze({ kind: "methodNotFound" }) satisfies ErrorCodeType,
  invalidParams: Object.freeze({ kind: "invalidParams" }) satisfies ErrorCodeType,
  internalError: Object.freeze({ kind: "internalError" }) satisfies ErrorCodeType,
  server,
  value,
  fromValue,
};
