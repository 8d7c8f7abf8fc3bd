import { errorObject } from "../protocols/jsonrpc/response.js";
import type {
  ErrorCode,
  ErrorObject,
  JsonValue,
  RequestObject,
} from "../protocols/jsonrpc/types.js";

export type DispatchOutcome =
  | { kind: "result"; result: JsonValue }
  | { kind: "error"; error: ErrorObject };

/**
 * Application method dispatch. Called for notifications too; their outcome is
 * discarded. A dispatcher that throws ends the connection it was serving.
 */
export type Dispatch = (request: RequestObject) => DispatchOutcome | Promise<DispatchOutcome>;

export function result(value: JsonValue): DispatchOutcome {
  return { kind: "result", result: value };
}

export function failure(code: ErrorCode, message: string, data?: JsonValue): DispatchOutcome {
  return { kind: "error", error: errorObject(code, message, data) };
}

/** Demonstration dispatcher: answers every call with its own method name. */
export const echoDispatch: Dispatch = (request) => result(request.method);
