import { type } from "arktype";

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export const JSONRPC_VERSION = "2.0";

export const JsonRpcVersionSchema = type("'2.0'");
export type JsonRpcVersion = typeof JsonRpcVersionSchema.infer;

export const MethodSchema = type("string");
export const JsonRpcIdSchema = type("string | number.integer");
export const ErrorCodeValueSchema = type("number.integer");
export const ErrorMessageSchema = type("string");

/** Absent on a request means notification. */
export type RequestId =
  | { kind: "number"; value: number }
  | { kind: "string"; value: string };

export type Params =
  | { kind: "array"; value: JsonValue[] }
  | { kind: "object"; value: JsonObject };

export interface RequestObject {
  jsonrpc: JsonRpcVersion;
  method: string;
  params?: Params;
  id?: RequestId;
}

export type ErrorCode =
  | { kind: "parseError" }
  | { kind: "invalidRequest" }
  | { kind: "methodNotFound" }
  | { kind: "invalidParams" }
  | { kind: "internalError" }
  /** Implementation-defined, -32099..-32000. */
  | { kind: "serverError"; value: number };

export interface ErrorObject {
  code: ErrorCode;
  message: string;
  data?: JsonValue;
}

export type ResponseObject =
  | { kind: "ok"; jsonrpc: JsonRpcVersion; id: RequestId; result: JsonValue }
  | { kind: "err"; jsonrpc: JsonRpcVersion; id?: RequestId; error: ErrorObject };

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
