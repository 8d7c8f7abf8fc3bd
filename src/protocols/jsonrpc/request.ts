import { EnvelopeError } from "../../shared/errors.js";
import { assertSchema } from "../assert.js";
import { parseJsonText, serializeJson } from "./codec.js";
import {
  JsonRpcIdSchema,
  JsonRpcVersionSchema,
  JSONRPC_VERSION,
  MethodSchema,
  isJsonObject,
  type JsonObject,
  type JsonRpcVersion,
  type JsonValue,
  type Params,
  type RequestId,
  type RequestObject,
} from "./types.js";

/** Builds an id from a caller value; numbers must be integers. */
export function requestId(value: number | string): RequestId {
  return readId(value);
}

export function requestIdToJson(id: RequestId): JsonValue {
  switch (id.kind) {
    case "number":
      return id.value;
    case "string":
      return id.value;
  }
}

export function arrayParams(values: JsonValue[]): Params {
  return { kind: "array", value: values };
}

export function objectParams(entries: JsonObject): Params {
  return { kind: "object", value: entries };
}

export function paramsToJson(params: Params): JsonValue {
  switch (params.kind) {
    case "array":
      return params.value;
    case "object":
      return params.value;
  }
}

/** Only "2.0" is a supported protocol version. */
export function parseVersion(version: string): JsonRpcVersion {
  return assertSchema(JsonRpcVersionSchema, version, "UnsupportedVersion", "jsonrpc version");
}

/** Reads the "jsonrpc" member shared by requests and responses. */
export function readVersion(root: JsonObject): JsonRpcVersion {
  if (!("jsonrpc" in root)) {
    throw new EnvelopeError("MissingProtocolVersion", "Missing \"jsonrpc\" member");
  }
  const version = root.jsonrpc;
  if (typeof version !== "string") {
    throw new EnvelopeError("ProtocolVersionShouldBeString", "\"jsonrpc\" must be a string");
  }
  return parseVersion(version);
}

/** Reads an optional id. Absent and null both mean "no id". */
export function readOptionalId(root: JsonObject): RequestId | undefined {
  if (!("id" in root) || root.id === null) return undefined;
  return readId(root.id);
}

/** Numeric ids must be safe integers; larger ones would not survive a round trip. */
export function readId(value: JsonValue): RequestId {
  const id = assertSchema(JsonRpcIdSchema, value, "InvalidID", "id");
  if (typeof id === "string") return { kind: "string", value: id };
  if (!Number.isSafeInteger(id)) {
    throw new EnvelopeError("InvalidID", `Numeric id ${id} is outside the safe integer range`);
  }
  return { kind: "number", value: id };
}

export function readObject(value: JsonValue): JsonObject {
  if (!isJsonObject(value)) {
    throw new EnvelopeError("NotAnObject", "JSON-RPC envelope must be a JSON object");
  }
  return value;
}

function validateMethod(method: string): string {
  if (method.length === 0) {
    throw new EnvelopeError("EmptyMethod", "Method name must not be empty");
  }
  return method;
}

export function createRequest(
  method: string,
  options: { params?: Params; id?: RequestId } = {}
): RequestObject {
  return {
    jsonrpc: JSONRPC_VERSION,
    method: validateMethod(method),
    ...(options.params !== undefined && { params: options.params }),
    ...(options.id !== undefined && { id: options.id }),
  };
}

export function parseRequest(text: string): RequestObject {
  const root = readObject(parseJsonText(text));
  const jsonrpc = readVersion(root);

  if (!("method" in root)) {
    throw new EnvelopeError("MissingMethod", "Missing \"method\" member");
  }
  const method = validateMethod(
    assertSchema(MethodSchema, root.method, "MethodShouldBeString", "method")
  );

  let params: Params | undefined;
  if ("params" in root) {
    const raw = root.params;
    if (Array.isArray(raw)) params = arrayParams(raw);
    else if (isJsonObject(raw)) params = objectParams(raw);
    else throw new EnvelopeError("InvalidParams", "\"params\" must be an array or an object");
  }

  const id = readOptionalId(root);
  return {
    jsonrpc,
    method,
    ...(params !== undefined && { params }),
    ...(id !== undefined && { id }),
  };
}

/** Compact JSON with members in the order jsonrpc, method, params, id. */
export function serializeRequest(request: RequestObject): string {
  const out: JsonObject = { jsonrpc: request.jsonrpc, method: request.method };
  if (request.params) out.params = paramsToJson(request.params);
  if (request.id) out.id = requestIdToJson(request.id);
  return serializeJson(out);
}

export function isNotification(request: RequestObject): boolean {
  return request.id === undefined;
}
