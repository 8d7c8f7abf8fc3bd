import { EnvelopeError } from "../../shared/errors.js";
import { assertSchema } from "../assert.js";
import { parseJsonText, serializeJson } from "./codec.js";
import { ErrorCode } from "./error-code.js";
import {
  readId,
  readObject,
  readOptionalId,
  readVersion,
  requestIdToJson,
} from "./request.js";
import {
  ErrorCodeValueSchema,
  ErrorMessageSchema,
  JSONRPC_VERSION,
  isJsonObject,
  type ErrorCode as ErrorCodeType,
  type ErrorObject,
  type JsonObject,
  type JsonValue,
  type RequestId,
  type ResponseObject,
} from "./types.js";

export function errorObject(code: ErrorCodeType, message: string, data?: JsonValue): ErrorObject {
  return { code, message, ...(data !== undefined && { data }) };
}

export function okResponse(id: RequestId, result: JsonValue): ResponseObject {
  return { kind: "ok", jsonrpc: JSONRPC_VERSION, id, result };
}

/** `id` is left out when the failing request could not be read. */
export function errorResponse(id: RequestId | undefined, error: ErrorObject): ResponseObject {
  return { kind: "err", jsonrpc: JSONRPC_VERSION, ...(id !== undefined && { id }), error };
}

export function parseErrorObject(value: JsonValue): ErrorObject {
  if (!isJsonObject(value)) {
    throw new EnvelopeError("InvalidErrorObject", "\"error\" must be an object");
  }
  if (!("code" in value)) {
    throw new EnvelopeError("MissingErrorCode", "Missing \"error.code\" member");
  }
  const code = ErrorCode.fromValue(
    assertSchema(ErrorCodeValueSchema, value.code, "InvalidErrorCode", "error.code")
  );
  if (!("message" in value)) {
    throw new EnvelopeError("MissingErrorMessage", "Missing \"error.message\" member");
  }
  const message = assertSchema(ErrorMessageSchema, value.message, "InvalidErrorMessage", "error.message");
  return "data" in value ? { code, message, data: value.data } : { code, message };
}

export function parseResponse(text: string): ResponseObject {
  const root = readObject(parseJsonText(text));
  const jsonrpc = readVersion(root);

  if ("error" in root) {
    const id = readOptionalId(root);
    const error = parseErrorObject(root.error);
    return { kind: "err", jsonrpc, ...(id !== undefined && { id }), error };
  }

  if (!("id" in root)) {
    throw new EnvelopeError("MissingID", "Success response must carry an \"id\"");
  }
  const id = readId(root.id);
  if (!("result" in root)) {
    throw new EnvelopeError("MissingResult", "Success response must carry a \"result\"");
  }
  return { kind: "ok", jsonrpc, id, result: root.result };
}

function errorObjectToJson(error: ErrorObject): JsonObject {
  const out: JsonObject = { code: ErrorCode.value(error.code), message: error.message };
  if (error.data !== undefined) out.data = error.data;
  return out;
}

export function serializeResponse(response: ResponseObject): string {
  switch (response.kind) {
    case "ok":
      return serializeJson({
        jsonrpc: response.jsonrpc,
        id: requestIdToJson(response.id),
        result: response.result,
      });
    case "err": {
      const out: JsonObject = { jsonrpc: response.jsonrpc };
      if (response.id) out.id = requestIdToJson(response.id);
      out.error = errorObjectToJson(response.error);
      return serializeJson(out);
    }
  }
}
