/**
 * JSON text codec for envelope payloads. Output is compact: no inserted whitespace,
 * so a serialized envelope never contains a raw newline.
 */

import { EnvelopeError } from "../../shared/errors.js";
import type { JsonValue } from "./types.js";

export function parseJsonText(text: string): JsonValue {
  try {
    return JSON.parse(text) as JsonValue;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new EnvelopeError("ParseError", `Parse error: ${reason}`);
  }
}

export function serializeJson(value: JsonValue): string {
  return JSON.stringify(value);
}
