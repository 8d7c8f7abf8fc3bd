/**
 * Batch wire convention: members are serialized one per line and joined with "\n"
 * (no trailing newline). This is not the JSON array batch of the JSON-RPC 2.0
 * specification; a standard batch client will not interoperate with it.
 */

import { EnvelopeError, UsageError } from "../../shared/errors.js";
import { parseRequest, serializeRequest } from "./request.js";
import { parseResponse, serializeResponse } from "./response.js";
import type { RequestObject, ResponseObject } from "./types.js";

export type MaybeBatch<T> = { kind: "single"; value: T } | { kind: "batch"; items: T[] };

const SEPARATOR = "\n";

export function single<T>(value: T): MaybeBatch<T> {
  return { kind: "single", value };
}

export function batch<T>(items: T[]): MaybeBatch<T> {
  return { kind: "batch", items };
}

export function batchItems<T>(envelopes: MaybeBatch<T>): T[] {
  switch (envelopes.kind) {
    case "single":
      return [envelopes.value];
    case "batch":
      return envelopes.items;
  }
}

export function batchLength<T>(envelopes: MaybeBatch<T>): number {
  return batchItems(envelopes).length;
}

/** Singleton lists collapse to `single`, matching what a one-line payload decodes to. */
export function fromItems<T>(items: T[]): MaybeBatch<T> {
  const [first] = items;
  return items.length === 1 && first !== undefined ? single(first) : batch(items);
}

export function encodeBatch<T>(envelopes: MaybeBatch<T>, serialize: (value: T) => string): string {
  const items = batchItems(envelopes);
  if (items.length === 0) {
    throw new UsageError("EmptyBatch", "Batch must contain at least one envelope");
  }
  return items.map(serialize).join(SEPARATOR);
}

/** Any line that fails to parse aborts the whole payload. */
export function decodeBatch<T>(text: string, parse: (line: string) => T): MaybeBatch<T> {
  if (text.length === 0) {
    throw new EnvelopeError("EmptyBatch", "Frame payload contains no envelopes");
  }
  const lines = text.split(SEPARATOR);
  if (lines.length === 1) return single(parse(text));
  return batch(lines.map((line) => parse(line)));
}

export function encodeRequests(requests: MaybeBatch<RequestObject>): string {
  return encodeBatch(requests, serializeRequest);
}

export function decodeRequests(text: string): MaybeBatch<RequestObject> {
  return decodeBatch(text, parseRequest);
}

export function encodeResponses(responses: MaybeBatch<ResponseObject>): string {
  return encodeBatch(responses, serializeResponse);
}

export function decodeResponses(text: string): MaybeBatch<ResponseObject> {
  return decodeBatch(text, parseResponse);
}
