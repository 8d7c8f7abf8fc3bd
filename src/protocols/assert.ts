import { type, type ArkErrors } from "arktype";
import { EnvelopeError, type EnvelopeFault } from "../shared/errors.js";

/** Asserts the value matches the schema and returns it. Throws the given envelope fault otherwise. */
export function assertSchema<T>(
  schema: (value: unknown) => T,
  value: unknown,
  fault: EnvelopeFault,
  context: string
): Exclude<T, ArkErrors> {
  const out = schema(value);
  if (out instanceof type.errors) {
    throw new EnvelopeError(fault, `Invalid ${context}: ${out.summary}`);
  }
  return out as Exclude<T, ArkErrors>;
}
