/**
 * JSON values and their byte form.
 */

import { z } from "zod";

import { PipelineError, errorMessage, type ErrorAttribution } from "../errors/index.js";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

const JsonLiteralSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

const JsonShapeSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([JsonLiteralSchema, z.array(JsonShapeSchema), z.record(JsonShapeSchema)])
);

/**
 * First part of a value that JSON text cannot carry exactly, if any.
 * Non-finite numbers and -0 change on the way through JSON.stringify; an own
 * "__proto__" key is lost when the parsed object is copied.
 */
export function inexactJsonPath(value: unknown, path: (string | number)[] = []): {
  path: (string | number)[];
  message: string;
} | undefined {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return { path, message: `${value} has no JSON form` };
    if (Object.is(value, -0)) return { path, message: "-0 has no JSON form" };
    return undefined;
  }
  if (Array.isArray(value)) {
    for (const [index, item] of value.entries()) {
      const found = inexactJsonPath(item, [...path, index]);
      if (found !== undefined) return found;
    }
    return undefined;
  }
  if (typeof value === "object" && value !== null) {
    if (Object.hasOwn(value, "__proto__")) {
      return { path: [...path, "__proto__"], message: '"__proto__" is not an allowed key' };
    }
    for (const [key, item] of Object.entries(value)) {
      const found = inexactJsonPath(item, [...path, key]);
      if (found !== undefined) return found;
    }
  }
  return undefined;
}

/**
 * JSON values that survive a text round trip unchanged.
 */
export const JsonValueSchema: z.ZodType<JsonValue, z.ZodTypeDef, unknown> = z
  .unknown()
  .superRefine((value, ctx) => {
    const found = inexactJsonPath(value);
    if (found !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: found.path, message: found.message });
    }
  })
  .pipe(JsonShapeSchema);

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * UTF-8 bytes of the compact JSON text of a value.
 *
 * @throws PipelineError (ValidationError) if the value has no JSON form
 */
export function toJSONBytes(value: unknown, attribution: ErrorAttribution): Uint8Array {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (err) {
    throw new PipelineError("ValidationError", `Value is not serializable: ${errorMessage(err)}`, attribution, {
      cause: err,
    });
  }
  if (text === undefined) {
    throw new PipelineError("ValidationError", "Value has no JSON representation", attribution);
  }
  return encoder.encode(text);
}

/**
 * Parse UTF-8 JSON bytes.
 *
 * @throws PipelineError (SchemaError) on invalid UTF-8 or JSON
 */
export function fromJSONBytes(bytes: Uint8Array, attribution: ErrorAttribution): unknown {
  try {
    return JSON.parse(decoder.decode(bytes));
  } catch (err) {
    throw new PipelineError("SchemaError", `Stored payload is not valid JSON: ${errorMessage(err)}`, attribution, {
      cause: err,
    });
  }
}

/**
 * Byte length of a value's compact JSON text.
 */
export function jsonByteLength(value: unknown, attribution: ErrorAttribution): number {
  return toJSONBytes(value, attribution).byteLength;
}
