/**
 * Envelope serialization.
 *
 * The wire form is compact JSON with a fixed field order, so the same
 * envelope always serializes to the same bytes. `inline` is omitted when
 * empty, which keeps envelopes without inline payloads identical to the
 * classic { verificationId, status, references, summary } shape.
 */

import { PipelineError, errorMessage } from "../errors/index.js";
import { EnvelopeSchema, type Envelope } from "./schema.js";

/**
 * Serialize an envelope to a JSON string.
 *
 * @param pretty - Whether to format with indentation (default: false)
 */
export function serializeEnvelope(envelope: Envelope, pretty = false): string {
  const wire: Record<string, unknown> = {
    verificationId: envelope.verificationId,
    status: envelope.status,
    references: envelope.references,
  };
  if (Object.keys(envelope.inline).length > 0) {
    wire["inline"] = envelope.inline;
  }
  wire["summary"] = envelope.summary;
  wire["createdAt"] = envelope.createdAt;
  wire["updatedAt"] = envelope.updatedAt;

  return JSON.stringify(wire, null, pretty ? 2 : undefined);
}

/**
 * Validate an already-parsed value as an envelope.
 *
 * @throws PipelineError (SchemaError) if validation fails
 */
export function parseEnvelope(value: unknown): Envelope {
  const result = EnvelopeSchema.safeParse(value);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new PipelineError("SchemaError", `Invalid envelope format: ${errors}`, {
      operation: "deserializeEnvelope",
      runId: readVerificationId(value),
    }, { cause: result.error });
  }
  return result.data;
}

/**
 * Deserialize an envelope from a JSON string.
 *
 * @throws PipelineError (SchemaError) if parsing or validation fails
 */
export function deserializeEnvelope(json: string): Envelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new PipelineError(
      "SchemaError",
      `Failed to parse envelope JSON: ${errorMessage(err)}`,
      { operation: "deserializeEnvelope" },
      { cause: err }
    );
  }
  return parseEnvelope(parsed);
}

function readVerificationId(value: unknown): string | undefined {
  if (typeof value === "object" && value !== null && "verificationId" in value) {
    const id = value.verificationId;
    return typeof id === "string" ? id : undefined;
  }
  return undefined;
}
