/**
 * Orchestrator messages.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * BOUNDARY DECODING
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Raw orchestrator JSON is decoded exactly once, here, into tagged unions.
 * Nothing past this file inspects untyped input.
 *
 *   Stage input
 *     { kind: "envelope" }  a full envelope from the previous stage
 *     { kind: "minimal" }   verificationId plus optional status/references,
 *                           as sent to the first stage or after a manual
 *                           restart
 *
 *   Failure input (error-finalization stage)
 *     { verificationId?, errorStage?, error?: { Error?, Cause? }, references? }
 *
 * Stage input is strict: a message that is neither form is a SchemaError.
 * Failure input is lenient: the failure finalizer must always be able to run,
 * so malformed fields are dropped instead of rejected.
 */

import { z } from "zod";

import { PipelineError } from "../errors/index.js";
import { ReferenceSchema, freezeReferenceMap, type Reference } from "../reference/index.js";
import { VerificationStatus } from "../status/index.js";
import { EnvelopeSchema, createEnvelope, type Envelope } from "../envelope/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// STAGE INPUT
// ═══════════════════════════════════════════════════════════════════════════

const MinimalInputSchema = z.object({
  verificationId: z.string().min(1),
  status: VerificationStatus.optional(),
  references: z.record(ReferenceSchema).default({}),
});

export interface MinimalStageInput {
  kind: "minimal";
  verificationId: string;
  status?: VerificationStatus;
  references: Record<string, Reference>;
}

export type StageInput = { kind: "envelope"; envelope: Envelope } | MinimalStageInput;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/**
 * Decode a stage invocation message.
 *
 * @throws PipelineError (SchemaError) if the message is neither form
 */
export function decodeStageInput(value: unknown): StageInput {
  const full = EnvelopeSchema.safeParse(value);
  if (full.success) {
    return { kind: "envelope", envelope: full.data };
  }

  const minimal = MinimalInputSchema.safeParse(value);
  if (minimal.success) {
    const input: MinimalStageInput = {
      kind: "minimal",
      verificationId: minimal.data.verificationId,
      references: freezeReferenceMap(minimal.data.references),
    };
    if (minimal.data.status !== undefined) {
      input.status = minimal.data.status;
    }
    return input;
  }

  throw new PipelineError(
    "SchemaError",
    `Invalid stage input: ${formatIssues(minimal.error)}`,
    { operation: "decodeStageInput" },
    { cause: minimal.error }
  );
}

/**
 * Envelope a stage works on, building one from a minimal message.
 */
export function envelopeFromInput(input: StageInput, now: Date = new Date()): Envelope {
  if (input.kind === "envelope") {
    return input.envelope;
  }
  const envelope = createEnvelope(input.verificationId, now);
  envelope.references = { ...input.references };
  if (input.status !== undefined) {
    envelope.status = input.status;
  }
  return envelope;
}

// ═══════════════════════════════════════════════════════════════════════════
// FAILURE INPUT
// ═══════════════════════════════════════════════════════════════════════════

const FailureInputSchema = z
  .object({
    verificationId: z.string().min(1).optional().catch(undefined),
    errorStage: z.string().optional().catch(undefined),
    error: z
      .object({
        Error: z.string().optional().catch(undefined),
        Cause: z.string().optional().catch(undefined),
      })
      .optional()
      .catch(undefined),
    references: z.record(z.unknown()).optional().catch(undefined),
  })
  .catch({});

export interface FailureInput {
  verificationId?: string;
  /** Stage name as reported; resolved later by resolveErrorStage() */
  errorStage?: string;
  /** Error name reported by the orchestrator, e.g. "States.Timeout" */
  errorName?: string;
  /** Raw cause text, JSON or plain */
  cause?: string;
  /** Valid references from the message; malformed entries are dropped */
  references: Record<string, Reference>;
  /** Names of references that failed validation */
  droppedReferences: string[];
}

/**
 * Decode an error-finalization message. Never throws.
 */
export function decodeFailureInput(value: unknown): FailureInput {
  const raw = FailureInputSchema.parse(value);
  const references: Record<string, Reference> = {};
  const droppedReferences: string[] = [];

  for (const [name, candidate] of Object.entries(raw.references ?? {})) {
    const parsed = ReferenceSchema.safeParse(candidate);
    if (parsed.success) {
      references[name] = parsed.data;
    } else {
      droppedReferences.push(name);
    }
  }

  const input: FailureInput = {
    references: freezeReferenceMap(references),
    droppedReferences,
  };
  if (raw.verificationId !== undefined) input.verificationId = raw.verificationId;
  if (raw.errorStage !== undefined) input.errorStage = raw.errorStage;
  if (raw.error?.Error !== undefined) input.errorName = raw.error.Error;
  if (raw.error?.Cause !== undefined) input.cause = raw.error.Cause;
  return input;
}

// ═══════════════════════════════════════════════════════════════════════════
// FAILURE CAUSE
// ═══════════════════════════════════════════════════════════════════════════

const CauseDocumentSchema = z.object({
  errorType: z.string().optional(),
  errorMessage: z.string().optional(),
  stackTrace: z.array(z.string()).optional(),
});

export interface FailureCause {
  errorType?: string;
  errorMessage: string;
  stackTrace: string[];
}

export const UNKNOWN_ERROR_MESSAGE = "Unknown error";

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function causeOf(errorMessage: string, errorType: string | undefined, stackTrace: string[]): FailureCause {
  const cause: FailureCause = { errorMessage, stackTrace };
  if (errorType !== undefined) {
    cause.errorType = errorType;
  }
  return cause;
}

/**
 * Interpret a raw cause. A JSON document contributes its fields; anything
 * else is taken as the message itself.
 */
export function parseFailureCause(cause: string | undefined, errorName?: string): FailureCause {
  if (cause === undefined || cause.trim() === "") {
    return causeOf(UNKNOWN_ERROR_MESSAGE, errorName, []);
  }

  const document = CauseDocumentSchema.safeParse(parseJson(cause));
  if (!document.success) {
    return causeOf(cause, errorName, []);
  }

  return causeOf(
    document.data.errorMessage || cause,
    document.data.errorType ?? errorName,
    document.data.stackTrace ?? []
  );
}
