/**
 * Verification context: the durable per-run record.
 *
 * Invariants maintained by every function here:
 *
 * - statusHistory only grows; entries are never reordered or removed.
 * - status and currentStatus are one logical field and are always written
 *   together.
 * - errorTracking.hasErrors never reverts to false once set.
 *
 * All functions return a new context and leave their input untouched.
 */

import { z } from "zod";

import { PipelineError, type ErrorAttribution } from "../errors/index.js";
import { ReferenceSchema } from "../reference/index.js";
import { parseVerificationTimestamp } from "../logging/run-id.js";
import { VerificationStatus, type ErrorStage } from "./states.js";
import { terminateWithFailure, transition, type TransitionResult } from "./machine.js";

export const VerificationType = z.enum(["LAYOUT_VS_CHECKING", "PREVIOUS_VS_CURRENT"]);
export type VerificationType = z.infer<typeof VerificationType>;

export const ErrorInfoSchema = z.object({
  code: z.string(),
  message: z.string(),
  details: z.record(z.unknown()).default({}),
  timestamp: z.string(),
});
export type ErrorInfo = z.infer<typeof ErrorInfoSchema>;

export const ErrorTrackingSchema = z.object({
  hasErrors: z.boolean(),
  currentError: ErrorInfoSchema.optional(),
  errorHistory: z.array(ErrorInfoSchema),
  lastErrorAt: z.string().optional(),
});
export type ErrorTracking = z.infer<typeof ErrorTrackingSchema>;

export const StatusHistoryEntrySchema = z.object({
  status: VerificationStatus,
  timestamp: z.string(),
  stage: z.string().optional(),
  functionName: z.string().optional(),
});
export type StatusHistoryEntry = z.infer<typeof StatusHistoryEntrySchema>;

const VerificationContextObject = z.object({
  verificationId: z.string().min(1),
  verificationAt: z.string(),
  verificationType: VerificationType,
  status: VerificationStatus,
  currentStatus: VerificationStatus,
  lastUpdatedAt: z.string(),
  error: ErrorInfoSchema.optional(),
  errorTracking: ErrorTrackingSchema.optional(),
  statusHistory: z.array(StatusHistoryEntrySchema),
  references: z.record(ReferenceSchema).optional(),
});

export const VerificationContextSchema = VerificationContextObject.refine(
  (ctx) => ctx.status === ctx.currentStatus,
  { message: "status and currentStatus must be equal", path: ["currentStatus"] }
);

export type VerificationContext = z.infer<typeof VerificationContextObject>;

export interface StatusChangeOptions {
  stage?: string;
  functionName?: string;
  now?: Date;
}

export interface CreateContextOptions {
  verificationType?: VerificationType;
  now?: Date;
}

function historyEntry(
  status: VerificationStatus,
  timestamp: string,
  options: StatusChangeOptions
): StatusHistoryEntry {
  const entry: StatusHistoryEntry = { status, timestamp };
  if (options.stage !== undefined) {
    entry.stage = options.stage;
  }
  if (options.functionName !== undefined) {
    entry.functionName = options.functionName;
  }
  return entry;
}

export function createVerificationContext(
  verificationId: string,
  options: CreateContextOptions = {}
): VerificationContext {
  const timestamp = (options.now ?? new Date()).toISOString();
  return {
    verificationId,
    verificationAt: parseVerificationTimestamp(verificationId) ?? timestamp,
    verificationType: options.verificationType ?? "LAYOUT_VS_CHECKING",
    status: "INITIALIZED",
    currentStatus: "INITIALIZED",
    lastUpdatedAt: timestamp,
    statusHistory: [historyEntry("INITIALIZED", timestamp, { stage: "INITIALIZATION" })],
  };
}

/**
 * Minimal context for a run whose stored state is missing, built from the
 * run id alone. Used by the failure finalizer so it can always terminate.
 */
export function synthesizeContext(verificationId: string, now: Date = new Date()): VerificationContext {
  return createVerificationContext(verificationId, { now });
}

/**
 * Move a context forward. Requests for the same or an earlier status leave
 * the context unchanged (the same object is returned).
 *
 * @throws PipelineError (ValidationError) on an illegal forward move
 */
export function applyStatus(
  ctx: VerificationContext,
  target: VerificationStatus,
  options: StatusChangeOptions = {}
): { context: VerificationContext; result: TransitionResult } {
  const attribution: ErrorAttribution = { operation: "applyStatus", runId: ctx.verificationId };
  const result = transition(ctx.status, target, attribution);
  if (result.outcome === "unchanged") {
    return { context: ctx, result };
  }

  const timestamp = (options.now ?? new Date()).toISOString();
  return {
    context: {
      ...ctx,
      status: result.status,
      currentStatus: result.status,
      lastUpdatedAt: timestamp,
      statusHistory: [...ctx.statusHistory, historyEntry(result.status, timestamp, options)],
    },
    result,
  };
}

const PROGRESS_ORDER: readonly VerificationStatus[] = [
  "INITIALIZED",
  "IMAGES_FETCHED",
  "TURN1_PROCESSED",
  "TURN2_PROCESSED",
  "COMPLETED",
];

/**
 * Move a context to `target` through every progress status in between, for
 * records that were not updated by the intermediate stages.
 *
 * @throws PipelineError (ValidationError) if the context cannot reach `target`
 */
export function advanceTo(
  ctx: VerificationContext,
  target: VerificationStatus,
  options: StatusChangeOptions = {}
): VerificationContext {
  const index = PROGRESS_ORDER.indexOf(target);
  if (index === -1) {
    return applyStatus(ctx, target, options).context;
  }
  let current = ctx;
  for (const status of PROGRESS_ORDER.slice(0, index + 1)) {
    current = applyStatus(current, status, options).context;
  }
  return current;
}

export function createErrorInfo(
  code: string,
  message: string,
  details: Record<string, unknown> = {},
  now: Date = new Date()
): ErrorInfo {
  return { code, message, details, timestamp: now.toISOString() };
}

/**
 * Record an error. hasErrors becomes (and stays) true.
 */
export function recordError(ctx: VerificationContext, info: ErrorInfo): VerificationContext {
  const previous = ctx.errorTracking;
  return {
    ...ctx,
    error: info,
    lastUpdatedAt: info.timestamp,
    errorTracking: {
      hasErrors: true,
      currentError: info,
      errorHistory: [...(previous?.errorHistory ?? []), info],
      lastErrorAt: info.timestamp,
    },
  };
}

/**
 * Record the error and drive the context to VERIFICATION_FAILED through the
 * stage's FAILED_AT_* state. A COMPLETED context only gets the error recorded.
 */
export function markFailed(
  ctx: VerificationContext,
  stage: ErrorStage,
  info: ErrorInfo,
  options: StatusChangeOptions = {}
): VerificationContext {
  const withError = recordError(ctx, info);
  const termination = terminateWithFailure(ctx.status, stage);
  if (termination.path.length === 0) {
    return withError;
  }

  const timestamp = (options.now ?? new Date()).toISOString();
  const entries = termination.path.map((status) =>
    historyEntry(status, timestamp, { stage, functionName: options.functionName })
  );
  return {
    ...withError,
    status: termination.status,
    currentStatus: termination.status,
    lastUpdatedAt: timestamp,
    statusHistory: [...withError.statusHistory, ...entries],
  };
}

/**
 * Validate an unknown value as a context.
 *
 * @throws PipelineError (SchemaError) on mismatch
 */
export function parseVerificationContext(
  value: unknown,
  attribution: ErrorAttribution = { operation: "parseVerificationContext" }
): VerificationContext {
  const result = VerificationContextSchema.safeParse(value);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new PipelineError("SchemaError", `Invalid verification context: ${errors}`, attribution, {
      cause: result.error,
    });
  }
  return result.data;
}
