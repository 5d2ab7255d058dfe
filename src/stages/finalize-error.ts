/**
 * Failure finalizer.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ERROR-FINALIZATION STAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Invoked by the orchestrator after any unrecoverable fault, with whatever
 * partial state it still has. It always produces a terminal outcome:
 *
 *   1. decode the message leniently; a missing id becomes "unknown-run"
 *   2. parse the cause and resolve the failing stage
 *   3. load the stored context, or synthesize one from the id
 *   4. a COMPLETED record wins: return it and write nothing
 *   5. record the error and drive the context to VERIFICATION_FAILED
 *   6. store the error report, the date-partitioned log entry and the
 *      context (conditional put, re-read once on conflict); the context is
 *      not written when the stored record could not be read
 *   7. return the VERIFICATION_FAILED outcome
 *
 * This is the only place that absorbs errors. Every write in step 6 is best
 * effort, and every failure it absorbs is logged at warn.
 */

import { isPipelineError, type PipelineError } from "../errors/index.js";
import type { Reference } from "../reference/index.js";
import { datePartitionedKey, type BlobStoreClient } from "../store/index.js";
import {
  createErrorInfo,
  markFailed,
  resolveErrorStage,
  synthesizeContext,
  type ErrorStage,
  type VerificationContext,
} from "../status/index.js";
import type { VerificationTable } from "../table/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import { decodeFailureInput, parseFailureCause, type FailureCause } from "./messages.js";
import {
  completedOutcome,
  failedOutcome,
  type VerificationOutcome,
} from "./outcome.js";

export const UNKNOWN_RUN_ID = "unknown-run";
export const UNKNOWN_ERROR_CODE = "UnknownError";
export const ERROR_LOG_PREFIX = "logs";

const FUNCTION_NAME = "finalizeWithError";

export interface FinalizeErrorDeps {
  client: BlobStoreClient;
  table: VerificationTable;
  logger?: Logger;
  now?: () => Date;
}

/** Error report written to errors.failure and the date-partitioned log */
export interface ErrorReport {
  verificationId: string;
  errorStage: ErrorStage;
  errorCode: string;
  errorMessage: string;
  stackTrace: string[];
  previousStatus: string;
  timestamp: string;
}

function describe(err: unknown): string {
  if (isPipelineError(err)) {
    return err.describe();
  }
  return err instanceof Error ? err.message : String(err);
}

export async function finalizeWithError(
  message: unknown,
  deps: FinalizeErrorDeps
): Promise<VerificationOutcome> {
  const now = deps.now ?? (() => new Date());
  const input = decodeFailureInput(message);
  const verificationId = input.verificationId ?? UNKNOWN_RUN_ID;
  const logger = (deps.logger ?? createSilentLogger()).child({
    component: FUNCTION_NAME,
    runId: verificationId,
  });

  if (input.verificationId === undefined) {
    logger.warn("Failure message has no verification id", { fallback: UNKNOWN_RUN_ID });
  }
  if (input.droppedReferences.length > 0) {
    logger.warn("Dropped malformed references", { names: input.droppedReferences });
  }

  const cause = parseFailureCause(input.cause, input.errorName);
  const errorStage = resolveErrorStage(input.errorStage, cause.errorMessage);
  if (input.errorStage === undefined) {
    logger.info("Inferred error stage", { errorStage, errorMessage: cause.errorMessage });
  }

  const loaded = await loadStoredContext(deps.table, verificationId, logger);
  const stored = loaded.readable ? loaded.context : undefined;
  if (stored?.status === "COMPLETED") {
    logger.warn("Run already completed; failure ignored", { errorStage });
    return completedOutcome(
      verificationId,
      { ...input.references, ...stored.references },
      stored.lastUpdatedAt
    );
  }

  const at = now();
  const timestamp = at.toISOString();
  const errorCode = cause.errorType ?? UNKNOWN_ERROR_CODE;
  const base = stored ?? synthesizeContext(verificationId, at);
  const report: ErrorReport = {
    verificationId,
    errorStage,
    errorCode,
    errorMessage: cause.errorMessage,
    stackTrace: cause.stackTrace,
    previousStatus: base.status,
    timestamp,
  };

  const references: Record<string, Reference> = { ...input.references };
  const reportRef = await writeReport(deps.client, report, at, logger);
  if (reportRef !== undefined) {
    references["errors_failure"] = reportRef;
  }

  const failed = terminate(base, errorStage, cause, at, references);
  // Without the stored record the forward-only rule cannot be checked.
  let persisted: VerificationContext | undefined;
  if (loaded.readable) {
    persisted = await persistContext(deps.table, failed, stored, logger, (latest) =>
      terminate(latest, errorStage, cause, at, references)
    );
  } else {
    logger.warn("Stored context unreadable; failed context not persisted", { table: deps.table.name });
  }
  if (persisted?.status === "COMPLETED") {
    logger.warn("Run completed concurrently; failure ignored", { errorStage });
    return completedOutcome(
      verificationId,
      { ...references, ...persisted.references },
      persisted.lastUpdatedAt
    );
  }

  logger.info("Run terminated", { status: "VERIFICATION_FAILED", errorStage, errorCode });
  return failedOutcome(verificationId, errorStage, errorCode, cause.errorMessage, references, timestamp);
}

function terminate(
  ctx: VerificationContext,
  errorStage: ErrorStage,
  cause: FailureCause,
  at: Date,
  references: Record<string, Reference>
): VerificationContext {
  const info = createErrorInfo(
    cause.errorType ?? UNKNOWN_ERROR_CODE,
    cause.errorMessage,
    { errorStage, stackTrace: cause.stackTrace },
    at
  );
  const failed = markFailed(ctx, errorStage, info, { now: at, functionName: FUNCTION_NAME });
  return { ...failed, references: { ...ctx.references, ...references } };
}

type StoredContext =
  | { readable: true; context: VerificationContext | undefined }
  | { readable: false };

async function loadStoredContext(
  table: VerificationTable,
  verificationId: string,
  logger: Logger
): Promise<StoredContext> {
  try {
    return { readable: true, context: await table.get(verificationId) };
  } catch (err) {
    logger.warn("Failed to load stored context; continuing with a synthesized one", {
      table: table.name,
      error: describe(err),
    });
    return { readable: false };
  }
}

async function writeReport(
  client: BlobStoreClient,
  report: ErrorReport,
  at: Date,
  logger: Logger
): Promise<Reference | undefined> {
  let reportRef: Reference | undefined;
  try {
    reportRef = await client.putJSON(
      { runId: report.verificationId, category: "errors", slot: "failure" },
      report
    );
  } catch (err) {
    logger.warn("Failed to store error report", { error: describe(err) });
  }

  try {
    const key = datePartitionedKey(ERROR_LOG_PREFIX, report.verificationId, at);
    await client.putJSONAt(key, report);
  } catch (err) {
    logger.warn("Failed to write error log entry", { error: describe(err) });
  }

  return reportRef;
}

/**
 * Conditional put of the failed context. On a conflict the record is read
 * once more: a terminal record is left alone, anything else is failed again
 * from its latest state. Returns the record now stored, if known.
 */
async function persistContext(
  table: VerificationTable,
  failed: VerificationContext,
  stored: VerificationContext | undefined,
  logger: Logger,
  refail: (latest: VerificationContext) => VerificationContext
): Promise<VerificationContext | undefined> {
  try {
    await table.putConditional(failed, stored?.status ?? null);
    return failed;
  } catch (err) {
    if (!isConflict(err)) {
      logger.warn("Failed to persist failed context", { table: table.name, error: describe(err) });
      return undefined;
    }
  }

  let latest: VerificationContext | undefined;
  try {
    latest = await table.get(failed.verificationId);
  } catch (err) {
    logger.warn("Failed to re-read context after conflict", { table: table.name, error: describe(err) });
    return undefined;
  }
  if (latest === undefined) {
    logger.warn("Context vanished after conflict", { table: table.name });
    return undefined;
  }
  if (latest.status === "COMPLETED" || latest.status === "VERIFICATION_FAILED") {
    return latest;
  }

  const retried = refail(latest);
  try {
    await table.putConditional(retried, latest.status);
    return retried;
  } catch (err) {
    logger.warn("Failed to persist failed context after re-read", {
      table: table.name,
      error: describe(err),
    });
    return undefined;
  }
}

function isConflict(err: unknown): err is PipelineError {
  return isPipelineError(err, "Conflict");
}
