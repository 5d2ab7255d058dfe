/**
 * Forward-only status state machine.
 *
 * transition(current, target):
 *   rank(target) <= rank(current)      unchanged (idempotent re-entry, stale retry)
 *   listed in TRANSITIONS[current]     advanced
 *   anything else                      ValidationError
 *
 * VERIFICATION_FAILED is never a legal target of transition(); only the
 * failure finalizer reaches it, through terminateWithFailure().
 */

import { PipelineError, type ErrorAttribution } from "../errors/index.js";
import {
  ErrorStage,
  STAGE_FAILURE_STATUS,
  STAGE_SUCCESS_STATUS,
  TRANSITIONS,
  isAfter,
  isFailed,
  type PipelineStage,
  type VerificationStatus,
} from "./states.js";

export type StageOutcome = "success" | "failure";

export type TransitionResult =
  | { outcome: "advanced"; from: VerificationStatus; status: VerificationStatus }
  | {
      outcome: "unchanged";
      from: VerificationStatus;
      status: VerificationStatus;
      requested: VerificationStatus;
    };

export interface Termination {
  status: VerificationStatus;
  /** Statuses entered on the way, in order (empty if nothing changed) */
  path: VerificationStatus[];
}

export function transition(
  current: VerificationStatus,
  target: VerificationStatus,
  attribution: ErrorAttribution = { operation: "transition" }
): TransitionResult {
  if (!isAfter(target, current)) {
    return { outcome: "unchanged", from: current, status: current, requested: target };
  }
  if (target === "VERIFICATION_FAILED") {
    throw new PipelineError(
      "ValidationError",
      `${current} → VERIFICATION_FAILED is reserved for the failure finalizer`,
      attribution,
      { details: { from: current, to: target } }
    );
  }
  if (!TRANSITIONS[current].includes(target)) {
    throw new PipelineError("ValidationError", `Illegal status transition ${current} → ${target}`, attribution, {
      details: { from: current, to: target },
    });
  }
  return { outcome: "advanced", from: current, status: target };
}

/**
 * Status a stage's outcome leads to.
 */
export function targetStatus(stage: PipelineStage, outcome: StageOutcome): VerificationStatus {
  return outcome === "success" ? STAGE_SUCCESS_STATUS[stage] : STAGE_FAILURE_STATUS[stage];
}

export function nextStatus(
  current: VerificationStatus,
  stage: PipelineStage,
  outcome: StageOutcome,
  attribution?: ErrorAttribution
): TransitionResult {
  return transition(current, targetStatus(stage, outcome), attribution);
}

/**
 * Drive a run to VERIFICATION_FAILED.
 *
 * COMPLETED and VERIFICATION_FAILED are left as they are. A run already in a
 * FAILED_AT_* state keeps its recorded stage.
 */
export function terminateWithFailure(current: VerificationStatus, stage: ErrorStage): Termination {
  if (current === "COMPLETED" || current === "VERIFICATION_FAILED") {
    return { status: current, path: [] };
  }
  if (isFailed(current)) {
    return { status: "VERIFICATION_FAILED", path: ["VERIFICATION_FAILED"] };
  }
  return {
    status: "VERIFICATION_FAILED",
    path: [STAGE_FAILURE_STATUS[stage], "VERIFICATION_FAILED"],
  };
}

/**
 * Guess the failing stage from free-form error text.
 */
export function inferErrorStage(text: string): ErrorStage {
  const lower = text.toLowerCase();
  if (lower.includes("turn2")) return "TURN2";
  if (lower.includes("turn1")) return "TURN1";
  if (lower.includes("initializ")) return "INITIALIZATION";
  if (lower.includes("fetch") && lower.includes("image")) return "IMAGE_FETCH";
  if (lower.includes("finaliz")) return "FINALIZATION";
  return "UNKNOWN";
}

/**
 * Resolve a reported stage name, falling back to inference from `fallbackText`.
 */
export function resolveErrorStage(reported: string | undefined, fallbackText = ""): ErrorStage {
  if (reported !== undefined && reported !== "") {
    const exact = ErrorStage.safeParse(reported.toUpperCase());
    if (exact.success) {
      return exact.data;
    }
    const inferred = inferErrorStage(reported);
    if (inferred !== "UNKNOWN") {
      return inferred;
    }
  }
  return inferErrorStage(fallbackText);
}
