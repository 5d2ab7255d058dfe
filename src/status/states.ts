/**
 * Verification status enumeration and transition table.
 *
 * Progress:   INITIALIZED → IMAGES_FETCHED → TURN1_PROCESSED → TURN2_PROCESSED → COMPLETED
 * Failure:    any progress state → FAILED_AT_<STAGE> → VERIFICATION_FAILED
 * Terminal:   COMPLETED, VERIFICATION_FAILED
 *
 * Every status has a rank. Status only ever moves to a strictly higher rank;
 * asking for an equal or lower one is a no-op (see machine.ts).
 */

import { z } from "zod";

export const PipelineStage = z.enum([
  "INITIALIZATION",
  "IMAGE_FETCH",
  "TURN1",
  "TURN2",
  "FINALIZATION",
]);
export type PipelineStage = z.infer<typeof PipelineStage>;

/** A pipeline stage, or UNKNOWN when the failing stage cannot be determined */
export const ErrorStage = z.enum([
  "INITIALIZATION",
  "IMAGE_FETCH",
  "TURN1",
  "TURN2",
  "FINALIZATION",
  "UNKNOWN",
]);
export type ErrorStage = z.infer<typeof ErrorStage>;

export const VerificationStatus = z.enum([
  "INITIALIZED",
  "IMAGES_FETCHED",
  "TURN1_PROCESSED",
  "TURN2_PROCESSED",
  "COMPLETED",
  "FAILED_AT_INITIALIZATION",
  "FAILED_AT_IMAGE_FETCH",
  "FAILED_AT_TURN1",
  "FAILED_AT_TURN2",
  "FAILED_AT_FINALIZATION",
  "FAILED_AT_UNKNOWN",
  "VERIFICATION_FAILED",
]);
export type VerificationStatus = z.infer<typeof VerificationStatus>;

export type FailedStatus = `FAILED_AT_${ErrorStage}`;
export type TerminalStatus = "COMPLETED" | "VERIFICATION_FAILED";

/** Status a stage produces when it succeeds */
export const STAGE_SUCCESS_STATUS: Readonly<Record<PipelineStage, VerificationStatus>> = {
  INITIALIZATION: "INITIALIZED",
  IMAGE_FETCH: "IMAGES_FETCHED",
  TURN1: "TURN1_PROCESSED",
  TURN2: "TURN2_PROCESSED",
  FINALIZATION: "COMPLETED",
};

export const STAGE_FAILURE_STATUS: Readonly<Record<ErrorStage, FailedStatus>> = {
  INITIALIZATION: "FAILED_AT_INITIALIZATION",
  IMAGE_FETCH: "FAILED_AT_IMAGE_FETCH",
  TURN1: "FAILED_AT_TURN1",
  TURN2: "FAILED_AT_TURN2",
  FINALIZATION: "FAILED_AT_FINALIZATION",
  UNKNOWN: "FAILED_AT_UNKNOWN",
};

const FAILED_STATUSES: readonly FailedStatus[] = Object.values(STAGE_FAILURE_STATUS);

export const STATUS_RANK: Readonly<Record<VerificationStatus, number>> = {
  INITIALIZED: 0,
  IMAGES_FETCHED: 1,
  TURN1_PROCESSED: 2,
  TURN2_PROCESSED: 3,
  FAILED_AT_INITIALIZATION: 4,
  FAILED_AT_IMAGE_FETCH: 4,
  FAILED_AT_TURN1: 4,
  FAILED_AT_TURN2: 4,
  FAILED_AT_FINALIZATION: 4,
  FAILED_AT_UNKNOWN: 4,
  COMPLETED: 5,
  VERIFICATION_FAILED: 5,
};

/**
 * Legal single-step moves. VERIFICATION_FAILED is listed for completeness
 * but only terminateWithFailure() may take that edge.
 */
export const TRANSITIONS: Readonly<Record<VerificationStatus, readonly VerificationStatus[]>> = {
  INITIALIZED: ["IMAGES_FETCHED", ...FAILED_STATUSES],
  IMAGES_FETCHED: ["TURN1_PROCESSED", ...FAILED_STATUSES],
  TURN1_PROCESSED: ["TURN2_PROCESSED", ...FAILED_STATUSES],
  TURN2_PROCESSED: ["COMPLETED", ...FAILED_STATUSES],
  FAILED_AT_INITIALIZATION: ["VERIFICATION_FAILED"],
  FAILED_AT_IMAGE_FETCH: ["VERIFICATION_FAILED"],
  FAILED_AT_TURN1: ["VERIFICATION_FAILED"],
  FAILED_AT_TURN2: ["VERIFICATION_FAILED"],
  FAILED_AT_FINALIZATION: ["VERIFICATION_FAILED"],
  FAILED_AT_UNKNOWN: ["VERIFICATION_FAILED"],
  COMPLETED: [],
  VERIFICATION_FAILED: [],
};

export function isTerminal(status: VerificationStatus): status is TerminalStatus {
  return status === "COMPLETED" || status === "VERIFICATION_FAILED";
}

export function isFailed(status: VerificationStatus): status is FailedStatus {
  return STATUS_RANK[status] === STATUS_RANK.FAILED_AT_UNKNOWN;
}

/** Whether `to` is a strictly later status than `from` */
export function isAfter(to: VerificationStatus, from: VerificationStatus): boolean {
  return STATUS_RANK[to] > STATUS_RANK[from];
}
