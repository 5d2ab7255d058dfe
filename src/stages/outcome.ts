/**
 * Terminal outcome of a run: exactly one of COMPLETED (with references) or
 * VERIFICATION_FAILED (with stage, code, message and timestamp).
 */

import type { Reference } from "../reference/index.js";
import type { ErrorStage } from "../status/index.js";

export interface CompletedOutcome {
  verificationId: string;
  status: "COMPLETED";
  timestamp: string;
  references: Record<string, Reference>;
  message: string;
}

export interface FailedOutcome {
  verificationId: string;
  status: "VERIFICATION_FAILED";
  errorStage: ErrorStage;
  errorCode: string;
  errorMessage: string;
  timestamp: string;
  references: Record<string, Reference>;
  message: string;
}

export type VerificationOutcome = CompletedOutcome | FailedOutcome;

export function completedOutcome(
  verificationId: string,
  references: Record<string, Reference>,
  timestamp: string
): CompletedOutcome {
  return {
    verificationId,
    status: "COMPLETED",
    timestamp,
    references,
    message: "Verification completed successfully",
  };
}

export function failedOutcome(
  verificationId: string,
  errorStage: ErrorStage,
  errorCode: string,
  errorMessage: string,
  references: Record<string, Reference>,
  timestamp: string
): FailedOutcome {
  return {
    verificationId,
    status: "VERIFICATION_FAILED",
    errorStage,
    errorCode,
    errorMessage,
    timestamp,
    references,
    message: `Verification failed at ${errorStage} stage. Error details logged and persisted.`,
  };
}
