/**
 * Run status: closed enumeration, forward-only transitions and the durable
 * verification context.
 */

export {
  PipelineStage,
  ErrorStage,
  VerificationStatus,
  STAGE_SUCCESS_STATUS,
  STAGE_FAILURE_STATUS,
  STATUS_RANK,
  TRANSITIONS,
  isTerminal,
  isFailed,
  isAfter,
  type FailedStatus,
  type TerminalStatus,
} from "./states.js";

export {
  transition,
  targetStatus,
  nextStatus,
  terminateWithFailure,
  inferErrorStage,
  resolveErrorStage,
  type StageOutcome,
  type TransitionResult,
  type Termination,
} from "./machine.js";

export {
  VerificationType,
  ErrorInfoSchema,
  ErrorTrackingSchema,
  StatusHistoryEntrySchema,
  VerificationContextSchema,
  createVerificationContext,
  synthesizeContext,
  applyStatus,
  advanceTo,
  createErrorInfo,
  recordError,
  markFailed,
  parseVerificationContext,
  type VerificationContext,
  type ErrorInfo,
  type ErrorTracking,
  type StatusHistoryEntry,
  type StatusChangeOptions,
  type CreateContextOptions,
} from "./context.js";
