/**
 * Stage execution: boundary messages, the runner and the two finalizers.
 */

export {
  decodeStageInput,
  envelopeFromInput,
  decodeFailureInput,
  parseFailureCause,
  UNKNOWN_ERROR_MESSAGE,
  type StageInput,
  type MinimalStageInput,
  type FailureInput,
  type FailureCause,
} from "./messages.js";
export {
  runStage,
  type StageContext,
  type StageDefinition,
  type StageRunnerOptions,
  type StageResult,
} from "./runner.js";
export {
  completedOutcome,
  failedOutcome,
  type CompletedOutcome,
  type FailedOutcome,
  type VerificationOutcome,
} from "./outcome.js";
export {
  finalizeWithError,
  UNKNOWN_RUN_ID,
  UNKNOWN_ERROR_CODE,
  ERROR_LOG_PREFIX,
  type FinalizeErrorDeps,
  type ErrorReport,
} from "./finalize-error.js";
export {
  createFinalizeResultsStage,
  outcomeOf,
  type FinalizeResultsDeps,
} from "./finalize-results.js";
