/**
 * Error taxonomy, classification and retry advice.
 */

export {
  PipelineError,
  ERROR_KINDS,
  isPipelineError,
  wrapError,
  errorMessage,
  type ErrorKind,
  type ErrorAttribution,
  type PipelineErrorOptions,
} from "./errors.js";

export {
  classifyError,
  categoryForHttpStatus,
  isRetryableCategory,
  type ErrorCategory,
  type ErrorClassification,
} from "./classifier.js";

export {
  classify,
  ClassifiedError,
  RetryExhaustedError,
  DEFAULT_RETRY_POLICIES,
  NO_RETRY,
  type RetryPolicy,
  type RetryPolicyTable,
  type RetryStrategy,
  type ClassifiedErrorOptions,
} from "./retry.js";
