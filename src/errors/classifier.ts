/**
 * Fault classification.
 *
 * Maps any thrown value to exactly one retry category:
 *
 *   validation  caller supplied bad input            never retried
 *   client      resource missing or in conflict      never retried
 *   capacity    throttling / rate limiting           jittered backoff
 *   transient   timeouts, dropped connections        exponential backoff
 *   permanent   server faults and everything unknown never retried
 *
 * Sources recognized, in order: PipelineError kinds, AWS SDK v3 service
 * exceptions (by `name`, then `$metadata.httpStatusCode`), Node system error
 * codes, abort/timeout errors and zod validation errors.
 */

import { isPipelineError, type ErrorKind } from "./errors.js";

export type ErrorCategory = "validation" | "client" | "capacity" | "transient" | "permanent";

export interface ErrorClassification {
  category: ErrorCategory;
  /** The pipeline error kind this fault corresponds to */
  kind: ErrorKind;
  /** Short machine-readable reason, e.g. "aws:ThrottlingException" */
  reason: string;
}

const KIND_CATEGORY: Record<ErrorKind, ErrorCategory> = {
  SchemaError: "validation",
  ValidationError: "validation",
  ReferenceError: "client",
  NotFound: "client",
  Conflict: "client",
  Corrupt: "permanent",
  StoreUnavailable: "transient",
  CapacityError: "capacity",
  TransientError: "transient",
  PermanentError: "permanent",
};

const CATEGORY_KIND: Record<ErrorCategory, ErrorKind> = {
  validation: "ValidationError",
  client: "NotFound",
  capacity: "CapacityError",
  transient: "TransientError",
  permanent: "PermanentError",
};

const AWS_ERROR_NAMES: Record<string, ErrorCategory> = {
  ThrottlingException: "capacity",
  Throttling: "capacity",
  ThrottledException: "capacity",
  TooManyRequestsException: "capacity",
  SlowDown: "capacity",
  ProvisionedThroughputExceededException: "capacity",
  RequestLimitExceeded: "capacity",
  RequestThrottled: "capacity",
  RequestThrottledException: "capacity",

  TimeoutError: "transient",
  RequestTimeout: "transient",
  RequestTimeoutException: "transient",
  TransactionConflictException: "transient",
  ServiceUnavailable: "transient",
  ServiceUnavailableException: "transient",

  NoSuchKey: "client",
  NoSuchBucket: "client",
  NotFound: "client",
  ResourceNotFoundException: "client",
  ConditionalCheckFailedException: "client",
  AccessDenied: "client",
  AccessDeniedException: "client",

  ValidationException: "validation",
  InvalidRequest: "validation",
  InvalidParameterValue: "validation",
  SerializationException: "validation",
};

const NODE_ERROR_CODES: Record<string, ErrorCategory> = {
  ETIMEDOUT: "transient",
  ECONNRESET: "transient",
  ECONNREFUSED: "transient",
  ECONNABORTED: "transient",
  EPIPE: "transient",
  EAI_AGAIN: "transient",
  EBUSY: "transient",
  EMFILE: "capacity",
  ENOENT: "client",
  EEXIST: "client",
  EACCES: "permanent",
  EPERM: "permanent",
  ENOSPC: "permanent",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readString(value: unknown, field: string): string | undefined {
  if (!isRecord(value)) return undefined;
  const raw = value[field];
  return typeof raw === "string" ? raw : undefined;
}

function readHttpStatus(value: unknown): number | undefined {
  if (!isRecord(value)) return undefined;
  const metadata = value["$metadata"];
  if (isRecord(metadata)) {
    const httpStatusCode = metadata["httpStatusCode"];
    if (typeof httpStatusCode === "number") {
      return httpStatusCode;
    }
  }
  const statusCode = value["statusCode"];
  return typeof statusCode === "number" ? statusCode : undefined;
}

/**
 * Category for an HTTP status code, or undefined for 2xx/3xx.
 */
export function categoryForHttpStatus(status: number): ErrorCategory | undefined {
  if (status === 429) return "capacity";
  if (status === 408 || status === 502 || status === 503 || status === 504) return "transient";
  if (status === 400 || status === 422) return "validation";
  if (status >= 400 && status < 500) return "client";
  if (status >= 500) return "permanent";
  return undefined;
}

function classification(category: ErrorCategory, reason: string, kind?: ErrorKind): ErrorClassification {
  return { category, kind: kind ?? CATEGORY_KIND[category], reason };
}

/**
 * Classify a thrown value into exactly one category.
 */
export function classifyError(err: unknown): ErrorClassification {
  if (isPipelineError(err)) {
    // A store outage inherits the category of the fault that caused it.
    if (err.kind === "StoreUnavailable" && err.cause !== undefined) {
      const inner = classifyError(err.cause);
      if (inner.reason !== "unknown") {
        return { ...inner, kind: "StoreUnavailable" };
      }
    }
    return classification(KIND_CATEGORY[err.kind], `pipeline:${err.kind}`, err.kind);
  }

  const name = readString(err, "name");

  if (name === "ZodError") {
    return classification("validation", "zod", "SchemaError");
  }

  if (name === "AbortError") {
    return classification("transient", "abort");
  }

  if (name !== undefined) {
    const awsCategory = AWS_ERROR_NAMES[name];
    if (awsCategory !== undefined) {
      return classification(awsCategory, `aws:${name}`);
    }
  }

  const status = readHttpStatus(err);
  if (status !== undefined) {
    const httpCategory = categoryForHttpStatus(status);
    if (httpCategory !== undefined) {
      return classification(httpCategory, `http:${status}`);
    }
  }

  const code = readString(err, "code");
  if (code !== undefined) {
    const nodeCategory = NODE_ERROR_CODES[code];
    if (nodeCategory !== undefined) {
      return classification(nodeCategory, `node:${code}`);
    }
  }

  return classification("permanent", "unknown");
}

/**
 * Whether a category is ever retried.
 */
export function isRetryableCategory(category: ErrorCategory): boolean {
  return category === "capacity" || category === "transient";
}
