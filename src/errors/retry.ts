/**
 * Retry policy.
 *
 * The classifier only advises: it says whether a fault may be retried and how
 * long to wait before the next attempt. It never sleeps and never loops;
 * whole-stage retry belongs to the orchestrator.
 *
 * Delay for attempt n (0-based) with base unit b:
 *
 *   exponential  min(cap, b * 2^n)
 *   jittered     equal jitter inside [ceiling / 2, ceiling] of the above
 *
 * Once the policy's attempt budget is spent, nextDelay() throws a
 * RetryExhaustedError carrying the category and every delay handed out.
 */

import { PipelineError, type ErrorAttribution, type ErrorKind } from "./errors.js";
import {
  classifyError,
  isRetryableCategory,
  type ErrorCategory,
  type ErrorClassification,
} from "./classifier.js";

export type RetryStrategy = "none" | "exponential" | "jittered";

export interface RetryPolicy {
  readonly strategy: RetryStrategy;
  /** Maximum number of retries after the first failure */
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export type RetryPolicyTable = Readonly<Record<ErrorCategory, RetryPolicy>>;

export const NO_RETRY: RetryPolicy = Object.freeze({
  strategy: "none",
  maxAttempts: 0,
  baseDelayMs: 0,
  maxDelayMs: 0,
});

export const DEFAULT_RETRY_POLICIES: RetryPolicyTable = Object.freeze({
  validation: NO_RETRY,
  client: NO_RETRY,
  permanent: NO_RETRY,
  capacity: Object.freeze({
    strategy: "jittered",
    maxAttempts: 5,
    baseDelayMs: 1000,
    maxDelayMs: 30_000,
  }),
  transient: Object.freeze({
    strategy: "exponential",
    maxAttempts: 3,
    baseDelayMs: 200,
    maxDelayMs: 10_000,
  }),
});

/**
 * Raised when a retryable fault has used its whole attempt budget.
 */
export class RetryExhaustedError extends PipelineError {
  public readonly category: ErrorCategory;
  public readonly delays: readonly number[];

  constructor(
    category: ErrorCategory,
    delays: readonly number[],
    attribution: ErrorAttribution,
    cause: unknown
  ) {
    super(
      "PermanentError",
      `Retries exhausted for ${category} fault after ${delays.length} attempt(s)`,
      attribution,
      { cause, details: { category, delays: [...delays] } }
    );
    this.name = "RetryExhaustedError";
    this.category = category;
    this.delays = Object.freeze([...delays]);
  }
}

export interface ClassifiedErrorOptions {
  /** Source of randomness for jitter, in [0, 1) */
  random?: () => number;
  /** Attribution used when the retry budget runs out */
  attribution?: ErrorAttribution;
}

/**
 * A fault together with its category, retry policy and delay history.
 */
export class ClassifiedError {
  public readonly category: ErrorCategory;
  public readonly kind: ErrorKind;
  public readonly reason: string;
  public readonly cause: unknown;
  public readonly policy: RetryPolicy;

  private readonly delayHistory: number[] = [];
  private readonly random: () => number;
  private readonly attribution: ErrorAttribution;

  constructor(
    cause: unknown,
    classification: ErrorClassification,
    policy: RetryPolicy,
    options: ClassifiedErrorOptions = {}
  ) {
    this.cause = cause;
    this.category = classification.category;
    this.kind = classification.kind;
    this.reason = classification.reason;
    this.policy = isRetryableCategory(classification.category) ? policy : NO_RETRY;
    this.random = options.random ?? Math.random;
    this.attribution = options.attribution ?? { operation: "retry" };
  }

  /** Number of retries already advised */
  get attempts(): number {
    return this.delayHistory.length;
  }

  /** Every delay handed out so far, oldest first */
  get delays(): readonly number[] {
    return [...this.delayHistory];
  }

  isRetryable(): boolean {
    return this.policy.strategy !== "none" && this.attempts < this.policy.maxAttempts;
  }

  /**
   * Delay before the next attempt, in milliseconds.
   *
   * @param baseUnitMs - Base unit to scale from (defaults to the policy's)
   * @throws RetryExhaustedError when the fault is not (or no longer) retryable
   */
  nextDelay(baseUnitMs: number = this.policy.baseDelayMs): number {
    if (!this.isRetryable()) {
      throw new RetryExhaustedError(this.category, this.delayHistory, this.attribution, this.cause);
    }

    const ceiling = Math.min(this.policy.maxDelayMs, baseUnitMs * 2 ** this.attempts);
    const delay =
      this.policy.strategy === "jittered"
        ? Math.floor(ceiling / 2 + this.random() * (ceiling / 2))
        : ceiling;

    this.delayHistory.push(delay);
    return delay;
  }

  /**
   * Upper bound for the delay of a given attempt, ignoring jitter.
   */
  ceilingFor(attempt: number, baseUnitMs: number = this.policy.baseDelayMs): number {
    return Math.min(this.policy.maxDelayMs, baseUnitMs * 2 ** attempt);
  }

  toJSON(): Record<string, unknown> {
    return {
      category: this.category,
      kind: this.kind,
      reason: this.reason,
      retryable: this.isRetryable(),
      attempts: this.attempts,
      delays: this.delays,
    };
  }
}

/**
 * Classify a fault and attach the matching retry policy.
 */
export function classify(
  err: unknown,
  policies: RetryPolicyTable = DEFAULT_RETRY_POLICIES,
  options: ClassifiedErrorOptions = {}
): ClassifiedError {
  const classification = classifyError(err);
  return new ClassifiedError(err, classification, policies[classification.category], options);
}
