/**
 * Structured pipeline errors.
 *
 * Every failure raised by the reference, store, codec and envelope layers is a
 * PipelineError. Callers match on `kind`, never on message text, and the
 * attribution context always names the artifact involved:
 *
 *   { operation, runId?, category?, slot?, key? }
 *
 * The kind determines how the error classifier treats the fault (see
 * classifier.ts); the message is for humans only.
 */

/**
 * Closed set of error kinds.
 */
export const ERROR_KINDS = [
  "SchemaError",
  "ReferenceError",
  "NotFound",
  "StoreUnavailable",
  "Corrupt",
  "Conflict",
  "ValidationError",
  "CapacityError",
  "TransientError",
  "PermanentError",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/**
 * Which artifact and operation a failure belongs to.
 */
export interface ErrorAttribution {
  /** Operation that failed, e.g. "saveToEnvelope" or "store.get" */
  operation: string;
  runId?: string;
  category?: string;
  slot?: string;
  /** Blob key, when a concrete key was involved */
  key?: string;
}

export interface PipelineErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class PipelineError extends Error {
  public readonly kind: ErrorKind;
  public readonly attribution: ErrorAttribution;
  public readonly details: Record<string, unknown>;

  constructor(
    kind: ErrorKind,
    message: string,
    attribution: ErrorAttribution,
    options: PipelineErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PipelineError";
    this.kind = kind;
    this.attribution = attribution;
    this.details = options.details ?? {};
  }

  /**
   * One-line description including attribution and cause chain.
   */
  describe(): string {
    const where = [
      this.attribution.runId && `run=${this.attribution.runId}`,
      this.attribution.category && `category=${this.attribution.category}`,
      this.attribution.slot && `slot=${this.attribution.slot}`,
      this.attribution.key && `key=${this.attribution.key}`,
    ]
      .filter(Boolean)
      .join(" ");

    let text = `${this.kind} in ${this.attribution.operation}: ${this.message}`;
    if (where) {
      text += ` [${where}]`;
    }
    if (this.cause !== undefined) {
      text += ` (caused by: ${describeCause(this.cause)})`;
    }
    return text;
  }

  /**
   * Plain object form for logs and error reports.
   */
  toJSON(): Record<string, unknown> {
    return {
      kind: this.kind,
      message: this.message,
      attribution: this.attribution,
      details: this.details,
      cause: this.cause === undefined ? undefined : describeCause(this.cause),
    };
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof PipelineError) {
    return cause.describe();
  }
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }
  return String(cause);
}

/**
 * Type guard, optionally narrowed to one kind.
 */
export function isPipelineError(err: unknown, kind?: ErrorKind): err is PipelineError {
  if (!(err instanceof PipelineError)) {
    return false;
  }
  return kind === undefined || err.kind === kind;
}

/**
 * Attach attribution to any thrown value.
 *
 * A PipelineError keeps its kind; attribution fields it lacks are filled in
 * from `attribution` so the innermost, most specific context wins. Any other
 * value becomes a PermanentError wrapping the original.
 */
export function wrapError(err: unknown, attribution: ErrorAttribution): PipelineError {
  if (err instanceof PipelineError) {
    const inner = err.attribution;
    const merged: ErrorAttribution = {
      operation: inner.operation,
      runId: inner.runId ?? attribution.runId,
      category: inner.category ?? attribution.category,
      slot: inner.slot ?? attribution.slot,
      key: inner.key ?? attribution.key,
    };
    if (sameAttribution(merged, inner)) {
      return err;
    }
    return new PipelineError(err.kind, err.message, merged, {
      cause: err.cause,
      details: err.details,
    });
  }

  const message = err instanceof Error ? err.message : String(err);
  return new PipelineError("PermanentError", message, attribution, { cause: err });
}

function sameAttribution(a: ErrorAttribution, b: ErrorAttribution): boolean {
  return (
    a.operation === b.operation &&
    a.runId === b.runId &&
    a.category === b.category &&
    a.slot === b.slot &&
    a.key === b.key
  );
}

/**
 * Normalize a thrown value into a message string.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
