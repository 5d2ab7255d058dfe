/**
 * Stage runner.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ONE STAGE INVOCATION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * runStage(definition, envelope):
 *   1. clone the incoming envelope; the stage only ever sees the copy
 *   2. start the deadline timer; its AbortSignal is handed to the stage
 *   3. execute, then advance status to the stage's success status
 *   4. success → the copy is returned; failure → the incoming envelope is
 *      returned untouched together with the classified fault
 *
 * A stage that misses its deadline fails with a retryable TransientError.
 * Blobs it already wrote stay orphaned; entries it had not registered never
 * appear. The timer is always cleared before runStage() returns.
 *
 * The runner does not retry. The orchestrator reads the classified fault and
 * decides whether to invoke the stage again or the failure finalizer.
 */

import {
  PipelineError,
  classify,
  DEFAULT_RETRY_POLICIES,
  type ClassifiedError,
  type ErrorAttribution,
  type RetryPolicyTable,
} from "../errors/index.js";
import { STAGE_SUCCESS_STATUS, type PipelineStage } from "../status/index.js";
import { cloneEnvelope, type Envelope, type EnvelopeManager } from "../envelope/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";

export interface StageContext {
  /** Working copy; discarded if the stage fails */
  envelope: Envelope;
  manager: EnvelopeManager;
  /** Aborts when the stage deadline expires */
  signal: AbortSignal;
  logger: Logger;
}

export interface StageDefinition {
  stage: PipelineStage;
  /** Function name used in logs and status history */
  name: string;
  execute(context: StageContext): Promise<void>;
}

export interface StageRunnerOptions {
  manager: EnvelopeManager;
  timeoutMs: number;
  logger?: Logger;
  retryPolicies?: RetryPolicyTable;
  /** Source of randomness for retry jitter */
  random?: () => number;
}

export type StageResult =
  | { outcome: "success"; envelope: Envelope }
  | { outcome: "failure"; envelope: Envelope; error: ClassifiedError };

function deadline(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

export async function runStage(
  definition: StageDefinition,
  input: Envelope,
  options: StageRunnerOptions
): Promise<StageResult> {
  const attribution: ErrorAttribution = {
    operation: definition.name,
    runId: input.verificationId,
  };
  const logger = (options.logger ?? createSilentLogger()).child({
    component: definition.name,
    runId: input.verificationId,
  });

  const working = cloneEnvelope(input);
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(
      new PipelineError(
        "TransientError",
        `Stage ${definition.stage} exceeded its ${options.timeoutMs} ms deadline`,
        attribution
      )
    );
  }, options.timeoutMs);

  logger.info("Stage started", { stage: definition.stage, status: input.status });

  try {
    await Promise.race([
      definition.execute({
        envelope: working,
        manager: options.manager,
        signal: controller.signal,
        logger,
      }),
      deadline(controller.signal),
    ]);
    if (controller.signal.aborted) {
      throw controller.signal.reason;
    }

    options.manager.setStatus(working, STAGE_SUCCESS_STATUS[definition.stage]);
    logger.info("Stage completed", { stage: definition.stage, status: working.status });
    return { outcome: "success", envelope: working };
  } catch (err) {
    const error = classify(err, options.retryPolicies ?? DEFAULT_RETRY_POLICIES, {
      attribution,
      random: options.random,
    });
    logger.warn("Stage failed", {
      stage: definition.stage,
      category: error.category,
      kind: error.kind,
      reason: error.reason,
      retryable: error.isRetryable(),
      error: err instanceof PipelineError ? err.describe() : String(err),
    });
    return { outcome: "failure", envelope: input, error };
  } finally {
    clearTimeout(timer);
  }
}
