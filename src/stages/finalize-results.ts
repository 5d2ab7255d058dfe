/**
 * FINALIZATION stage: write the final results, complete the envelope and the
 * stored record.
 *
 * A terminal record is never overwritten. If the stored run already
 * COMPLETED the write is skipped; if it already failed the stage fails with
 * a Conflict.
 */

import { PipelineError } from "../errors/index.js";
import {
  advanceTo,
  createVerificationContext,
  type VerificationContext,
} from "../status/index.js";
import type { VerificationTable } from "../table/index.js";
import type { Envelope } from "../envelope/index.js";
import type { StageDefinition } from "./runner.js";
import { completedOutcome, type CompletedOutcome } from "./outcome.js";

export interface FinalizeResultsDeps {
  table: VerificationTable;
  now?: () => Date;
}

const FUNCTION_NAME = "finalizeResults";

export function createFinalizeResultsStage(deps: FinalizeResultsDeps): StageDefinition {
  const now = deps.now ?? (() => new Date());

  return {
    stage: "FINALIZATION",
    name: FUNCTION_NAME,
    async execute({ envelope, manager, signal, logger }) {
      // Depends only on the input envelope.
      await manager.saveJSON(
        envelope,
        "processing",
        "finalResults",
        {
          verificationId: envelope.verificationId,
          status: "COMPLETED",
          completedAt: envelope.updatedAt,
          summary: envelope.summary,
          references: Object.keys(envelope.references).sort(),
        },
        { signal }
      );
      manager.setStatus(envelope, "COMPLETED");

      const at = now();
      const stored = await deps.table.get(envelope.verificationId);
      if (stored?.status === "COMPLETED") {
        logger.info("Stored record already completed", { table: deps.table.name });
        return;
      }
      if (stored?.status === "VERIFICATION_FAILED") {
        throw new PipelineError(
          "Conflict",
          "Run already terminated as VERIFICATION_FAILED",
          { operation: FUNCTION_NAME, runId: envelope.verificationId }
        );
      }

      const base: VerificationContext =
        stored ?? createVerificationContext(envelope.verificationId, { now: at });
      const completed = advanceTo(base, "COMPLETED", {
        now: at,
        stage: "FINALIZATION",
        functionName: FUNCTION_NAME,
      });
      await deps.table.putConditional(
        { ...completed, references: { ...envelope.references } },
        stored?.status ?? null
      );
      logger.info("Stored record completed", { table: deps.table.name });
    },
  };
}

/**
 * Outcome reported for a completed envelope.
 */
export function outcomeOf(envelope: Envelope): CompletedOutcome {
  return completedOutcome(envelope.verificationId, { ...envelope.references }, envelope.updatedAt);
}
