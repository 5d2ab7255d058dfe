#!/usr/bin/env node
/**
 * Runs two simulated verifications end to end against a file-backed blob
 * store in a temporary directory:
 *
 *   1. a run that passes every stage (turn 1 fails once with a capacity
 *      error and is retried)
 *   2. a run whose turn 2 is rejected, handed to the failure finalizer
 *
 * No model or image service is called; stages write placeholder payloads.
 *
 * Usage:
 *   npm run demo
 *   npm run demo -- --keep      Leave the temporary directory in place
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseArgs } from "node:util";
import { randomBytes } from "node:crypto";
import { setTimeout as sleep } from "node:timers/promises";

import {
  DEFAULT_PIPELINE_CONFIG,
  createRuntime,
  loadPipelineConfig,
  type Runtime,
} from "../src/config/index.js";
import {
  createFinalizeResultsStage,
  finalizeWithError,
  outcomeOf,
  runStage,
  type StageDefinition,
  type VerificationOutcome,
} from "../src/stages/index.js";
import { binaryPayload } from "../src/codec/index.js";
import { PipelineError, type ClassifiedError } from "../src/errors/index.js";
import { serializeEnvelope, type Envelope } from "../src/envelope/index.js";
import { generateVerificationId } from "../src/logging/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// STAGES
// ═══════════════════════════════════════════════════════════════════════════

const initialize: StageDefinition = {
  stage: "INITIALIZATION",
  name: "initialize",
  async execute({ envelope, manager, signal }) {
    await manager.saveJSON(
      envelope,
      "processing",
      "initialization",
      { verificationType: "LAYOUT_VS_CHECKING", layoutId: 42, vendingMachineId: "vm-001" },
      { signal }
    );
    manager.addSummary(envelope, "verificationType", "LAYOUT_VS_CHECKING");
  },
};

const fetchImages: StageDefinition = {
  stage: "IMAGE_FETCH",
  name: "fetchImages",
  async execute({ envelope, manager, signal }) {
    // Large enough to be stored by reference under the default threshold.
    const reference = randomBytes(3 * 1024 * 1024);
    const checking = randomBytes(64 * 1024);

    await Promise.all([
      manager.saveToEnvelope(envelope, "images", "referenceBase64", binaryPayload(reference), { signal }),
      manager.saveToEnvelope(envelope, "images", "checkingBase64", binaryPayload(checking), { signal }),
      manager.saveJSON(
        envelope,
        "images",
        "metadata",
        {
          reference: { contentType: "image/png", size: reference.byteLength },
          checking: { contentType: "image/png", size: checking.byteLength },
        },
        { signal }
      ),
    ]);
    manager.addSummary(envelope, "imagesProcessed", 2);
  },
};

function turn1(failFirstAttempts: number): StageDefinition {
  let attempts = 0;
  return {
    stage: "TURN1",
    name: "executeTurn1",
    async execute({ envelope, manager, signal }) {
      attempts++;
      if (attempts <= failFirstAttempts) {
        throw new PipelineError("CapacityError", "Model is throttling requests", {
          operation: "executeTurn1",
          runId: envelope.verificationId,
        });
      }
      await manager.saveJSON(envelope, "prompts", "systemPrompt", "Compare the two images.", { signal });
      await manager.saveJSON(envelope, "prompts", "turn1Prompt", "Describe the reference layout.", { signal });
      await manager.saveJSON(envelope, "responses", "turn1Raw", { text: "Row A holds 6 products." }, { signal });
      await manager.saveJSON(envelope, "processing", "turn1Analysis", { rows: 1, products: 6 }, { signal });
    },
  };
}

function turn2(rejected: boolean): StageDefinition {
  return {
    stage: "TURN2",
    name: "executeTurn2",
    async execute({ envelope, manager, signal }) {
      if (rejected) {
        throw new PipelineError("PermanentError", "Turn 2 response could not be parsed", {
          operation: "executeTurn2",
          runId: envelope.verificationId,
        });
      }
      await manager.saveJSON(envelope, "prompts", "turn2Prompt", "Compare the checking image.", { signal });
      await manager.saveJSON(envelope, "responses", "turn2Raw", { text: "All products match." }, { signal });
      await manager.saveJSON(envelope, "processing", "turn2Analysis", { discrepancies: 0 }, { signal });
      manager.addSummary(envelope, "verificationStatus", "CORRECT");
      manager.addSummary(envelope, "discrepanciesFound", 0);
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════

type RunResult =
  | { ok: true; envelope: Envelope }
  | { ok: false; envelope: Envelope; error: ClassifiedError; stage: StageDefinition };

/**
 * Run one stage, retrying retryable faults on the first fault's schedule.
 * Delays are scaled down to 10 ms units so the demo finishes quickly.
 */
async function runWithRetry(runtime: Runtime, definition: StageDefinition, input: Envelope): Promise<RunResult> {
  let fault: ClassifiedError | undefined;

  for (;;) {
    const result = await runStage(definition, input, runtime.stageOptions());
    if (result.outcome === "success") {
      return { ok: true, envelope: result.envelope };
    }

    fault ??= result.error;
    if (!fault.isRetryable()) {
      return { ok: false, envelope: result.envelope, error: result.error, stage: definition };
    }
    const delay = fault.nextDelay(10);
    runtime.logger.info("Retrying stage", {
      runId: input.verificationId,
      stage: definition.name,
      category: fault.category,
      delayMs: delay,
    });
    await sleep(delay);
  }
}

async function verify(runtime: Runtime, stages: StageDefinition[]): Promise<VerificationOutcome> {
  let envelope = runtime.manager.create(generateVerificationId());

  for (const definition of stages) {
    // Envelopes cross stage boundaries as JSON.
    const wire = serializeEnvelope(envelope);
    runtime.logger.debug("Envelope handed over", { bytes: Buffer.byteLength(wire) });

    const result = await runWithRetry(runtime, definition, envelope);
    if (!result.ok) {
      return finalizeWithError(
        {
          verificationId: result.envelope.verificationId,
          errorStage: result.stage.stage,
          references: result.envelope.references,
          error: {
            Error: result.error.kind,
            Cause: JSON.stringify({
              errorType: result.error.kind,
              errorMessage: result.error.reason,
            }),
          },
        },
        { client: runtime.client, table: runtime.table, logger: runtime.logger }
      );
    }
    envelope = result.envelope;
  }

  return outcomeOf(envelope);
}

// ═══════════════════════════════════════════════════════════════════════════
// MAIN
// ═══════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: { keep: { type: "boolean", default: false } },
  });

  const directory = mkdtempSync(join(tmpdir(), "verification-demo-"));
  const config = loadPipelineConfig({
    ...DEFAULT_PIPELINE_CONFIG,
    storage: { driver: "file", directory },
  });
  const runtime = createRuntime(config);
  const finalize = createFinalizeResultsStage({ table: runtime.table });

  try {
    const passing = await verify(runtime, [initialize, fetchImages, turn1(1), turn2(false), finalize]);
    console.log("\nPassing run:");
    console.log(JSON.stringify(passing, null, 2));

    const failing = await verify(runtime, [initialize, fetchImages, turn1(0), turn2(true), finalize]);
    console.log("\nFailing run:");
    console.log(JSON.stringify(failing, null, 2));
  } finally {
    if (values.keep === true) {
      console.log(`\nBlobs kept in ${directory}`);
    } else {
      rmSync(directory, { recursive: true, force: true });
    }
  }
}

main().catch((err: unknown) => {
  console.error("Demo failed:", err);
  process.exit(1);
});
