/**
 * FINALIZATION stage tests.
 *
 * Run: node --import tsx src/stages/finalize-results.test.ts
 */

import { strict as assert } from "node:assert";
import { z } from "zod";

import { createFinalizeResultsStage, outcomeOf, runStage } from "./index.js";
import { EnvelopeManager, type Envelope } from "../envelope/index.js";
import { BlobStoreClient, MemoryBlobStore } from "../store/index.js";
import { HybridPayloadCodec } from "../codec/index.js";
import { MemoryVerificationTable } from "../table/index.js";
import { createVerificationContext, markFailed, advanceTo, createErrorInfo } from "../status/index.js";
import { sameReference } from "../reference/index.js";
import { section, test, run } from "../testing/harness.js";

const T0 = new Date("2025-03-07T12:00:00.000Z");
const T1 = new Date("2025-03-07T12:10:00.000Z");
const RUN = "verif-20250307120000-ab12";

function setup() {
  const store = new MemoryBlobStore("state-bucket");
  const client = new BlobStoreClient(store);
  const codec = new HybridPayloadCodec(client, { enabled: true, thresholdBytes: 0 });
  const manager = new EnvelopeManager({ client, codec, now: () => T0 });
  const table = new MemoryVerificationTable();
  const stage = createFinalizeResultsStage({ table, now: () => T1 });
  return { manager, table, stage };
}

function turn2Envelope(manager: EnvelopeManager): Envelope {
  const envelope = manager.create(RUN);
  manager.setStatus(envelope, "IMAGES_FETCHED");
  manager.setStatus(envelope, "TURN1_PROCESSED");
  manager.setStatus(envelope, "TURN2_PROCESSED");
  manager.addSummary(envelope, "verificationStatus", "CORRECT");
  return envelope;
}

const FinalResultsSchema = z.object({
  status: z.literal("COMPLETED"),
  completedAt: z.string(),
  summary: z.record(z.unknown()),
  references: z.array(z.string()),
});

section("Finalize results");

test("completes the envelope and the stored record", async () => {
  const { manager, table, stage } = setup();

  const result = await runStage(stage, turn2Envelope(manager), { manager, timeoutMs: 1000 });

  assert.equal(result.outcome, "success");
  assert.equal(result.envelope.status, "COMPLETED");

  const results = await manager.loadJSON(result.envelope, "processing", "finalResults", FinalResultsSchema);
  assert.deepEqual(results, {
    status: "COMPLETED",
    completedAt: "2025-03-07T12:00:00.000Z",
    summary: { verificationStatus: "CORRECT" },
    references: [],
  });

  const record = await table.get(RUN);
  assert.equal(record?.status, "COMPLETED");
  assert.deepEqual(
    record?.statusHistory.map((entry) => entry.status),
    ["INITIALIZED", "IMAGES_FETCHED", "TURN1_PROCESSED", "TURN2_PROCESSED", "COMPLETED"]
  );
  assert.deepEqual(Object.keys(record?.references ?? {}), ["processing_finalResults"]);

  const outcome = outcomeOf(result.envelope);
  assert.equal(outcome.status, "COMPLETED");
  assert.equal(outcome.message, "Verification completed successfully");
  assert.deepEqual(Object.keys(outcome.references), ["processing_finalResults"]);
});

test("rerunning on the same input with a later clock yields the same reference", async () => {
  const { manager, table } = setup();
  let tick = T1.getTime();
  const stage = createFinalizeResultsStage({ table, now: () => new Date((tick += 1000)) });
  const input = turn2Envelope(manager);

  const first = await runStage(stage, input, { manager, timeoutMs: 1000 });
  const second = await runStage(stage, input, { manager, timeoutMs: 1000 });

  assert.ok(first.outcome === "success" && second.outcome === "success");
  const a = first.envelope.references["processing_finalResults"];
  const b = second.envelope.references["processing_finalResults"];
  assert.ok(a !== undefined && b !== undefined);
  assert.ok(sameReference(a, b));
  assert.deepEqual(a, b);
});

test("an already completed record is left as it is", async () => {
  const { manager, table, stage } = setup();
  const completed = advanceTo(createVerificationContext(RUN, { now: T0 }), "COMPLETED", { now: T0 });
  table.seed(completed);

  const result = await runStage(stage, turn2Envelope(manager), { manager, timeoutMs: 1000 });

  assert.equal(result.outcome, "success");
  assert.equal((await table.get(RUN))?.lastUpdatedAt, "2025-03-07T12:00:00.000Z");
});

test("a failed record is a Conflict", async () => {
  const { manager, table, stage } = setup();
  const ctx = createVerificationContext(RUN, { now: T0 });
  table.seed(markFailed(ctx, "TURN2", createErrorInfo("States.Timeout", "timed out", {}, T0), { now: T0 }));
  const input = turn2Envelope(manager);

  const result = await runStage(stage, input, { manager, timeoutMs: 1000 });

  assert.equal(result.outcome, "failure");
  if (result.outcome !== "failure") return;
  assert.equal(result.error.kind, "Conflict");
  assert.equal(result.error.category, "client");
  assert.equal(result.envelope, input);
  assert.equal(input.status, "TURN2_PROCESSED");
  assert.equal((await table.get(RUN))?.status, "VERIFICATION_FAILED");
});

test("finalization before turn 2 is rejected", async () => {
  const { manager, table, stage } = setup();
  const envelope = manager.create(RUN);
  manager.setStatus(envelope, "IMAGES_FETCHED");

  const result = await runStage(stage, envelope, { manager, timeoutMs: 1000 });

  assert.equal(result.outcome, "failure");
  if (result.outcome !== "failure") return;
  assert.equal(result.error.category, "validation");
  assert.equal(table.size, 0);
});

await run("Finalize results");
