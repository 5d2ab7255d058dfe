/**
 * Verification table tests.
 *
 * Run: node --import tsx src/table/table.test.ts
 */

import { strict as assert } from "node:assert";

import { MemoryVerificationTable, buildPutInput, tableFailure } from "./index.js";
import { applyStatus, createVerificationContext } from "../status/index.js";
import { PipelineError, classifyError } from "../errors/index.js";
import { section, test, rejection, run } from "../testing/harness.js";

const T0 = new Date("2025-03-07T12:00:00.000Z");

section("Memory table");

test("missing records read as undefined", async () => {
  const table = new MemoryVerificationTable();
  assert.equal(await table.get("run-1"), undefined);
});

test("create then conditional replace", async () => {
  const table = new MemoryVerificationTable();
  const ctx = createVerificationContext("run-1", { now: T0 });
  await table.putConditional(ctx, null);

  const { context: advanced } = applyStatus(ctx, "IMAGES_FETCHED", { now: T0 });
  await table.putConditional(advanced, "INITIALIZED");

  const stored = await table.get("run-1");
  assert.equal(stored?.status, "IMAGES_FETCHED");
  assert.equal(stored?.statusHistory.length, 2);
  assert.equal(table.size, 1);
});

test("stale expected status is a Conflict", async () => {
  const table = new MemoryVerificationTable();
  const ctx = createVerificationContext("run-1", { now: T0 });
  table.seed(applyStatus(ctx, "IMAGES_FETCHED", { now: T0 }).context);

  const err = await rejection(table.putConditional(ctx, "INITIALIZED"));

  assert.ok(err instanceof PipelineError);
  assert.equal(err.kind, "Conflict");
  assert.equal(err.message, "Stored status is IMAGES_FETCHED, expected INITIALIZED");
  assert.equal(classifyError(err).category, "client");
});

test("create fails when a record exists", async () => {
  const table = new MemoryVerificationTable();
  const ctx = createVerificationContext("run-1", { now: T0 });
  await table.putConditional(ctx, null);

  const err = await rejection(table.putConditional(ctx, null));

  assert.ok(err instanceof PipelineError);
  assert.equal(err.message, "Stored status is INITIALIZED, expected no record");
});

test("reads return independent copies", async () => {
  const table = new MemoryVerificationTable();
  await table.putConditional(createVerificationContext("run-1", { now: T0 }), null);

  const first = await table.get("run-1");
  first?.statusHistory.push({ status: "COMPLETED", timestamp: "x" });

  const second = await table.get("run-1");
  assert.equal(second?.statusHistory.length, 1);
});

section("DynamoDB requests");

test("create condition requires a missing item", () => {
  const ctx = createVerificationContext("run-1", { now: T0 });
  const input = buildPutInput("results", ctx, null);

  assert.equal(input.TableName, "results");
  assert.equal(input.Item, ctx);
  assert.equal(input.ConditionExpression, "attribute_not_exists(verificationId)");
  assert.equal(input.ExpressionAttributeValues, undefined);
});

test("replace condition names the expected status", () => {
  const ctx = createVerificationContext("run-1", { now: T0 });
  const input = buildPutInput("results", ctx, "TURN2_PROCESSED");

  assert.equal(input.ConditionExpression, "attribute_not_exists(verificationId) OR #status = :expected");
  assert.deepEqual(input.ExpressionAttributeNames, { "#status": "status" });
  assert.deepEqual(input.ExpressionAttributeValues, { ":expected": "TURN2_PROCESSED" });
});

test("failed conditions map to Conflict, other faults to StoreUnavailable", () => {
  const attribution = { operation: "table.put", runId: "run-1" };
  const conditional = Object.assign(new Error("The conditional request failed"), {
    name: "ConditionalCheckFailedException",
  });
  const throttled = Object.assign(new Error("Rate exceeded"), {
    name: "ProvisionedThroughputExceededException",
  });

  const conflict = tableFailure(conditional, "results", attribution);
  assert.equal(conflict.kind, "Conflict");
  assert.equal(conflict.message, "Conditional write to results rejected");

  const unavailable = tableFailure(throttled, "results", attribution);
  assert.equal(unavailable.kind, "StoreUnavailable");
  assert.equal(unavailable.message, "table.put on results failed");
  assert.equal(classifyError(unavailable).category, "capacity");
});

await run("Verification table");
