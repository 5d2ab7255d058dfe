/**
 * Orchestrator message decoding tests.
 *
 * Run: node --import tsx src/stages/messages.test.ts
 */

import { strict as assert } from "node:assert";

import {
  decodeFailureInput,
  decodeStageInput,
  envelopeFromInput,
  parseFailureCause,
} from "./index.js";
import { PipelineError } from "../errors/index.js";
import { section, test, thrown, run } from "../testing/harness.js";

const T0 = new Date("2025-03-07T12:00:00.000Z");

// ═══════════════════════════════════════════════════════════════════════════
// STAGE INPUT
// ═══════════════════════════════════════════════════════════════════════════

section("Stage input");

test("full envelopes decode as kind envelope", () => {
  const input = decodeStageInput({
    verificationId: "run-1",
    status: "IMAGES_FETCHED",
    references: { images_metadata: { bucket: "state-bucket", key: "run-1/images/metadata.json" } },
    summary: { imagesProcessed: 2 },
    createdAt: "2025-03-07T12:00:00.000Z",
    updatedAt: "2025-03-07T12:01:00.000Z",
  });

  assert.equal(input.kind, "envelope");
  const envelope = envelopeFromInput(input);
  assert.equal(envelope.status, "IMAGES_FETCHED");
  assert.equal(envelope.summary["imagesProcessed"], 2);
  assert.ok(Object.isFrozen(envelope.references["images_metadata"]));
});

test("id-only messages decode as kind minimal", () => {
  const input = decodeStageInput({
    verificationId: "run-1",
    references: { images_metadata: { bucket: "state-bucket", key: "run-1/images/metadata.json" } },
  });

  assert.equal(input.kind, "minimal");
  const envelope = envelopeFromInput(input, T0);
  assert.equal(envelope.status, "INITIALIZED");
  assert.equal(envelope.createdAt, "2025-03-07T12:00:00.000Z");
  assert.deepEqual(envelope.references, {
    images_metadata: { bucket: "state-bucket", key: "run-1/images/metadata.json" },
  });
  assert.ok(Object.isFrozen(envelope.references["images_metadata"]));
});

test("minimal messages may carry a status", () => {
  const input = decodeStageInput({ verificationId: "run-1", status: "TURN1_PROCESSED" });
  assert.equal(envelopeFromInput(input, T0).status, "TURN1_PROCESSED");
});

test("messages without an id are a SchemaError", () => {
  const err = thrown(() => decodeStageInput({ status: "INITIALIZED" }));

  assert.ok(err instanceof PipelineError);
  assert.equal(err.kind, "SchemaError");
  assert.equal(err.message, "Invalid stage input: verificationId: Required");
});

// ═══════════════════════════════════════════════════════════════════════════
// FAILURE INPUT
// ═══════════════════════════════════════════════════════════════════════════

section("Failure input");

test("well-formed failure messages keep every field", () => {
  const input = decodeFailureInput({
    verificationId: "run-1",
    errorStage: "TURN1",
    error: { Error: "States.TaskFailed", Cause: "boom" },
    references: { images_metadata: { bucket: "b", key: "run-1/images/metadata.json" } },
  });

  assert.equal(input.verificationId, "run-1");
  assert.equal(input.errorStage, "TURN1");
  assert.equal(input.errorName, "States.TaskFailed");
  assert.equal(input.cause, "boom");
  assert.deepEqual(Object.keys(input.references), ["images_metadata"]);
  assert.deepEqual(input.droppedReferences, []);
});

test("malformed fields are dropped, not rejected", () => {
  const input = decodeFailureInput({
    verificationId: 42,
    error: { Cause: { nested: true } },
    references: { good: { bucket: "b", key: "k" }, bad: { bucket: "" } },
  });

  assert.equal(input.verificationId, undefined);
  assert.equal(input.cause, undefined);
  assert.deepEqual(Object.keys(input.references), ["good"]);
  assert.deepEqual(input.droppedReferences, ["bad"]);
});

test("non-object messages decode to an empty input", () => {
  assert.deepEqual(decodeFailureInput("oops"), { references: {}, droppedReferences: [] });
  assert.deepEqual(decodeFailureInput(null), { references: {}, droppedReferences: [] });
});

// ═══════════════════════════════════════════════════════════════════════════
// FAILURE CAUSE
// ═══════════════════════════════════════════════════════════════════════════

section("Failure cause");

test("JSON causes contribute type, message and stack", () => {
  const cause = parseFailureCause(
    JSON.stringify({
      errorType: "BedrockTimeout",
      errorMessage: "turn1 model call timed out",
      stackTrace: ["at invoke", "at handler"],
    }),
    "States.TaskFailed"
  );

  assert.deepEqual(cause, {
    errorType: "BedrockTimeout",
    errorMessage: "turn1 model call timed out",
    stackTrace: ["at invoke", "at handler"],
  });
});

test("text causes become the message", () => {
  assert.deepEqual(parseFailureCause("failed to fetch image", "States.TaskFailed"), {
    errorType: "States.TaskFailed",
    errorMessage: "failed to fetch image",
    stackTrace: [],
  });
});

test("JSON without a message keeps the raw text", () => {
  assert.deepEqual(parseFailureCause('{"errorType":"X"}'), {
    errorType: "X",
    errorMessage: '{"errorType":"X"}',
    stackTrace: [],
  });
});

test("missing causes read as unknown errors", () => {
  assert.deepEqual(parseFailureCause(undefined), { errorMessage: "Unknown error", stackTrace: [] });
  assert.deepEqual(parseFailureCause("   "), { errorMessage: "Unknown error", stackTrace: [] });
});

await run("Orchestrator messages");
