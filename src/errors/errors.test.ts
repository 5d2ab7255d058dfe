/**
 * Error taxonomy and classifier tests.
 *
 * Run: node --import tsx src/errors/errors.test.ts
 */

import { strict as assert } from "node:assert";
import { z } from "zod";

import {
  PipelineError,
  isPipelineError,
  wrapError,
  classifyError,
  categoryForHttpStatus,
} from "./index.js";
import { section, test, run } from "../testing/harness.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

function awsError(name: string, httpStatusCode: number): Error {
  return Object.assign(new Error(`${name} raised`), {
    name,
    $metadata: { httpStatusCode },
  });
}

function nodeError(code: string): Error {
  return Object.assign(new Error(`system error ${code}`), { code });
}

// ═══════════════════════════════════════════════════════════════════════════
// PIPELINE ERRORS
// ═══════════════════════════════════════════════════════════════════════════

section("PipelineError");

test("describe() includes kind, operation and attribution", () => {
  const err = new PipelineError("NotFound", "object missing", {
    operation: "store.get",
    runId: "run-1",
    category: "images",
    slot: "referenceBase64",
  });

  assert.equal(
    err.describe(),
    "NotFound in store.get: object missing [run=run-1 category=images slot=referenceBase64]"
  );
});

test("describe() appends the cause chain", () => {
  const err = new PipelineError(
    "StoreUnavailable",
    "write rejected",
    { operation: "store.put" },
    { cause: new Error("socket closed") }
  );

  assert.equal(
    err.describe(),
    "StoreUnavailable in store.put: write rejected (caused by: Error: socket closed)"
  );
});

test("isPipelineError matches by kind", () => {
  const err = new PipelineError("Conflict", "stale write", { operation: "table.put" });

  assert.equal(isPipelineError(err), true);
  assert.equal(isPipelineError(err, "Conflict"), true);
  assert.equal(isPipelineError(err, "NotFound"), false);
  assert.equal(isPipelineError(new Error("plain")), false);
});

test("wrapError keeps the kind and fills missing attribution", () => {
  const inner = new PipelineError("NotFound", "object missing", {
    operation: "store.get",
    key: "run-1/images/referenceBase64.bin",
  });

  const wrapped = wrapError(inner, {
    operation: "loadSlot",
    runId: "run-1",
    category: "images",
    slot: "referenceBase64",
  });

  assert.equal(wrapped.kind, "NotFound");
  assert.equal(wrapped.attribution.operation, "store.get");
  assert.equal(wrapped.attribution.runId, "run-1");
  assert.equal(wrapped.attribution.category, "images");
  assert.equal(wrapped.attribution.key, "run-1/images/referenceBase64.bin");
});

test("wrapError returns the same instance when nothing is added", () => {
  const inner = new PipelineError("SchemaError", "bad json", {
    operation: "getJSON",
    runId: "run-1",
  });

  assert.equal(wrapError(inner, { operation: "outer", runId: "run-1" }), inner);
});

test("wrapError turns foreign errors into PermanentError", () => {
  const cause = new TypeError("undefined is not a function");
  const wrapped = wrapError(cause, { operation: "stage.execute", runId: "run-2" });

  assert.equal(wrapped.kind, "PermanentError");
  assert.equal(wrapped.message, "undefined is not a function");
  assert.equal(wrapped.cause, cause);
});

// ═══════════════════════════════════════════════════════════════════════════
// CLASSIFIER
// ═══════════════════════════════════════════════════════════════════════════

section("Classifier");

test("pipeline kinds map to their categories", () => {
  const cases: Array<[PipelineError["kind"], string]> = [
    ["ValidationError", "validation"],
    ["SchemaError", "validation"],
    ["NotFound", "client"],
    ["ReferenceError", "client"],
    ["Conflict", "client"],
    ["CapacityError", "capacity"],
    ["TransientError", "transient"],
    ["PermanentError", "permanent"],
    ["Corrupt", "permanent"],
  ];

  for (const [kind, category] of cases) {
    const result = classifyError(new PipelineError(kind, "x", { operation: "op" }));
    assert.equal(result.category, category, `${kind} → ${category}`);
    assert.equal(result.kind, kind);
  }
});

test("AWS throttling names are capacity faults", () => {
  const result = classifyError(awsError("ThrottlingException", 400));

  assert.equal(result.category, "capacity");
  assert.equal(result.kind, "CapacityError");
  assert.equal(result.reason, "aws:ThrottlingException");
});

test("S3 SlowDown is a capacity fault", () => {
  assert.equal(classifyError(awsError("SlowDown", 503)).category, "capacity");
});

test("conditional check failure is a client fault", () => {
  assert.equal(classifyError(awsError("ConditionalCheckFailedException", 400)).category, "client");
});

test("transaction conflict is transient", () => {
  assert.equal(classifyError(awsError("TransactionConflictException", 400)).category, "transient");
});

test("unknown names fall back to the HTTP status", () => {
  assert.equal(classifyError(awsError("Mystery", 503)).reason, "http:503");
  assert.equal(classifyError(awsError("Mystery", 503)).category, "transient");
  assert.equal(classifyError(awsError("Mystery", 429)).category, "capacity");
  assert.equal(classifyError(awsError("Mystery", 404)).category, "client");
  assert.equal(classifyError(awsError("Mystery", 400)).category, "validation");
  assert.equal(classifyError(awsError("Mystery", 500)).category, "permanent");
});

test("node network codes are transient", () => {
  const result = classifyError(nodeError("ECONNRESET"));

  assert.equal(result.category, "transient");
  assert.equal(result.reason, "node:ECONNRESET");
});

test("abort errors are transient", () => {
  const abort = Object.assign(new Error("The operation was aborted"), { name: "AbortError" });
  assert.equal(classifyError(abort).category, "transient");
});

test("zod errors are schema faults", () => {
  const parsed = z.string().safeParse(42);
  assert.equal(parsed.success, false);
  if (parsed.success) return;

  const result = classifyError(parsed.error);
  assert.equal(result.category, "validation");
  assert.equal(result.kind, "SchemaError");
});

test("unrecognized errors are permanent", () => {
  const result = classifyError(new Error("boom"));

  assert.equal(result.category, "permanent");
  assert.equal(result.reason, "unknown");
  assert.equal(classifyError("a string").category, "permanent");
});

test("store outage inherits the category of its cause", () => {
  const throttled = new PipelineError(
    "StoreUnavailable",
    "write rejected",
    { operation: "store.put" },
    { cause: awsError("SlowDown", 503) }
  );
  const result = classifyError(throttled);

  assert.equal(result.category, "capacity");
  assert.equal(result.kind, "StoreUnavailable");
});

test("store outage with an unknown cause is transient", () => {
  const err = new PipelineError(
    "StoreUnavailable",
    "write rejected",
    { operation: "store.put" },
    { cause: new Error("???") }
  );

  assert.equal(classifyError(err).category, "transient");
  assert.equal(
    classifyError(new PipelineError("StoreUnavailable", "down", { operation: "store.get" })).category,
    "transient"
  );
});

test("categoryForHttpStatus ignores success codes", () => {
  assert.equal(categoryForHttpStatus(200), undefined);
  assert.equal(categoryForHttpStatus(504), "transient");
  assert.equal(categoryForHttpStatus(409), "client");
});

await run("Error taxonomy");
