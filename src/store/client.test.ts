/**
 * Blob store client and adapter tests.
 *
 * Run: node --import tsx src/store/client.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

import {
  BlobStoreClient,
  FileBlobStore,
  MemoryBlobStore,
  datePartitionedKey,
  parseSlotKey,
  slotKey,
  type BlobStore,
} from "./index.js";
import { PipelineError, classifyError } from "../errors/index.js";
import { computeIntegrity, createReference } from "../reference/index.js";
import { section, test, thrown, rejection, run } from "../testing/harness.js";

const encoder = new TextEncoder();

const address = { runId: "run-1", category: "processing", slot: "turn1Analysis" };

/** Store whose every call fails with the given error. */
class BrokenStore implements BlobStore {
  readonly container = "memory";
  constructor(private readonly failure: unknown) {}
  async put(): Promise<void> {
    throw this.failure;
  }
  async get(): Promise<Uint8Array> {
    throw this.failure;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// KEYS
// ═══════════════════════════════════════════════════════════════════════════

section("Keys");

test("slotKey is a pure function of run, category and slot", () => {
  assert.equal(slotKey(address, "json"), "run-1/processing/turn1Analysis.json");
  assert.equal(slotKey(address, "json"), slotKey({ ...address }, "json"));
});

test("slotKey rejects path separators and relative segments", () => {
  for (const runId of ["", "a/b", "..", "../x"]) {
    const err = thrown(() => slotKey({ ...address, runId }, "json"));
    assert.ok(err instanceof PipelineError, runId);
    assert.equal(err.kind, "ValidationError");
  }
});

test("parseSlotKey inverts slotKey", () => {
  assert.deepEqual(parseSlotKey("run-1/images/referenceBase64.bin"), {
    runId: "run-1",
    category: "images",
    slot: "referenceBase64",
    extension: "bin",
  });
  assert.equal(parseSlotKey("logs/2025/03/07/run-1.json"), undefined);
  assert.equal(parseSlotKey("run-1/images/noext"), undefined);
});

test("datePartitionedKey uses the UTC date", () => {
  const at = new Date("2025-03-07T23:30:00.000Z");
  assert.equal(datePartitionedKey("logs", "run-1", at), "logs/2025/03/07/run-1.json");
});

// ═══════════════════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════════════════

section("Client writes");

test("putJSON stores compact JSON and returns a full reference", async () => {
  const store = new MemoryBlobStore("state");
  const client = new BlobStoreClient(store);

  const ref = await client.putJSON(address, { score: 1 });
  const expectedBytes = encoder.encode('{"score":1}');

  assert.deepEqual(ref, {
    bucket: "state",
    key: "run-1/processing/turn1Analysis.json",
    integrity: computeIntegrity(expectedBytes),
    size: 11,
  });
  assert.equal(store.contentTypeOf(ref.key), "application/json");
});

test("writing the same value twice yields an identical reference", async () => {
  const store = new MemoryBlobStore("state");
  const client = new BlobStoreClient(store);

  const first = await client.putJSON(address, { score: 1 });
  const second = await client.putJSON(address, { score: 1 });

  assert.equal(JSON.stringify(first), JSON.stringify(second));
  assert.deepEqual(store.keys(), ["run-1/processing/turn1Analysis.json"]);
});

test("integrity tags can be disabled", async () => {
  const client = new BlobStoreClient(new MemoryBlobStore("state"), { integrity: false });
  const ref = await client.put({ runId: "run-1", category: "images", slot: "referenceBase64" }, new Uint8Array([1, 2, 3]));

  assert.deepEqual(ref, { bucket: "state", key: "run-1/images/referenceBase64.bin", size: 3 });
});

test("unknown slots are rejected before anything is written", async () => {
  const store = new MemoryBlobStore();
  const client = new BlobStoreClient(store);

  const err = await rejection(client.put({ runId: "run-1", category: "images", slot: "thumbnail" }, new Uint8Array(1)));

  assert.ok(err instanceof PipelineError);
  assert.equal(err.kind, "ValidationError");
  assert.equal(store.size, 0);
});

test("backend rejection surfaces as StoreUnavailable with its cause", async () => {
  const throttled = Object.assign(new Error("Please reduce your request rate."), { name: "SlowDown" });
  const client = new BlobStoreClient(new BrokenStore(throttled));

  const err = await rejection(client.putJSON(address, { score: 1 }));

  assert.ok(err instanceof PipelineError);
  assert.equal(err.kind, "StoreUnavailable");
  assert.equal(err.cause, throttled);
  assert.equal(err.attribution.slot, "turn1Analysis");
  assert.equal(err.attribution.key, "run-1/processing/turn1Analysis.json");
  assert.equal(classifyError(err).category, "capacity");
});

test("values without a JSON form are a ValidationError", async () => {
  const client = new BlobStoreClient(new MemoryBlobStore());
  const err = await rejection(client.putJSON(address, undefined));

  assert.ok(err instanceof PipelineError);
  assert.equal(err.kind, "ValidationError");
});

test("putJSONAt writes outside the slot layout", async () => {
  const store = new MemoryBlobStore("state");
  const client = new BlobStoreClient(store, { integrity: false });

  const ref = await client.putJSONAt("logs/2025/03/07/run-1.json", { ok: true });

  assert.deepEqual(ref, { bucket: "state", key: "logs/2025/03/07/run-1.json", size: 11 });
});

section("Client reads");

test("get returns the stored bytes", async () => {
  const client = new BlobStoreClient(new MemoryBlobStore("state"));
  const ref = await client.put({ runId: "run-1", category: "images", slot: "checkingBase64" }, new Uint8Array([9, 8, 7]));

  assert.deepEqual(await client.get(ref), new Uint8Array([9, 8, 7]));
});

test("missing objects are NotFound with slot attribution", async () => {
  const client = new BlobStoreClient(new MemoryBlobStore("state"));
  const err = await rejection(client.get(createReference("state", "run-2/processing/turn2Analysis.json")));

  assert.ok(err instanceof PipelineError);
  assert.equal(err.kind, "NotFound");
  assert.equal(err.attribution.runId, "run-2");
  assert.equal(err.attribution.category, "processing");
  assert.equal(err.attribution.slot, "turn2Analysis");
});

test("integrity mismatch is Corrupt", async () => {
  const store = new MemoryBlobStore("state");
  const client = new BlobStoreClient(store);
  const ref = await client.putJSON(address, { score: 1 });

  store.overwrite(ref.key, encoder.encode('{"score":2}'));
  const err = await rejection(client.get(ref));

  assert.ok(err instanceof PipelineError);
  assert.equal(err.kind, "Corrupt");
  assert.equal(err.message, "Integrity check failed");
});

test("size mismatch is Corrupt", async () => {
  const store = new MemoryBlobStore("state");
  const client = new BlobStoreClient(store, { integrity: false });
  const ref = await client.putJSON(address, { score: 1 });

  store.overwrite(ref.key, encoder.encode('{"score":10}'));
  const err = await rejection(client.get(ref));

  assert.ok(err instanceof PipelineError);
  assert.equal(err.kind, "Corrupt");
  assert.equal(err.message, "Size mismatch: expected 11 bytes, read 12");
});

test("references to another container are a ReferenceError", async () => {
  const client = new BlobStoreClient(new MemoryBlobStore("state"));
  const err = await rejection(client.get(createReference("other", "run-1/errors/failure.json")));

  assert.ok(err instanceof PipelineError);
  assert.equal(err.kind, "ReferenceError");
});

test("getJSON validates against the schema", async () => {
  const client = new BlobStoreClient(new MemoryBlobStore("state"));
  const ref = await client.putJSON(address, { score: 1 });

  const value = await client.getJSON(ref, z.object({ score: z.number() }));
  assert.deepEqual(value, { score: 1 });

  const err = await rejection(client.getJSON(ref, z.object({ score: z.string() })));
  assert.ok(err instanceof PipelineError);
  assert.equal(err.kind, "SchemaError");
  assert.equal(err.message, "Stored payload failed validation: score: Expected string, received number");
});

test("getJSON on non-JSON bytes is a SchemaError", async () => {
  const store = new MemoryBlobStore("state");
  const client = new BlobStoreClient(store, { integrity: false });
  const ref = await client.putJSON(address, "abc");

  store.overwrite(ref.key, encoder.encode("abcde"));
  const err = await rejection(client.getJSON(ref, z.string()));

  assert.ok(err instanceof PipelineError);
  assert.equal(err.kind, "SchemaError");
});

// ═══════════════════════════════════════════════════════════════════════════
// FILE STORE
// ═══════════════════════════════════════════════════════════════════════════

section("File store");

test("file store round trip and NotFound", async () => {
  const directory = await mkdtemp(join(tmpdir(), "blob-store-"));
  try {
    const client = new BlobStoreClient(new FileBlobStore(directory, "local"));
    const ref = await client.putJSON(address, { score: 3 });

    assert.equal(ref.bucket, "local");
    assert.deepEqual(await client.getJSON(ref, z.object({ score: z.number() })), { score: 3 });

    const err = await rejection(client.get(createReference("local", "run-1/errors/failure.json")));
    assert.ok(err instanceof PipelineError);
    assert.equal(err.kind, "NotFound");
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
});

test("file store refuses keys outside its directory", async () => {
  const store = new FileBlobStore(join(tmpdir(), "blob-store-unused"), "local");
  const err = await rejection(store.get("../escape.json"));

  assert.ok(err instanceof PipelineError);
  assert.equal(err.kind, "ReferenceError");
});

await run("Blob store client");
