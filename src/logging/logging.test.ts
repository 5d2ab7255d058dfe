/**
 * Logger and verification ID tests.
 *
 * Run: node --import tsx src/logging/logging.test.ts
 */

import { strict as assert } from "node:assert";

import {
  createLogger,
  generateVerificationId,
  parseVerificationTimestamp,
  type LogLevel,
} from "./index.js";
import { section, test, run } from "../testing/harness.js";

const T0 = new Date("2025-03-07T12:00:00.000Z");

function capture(options: { level?: LogLevel; json?: boolean; runId?: string; component?: string } = {}) {
  const lines: Array<[LogLevel, string]> = [];
  const logger = createLogger({
    ...options,
    now: () => T0,
    sink: (level, line) => lines.push([level, line]),
  });
  return { logger, lines };
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════════════════

section("Text output");

test("entries carry timestamp, level, run id and component", () => {
  const { logger, lines } = capture({ runId: "verif-20250307120000-ab12", component: "fetchImages" });

  logger.info("Stage started");
  logger.warn("Slow upload", { key: "a/b.json", ms: 1200 });

  assert.deepEqual(lines, [
    ["info", "[2025-03-07T12:00:00.000Z] [INFO ] [verif-20250307120000-ab12] fetchImages: Stage started"],
    [
      "warn",
      '[2025-03-07T12:00:00.000Z] [WARN ] [verif-20250307120000-ab12] fetchImages: Slow upload {"key":"a/b.json","ms":1200}',
    ],
  ]);
});

test("unbound loggers print a placeholder run id", () => {
  const { logger, lines } = capture();
  logger.error("boom", {});
  assert.deepEqual(lines, [["error", "[2025-03-07T12:00:00.000Z] [ERROR] [no-run-id] boom"]]);
});

test("entries below the level are dropped", () => {
  const { logger, lines } = capture({ level: "warn" });

  logger.debug("d");
  logger.info("i");
  logger.warn("w");
  logger.error("e");

  assert.deepEqual(
    lines.map(([level]) => level),
    ["warn", "error"]
  );
});

section("JSON output and bindings");

test("json mode emits one object per entry", () => {
  const { logger, lines } = capture({ json: true, component: "runner" });

  logger.info("done", { status: "COMPLETED" });

  assert.equal(lines.length, 1);
  assert.deepEqual(JSON.parse(lines[0]?.[1] ?? ""), {
    timestamp: "2025-03-07T12:00:00.000Z",
    level: "info",
    component: "runner",
    message: "done",
    status: "COMPLETED",
  });
});

test("child loggers merge bindings without touching the parent", () => {
  const { logger, lines } = capture({ component: "runner" });
  const child = logger.child({ runId: "verif-20250307120000-ab12" });

  child.info("bound");
  logger.info("parent");

  assert.deepEqual(
    lines.map(([, line]) => line),
    [
      "[2025-03-07T12:00:00.000Z] [INFO ] [verif-20250307120000-ab12] runner: bound",
      "[2025-03-07T12:00:00.000Z] [INFO ] [no-run-id] runner: parent",
    ]
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// VERIFICATION IDS
// ═══════════════════════════════════════════════════════════════════════════

section("Verification IDs");

test("generated ids encode the UTC creation time", () => {
  const id = generateVerificationId(new Date("2025-03-07T12:15:30.250Z"));

  assert.match(id, /^verif-20250307121530-[0-9a-f]{4}$/);
  assert.equal(parseVerificationTimestamp(id), "2025-03-07T12:15:30.000Z");
});

test("ids of other formats and impossible dates have no timestamp", () => {
  assert.equal(parseVerificationTimestamp("run-123"), undefined);
  assert.equal(parseVerificationTimestamp("verif-20251307120000-ab12"), undefined);
  assert.equal(parseVerificationTimestamp("verif-20250230120000"), undefined);
  assert.equal(parseVerificationTimestamp("verif-20250228120000"), "2025-02-28T12:00:00.000Z");
});

await run("Logging");
