#!/usr/bin/env node
/**
 * CLI tool to inspect a serialized envelope.
 *
 * Reads an envelope JSON file (as passed between stages), validates it and
 * prints what it carries: status, stored references grouped by category,
 * inline payloads and summary fields. Names the category catalog does not
 * know are flagged.
 *
 * Usage:
 *   npm run inspect-envelope -- envelope.json
 *   npm run inspect-envelope -- --file envelope.json --json
 *
 * Options:
 *   --file <path>   Envelope JSON file
 *   --json          Output the summary as JSON
 *   -h, --help      Show help
 *
 * Exit codes:
 *   0 - Envelope is valid
 *   1 - File missing or envelope invalid
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  deserializeEnvelope,
  listCategories,
  type Envelope,
  type Scalar,
} from "../envelope/index.js";
import { DEFAULT_CATALOG, parseReferenceName, type CategoryCatalog } from "../categories/index.js";
import { jsonByteLength } from "../codec/index.js";
import { errorMessage, isPipelineError } from "../errors/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

export interface EntrySummary {
  name: string;
  category: string;
  slot: string;
  storage: "reference" | "inline";
  /** Byte length of the payload, when known */
  size?: number;
  /** Blob URI for stored payloads */
  location?: string;
  /** False when the catalog has no such slot */
  known: boolean;
}

export interface EnvelopeSummary {
  verificationId: string;
  status: string;
  createdAt: string;
  updatedAt: string;
  categories: string[];
  entries: EntrySummary[];
  summary: Record<string, Scalar>;
  unknownEntries: number;
}

function splitName(name: string): { category: string; slot: string } {
  return parseReferenceName(name) ?? { category: "", slot: name };
}

/**
 * Flatten an envelope into one row per registered payload, sorted by name.
 */
export function summarizeEnvelope(
  envelope: Envelope,
  catalog: CategoryCatalog = DEFAULT_CATALOG
): EnvelopeSummary {
  const entries: EntrySummary[] = [];

  for (const [name, reference] of Object.entries(envelope.references)) {
    const { category, slot } = splitName(name);
    entries.push({
      name,
      category,
      slot,
      storage: "reference",
      size: reference.size,
      location: `s3://${reference.bucket}/${reference.key}`,
      known: catalog.has(category, slot),
    });
  }

  for (const [name, inline] of Object.entries(envelope.inline)) {
    const { category, slot } = splitName(name);
    entries.push({
      name,
      category,
      slot,
      storage: "inline",
      size:
        inline.encoding === "binary"
          ? Buffer.byteLength(inline.base64, "base64")
          : jsonByteLength(inline.value, { operation: "inspectEnvelope", category, slot }),
      known: catalog.has(category, slot),
    });
  }

  entries.sort((a, b) => a.name.localeCompare(b.name));

  return {
    verificationId: envelope.verificationId,
    status: envelope.status,
    createdAt: envelope.createdAt,
    updatedAt: envelope.updatedAt,
    categories: listCategories(envelope),
    entries,
    summary: { ...envelope.summary },
    unknownEntries: entries.filter((e) => !e.known).length,
  };
}

/**
 * Plain-text rendering of a summary.
 */
export function formatEnvelopeSummary(summary: EnvelopeSummary): string {
  const lines = [
    `Verification: ${summary.verificationId}`,
    `Status:       ${summary.status}`,
    `Created:      ${summary.createdAt}`,
    `Updated:      ${summary.updatedAt}`,
    "",
  ];

  if (summary.entries.length === 0) {
    lines.push("No payloads registered");
  }

  for (const category of summary.categories) {
    lines.push(`[${category}]`);
    for (const entry of summary.entries.filter((e) => e.category === category)) {
      const size = entry.size === undefined ? "?" : `${entry.size} B`;
      const where = entry.location ?? "inline";
      const flag = entry.known ? "" : " (unknown slot)";
      lines.push(`  ${entry.slot.padEnd(20)} ${size.padStart(10)}  ${where}${flag}`);
    }
  }

  const summaryKeys = Object.keys(summary.summary).sort();
  if (summaryKeys.length > 0) {
    lines.push("", "Summary:");
    for (const key of summaryKeys) {
      lines.push(`  ${key}: ${JSON.stringify(summary.summary[key])}`);
    }
  }

  return lines.join("\n");
}

// ═══════════════════════════════════════════════════════════════════════════
// MAIN
// ═══════════════════════════════════════════════════════════════════════════

function parseCliArgs() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      file: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: inspect-envelope <path> [options]

Options:
  --file <path>   Envelope JSON file
  --json          Output the summary as JSON
  -h, --help      Show this help message
`);
    process.exit(0);
  }

  return { ...values, file: values.file ?? positionals[0] };
}

async function main(): Promise<void> {
  const args = parseCliArgs();

  if (args.file === undefined) {
    console.error("Error: an envelope file is required");
    process.exit(1);
  }

  const path = resolve(args.file);
  if (!existsSync(path)) {
    console.error(`Error: envelope file not found: ${path}`);
    process.exit(1);
  }

  const summary = summarizeEnvelope(deserializeEnvelope(readFileSync(path, "utf-8")));

  if (args.json === true) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    console.log(formatEnvelopeSummary(summary));
  }
  process.exit(0);
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] !== undefined &&
  (process.argv[1].endsWith("inspect-envelope.ts") ||
   process.argv[1].endsWith("inspect-envelope.js"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    const message = isPipelineError(err) ? `${err.kind}: ${err.message}` : errorMessage(err);
    console.error(`Error: ${message}`);
    process.exit(1);
  });
}
