/**
 * Envelope construction and read-only helpers.
 */

import { PipelineError } from "../errors/index.js";
import type { Reference } from "../reference/index.js";
import { parseReferenceName } from "../categories/index.js";
import { validateKeySegment } from "../store/index.js";
import type { Envelope, Scalar } from "./schema.js";

/**
 * New envelope at INITIALIZED with empty maps.
 *
 * @throws PipelineError (ValidationError) if the run id cannot form blob keys
 */
export function createEnvelope(verificationId: string, now: Date = new Date()): Envelope {
  validateKeySegment(verificationId, "verification id", {
    operation: "createEnvelope",
    runId: verificationId,
  });
  const timestamp = now.toISOString();
  return {
    verificationId,
    status: "INITIALIZED",
    references: {},
    inline: {},
    summary: {},
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

export function hasReference(envelope: Envelope, name: string): boolean {
  return Object.hasOwn(envelope.references, name);
}

export function hasEntry(envelope: Envelope, name: string): boolean {
  return hasReference(envelope, name) || Object.hasOwn(envelope.inline, name);
}

/**
 * Reference registered under `name`.
 *
 * @throws PipelineError (ReferenceError) if nothing is registered by reference
 */
export function getReference(envelope: Envelope, name: string): Reference {
  const reference = hasReference(envelope, name) ? envelope.references[name] : undefined;
  if (reference === undefined) {
    const parsed = parseReferenceName(name);
    const detail = Object.hasOwn(envelope.inline, name) ? " (payload is inline)" : "";
    throw new PipelineError(
      "ReferenceError",
      `No reference registered under "${name}"${detail}`,
      {
        operation: "getReference",
        runId: envelope.verificationId,
        category: parsed?.category,
        slot: parsed?.slot,
      }
    );
  }
  return reference;
}

/**
 * Distinct category prefixes of every registered name, sorted.
 */
export function listCategories(envelope: Envelope): string[] {
  const categories = new Set<string>();
  for (const name of [...Object.keys(envelope.references), ...Object.keys(envelope.inline)]) {
    const parsed = parseReferenceName(name);
    if (parsed !== undefined) {
      categories.add(parsed.category);
    }
  }
  return [...categories].sort();
}

/**
 * References grouped by category, keyed by slot name.
 */
export function referencesByCategory(envelope: Envelope): Record<string, Record<string, Reference>> {
  const grouped: Record<string, Record<string, Reference>> = {};
  for (const name of Object.keys(envelope.references).sort()) {
    const parsed = parseReferenceName(name);
    const reference = envelope.references[name];
    if (parsed === undefined || reference === undefined) {
      continue;
    }
    const bucket = grouped[parsed.category] ?? {};
    bucket[parsed.slot] = reference;
    grouped[parsed.category] = bucket;
  }
  return grouped;
}

export function getSummary(envelope: Envelope, key: string): Scalar | undefined {
  return Object.hasOwn(envelope.summary, key) ? envelope.summary[key] : undefined;
}

/**
 * Independent copy whose maps can be mutated without touching the original.
 * References and inline values are immutable and shared.
 */
export function cloneEnvelope(envelope: Envelope): Envelope {
  return {
    ...envelope,
    references: { ...envelope.references },
    inline: { ...envelope.inline },
    summary: { ...envelope.summary },
  };
}
