/**
 * References to stored blobs.
 *
 * A Reference names one object in the blob store:
 *
 *   { bucket, key, integrity?, size? }
 *
 * `bucket` is the container, `key` the deterministic object key (see
 * store/keys.ts), `integrity` a "sha256:<hex>" digest of the stored bytes and
 * `size` their byte length. References are frozen on creation and shared
 * read-only between envelope entries.
 */

import { createHash } from "node:crypto";
import { z } from "zod";

import { PipelineError, type ErrorAttribution } from "../errors/index.js";

export const INTEGRITY_PATTERN = /^sha256:[0-9a-f]{64}$/;

export const ReferenceSchema = z.object({
  bucket: z.string().min(1, "bucket must not be empty"),
  key: z.string().min(1, "key must not be empty"),
  integrity: z.string().regex(INTEGRITY_PATTERN, "integrity must be sha256:<64 hex>").optional(),
  size: z.number().int().nonnegative().optional(),
});

export type Reference = Readonly<z.infer<typeof ReferenceSchema>>;

export interface ReferenceExtras {
  integrity?: string;
  size?: number;
}

/**
 * Validate an unknown value as a Reference.
 *
 * @throws PipelineError (ReferenceError) if the value is not a valid Reference
 */
export function validateReference(value: unknown, attribution: ErrorAttribution): Reference {
  const result = ReferenceSchema.safeParse(value);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new PipelineError("ReferenceError", `Invalid reference: ${errors}`, attribution);
  }
  return freezeReference(result.data);
}

/**
 * Create a frozen Reference.
 *
 * Optional fields are only present when supplied, so two references built
 * from the same inputs serialize to the same bytes.
 */
export function createReference(
  bucket: string,
  key: string,
  extras: ReferenceExtras = {}
): Reference {
  return validateReference({ bucket, key, ...extras }, { operation: "createReference", key });
}

function freezeReference(ref: z.infer<typeof ReferenceSchema>): Reference {
  const out: z.infer<typeof ReferenceSchema> = { bucket: ref.bucket, key: ref.key };
  if (ref.integrity !== undefined) {
    out.integrity = ref.integrity;
  }
  if (ref.size !== undefined) {
    out.size = ref.size;
  }
  return Object.freeze(out);
}

/**
 * Frozen copies of every reference in a validated map.
 */
export function freezeReferenceMap(
  references: Record<string, z.infer<typeof ReferenceSchema>>
): Record<string, Reference> {
  const out: Record<string, Reference> = {};
  for (const [name, ref] of Object.entries(references)) {
    out[name] = freezeReference(ref);
  }
  return out;
}

/**
 * Integrity tag for a byte sequence.
 */
export function computeIntegrity(bytes: Uint8Array): string {
  return `sha256:${createHash("sha256").update(bytes).digest("hex")}`;
}

export function referenceUri(ref: Reference): string {
  return `s3://${ref.bucket}/${ref.key}`;
}

/**
 * Last path segment of the key, e.g. "turn1Analysis.json".
 */
export function referenceFilename(ref: Reference): string {
  const slash = ref.key.lastIndexOf("/");
  return slash === -1 ? ref.key : ref.key.slice(slash + 1);
}

export function sameReference(a: Reference, b: Reference): boolean {
  return (
    a.bucket === b.bucket &&
    a.key === b.key &&
    a.integrity === b.integrity &&
    a.size === b.size
  );
}
