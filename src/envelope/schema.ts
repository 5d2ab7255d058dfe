/**
 * Envelope schema.
 *
 * The envelope is the message passed between stages:
 *
 *   {
 *     verificationId, status,
 *     references: { "<category>_<slot>": Reference },   stored payloads
 *     inline:     { "<category>_<slot>": InlineValue },  small payloads (omitted when empty)
 *     summary:    { key: string | number | boolean | null },
 *     createdAt, updatedAt
 *   }
 *
 * A name appears in at most one of `references` and `inline`. Parsed
 * references are frozen.
 */

import { z } from "zod";

import { ReferenceSchema, freezeReferenceMap } from "../reference/index.js";
import { JsonValueSchema } from "../codec/index.js";
import { VerificationStatus } from "../status/index.js";

export const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export type Scalar = z.infer<typeof ScalarSchema>;

export const InlineValueSchema = z.discriminatedUnion("encoding", [
  z.object({ encoding: z.literal("json"), value: JsonValueSchema }),
  z.object({ encoding: z.literal("binary"), base64: z.string() }),
]);

const EnvelopeObject = z.object({
  verificationId: z.string().min(1),
  status: VerificationStatus,
  references: z.record(ReferenceSchema).default({}),
  inline: z.record(InlineValueSchema).default({}),
  summary: z.record(ScalarSchema).default({}),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

const ENTRY_MAPS = ["references", "inline", "summary"] as const;

export const EnvelopeSchema = z
  .unknown()
  .superRefine((value, ctx) => {
    if (typeof value !== "object" || value === null) {
      return;
    }
    for (const map of ENTRY_MAPS) {
      const entries: unknown = Object.getOwnPropertyDescriptor(value, map)?.value;
      if (typeof entries === "object" && entries !== null && Object.hasOwn(entries, "__proto__")) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [map, "__proto__"],
          message: '"__proto__" is not an allowed key',
        });
      }
    }
  })
  .pipe(
    EnvelopeObject.superRefine((envelope, ctx) => {
      for (const name of Object.keys(envelope.inline)) {
        if (Object.hasOwn(envelope.references, name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["inline", name],
            message: `"${name}" is registered both inline and by reference`,
          });
        }
      }
    })
  )
  .transform((envelope) => ({ ...envelope, references: freezeReferenceMap(envelope.references) }));

export type Envelope = z.infer<typeof EnvelopeObject>;
