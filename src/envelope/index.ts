/**
 * Envelope: the message exchanged between stages.
 */

export {
  EnvelopeSchema,
  InlineValueSchema,
  ScalarSchema,
  type Envelope,
  type Scalar,
} from "./schema.js";
export {
  createEnvelope,
  getReference,
  hasReference,
  hasEntry,
  listCategories,
  referencesByCategory,
  getSummary,
  cloneEnvelope,
} from "./envelope.js";
export { serializeEnvelope, deserializeEnvelope, parseEnvelope } from "./serialization.js";
export { EnvelopeManager, type EnvelopeManagerOptions, type SaveOptions } from "./manager.js";
export { Mutex } from "./mutex.js";
