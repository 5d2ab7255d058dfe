export {
  ReferenceSchema,
  INTEGRITY_PATTERN,
  createReference,
  validateReference,
  freezeReferenceMap,
  computeIntegrity,
  referenceUri,
  referenceFilename,
  sameReference,
  type Reference,
  type ReferenceExtras,
} from "./reference.js";
