/**
 * Category catalog: closed, versioned taxonomy of payload slots.
 */

export {
  CATALOG_VERSION,
  Category,
  SlotEncoding,
  SLOT_DEFINITIONS,
  CategoryCatalog,
  DEFAULT_CATALOG,
  referenceName,
  parseReferenceName,
  isCatalogCompatible,
  type SlotDefinition,
  type SlotName,
  type SlotId,
} from "./catalog.js";
