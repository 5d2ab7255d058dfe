/**
 * Category catalog.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CLOSED, VERSIONED SLOT TAXONOMY
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Every artifact a stage writes lives in exactly one named slot of one
 * category. The catalog is the single source of truth for:
 *
 * 1. NAMING: the envelope registers a slot under "<category>_<slot>" and the
 *    blob store keys it as "<runId>/<category>/<slot>.<ext>".
 *
 * 2. ENCODING: each slot is either JSON or binary. Writers must supply the
 *    matching payload kind.
 *
 * 3. VERSIONING: CATALOG_VERSION follows semver. Adding a slot is a minor
 *    bump; renaming or removing one is a breaking (major) change. Readers
 *    accept any catalog with the same major version.
 */

import { z } from "zod";

import { PipelineError, type ErrorAttribution } from "../errors/index.js";

export const CATALOG_VERSION = "1.0.0";

export const Category = z.enum(["images", "prompts", "responses", "processing", "errors"]);
export type Category = z.infer<typeof Category>;

export const SlotEncoding = z.enum(["json", "binary"]);
export type SlotEncoding = z.infer<typeof SlotEncoding>;

export interface SlotDefinition {
  readonly encoding: SlotEncoding;
  readonly extension: string;
  readonly contentType: string;
  readonly description: string;
}

function jsonSlot(description: string): SlotDefinition {
  return { encoding: "json", extension: "json", contentType: "application/json", description };
}

function binarySlot(description: string): SlotDefinition {
  return {
    encoding: "binary",
    extension: "bin",
    contentType: "application/octet-stream",
    description,
  };
}

export const SLOT_DEFINITIONS = {
  images: {
    metadata: jsonSlot("Combined metadata for both images of the run"),
    referenceMetadata: jsonSlot("Metadata of the reference (layout or previous) image"),
    checkingMetadata: jsonSlot("Metadata of the image being checked"),
    referenceBase64: binarySlot("Raw bytes of the reference image"),
    checkingBase64: binarySlot("Raw bytes of the image being checked"),
  },
  prompts: {
    systemPrompt: jsonSlot("System prompt shared by both turns"),
    turn1Prompt: jsonSlot("User prompt for the first turn"),
    turn2Prompt: jsonSlot("User prompt for the second turn"),
  },
  responses: {
    turn1Raw: jsonSlot("Unprocessed model response for the first turn"),
    turn2Raw: jsonSlot("Unprocessed model response for the second turn"),
  },
  processing: {
    initialization: jsonSlot("Run parameters captured at initialization"),
    layoutMetadata: jsonSlot("Layout the checked image is compared against"),
    historicalContext: jsonSlot("Previous verification used as comparison baseline"),
    turn1Analysis: jsonSlot("Parsed analysis of the first turn"),
    turn2Analysis: jsonSlot("Parsed analysis of the second turn"),
    finalResults: jsonSlot("Final verification outcome"),
  },
  errors: {
    failure: jsonSlot("Error report written by the failure finalizer"),
  },
} as const satisfies Record<Category, Record<string, SlotDefinition>>;

/** Slot names valid for one category */
export type SlotName<C extends Category> = keyof (typeof SLOT_DEFINITIONS)[C] & string;

/** Dotted identifier, e.g. "images.referenceBase64" */
export type SlotId = { [C in Category]: `${C}.${SlotName<C>}` }[Category];

/**
 * Canonical envelope name for a slot: "<category>_<slot>".
 */
export function referenceName(category: string, slot: string): string {
  return `${category}_${slot}`;
}

/**
 * Split an envelope name back into category and slot.
 * Returns undefined if the name has no underscore separator.
 */
export function parseReferenceName(name: string): { category: string; slot: string } | undefined {
  const separator = name.indexOf("_");
  if (separator <= 0 || separator === name.length - 1) {
    return undefined;
  }
  return { category: name.slice(0, separator), slot: name.slice(separator + 1) };
}

/**
 * Check if a catalog version is readable by this catalog.
 * Only the major version has to match.
 */
export function isCatalogCompatible(version: string, current: string = CATALOG_VERSION): boolean {
  const [major] = version.split(".").map(Number);
  const [currentMajor] = current.split(".").map(Number);
  return major !== undefined && !Number.isNaN(major) && major === currentMajor;
}

/**
 * Read-only view over the slot definitions.
 */
export class CategoryCatalog {
  readonly version: string;
  private readonly _slots: ReadonlyMap<string, ReadonlyMap<string, SlotDefinition>>;

  private constructor(
    version: string,
    slots: ReadonlyMap<string, ReadonlyMap<string, SlotDefinition>>
  ) {
    this.version = version;
    this._slots = slots;
  }

  static create(
    definitions: Readonly<Record<string, Readonly<Record<string, SlotDefinition>>>> = SLOT_DEFINITIONS,
    version: string = CATALOG_VERSION
  ): CategoryCatalog {
    const slots = new Map<string, ReadonlyMap<string, SlotDefinition>>();
    for (const category of Object.keys(definitions).sort()) {
      const entries = definitions[category] ?? {};
      const bySlot = new Map<string, SlotDefinition>();
      for (const slot of Object.keys(entries).sort()) {
        const definition = entries[slot];
        if (definition !== undefined) {
          bySlot.set(slot, Object.freeze({ ...definition }));
        }
      }
      slots.set(category, bySlot);
    }
    return new CategoryCatalog(version, slots);
  }

  /** Sorted category names */
  listCategories(): string[] {
    return [...this._slots.keys()];
  }

  /** Sorted slot names of one category (empty for unknown categories) */
  slotsOf(category: string): string[] {
    return [...(this._slots.get(category)?.keys() ?? [])];
  }

  /** Every slot as a dotted identifier, sorted */
  listSlotIds(): string[] {
    return this.listCategories().flatMap((c) => this.slotsOf(c).map((s) => `${c}.${s}`));
  }

  has(category: string, slot: string): boolean {
    return this.describe(category, slot) !== undefined;
  }

  describe(category: string, slot: string): SlotDefinition | undefined {
    return this._slots.get(category)?.get(slot);
  }

  /**
   * Definition of a slot that must exist.
   *
   * @throws PipelineError (ValidationError) for unknown categories or slots
   */
  require(category: string, slot: string, attribution: ErrorAttribution): SlotDefinition {
    const definition = this.describe(category, slot);
    if (definition === undefined) {
      const what = this._slots.has(category)
        ? `Unknown slot "${slot}" in category "${category}"`
        : `Unknown category "${category}"`;
      throw new PipelineError("ValidationError", what, { ...attribution, category, slot });
    }
    return definition;
  }

  isCompatible(version: string): boolean {
    return isCatalogCompatible(version, this.version);
  }
}

export const DEFAULT_CATALOG: CategoryCatalog = CategoryCatalog.create();
