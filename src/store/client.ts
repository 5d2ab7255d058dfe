/**
 * Typed blob store client.
 *
 * Wraps a BlobStore with slot addressing, Reference construction and
 * integrity checking:
 *
 *   put(address, bytes)           -> Reference   key from (runId, category, slot)
 *   putJSON(address, value)       -> Reference
 *   putAt(key, bytes) / putJSONAt -> Reference   raw keys (date-partitioned logs)
 *   get(reference)                -> bytes       NotFound | Corrupt | ReferenceError
 *   getJSON(reference, schema)    -> T           SchemaError on decode/shape failure
 *
 * Identical bytes written to the same slot always yield an identical
 * Reference, so re-running a stage is safe.
 */

import type { z } from "zod";

import {
  PipelineError,
  isPipelineError,
  wrapError,
  type ErrorAttribution,
} from "../errors/index.js";
import {
  computeIntegrity,
  createReference,
  validateReference,
  type Reference,
} from "../reference/index.js";
import { DEFAULT_CATALOG, type CategoryCatalog } from "../categories/index.js";
import { fromJSONBytes, toJSONBytes } from "../codec/json.js";
import type { BlobStore } from "./blob-store.js";
import { parseSlotKey, slotKey, type SlotAddress } from "./keys.js";

export interface BlobStoreClientOptions {
  /** Record sha256 integrity tags on written references (default: true) */
  integrity?: boolean;
  catalog?: CategoryCatalog;
}

const JSON_CONTENT_TYPE = "application/json";

function attributionForKey(operation: string, key: string): ErrorAttribution {
  const parsed = parseSlotKey(key);
  if (parsed === undefined) {
    return { operation, key };
  }
  return { operation, runId: parsed.runId, category: parsed.category, slot: parsed.slot, key };
}

export class BlobStoreClient {
  private readonly store: BlobStore;
  private readonly integrity: boolean;
  readonly catalog: CategoryCatalog;

  constructor(store: BlobStore, options: BlobStoreClientOptions = {}) {
    this.store = store;
    this.integrity = options.integrity ?? true;
    this.catalog = options.catalog ?? DEFAULT_CATALOG;
  }

  get container(): string {
    return this.store.container;
  }

  /**
   * Write bytes to a catalog slot.
   */
  async put(address: SlotAddress, bytes: Uint8Array): Promise<Reference> {
    const attribution: ErrorAttribution = { operation: "store.put", ...address };
    const definition = this.catalog.require(address.category, address.slot, attribution);
    const key = slotKey(address, definition.extension);
    return this.write(key, bytes, definition.contentType, { ...attribution, key });
  }

  async putJSON(address: SlotAddress, value: unknown): Promise<Reference> {
    const bytes = toJSONBytes(value, { operation: "store.putJSON", ...address });
    return this.put(address, bytes);
  }

  /**
   * Write bytes under an explicit key, outside the slot layout.
   */
  async putAt(key: string, bytes: Uint8Array, contentType: string): Promise<Reference> {
    return this.write(key, bytes, contentType, { operation: "store.putAt", key });
  }

  async putJSONAt(key: string, value: unknown): Promise<Reference> {
    const bytes = toJSONBytes(value, { operation: "store.putJSONAt", key });
    return this.putAt(key, bytes, JSON_CONTENT_TYPE);
  }

  /**
   * Read the bytes a reference points to.
   *
   * @throws PipelineError ReferenceError | NotFound | StoreUnavailable | Corrupt
   */
  async get(reference: Reference): Promise<Uint8Array> {
    const ref = validateReference(reference, { operation: "store.get" });
    const attribution = attributionForKey("store.get", ref.key);

    if (ref.bucket !== this.store.container) {
      throw new PipelineError(
        "ReferenceError",
        `Reference points to container "${ref.bucket}", store is "${this.store.container}"`,
        attribution
      );
    }

    let bytes: Uint8Array;
    try {
      bytes = await this.store.get(ref.key);
    } catch (err) {
      throw this.storeFailure(err, attribution);
    }

    if (ref.size !== undefined && ref.size !== bytes.byteLength) {
      throw new PipelineError(
        "Corrupt",
        `Size mismatch: expected ${ref.size} bytes, read ${bytes.byteLength}`,
        attribution
      );
    }
    if (ref.integrity !== undefined) {
      const actual = computeIntegrity(bytes);
      if (actual !== ref.integrity) {
        throw new PipelineError("Corrupt", "Integrity check failed", attribution, {
          details: { expected: ref.integrity, actual },
        });
      }
    }
    return bytes;
  }

  /**
   * Read and validate a JSON payload.
   *
   * @throws PipelineError (SchemaError) if the bytes are not JSON or do not
   *         match the schema
   */
  async getJSON<T>(reference: Reference, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const bytes = await this.get(reference);
    const attribution = attributionForKey("store.getJSON", reference.key);
    const parsed = fromJSONBytes(bytes, attribution);

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const errors = result.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new PipelineError("SchemaError", `Stored payload failed validation: ${errors}`, attribution, {
        cause: result.error,
      });
    }
    return result.data;
  }

  private async write(
    key: string,
    bytes: Uint8Array,
    contentType: string,
    attribution: ErrorAttribution
  ): Promise<Reference> {
    try {
      await this.store.put(key, bytes, contentType);
    } catch (err) {
      throw this.storeFailure(err, attribution);
    }
    return createReference(this.store.container, key, {
      size: bytes.byteLength,
      integrity: this.integrity ? computeIntegrity(bytes) : undefined,
    });
  }

  private storeFailure(err: unknown, attribution: ErrorAttribution): PipelineError {
    if (isPipelineError(err)) {
      return wrapError(err, attribution);
    }
    const verb = attribution.operation === "store.get" ? "read" : "write";
    return new PipelineError(
      "StoreUnavailable",
      `Backing store failed to ${verb} ${attribution.key ?? "object"}`,
      attribution,
      { cause: err }
    );
  }
}
