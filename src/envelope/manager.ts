/**
 * Envelope manager.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STAGE-SIDE ENVELOPE OPERATIONS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * One manager serves one stage invocation. It owns the path from a payload
 * to a registered envelope entry:
 *
 *   saveToEnvelope(envelope, category, slot, payload)
 *     1. catalog check: slot exists, payload kind matches its encoding
 *     2. hybrid codec: inline or write to the blob store
 *     3. register under "<category>_<slot>" inside the critical section
 *
 * Uploads for different slots may run concurrently; registration is
 * serialized so no concurrent save loses an update. A save whose signal has
 * aborted registers nothing and fails with a retryable TransientError.
 *
 * setStatus() and addSummary() mutate the envelope in place and return the
 * same object. Every failure is a PipelineError attributed to
 * (operation, runId, category, slot).
 */

import type { z } from "zod";

import { PipelineError, wrapError, type ErrorAttribution } from "../errors/index.js";
import type { Reference } from "../reference/index.js";
import {
  DEFAULT_CATALOG,
  referenceName,
  type CategoryCatalog,
} from "../categories/index.js";
import type { BlobStoreClient } from "../store/index.js";
import {
  fromInline,
  type EncodedSlot,
  type HybridPayloadCodec,
  type JsonValue,
  type Payload,
} from "../codec/index.js";
import { transition, type VerificationStatus } from "../status/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import {
  createEnvelope,
  getReference,
  listCategories,
} from "./envelope.js";
import type { Envelope, Scalar } from "./schema.js";
import { Mutex } from "./mutex.js";

export interface EnvelopeManagerOptions {
  client: BlobStoreClient;
  codec: HybridPayloadCodec;
  catalog?: CategoryCatalog;
  logger?: Logger;
  /** Clock for createdAt/updatedAt */
  now?: () => Date;
}

export interface SaveOptions {
  /** Abort signal of the stage deadline */
  signal?: AbortSignal;
}

function abortedError(attribution: ErrorAttribution, signal: AbortSignal): PipelineError {
  return new PipelineError(
    "TransientError",
    "Stage deadline expired before the slot was registered",
    attribution,
    { cause: signal.reason }
  );
}

export class EnvelopeManager {
  private readonly client: BlobStoreClient;
  private readonly codec: HybridPayloadCodec;
  private readonly catalog: CategoryCatalog;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly mutex = new Mutex();

  constructor(options: EnvelopeManagerOptions) {
    this.client = options.client;
    this.codec = options.codec;
    this.catalog = options.catalog ?? DEFAULT_CATALOG;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "envelope" });
    this.now = options.now ?? (() => new Date());
  }

  create(verificationId: string): Envelope {
    const envelope = createEnvelope(verificationId, this.now());
    this.logger.debug("Envelope created", { verificationId });
    return envelope;
  }

  /**
   * Encode a payload and register it under "<category>_<slot>", replacing any
   * previous representation of that name.
   */
  async saveToEnvelope(
    envelope: Envelope,
    category: string,
    slot: string,
    payload: Payload,
    options: SaveOptions = {}
  ): Promise<Envelope> {
    const attribution: ErrorAttribution = {
      operation: "saveToEnvelope",
      runId: envelope.verificationId,
      category,
      slot,
    };
    const { signal } = options;
    if (signal?.aborted) {
      throw abortedError(attribution, signal);
    }

    const name = referenceName(category, slot);
    if (name === "__proto__") {
      throw new PipelineError("ValidationError", `"${name}" is not an allowed entry name`, attribution);
    }

    let encoded: EncodedSlot;
    try {
      const definition = this.catalog.require(category, slot, attribution);
      if (definition.encoding !== payload.kind) {
        throw new PipelineError(
          "ValidationError",
          `Slot ${category}.${slot} holds ${definition.encoding} payloads, got ${payload.kind}`,
          attribution
        );
      }
      encoded = await this.codec.encode({ runId: envelope.verificationId, category, slot }, payload);
    } catch (err) {
      throw wrapError(err, attribution);
    }

    await this.mutex.runExclusive(() => {
      if (signal?.aborted) {
        throw abortedError(attribution, signal);
      }
      register(envelope, name, encoded);
      envelope.updatedAt = this.now().toISOString();
    });

    this.logger.debug("Slot saved", {
      runId: envelope.verificationId,
      name,
      storage: encoded.storage,
    });
    return envelope;
  }

  /** saveToEnvelope() for JSON slots */
  async saveJSON(
    envelope: Envelope,
    category: string,
    slot: string,
    value: JsonValue,
    options: SaveOptions = {}
  ): Promise<Envelope> {
    return this.saveToEnvelope(envelope, category, slot, { kind: "json", value }, options);
  }

  getReference(envelope: Envelope, name: string): Reference {
    return getReference(envelope, name);
  }

  async retrieve(reference: Reference): Promise<Uint8Array> {
    return this.client.get(reference);
  }

  async retrieveJSON<T>(reference: Reference, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    return this.client.getJSON(reference, schema);
  }

  /**
   * Decode the payload of a slot, whether inline or stored.
   *
   * @throws PipelineError (ReferenceError) if the slot was never written
   */
  async loadSlot(envelope: Envelope, category: string, slot: string): Promise<Payload> {
    const attribution: ErrorAttribution = {
      operation: "loadSlot",
      runId: envelope.verificationId,
      category,
      slot,
    };
    const name = referenceName(category, slot);

    try {
      const definition = this.catalog.require(category, slot, attribution);
      const inline = Object.hasOwn(envelope.inline, name) ? envelope.inline[name] : undefined;
      if (inline !== undefined) {
        return fromInline(inline, attribution);
      }
      const reference = getReference(envelope, name);
      return await this.codec.decode(
        { storage: "reference", encoding: definition.encoding, reference },
        attribution
      );
    } catch (err) {
      throw wrapError(err, attribution);
    }
  }

  /**
   * Load a JSON slot and validate it.
   *
   * @throws PipelineError (SchemaError) if the payload does not match
   */
  async loadJSON<T>(
    envelope: Envelope,
    category: string,
    slot: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const payload = await this.loadSlot(envelope, category, slot);
    const attribution: ErrorAttribution = {
      operation: "loadJSON",
      runId: envelope.verificationId,
      category,
      slot,
    };
    if (payload.kind !== "json") {
      throw new PipelineError("SchemaError", `Slot ${category}.${slot} is not JSON`, attribution);
    }
    const result = schema.safeParse(payload.value);
    if (!result.success) {
      const errors = result.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new PipelineError("SchemaError", `Slot payload failed validation: ${errors}`, attribution, {
        cause: result.error,
      });
    }
    return result.data;
  }

  /**
   * Advance the envelope status (forward only). Earlier or equal targets are
   * a no-op.
   *
   * @throws PipelineError (ValidationError) on an illegal forward move
   */
  setStatus(envelope: Envelope, status: VerificationStatus): Envelope {
    const result = transition(envelope.status, status, {
      operation: "setStatus",
      runId: envelope.verificationId,
    });
    if (result.outcome === "advanced") {
      envelope.status = result.status;
      envelope.updatedAt = this.now().toISOString();
      this.logger.info("Status advanced", {
        runId: envelope.verificationId,
        from: result.from,
        to: result.status,
      });
    } else if (result.requested !== result.status) {
      this.logger.debug("Status kept", {
        runId: envelope.verificationId,
        status: result.status,
        requested: result.requested,
      });
    }
    return envelope;
  }

  /**
   * @throws PipelineError (ValidationError) for a key a plain object cannot hold
   */
  addSummary(envelope: Envelope, key: string, value: Scalar): Envelope {
    if (key === "__proto__") {
      throw new PipelineError("ValidationError", `"${key}" is not an allowed summary key`, {
        operation: "addSummary",
        runId: envelope.verificationId,
      });
    }
    envelope.summary[key] = value;
    envelope.updatedAt = this.now().toISOString();
    return envelope;
  }

  listCategories(envelope: Envelope): string[] {
    return listCategories(envelope);
  }
}

function register(envelope: Envelope, name: string, encoded: EncodedSlot): void {
  if (encoded.storage === "inline") {
    delete envelope.references[name];
    envelope.inline[name] = encoded.inline;
  } else {
    delete envelope.inline[name];
    envelope.references[name] = encoded.reference;
  }
}
