/**
 * Hybrid payload codec.
 *
 * Decides, per payload, whether it travels inline in the orchestrator message
 * or is written to the blob store with only its Reference travelling:
 *
 *   hybrid disabled            -> inline
 *   size(payload) <= threshold -> inline
 *   otherwise                  -> stored, Reference carried
 *
 * size() is the byte length of the stored form: UTF-8 JSON text for JSON
 * payloads, raw length for binary ones. Inline binary travels as base64.
 *
 * An EncodedSlot is either inline or a reference, never both.
 */

import { PipelineError, type ErrorAttribution } from "../errors/index.js";
import { validateReference, type Reference } from "../reference/index.js";
import type { BlobStoreClient, SlotAddress } from "../store/index.js";
import { JsonValueSchema, inexactJsonPath, jsonByteLength, type JsonValue } from "./json.js";

export type Payload =
  | { kind: "json"; value: JsonValue }
  | { kind: "binary"; data: Uint8Array };

export type PayloadKind = Payload["kind"];

export type InlineValue =
  | { encoding: "json"; value: JsonValue }
  | { encoding: "binary"; base64: string };

export type EncodedSlot =
  | { storage: "inline"; inline: InlineValue }
  | { storage: "reference"; encoding: PayloadKind; reference: Reference };

/** 2 MiB */
export const DEFAULT_THRESHOLD_BYTES = 2 * 1024 * 1024;

export interface HybridCodecOptions {
  enabled: boolean;
  thresholdBytes: number;
}

export const DEFAULT_HYBRID_OPTIONS: Readonly<HybridCodecOptions> = Object.freeze({
  enabled: true,
  thresholdBytes: DEFAULT_THRESHOLD_BYTES,
});

export function jsonPayload(value: JsonValue): Payload {
  return { kind: "json", value };
}

export function binaryPayload(data: Uint8Array): Payload {
  return { kind: "binary", data };
}

function decodeBase64(base64: string, attribution: ErrorAttribution): Uint8Array {
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(base64) || base64.length % 4 !== 0) {
    throw new PipelineError("SchemaError", "Inline binary value is not valid base64", attribution);
  }
  return new Uint8Array(Buffer.from(base64, "base64"));
}

export class HybridPayloadCodec {
  private readonly client: BlobStoreClient;
  readonly options: Readonly<HybridCodecOptions>;

  constructor(client: BlobStoreClient, options: HybridCodecOptions = DEFAULT_HYBRID_OPTIONS) {
    if (!Number.isInteger(options.thresholdBytes) || options.thresholdBytes < 0) {
      throw new PipelineError(
        "ValidationError",
        `Threshold must be a non-negative integer, got ${options.thresholdBytes}`,
        { operation: "codec.create" }
      );
    }
    this.client = client;
    this.options = Object.freeze({ ...options });
  }

  /**
   * Byte length of the payload's stored form.
   */
  size(payload: Payload): number {
    if (payload.kind === "binary") {
      return payload.data.byteLength;
    }
    return jsonByteLength(payload.value, { operation: "codec.size" });
  }

  shouldInline(size: number): boolean {
    return !this.options.enabled || size <= this.options.thresholdBytes;
  }

  /**
   * @throws PipelineError (ValidationError) for JSON values that would not
   * decode to the same value, whichever way they are carried
   */
  async encode(address: SlotAddress, payload: Payload): Promise<EncodedSlot> {
    if (payload.kind === "json") {
      const inexact = inexactJsonPath(payload.value);
      if (inexact !== undefined) {
        throw new PipelineError(
          "ValidationError",
          `Payload is not exact JSON: ${inexact.path.join(".") || "(root)"}: ${inexact.message}`,
          { operation: "codec.encode", runId: address.runId, category: address.category, slot: address.slot }
        );
      }
    }
    if (this.shouldInline(this.size(payload))) {
      return { storage: "inline", inline: toInline(payload) };
    }

    const reference =
      payload.kind === "json"
        ? await this.client.putJSON(address, payload.value)
        : await this.client.put(address, payload.data);
    return { storage: "reference", encoding: payload.kind, reference };
  }

  async decode(slot: EncodedSlot, attribution: ErrorAttribution = { operation: "codec.decode" }): Promise<Payload> {
    if (slot.storage === "inline") {
      return fromInline(slot.inline, attribution);
    }

    const reference = validateReference(slot.reference, attribution);
    if (slot.encoding === "json") {
      return { kind: "json", value: await this.client.getJSON(reference, JsonValueSchema) };
    }
    return { kind: "binary", data: await this.client.get(reference) };
  }
}

export function toInline(payload: Payload): InlineValue {
  if (payload.kind === "json") {
    return { encoding: "json", value: payload.value };
  }
  return { encoding: "binary", base64: Buffer.from(payload.data).toString("base64") };
}

export function fromInline(inline: InlineValue, attribution: ErrorAttribution): Payload {
  if (inline.encoding === "json") {
    return { kind: "json", value: inline.value };
  }
  return { kind: "binary", data: decodeBase64(inline.base64, attribution) };
}
