export {
  HybridPayloadCodec,
  DEFAULT_THRESHOLD_BYTES,
  DEFAULT_HYBRID_OPTIONS,
  jsonPayload,
  binaryPayload,
  toInline,
  fromInline,
  type Payload,
  type PayloadKind,
  type InlineValue,
  type EncodedSlot,
  type HybridCodecOptions,
} from "./hybrid.js";
export {
  JsonValueSchema,
  inexactJsonPath,
  toJSONBytes,
  fromJSONBytes,
  jsonByteLength,
  type JsonValue,
} from "./json.js";
