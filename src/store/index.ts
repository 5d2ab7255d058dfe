/**
 * Blob storage: store contract, adapters, keys and the typed client.
 */

export type { BlobStore } from "./blob-store.js";
export { MemoryBlobStore } from "./memory-store.js";
export { FileBlobStore } from "./file-store.js";
export { S3BlobStore } from "./s3-store.js";
export {
  slotKey,
  parseSlotKey,
  datePartitionedKey,
  validateKeySegment,
  type SlotAddress,
  type ParsedSlotKey,
} from "./keys.js";
export { BlobStoreClient, type BlobStoreClientOptions } from "./client.js";
