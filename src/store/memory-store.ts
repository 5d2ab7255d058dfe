/**
 * In-process blob store for tests and local runs.
 */

import { PipelineError } from "../errors/index.js";
import type { BlobStore } from "./blob-store.js";

interface StoredObject {
  bytes: Uint8Array;
  contentType: string;
}

export class MemoryBlobStore implements BlobStore {
  readonly container: string;
  private readonly objects = new Map<string, StoredObject>();

  constructor(container = "memory") {
    this.container = container;
  }

  async put(key: string, bytes: Uint8Array, contentType: string): Promise<void> {
    // Copy so later mutation of the caller's buffer cannot change stored data.
    this.objects.set(key, { bytes: Uint8Array.from(bytes), contentType });
  }

  async get(key: string): Promise<Uint8Array> {
    const stored = this.objects.get(key);
    if (stored === undefined) {
      throw new PipelineError("NotFound", `No object at ${this.container}/${key}`, {
        operation: "store.get",
        key,
      });
    }
    return Uint8Array.from(stored.bytes);
  }

  /** Sorted keys currently stored */
  keys(): string[] {
    return [...this.objects.keys()].sort();
  }

  contentTypeOf(key: string): string | undefined {
    return this.objects.get(key)?.contentType;
  }

  /** Replace stored bytes without going through put(), e.g. to simulate corruption */
  overwrite(key: string, bytes: Uint8Array): void {
    const stored = this.objects.get(key);
    this.objects.set(key, {
      bytes: Uint8Array.from(bytes),
      contentType: stored?.contentType ?? "application/octet-stream",
    });
  }

  get size(): number {
    return this.objects.size;
  }
}
