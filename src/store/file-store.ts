/**
 * Blob store backed by a local directory.
 *
 * Keys map to relative paths below the root directory; the container name is
 * the directory's base name unless given explicitly.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve, sep } from "node:path";

import { PipelineError } from "../errors/index.js";
import type { BlobStore } from "./blob-store.js";

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const code = err.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export class FileBlobStore implements BlobStore {
  readonly container: string;
  readonly directory: string;

  constructor(directory: string, container?: string) {
    this.directory = resolve(directory);
    this.container = container ?? basename(this.directory);
  }

  private pathFor(key: string, operation: string): string {
    const path = resolve(join(this.directory, key));
    if (!path.startsWith(this.directory + sep)) {
      throw new PipelineError("ReferenceError", `Key escapes the store directory: ${key}`, {
        operation,
        key,
      });
    }
    return path;
  }

  async put(key: string, bytes: Uint8Array, _contentType: string): Promise<void> {
    const path = this.pathFor(key, "store.put");
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, bytes);
    } catch (err) {
      throw new PipelineError(
        "StoreUnavailable",
        `Failed to write ${path}`,
        { operation: "store.put", key },
        { cause: err }
      );
    }
  }

  async get(key: string): Promise<Uint8Array> {
    const path = this.pathFor(key, "store.get");
    try {
      return new Uint8Array(await readFile(path));
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        throw new PipelineError("NotFound", `No object at ${path}`, { operation: "store.get", key });
      }
      throw new PipelineError(
        "StoreUnavailable",
        `Failed to read ${path}`,
        { operation: "store.get", key },
        { cause: err }
      );
    }
  }
}
