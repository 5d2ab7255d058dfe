/**
 * Blob store backed by an Amazon S3 bucket.
 */

import { GetObjectCommand, NoSuchKey, PutObjectCommand, type S3Client } from "@aws-sdk/client-s3";

import { PipelineError } from "../errors/index.js";
import type { BlobStore } from "./blob-store.js";

function isMissingObject(err: unknown): boolean {
  if (err instanceof NoSuchKey) {
    return true;
  }
  return err instanceof Error && (err.name === "NoSuchKey" || err.name === "NotFound");
}

export class S3BlobStore implements BlobStore {
  readonly container: string;
  private readonly client: S3Client;

  constructor(client: S3Client, bucket: string) {
    this.client = client;
    this.container = bucket;
  }

  async put(key: string, bytes: Uint8Array, contentType: string): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.container,
          Key: key,
          Body: bytes,
          ContentType: contentType,
        })
      );
    } catch (err) {
      throw new PipelineError(
        "StoreUnavailable",
        `Failed to write s3://${this.container}/${key}`,
        { operation: "store.put", key },
        { cause: err }
      );
    }
  }

  async get(key: string): Promise<Uint8Array> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.container, Key: key })
      );
      if (response.Body === undefined) {
        throw new PipelineError("StoreUnavailable", `Empty response body for s3://${this.container}/${key}`, {
          operation: "store.get",
          key,
        });
      }
      return await response.Body.transformToByteArray();
    } catch (err) {
      if (err instanceof PipelineError) {
        throw err;
      }
      if (isMissingObject(err)) {
        throw new PipelineError("NotFound", `No object at s3://${this.container}/${key}`, {
          operation: "store.get",
          key,
        });
      }
      throw new PipelineError(
        "StoreUnavailable",
        `Failed to read s3://${this.container}/${key}`,
        { operation: "store.get", key },
        { cause: err }
      );
    }
  }
}
