/**
 * Blob store contract.
 *
 * A backing store holds opaque bytes under string keys inside one container
 * (an S3 bucket, a directory, a map). Adapters report failures as
 * PipelineErrors:
 *
 *   get() on a missing key        NotFound
 *   any other backend failure     StoreUnavailable (cause = backend error)
 *
 * Adapters never retry; the error classifier decides whether a failure is
 * worth another attempt.
 */

export interface BlobStore {
  /** Container name recorded as `bucket` in every Reference */
  readonly container: string;

  /** Write (or overwrite) an object */
  put(key: string, bytes: Uint8Array, contentType: string): Promise<void>;

  /** Read an object's bytes */
  get(key: string): Promise<Uint8Array>;
}
