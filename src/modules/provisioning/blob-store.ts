export const BLOB_STORE = Symbol('BLOB_STORE');

/**
 * Read-only access to named blobs.
 */
export interface BlobStore {
  /**
   * Resolve with the blob's bytes, or reject if it cannot be read for any
   * reason (transport, authorization, missing blob).
   */
  fetch(container: string, blobName: string): Promise<Uint8Array>;
}
