import { BlobStore } from './blob-store';

/**
 * The part of `BlobServiceClient` this store relies on.
 */
export interface BlobContainerSource {
  getContainerClient(containerName: string): {
    getBlobClient(blobName: string): { downloadToBuffer(): Promise<Buffer> };
  };
}

/**
 * BlobStore over Azure Blob Storage. The client is usually built with
 * `BlobServiceClient.fromConnectionString`.
 */
export class AzureBlobStore implements BlobStore {
  constructor(private readonly client: BlobContainerSource) {}

  async fetch(container: string, blobName: string): Promise<Uint8Array> {
    return this.client.getContainerClient(container).getBlobClient(blobName).downloadToBuffer();
  }
}
