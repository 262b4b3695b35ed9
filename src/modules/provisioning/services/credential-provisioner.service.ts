import { Inject, Injectable, Logger } from '@nestjs/common';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { FetchError } from '../../../common/errors';
import { JOB_CONFIG, JobConfig } from '../../../config/job.config';
import { BLOB_STORE, BlobStore } from '../blob-store';

export const WALLET_BUNDLE_BLOB = 'ewallet.pem';
export const NETWORK_NAMES_BLOB = 'tnsnames.ora';

export interface StagedArtifact {
  blobName: string;
  path: string;
  bytes: number;
}

interface ArtifactTarget {
  blobName: string;
  directory: string;
}

/**
 * Stages the database wallet from blob storage onto the local filesystem.
 *
 * Artifacts are fetched fresh on every call and overwrite whatever is already
 * staged. The two fetches are independent: when the second fails the first
 * stays on disk.
 */
@Injectable()
export class CredentialProvisionerService {
  private readonly logger = new Logger(CredentialProvisionerService.name);

  constructor(
    @Inject(BLOB_STORE)
    private readonly blobStore: BlobStore,

    @Inject(JOB_CONFIG)
    private readonly config: JobConfig,
  ) {}

  get artifacts(): ArtifactTarget[] {
    return [
      { blobName: WALLET_BUNDLE_BLOB, directory: this.config.staging.walletDir },
      { blobName: NETWORK_NAMES_BLOB, directory: this.config.staging.configDir },
    ];
  }

  /**
   * @throws FetchError naming the first artifact that could not be staged
   */
  async provision(): Promise<StagedArtifact[]> {
    const staged: StagedArtifact[] = [];
    for (const artifact of this.artifacts) {
      staged.push(await this.stage(artifact));
    }
    return staged;
  }

  private async stage({ blobName, directory }: ArtifactTarget): Promise<StagedArtifact> {
    const { container } = this.config.storage;
    const path = join(directory, blobName);

    try {
      const content = await this.blobStore.fetch(container, blobName);
      await mkdir(directory, { recursive: true });
      await writeFile(path, content);

      this.logger.log(`Downloaded ${blobName} to ${path} (${content.byteLength} bytes)`);
      return { blobName, path, bytes: content.byteLength };
    } catch (error) {
      throw new FetchError(blobName, error);
    }
  }
}
