import { Module } from '@nestjs/common';
import { BlobServiceClient } from '@azure/storage-blob';
import { JOB_CONFIG, JobConfig } from '../../config/job.config';
import { AzureBlobStore } from './azure-blob-store';
import { BLOB_STORE, BlobStore } from './blob-store';
import { CredentialProvisionerService } from './services/credential-provisioner.service';

@Module({
  providers: [
    {
      provide: BLOB_STORE,
      useFactory: (config: JobConfig): BlobStore =>
        new AzureBlobStore(BlobServiceClient.fromConnectionString(config.storage.connectionString)),
      inject: [JOB_CONFIG],
    },
    CredentialProvisionerService,
  ],
  exports: [CredentialProvisionerService],
})
export class ProvisioningModule {}
