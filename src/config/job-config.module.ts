import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { buildJobConfig, JOB_CONFIG } from './job.config';

@Global()
@Module({
  providers: [
    {
      provide: JOB_CONFIG,
      useFactory: buildJobConfig,
      inject: [ConfigService],
    },
  ],
  exports: [JOB_CONFIG],
})
export class JobConfigModule {}
