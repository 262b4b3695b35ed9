import { Module } from '@nestjs/common';
import { JOB_CONFIG, JobConfig } from '../../config/job.config';
import {
  DATA_SOURCE_OPTIONS_FACTORY,
  DataSourceOptionsFactory,
  oracleDataSourceOptions,
} from '../../database/data-source-options';
import { DatabaseGatewayService } from './services/database-gateway.service';

@Module({
  providers: [
    {
      provide: DATA_SOURCE_OPTIONS_FACTORY,
      useFactory: (config: JobConfig): DataSourceOptionsFactory =>
        oracleDataSourceOptions({
          logging: config.database.logging,
          migrationsRun: config.database.migrationsRun,
        }),
      inject: [JOB_CONFIG],
    },
    DatabaseGatewayService,
  ],
  exports: [DatabaseGatewayService],
})
export class DatabaseModule {}
