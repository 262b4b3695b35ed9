import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { GeneratorModule } from '../generator/generator.module';
import { ProvisioningModule } from '../provisioning/provisioning.module';
import { RunsController } from './controllers/runs.controller';
import { RunHistoryService } from './services/run-history.service';
import { UsageJobScheduler } from './services/usage-job.scheduler';
import { WaterUsageJobService } from './services/water-usage-job.service';

@Module({
  imports: [ProvisioningModule, DatabaseModule, GeneratorModule],
  controllers: [RunsController],
  providers: [RunHistoryService, WaterUsageJobService, UsageJobScheduler],
  exports: [RunHistoryService, WaterUsageJobService],
})
export class JobModule {}
