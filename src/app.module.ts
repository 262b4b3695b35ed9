import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnvironment } from './config/environment';
import { JobConfigModule } from './config/job-config.module';
import { JobModule } from './modules/job/job.module';
import { HealthModule } from './modules/health/health.module';

@Module({
  imports: [
    // Configuration module - loads .env and validates it once at start-up
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      validate: validateEnvironment,
    }),
    JobConfigModule,

    // Feature modules
    JobModule,
    HealthModule,
  ],
})
export class AppModule {}
