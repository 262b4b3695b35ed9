import { join } from 'path';
import { ConfigService } from '@nestjs/config';

export const JOB_CONFIG = Symbol('JOB_CONFIG');

export interface StorageSettings {
  connectionString: string;
  container: string;
}

export interface StagingSettings {
  /** Directory receiving the network-name mapping (tnsnames.ora). */
  configDir: string;
  /** Directory receiving the wallet bundle (ewallet.pem). */
  walletDir: string;
}

export interface DatabaseSettings {
  user: string;
  password: string;
  dsn: string;
  walletPassword: string;
  logging: boolean;
  migrationsRun: boolean;
}

export interface ScheduleSettings {
  cron: string;
  timeZone: string;
  runOnStartup: boolean;
  pastDueToleranceMs: number;
  batchSize: number;
}

/**
 * Everything a run needs, resolved once at start-up and handed to each
 * component through the `JOB_CONFIG` provider.
 */
export interface JobConfig {
  storage: StorageSettings;
  staging: StagingSettings;
  database: DatabaseSettings;
  schedule: ScheduleSettings;
  generatorSeed?: number;
  runHistorySize: number;
}

export function buildJobConfig(config: ConfigService): JobConfig {
  const stagingRoot = config.getOrThrow<string>('STAGING_ROOT');

  const jobConfig: JobConfig = {
    storage: {
      connectionString: config.getOrThrow<string>('STORAGE_CONNECTION_STRING'),
      container: config.getOrThrow<string>('CONFIG_CONTAINER'),
    },
    staging: {
      configDir: join(stagingRoot, config.getOrThrow<string>('CONFIG_DIR')),
      walletDir: join(stagingRoot, config.getOrThrow<string>('WALLET_LOCATION')),
    },
    database: {
      user: config.getOrThrow<string>('DB_USER'),
      password: config.getOrThrow<string>('DB_PASSWORD'),
      dsn: config.getOrThrow<string>('DB_DSN'),
      walletPassword: config.getOrThrow<string>('DB_WALLET_PASSWORD'),
      logging: config.get<boolean>('DB_LOGGING', false),
      migrationsRun: config.get<boolean>('DB_MIGRATIONS_RUN', false),
    },
    schedule: {
      cron: config.get<string>('JOB_SCHEDULE', '*/10 * * * * *'),
      timeZone: config.get<string>('JOB_TIMEZONE', 'UTC'),
      runOnStartup: config.get<boolean>('JOB_RUN_ON_STARTUP', true),
      pastDueToleranceMs: config.get<number>('JOB_PAST_DUE_TOLERANCE_MS', 1000),
      batchSize: config.get<number>('JOB_BATCH_SIZE', 10),
    },
    generatorSeed: config.get<number>('GENERATOR_SEED'),
    runHistorySize: config.get<number>('RUN_HISTORY_SIZE', 50),
  };

  return Object.freeze(jobConfig);
}
