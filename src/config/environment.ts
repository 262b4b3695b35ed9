import { tmpdir } from 'os';
import { plainToInstance, Transform, TransformFnParams } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

// Reads the raw source value: implicit conversion has already run `Boolean()`
// over `value`, which turns "false" into true.
const toBoolean = ({ obj, key, value }: TransformFnParams): unknown => {
  const raw: unknown = obj[key];
  if (typeof raw === 'string') {
    return ['true', '1', 'yes'].includes(raw.trim().toLowerCase());
  }
  return raw === undefined ? value : raw;
};

/**
 * Environment variables read at start-up.
 *
 * Secrets and connection settings have no defaults; everything else falls back
 * to the values the job was designed around (10 rows every 10 seconds).
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  STORAGE_CONNECTION_STRING!: string;

  @IsString()
  @IsNotEmpty()
  CONFIG_CONTAINER!: string;

  @IsString()
  @IsNotEmpty()
  DB_USER!: string;

  @IsString()
  @IsNotEmpty()
  DB_PASSWORD!: string;

  @IsString()
  @IsNotEmpty()
  DB_DSN!: string;

  @IsString()
  @IsNotEmpty()
  DB_WALLET_PASSWORD!: string;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  DB_LOGGING: boolean = false;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  DB_MIGRATIONS_RUN: boolean = false;

  @IsString()
  @IsNotEmpty()
  STAGING_ROOT: string = tmpdir();

  @IsString()
  @IsNotEmpty()
  CONFIG_DIR: string = 'config';

  @IsString()
  @IsNotEmpty()
  WALLET_LOCATION: string = 'wallet';

  @IsString()
  @IsNotEmpty()
  JOB_SCHEDULE: string = '*/10 * * * * *';

  @IsString()
  @IsNotEmpty()
  JOB_TIMEZONE: string = 'UTC';

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  JOB_RUN_ON_STARTUP: boolean = true;

  @IsInt()
  @Min(1)
  @Max(10000)
  JOB_BATCH_SIZE: number = 10;

  @IsInt()
  @Min(0)
  JOB_PAST_DUE_TOLERANCE_MS: number = 1000;

  @IsOptional()
  @IsInt()
  GENERATOR_SEED?: number;

  @IsInt()
  @Min(1)
  @Max(1000)
  RUN_HISTORY_SIZE: number = 50;

  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;
}

/**
 * Passed to ConfigModule as its `validate` hook. Throws with every violation
 * listed so a misconfigured deployment fails before the first tick.
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
