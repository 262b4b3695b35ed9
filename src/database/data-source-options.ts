import { DataSourceOptions } from 'typeorm';
import { CreateWaterConsumptionData1760000000000 } from './migrations/1760000000000-CreateWaterConsumptionData';

export const DATA_SOURCE_OPTIONS_FACTORY = Symbol('DATA_SOURCE_OPTIONS_FACTORY');

export const MIGRATIONS = [CreateWaterConsumptionData1760000000000];

/**
 * Everything needed to open a wallet-authenticated session.
 */
export interface ConnectionParams {
  /** Directory holding tnsnames.ora. */
  configDir: string;
  /** Directory holding ewallet.pem. */
  walletLocation: string;
  user: string;
  password: string;
  /** Net service name from tnsnames.ora, or an Easy Connect string. */
  dsn: string;
  walletPassword: string;
}

export type DataSourceOptionsFactory = (params: ConnectionParams) => DataSourceOptions;

export interface OracleSessionSettings {
  logging: boolean;
  migrationsRun: boolean;
}

/**
 * Oracle options for a single-use data source. The wallet settings are passed
 * through `extra` straight to `oracledb.createPool`.
 */
export function oracleDataSourceOptions(settings: OracleSessionSettings): DataSourceOptionsFactory {
  return (params) => ({
    type: 'oracle',
    username: params.user,
    password: params.password,
    connectString: params.dsn,
    poolSize: 1,
    logging: settings.logging,
    migrations: MIGRATIONS,
    migrationsRun: settings.migrationsRun,
    extra: {
      configDir: params.configDir,
      walletLocation: params.walletLocation,
      walletPassword: params.walletPassword,
    },
  });
}
