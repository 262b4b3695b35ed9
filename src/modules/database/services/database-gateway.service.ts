import { Inject, Injectable, Logger } from '@nestjs/common';
import { DataSource, QueryRunner } from 'typeorm';
import { ConnectError, describeError, InsertError } from '../../../common/errors';
import {
  ConnectionParams,
  DATA_SOURCE_OPTIONS_FACTORY,
  DataSourceOptionsFactory,
} from '../../../database/data-source-options';
import { Observation } from '../../generator/observation';

export const TARGET_TABLE = 'WATER_CONSUMPTION_DATA';

export const TARGET_COLUMNS = [
  'TIME_OF_DAY',
  'SEASON',
  'TEMPERATURE',
  'HOUSEHOLD_SIZE',
  'DAY_OF_WEEK',
  'WATER_CONSUMPTION',
  'IS_ANOMALY',
] as const;

type ObservationRow = [string, string, number, number, string, number, number];

function toRow(observation: Observation): ObservationRow {
  return [
    observation.timeOfDay,
    observation.season,
    observation.temperature,
    observation.householdSize,
    observation.dayOfWeek,
    observation.waterConsumption,
    observation.isAnomaly,
  ];
}

/**
 * Renders the insert statement with the driver's own bind markers
 * (`:1`..`:7` on Oracle, `?` on SQLite).
 */
export function buildInsertStatement(connection: DataSource): string {
  const placeholders = TARGET_COLUMNS.map((column, index) =>
    connection.driver.createParameter(column, index),
  );
  return `INSERT INTO ${TARGET_TABLE} (${TARGET_COLUMNS.join(', ')}) VALUES (${placeholders.join(', ')})`;
}

@Injectable()
export class DatabaseGatewayService {
  private readonly logger = new Logger(DatabaseGatewayService.name);

  constructor(
    @Inject(DATA_SOURCE_OPTIONS_FACTORY)
    private readonly buildOptions: DataSourceOptionsFactory,
  ) {}

  /**
   * Open a session using the staged wallet. The caller owns the returned data
   * source and must hand it back to {@link close}.
   *
   * @throws ConnectError on authentication, network or wallet failures
   */
  async connect(params: ConnectionParams): Promise<DataSource> {
    let dataSource: DataSource | undefined;

    try {
      dataSource = new DataSource(this.buildOptions(params));
      await dataSource.initialize();
    } catch (error) {
      if (dataSource) {
        await this.close(dataSource);
      }
      throw new ConnectError(params.dsn, error);
    }

    this.logger.debug(`Connected to ${params.dsn}`);
    return dataSource;
  }

  /**
   * Insert every record in one transaction. Either the whole batch is
   * committed or nothing is.
   *
   * @returns the number of rows committed
   * @throws InsertError after rolling the batch back
   */
  async insertBatch(connection: DataSource, records: readonly Observation[]): Promise<number> {
    if (records.length === 0) {
      return 0;
    }

    const statement = buildInsertStatement(connection);
    this.logger.debug(statement);

    const queryRunner = connection.createQueryRunner();
    try {
      await queryRunner.connect();
      await queryRunner.startTransaction();

      for (const record of records) {
        await queryRunner.query(statement, toRow(record));
      }

      await queryRunner.commitTransaction();
    } catch (error) {
      await this.rollback(queryRunner);
      throw new InsertError(records.length, error);
    } finally {
      await this.release(queryRunner);
    }

    this.logger.log(`Inserted ${records.length} rows into ${TARGET_TABLE}`);
    return records.length;
  }

  /**
   * Release the session. Never rejects; close failures are logged.
   */
  async close(connection: DataSource): Promise<void> {
    if (!connection.isInitialized) {
      return;
    }

    try {
      await connection.destroy();
    } catch (error) {
      this.logger.warn(`Failed to close database connection: ${describeError(error)}`);
    }
  }

  private async rollback(queryRunner: QueryRunner): Promise<void> {
    if (!queryRunner.isTransactionActive) {
      return;
    }

    try {
      await queryRunner.rollbackTransaction();
    } catch (error) {
      this.logger.error(`Rollback failed: ${describeError(error)}`);
    }
  }

  private async release(queryRunner: QueryRunner): Promise<void> {
    try {
      await queryRunner.release();
    } catch (error) {
      this.logger.warn(`Failed to release query runner: ${describeError(error)}`);
    }
  }
}
