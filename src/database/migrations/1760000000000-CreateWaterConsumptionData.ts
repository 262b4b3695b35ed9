import { MigrationInterface, QueryRunner, Table } from 'typeorm';

/**
 * Creates the table the generator writes into.
 *
 * Uses the Table API (no raw DDL): it must run on Oracle and on SQLite.
 *
 * Identifiers are upper case. TypeORM quotes them on Oracle, and the insert
 * statement and check expressions refer to them unquoted, which Oracle folds
 * to upper case.
 */
export class CreateWaterConsumptionData1760000000000 implements MigrationInterface {
  name = 'CreateWaterConsumptionData1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'WATER_CONSUMPTION_DATA',
        columns: [
          {
            name: 'ID',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'TIME_OF_DAY', type: 'varchar', length: '16', isNullable: false },
          { name: 'SEASON', type: 'varchar', length: '16', isNullable: false },
          { name: 'TEMPERATURE', type: 'float', isNullable: false },
          { name: 'HOUSEHOLD_SIZE', type: 'integer', isNullable: false },
          { name: 'DAY_OF_WEEK', type: 'varchar', length: '16', isNullable: false },
          { name: 'WATER_CONSUMPTION', type: 'float', isNullable: false },
          { name: 'IS_ANOMALY', type: 'integer', isNullable: false },
          {
            name: 'CREATED_AT',
            type: 'timestamp',
            isNullable: false,
            default: 'CURRENT_TIMESTAMP',
          },
        ],
        checks: [
          {
            name: 'CHK_WCD_HOUSEHOLD_SIZE',
            expression: 'HOUSEHOLD_SIZE BETWEEN 1 AND 5',
          },
          {
            name: 'CHK_WCD_IS_ANOMALY',
            expression: 'IS_ANOMALY IN (0, 1)',
          },
        ],
      }),
      true,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('WATER_CONSUMPTION_DATA', true);
  }
}
