import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { RunReport, RunStage } from '../modules/job/run-report';

const RUN_STAGES: RunStage[] = ['idle', 'provisioning', 'connecting', 'generating', 'inserting'];

/**
 * Response DTO describing the outcome of one scheduled run
 */
export class RunReportDto implements RunReport {
  @ApiProperty({
    description: 'Run identifier',
    example: '3b241101-e2bb-4255-8caf-4136c566a962',
  })
  runId!: string;

  @ApiProperty({
    description: 'Terminal state of the run',
    enum: ['done', 'aborted'],
    example: 'done',
  })
  state!: 'done' | 'aborted';

  @ApiPropertyOptional({
    description: 'Stage the run was in when it aborted',
    enum: RUN_STAGES,
    example: 'connecting',
  })
  failedStage?: RunStage;

  @ApiProperty({
    description: 'Whether the tick fired later than scheduled',
    example: false,
  })
  pastDue!: boolean;

  @ApiProperty({
    description: 'When the run started (ISO 8601)',
    example: '2026-10-19T08:00:00.012Z',
  })
  startedAt!: string;

  @ApiProperty({
    description: 'When the run finished (ISO 8601)',
    example: '2026-10-19T08:00:01.348Z',
  })
  finishedAt!: string;

  @ApiProperty({
    description: 'Wall-clock duration in milliseconds',
    example: 1336,
  })
  durationMs!: number;

  @ApiProperty({
    description: 'Rows committed to WATER_CONSUMPTION_DATA',
    example: 10,
  })
  insertedRows!: number;

  @ApiPropertyOptional({
    description: 'Failure message when the run aborted',
    example: 'Failed to connect to usagedb_high: ORA-01017: invalid credential or not authorized',
  })
  error?: string;
}
