import { Controller, Get, NotFoundException, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ListRunsQueryDto, RunReportDto } from '../../../dto';
import { RunReport } from '../run-report';
import { RunHistoryService } from '../services/run-history.service';

@ApiTags('runs')
@Controller('v1/runs')
export class RunsController {
  constructor(private readonly history: RunHistoryService) {}

  /**
   * Recent runs, newest first
   */
  @Get()
  @ApiOperation({
    summary: 'List recent runs',
    description: 'Returns the outcome of the most recent scheduled runs kept in memory.',
  })
  @ApiResponse({ status: 200, description: 'Recent runs', type: RunReportDto, isArray: true })
  @ApiResponse({ status: 400, description: 'Validation error' })
  listRuns(@Query() query: ListRunsQueryDto): RunReport[] {
    return this.history.list(query.limit);
  }

  /**
   * Most recent run
   */
  @Get('latest')
  @ApiOperation({
    summary: 'Get the latest run',
    description: 'Returns the outcome of the most recently finished run.',
  })
  @ApiResponse({ status: 200, description: 'Latest run', type: RunReportDto })
  @ApiResponse({ status: 404, description: 'No run has finished yet' })
  getLatest(): RunReport {
    const report = this.history.latest();
    if (!report) {
      throw new NotFoundException('No run has finished yet');
    }
    return report;
  }
}
