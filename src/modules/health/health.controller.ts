import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { RunHistoryService } from '../job/services/run-history.service';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(private readonly history: RunHistoryService) {}

  @Get()
  @ApiOperation({
    summary: 'Health check',
    description: 'Reports degraded when the most recent run aborted.',
  })
  @ApiResponse({
    status: 200,
    description: 'Health status',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
        timestamp: { type: 'string', example: '2026-10-19T08:00:00.000Z' },
        lastRun: { type: 'string', example: 'done' },
        lastRunAt: { type: 'string', example: '2026-10-19T07:59:51.204Z' },
        uptime: { type: 'number', example: 3600 },
      },
    },
  })
  check() {
    const latest = this.history.latest();

    return {
      status: latest?.state === 'aborted' ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      lastRun: latest?.state ?? 'none',
      lastRunAt: latest?.finishedAt ?? null,
      uptime: process.uptime(),
    };
  }

  @Get('live')
  @ApiOperation({
    summary: 'Liveness check',
    description: 'Returns whether the process is alive.',
  })
  live() {
    return {
      status: 'alive',
      timestamp: new Date().toISOString(),
      pid: process.pid,
    };
  }
}
