import { Inject, Injectable } from '@nestjs/common';
import { JOB_CONFIG, JobConfig } from '../../../config/job.config';
import { RunReport } from '../run-report';

/**
 * Outcomes of the most recent runs, newest first. Kept in memory only: the
 * history starts empty on every process start.
 */
@Injectable()
export class RunHistoryService {
  private readonly reports: RunReport[] = [];

  constructor(
    @Inject(JOB_CONFIG)
    private readonly config: JobConfig,
  ) {}

  record(report: RunReport): void {
    this.reports.unshift(report);
    if (this.reports.length > this.config.runHistorySize) {
      this.reports.length = this.config.runHistorySize;
    }
  }

  list(limit: number): RunReport[] {
    return this.reports.slice(0, limit);
  }

  latest(): RunReport | undefined {
    return this.reports[0];
  }
}
