import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { DataSource } from 'typeorm';
import { describeError } from '../../../common/errors';
import { JOB_CONFIG, JobConfig } from '../../../config/job.config';
import { ConnectionParams } from '../../../database/data-source-options';
import { DatabaseGatewayService } from '../../database/services/database-gateway.service';
import { SampleGeneratorService } from '../../generator/services/sample-generator.service';
import { CredentialProvisionerService } from '../../provisioning/services/credential-provisioner.service';
import { RunReport, RunStage, RunState } from '../run-report';
import { TriggerInfo } from '../trigger';
import { RunHistoryService } from './run-history.service';

/**
 * One scheduled invocation of the water usage generator:
 *
 *   idle → provisioning → connecting → generating → inserting → done
 *
 * A failure while provisioning, connecting or inserting ends the run as
 * `aborted`; the next tick starts again from `idle`. Runs never reject.
 */
@Injectable()
export class WaterUsageJobService {
  private readonly logger = new Logger(WaterUsageJobService.name);

  constructor(
    private readonly provisioner: CredentialProvisionerService,
    private readonly gateway: DatabaseGatewayService,
    private readonly generator: SampleGeneratorService,
    private readonly history: RunHistoryService,

    @Inject(JOB_CONFIG)
    private readonly config: JobConfig,
  ) {}

  async run(trigger: TriggerInfo): Promise<RunReport> {
    const runId = randomUUID();
    const startedAt = new Date();

    if (trigger.pastDue) {
      this.logger.warn(`Run ${runId}: the timer is past due (fired at ${trigger.firedAt.toISOString()})`);
    }

    let stage: RunStage = 'idle';
    let connection: DataSource | undefined;
    let insertedRows = 0;
    let failure: { stage: RunStage; error: unknown } | undefined;

    try {
      stage = this.enter(runId, 'provisioning');
      await this.provisioner.provision();

      stage = this.enter(runId, 'connecting');
      connection = await this.gateway.connect(this.connectionParams());

      stage = this.enter(runId, 'generating');
      const batch = this.generator.generate(this.config.schedule.batchSize);

      stage = this.enter(runId, 'inserting');
      insertedRows = await this.gateway.insertBatch(connection, batch);

      this.enter(runId, 'done');
    } catch (error) {
      failure = { stage, error };
      this.enter(runId, 'aborted');
    } finally {
      if (connection) {
        await this.gateway.close(connection);
      }
    }

    const finishedAt = new Date();
    const report: RunReport = {
      runId,
      state: failure ? 'aborted' : 'done',
      pastDue: trigger.pastDue,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      insertedRows,
    };

    if (failure) {
      report.failedStage = failure.stage;
      report.error = describeError(failure.error);
      this.logger.error(`Run ${runId} aborted while ${failure.stage}: ${report.error}`);
    } else {
      this.logger.log(`Run ${runId} done: ${insertedRows} rows in ${report.durationMs}ms`);
    }

    this.history.record(report);
    return report;
  }

  private enter<S extends RunState>(runId: string, next: S): S {
    this.logger.debug(`Run ${runId}: ${next}`);
    return next;
  }

  private connectionParams(): ConnectionParams {
    const { staging, database } = this.config;
    return {
      configDir: staging.configDir,
      walletLocation: staging.walletDir,
      user: database.user,
      password: database.password,
      dsn: database.dsn,
      walletPassword: database.walletPassword,
    };
  }
}
