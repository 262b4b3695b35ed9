import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { CronJob } from 'cron';
import { describeError } from '../../../common/errors';
import { JOB_CONFIG, JobConfig } from '../../../config/job.config';
import { isPastDue, TriggerInfo } from '../trigger';
import { WaterUsageJobService } from './water-usage-job.service';

/**
 * Drives {@link WaterUsageJobService} from a cron timer.
 *
 * At most one run is in flight: a tick that fires while the previous run is
 * still going is dropped, not queued.
 */
@Injectable()
export class UsageJobScheduler implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(UsageJobScheduler.name);

  private job?: CronJob;
  private expectedAt?: Date;
  private inFlight?: Promise<void>;

  constructor(
    private readonly jobService: WaterUsageJobService,

    @Inject(JOB_CONFIG)
    private readonly config: JobConfig,
  ) {}

  onApplicationBootstrap(): void {
    const { cron, timeZone, runOnStartup } = this.config.schedule;

    this.job = new CronJob(cron, () => this.onTick(), null, false, timeZone);
    this.job.start();
    this.expectedAt = this.job.nextDate().toJSDate();

    this.logger.log(
      `Water usage job scheduled with "${cron}" (${timeZone}), next tick at ${this.expectedAt.toISOString()}`,
    );

    if (runOnStartup) {
      this.fire({ pastDue: false, firedAt: new Date() });
    }
  }

  async onApplicationShutdown(): Promise<void> {
    this.job?.stop();
    await this.whenIdle();
  }

  /**
   * Start a run unless one is already in flight.
   *
   * @returns whether a run was started
   */
  fire(trigger: TriggerInfo): boolean {
    if (this.inFlight) {
      this.logger.warn('Previous run is still in progress, skipping this tick');
      return false;
    }

    this.inFlight = this.jobService
      .run(trigger)
      .then(() => undefined)
      .catch((error: unknown) => {
        this.logger.error(`Run failed unexpectedly: ${describeError(error)}`);
      })
      .finally(() => {
        this.inFlight = undefined;
      });
    return true;
  }

  /** Resolves once no run is in flight. */
  async whenIdle(): Promise<void> {
    await this.inFlight;
  }

  private onTick(): void {
    const firedAt = new Date();
    const pastDue =
      this.expectedAt !== undefined &&
      isPastDue(this.expectedAt, firedAt, this.config.schedule.pastDueToleranceMs);

    this.expectedAt = this.job?.nextDate().toJSDate();
    this.fire({ pastDue, firedAt });
  }
}
