import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { CronJob } from 'cron';
import { errToMessage } from '../newsletter/newsletter.errors';
import { APP_CONFIG, type AppConfig } from '../settings/settings.types';
import { NewsletterJob } from './newsletter.job';

export const NEWSLETTER_CRON_NAME = 'job:newsletter';

function toIsoString(value: unknown): string | null {
  if (value instanceof Date) return value.toISOString();
  if (!value || typeof value !== 'object') return null;
  // cron 3 returns a luxon DateTime from nextDate()
  if ('toISO' in value && typeof value.toISO === 'function') {
    const out: unknown = value.toISO.call(value);
    if (typeof out === 'string') return out;
  }
  return null;
}

@Injectable()
export class JobsScheduler implements OnModuleInit {
  private readonly logger = new Logger(JobsScheduler.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly newsletterJob: NewsletterJob,
  ) {}

  onModuleInit() {
    if (process.env.SCHEDULER_ENABLED === 'false') {
      this.logger.warn('Scheduler disabled via SCHEDULER_ENABLED=false');
      return;
    }
    const { cron, timezone } = this.config.scheduler;
    if (!cron) {
      this.logger.log('No scheduler.cron configured; newsletter runs on demand only');
      return;
    }

    const job = new CronJob(cron, () => void this.tick(), null, false, timezone);
    this.schedulerRegistry.addCronJob(NEWSLETTER_CRON_NAME, job);
    job.start();
    this.logger.log(`Scheduled newsletter cron=${cron} tz=${timezone}`);
  }

  /** ISO time of the next scheduled run, or null when nothing is scheduled. */
  nextRunAt(): string | null {
    if (!this.schedulerRegistry.doesExist('cron', NEWSLETTER_CRON_NAME)) return null;
    return toIsoString(this.schedulerRegistry.getCronJob(NEWSLETTER_CRON_NAME).nextDate());
  }

  private async tick(): Promise<void> {
    if (this.newsletterJob.isRunning) {
      this.logger.warn('Skipping scheduled newsletter; previous run still in progress');
      return;
    }
    try {
      await this.newsletterJob.run('schedule');
    } catch (err) {
      this.logger.error(`Scheduled newsletter failed: ${errToMessage(err)}`);
    }
  }
}
