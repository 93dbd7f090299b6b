import { SchedulerRegistry } from '@nestjs/schedule';
import type { RunRecord } from '../newsletter/latest-digest.store';
import { makeAppConfig } from '../tests/fixtures/app-config';
import { JobsScheduler, NEWSLETTER_CRON_NAME } from './jobs.scheduler';
import { NewsletterJob } from './newsletter.job';

function createScheduler(cron: string | null) {
  const registry = new SchedulerRegistry();
  const job: jest.Mocked<Pick<NewsletterJob, 'run'>> = { run: jest.fn<Promise<RunRecord>, ['manual' | 'schedule']>() };
  const scheduler = new JobsScheduler(
    makeAppConfig({ scheduler: { cron, timezone: 'UTC' } }),
    registry,
    job as unknown as NewsletterJob,
  );
  return { scheduler, registry };
}

describe('JobsScheduler', () => {
  const originalEnabled = process.env.SCHEDULER_ENABLED;
  let registry: SchedulerRegistry | null = null;

  afterEach(() => {
    if (registry?.doesExist('cron', NEWSLETTER_CRON_NAME)) {
      registry.getCronJob(NEWSLETTER_CRON_NAME).stop();
    }
    registry = null;
    if (originalEnabled === undefined) delete process.env.SCHEDULER_ENABLED;
    else process.env.SCHEDULER_ENABLED = originalEnabled;
  });

  it('registers the configured cron and reports the next run', () => {
    delete process.env.SCHEDULER_ENABLED;
    const created = createScheduler('0 8 * * 1');
    registry = created.registry;

    created.scheduler.onModuleInit();

    expect(registry.doesExist('cron', NEWSLETTER_CRON_NAME)).toBe(true);
    const next = created.scheduler.nextRunAt();
    expect(next).not.toBeNull();
    const date = new Date(next ?? '');
    expect(date.getUTCDay()).toBe(1);
    expect(date.getUTCHours()).toBe(8);
    expect(date.getTime()).toBeGreaterThan(Date.now());
  });

  it('schedules nothing without a cron expression', () => {
    delete process.env.SCHEDULER_ENABLED;
    const created = createScheduler(null);
    registry = created.registry;

    created.scheduler.onModuleInit();

    expect(created.scheduler.nextRunAt()).toBeNull();
  });

  it('honours SCHEDULER_ENABLED=false', () => {
    process.env.SCHEDULER_ENABLED = 'false';
    const created = createScheduler('0 8 * * 1');
    registry = created.registry;

    created.scheduler.onModuleInit();

    expect(registry.doesExist('cron', NEWSLETTER_CRON_NAME)).toBe(false);
  });
});
