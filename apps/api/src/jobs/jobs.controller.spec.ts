import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { LatestDigestStore, type RunRecord } from '../newsletter/latest-digest.store';
import type { RenderedDigest } from '../newsletter/newsletter.types';
import { makeAppConfig } from '../tests/fixtures/app-config';
import { JobsController } from './jobs.controller';
import { JobsScheduler } from './jobs.scheduler';
import { NewsletterJob } from './newsletter.job';

const RECORD: RunRecord = {
  trigger: 'manual',
  status: 'success',
  startedAt: '2024-03-10T12:00:00.000Z',
  finishedAt: '2024-03-10T12:00:01.000Z',
  subject: 'Digest 2024-03-10',
  stats: null,
  failures: 0,
  error: null,
};

const RENDERED: RenderedDigest = {
  html: '<html><body>digest</body></html>',
  subject: 'Digest 2024-03-10',
  digest: { movies: [], shows: [], generatedAt: '2024-03-10T12:00:00.000Z' },
  failures: [],
  stats: {
    moviesCount: 0,
    showsCount: 0,
    episodesCount: 0,
    enrichmentFailures: 0,
    cacheHits: 0,
    cacheMisses: 0,
    auditPassed: true,
    fallbackUsed: false,
    durationMs: 1,
  },
};

describe('JobsController', () => {
  let controller: JobsController;
  let store: LatestDigestStore;
  const run = jest.fn<Promise<RunRecord>, ['manual' | 'schedule']>();
  const nextRunAt = jest.fn<string | null, []>();

  beforeEach(async () => {
    run.mockReset();
    nextRunAt.mockReset();
    const app: TestingModule = await Test.createTestingModule({
      controllers: [JobsController],
      providers: [
        LatestDigestStore,
        { provide: NewsletterJob, useValue: { run, isRunning: false } },
        { provide: JobsScheduler, useValue: { nextRunAt } },
      ],
    }).compile();

    controller = app.get(JobsController);
    store = app.get(LatestDigestStore);
  });

  it('runs the newsletter on demand', async () => {
    run.mockResolvedValue(RECORD);

    await expect(controller.runNow()).resolves.toEqual({ ok: true, run: RECORD });
    expect(run).toHaveBeenCalledWith('manual');
  });

  it('serves the latest rendered HTML', async () => {
    expect(() => controller.preview()).toThrow(NotFoundException);

    await store.deliver(RENDERED, makeAppConfig());

    expect(controller.preview()).toBe('<html><body>digest</body></html>');
  });

  it('reports the last run and the next scheduled time', () => {
    nextRunAt.mockReturnValue('2024-03-11T08:00:00.000Z');
    store.recordRun(RECORD);

    expect(controller.lastRun()).toEqual({
      running: false,
      lastRun: RECORD,
      nextRunAt: '2024-03-11T08:00:00.000Z',
    });
  });
});
