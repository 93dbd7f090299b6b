import { Controller, Get, Header, NotFoundException, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { LatestDigestStore } from '../newsletter/latest-digest.store';
import { JobsScheduler } from './jobs.scheduler';
import { NewsletterJob } from './newsletter.job';

@Controller('newsletter')
@ApiTags('newsletter')
export class JobsController {
  constructor(
    private readonly newsletterJob: NewsletterJob,
    private readonly jobsScheduler: JobsScheduler,
    private readonly store: LatestDigestStore,
  ) {}

  @Post('run')
  async runNow() {
    const run = await this.newsletterJob.run('manual');
    return { ok: true, run };
  }

  /** The latest rendered newsletter, served as the HTML a mail client would get. */
  @Get('preview')
  @Header('Content-Type', 'text/html; charset=utf-8')
  preview(): string {
    const latest = this.store.getLatest();
    if (!latest) throw new NotFoundException('No newsletter has been rendered yet');
    return latest.rendered.html;
  }

  @Get('last-run')
  lastRun() {
    return {
      running: this.newsletterJob.isRunning,
      lastRun: this.store.getLastRun(),
      nextRunAt: this.jobsScheduler.nextRunAt(),
    };
  }
}
