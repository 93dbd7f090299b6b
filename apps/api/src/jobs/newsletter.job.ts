import { ConflictException, Inject, Injectable, Logger } from '@nestjs/common';
import { LatestDigestStore, type DigestDelivery, type RunRecord, type RunTrigger } from '../newsletter/latest-digest.store';
import { NewsletterPipelineService } from '../newsletter/newsletter-pipeline.service';
import { errToMessage } from '../newsletter/newsletter.errors';
import { DIGEST_DELIVERY } from '../newsletter/newsletter.tokens';
import { redactSecrets } from '../security/redact';
import { APP_CONFIG, type AppConfig } from '../settings/settings.types';

/**
 * One newsletter run: render through the pipeline, then hand the result to the delivery
 * collaborator. An empty digest is only delivered when `newsletter.send_when_empty` is set.
 */
@Injectable()
export class NewsletterJob {
  private readonly logger = new Logger(NewsletterJob.name);
  private running = false;

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly pipeline: NewsletterPipelineService,
    @Inject(DIGEST_DELIVERY) private readonly delivery: DigestDelivery,
    private readonly store: LatestDigestStore,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  async run(trigger: RunTrigger): Promise<RunRecord> {
    if (this.running) {
      throw new ConflictException('A newsletter run is already in progress');
    }
    this.running = true;
    const startedAt = new Date().toISOString();
    this.logger.log(`Newsletter run started trigger=${trigger}`);

    try {
      const rendered = await this.pipeline.run(this.config);
      const empty = rendered.stats.moviesCount + rendered.stats.showsCount === 0;
      const skip = empty && !this.config.newsletter.sendWhenEmpty;

      if (skip) {
        this.logger.log('Nothing new in the window; delivery skipped (send_when_empty=false)');
      } else {
        await this.delivery.deliver(rendered, this.config);
      }

      const record: RunRecord = {
        trigger,
        status: skip ? 'skipped' : 'success',
        startedAt,
        finishedAt: new Date().toISOString(),
        subject: rendered.subject,
        stats: rendered.stats,
        failures: rendered.failures.length,
        error: null,
      };
      this.store.recordRun(record);
      return record;
    } catch (err) {
      const secrets = [this.config.server.apiToken, this.config.tmdb.apiKey];
      this.store.recordRun({
        trigger,
        status: 'failed',
        startedAt,
        finishedAt: new Date().toISOString(),
        subject: null,
        stats: null,
        failures: 0,
        error: redactSecrets(errToMessage(err), secrets),
      });
      throw err;
    } finally {
      this.running = false;
    }
  }
}
