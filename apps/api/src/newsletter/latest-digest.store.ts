import { Injectable, Logger } from '@nestjs/common';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { AppConfig } from '../settings/settings.types';
import type { RenderedDigest, RunStats } from './newsletter.types';

export type RunTrigger = 'manual' | 'schedule';

export type RunStatus = 'success' | 'skipped' | 'failed';

export type RunRecord = {
  trigger: RunTrigger;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  subject: string | null;
  stats: RunStats | null;
  failures: number;
  error: string | null;
};

export type DeliveredDigest = {
  rendered: RenderedDigest;
  deliveredAt: string;
  recipients: string[];
};

/** Hands a rendered newsletter to whatever sends it. */
export interface DigestDelivery {
  deliver(rendered: RenderedDigest, config: AppConfig): Promise<void>;
}

/**
 * Keeps the latest rendered newsletter in memory for the preview endpoint and, when
 * `newsletter.output_dir` is set, writes it there as `latest.html` plus `latest.json`.
 */
@Injectable()
export class LatestDigestStore implements DigestDelivery {
  private readonly logger = new Logger(LatestDigestStore.name);
  private latest: DeliveredDigest | null = null;
  private lastRun: RunRecord | null = null;

  async deliver(rendered: RenderedDigest, config: AppConfig): Promise<void> {
    const deliveredAt = new Date().toISOString();
    this.latest = { rendered, deliveredAt, recipients: [...config.recipients] };

    const outputDir = config.newsletter.outputDir;
    if (outputDir) {
      await mkdir(outputDir, { recursive: true });
      await writeFile(join(outputDir, 'latest.html'), rendered.html, 'utf8');
      await writeFile(
        join(outputDir, 'latest.json'),
        `${JSON.stringify(
          {
            subject: rendered.subject,
            deliveredAt,
            recipients: config.recipients,
            stats: rendered.stats,
            failures: rendered.failures,
          },
          null,
          2,
        )}\n`,
        'utf8',
      );
      this.logger.log(`Wrote newsletter to ${outputDir}`);
    }

    this.logger.log(
      `Newsletter ready subject=${JSON.stringify(rendered.subject)} recipients=${config.recipients.length}`,
    );
  }

  getLatest(): DeliveredDigest | null {
    return this.latest;
  }

  recordRun(record: RunRecord): void {
    this.lastRun = record;
  }

  getLastRun(): RunRecord | null {
    return this.lastRun;
  }
}
