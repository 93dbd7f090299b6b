import { Module } from '@nestjs/common';
import { join } from 'node:path';
import { LibraryModule } from '../library/library.module';
import { TmdbModule } from '../tmdb/tmdb.module';
import { LatestDigestStore } from './latest-digest.store';
import { NewsletterPipelineService } from './newsletter-pipeline.service';
import { DIGEST_DELIVERY, TEMPLATE_ROOT } from './newsletter.tokens';

/** `templates/` beside `src/` (or `dist/` once built) unless TEMPLATE_DIR points elsewhere. */
export function resolveTemplateRoot(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.TEMPLATE_DIR?.trim();
  return fromEnv || join(__dirname, '..', '..', 'templates');
}

@Module({
  imports: [LibraryModule, TmdbModule],
  providers: [
    NewsletterPipelineService,
    LatestDigestStore,
    { provide: DIGEST_DELIVERY, useExisting: LatestDigestStore },
    { provide: TEMPLATE_ROOT, useFactory: () => resolveTemplateRoot() },
  ],
  exports: [NewsletterPipelineService, LatestDigestStore, DIGEST_DELIVERY],
})
export class NewsletterModule {}
