import { Inject, Injectable, Logger } from '@nestjs/common';
import { raceWithAbort } from '../lib/abort';
import type { AppConfig } from '../settings/settings.types';
import { ContentEnricher } from './content-enricher';
import { ItemCollector } from './item-collector';
import { MetadataCache } from './metadata-cache';
import { RunTimedOutError, errToMessage } from './newsletter.errors';
import { ENRICHMENT_CLIENT, LIBRARY_SOURCE, TEMPLATE_ROOT } from './newsletter.tokens';
import type {
  EnrichmentClient,
  LibrarySource,
  LookupOutcome,
  MediaKind,
  RenderedDigest,
  ServerTotals,
} from './newsletter.types';
import { toHeaderText } from './sanitizer';
import { countEpisodes, groupEpisodesIntoShows } from './season-grouper';
import { SecureRenderer } from './secure-renderer';
import { buildTemplateContext, loadLocaleLabels } from './template-context';

export type PipelineRunOptions = {
  /** Clock override for the collection window and displayed dates. */
  now?: Date;
  /** Cancels the run early; reported the same way as the run timeout. */
  signal?: AbortSignal;
};

@Injectable()
export class NewsletterPipelineService {
  private readonly logger = new Logger(NewsletterPipelineService.name);
  private readonly renderers = new Map<number, SecureRenderer>();

  constructor(
    @Inject(LIBRARY_SOURCE) private readonly source: LibrarySource,
    @Inject(ENRICHMENT_CLIENT) private readonly enrichmentClient: EnrichmentClient,
    @Inject(TEMPLATE_ROOT) private readonly templateRoot: string,
  ) {}

  /**
   * Collect, group, enrich and render one newsletter. Rejects with RunTimedOutError once
   * `newsletter.runTimeoutMs` elapses; outbound requests are aborted with it.
   */
  async run(config: AppConfig, options: PipelineRunOptions = {}): Promise<RenderedDigest> {
    const timeoutMs = config.newsletter.runTimeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new RunTimedOutError(timeoutMs)), timeoutMs);
    const outer = options.signal;
    const forwardAbort = () => controller.abort(new RunTimedOutError(timeoutMs));
    if (outer?.aborted) forwardAbort();
    else outer?.addEventListener('abort', forwardAbort, { once: true });

    const toTimeout = (reason: unknown): Error =>
      reason instanceof RunTimedOutError ? reason : new RunTimedOutError(timeoutMs);

    try {
      return await raceWithAbort(
        this.execute(config, options.now ?? new Date(), controller.signal),
        controller.signal,
        toTimeout,
      );
    } catch (err) {
      this.logger.error(`Newsletter run failed: ${errToMessage(err)}`);
      throw err;
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener('abort', forwardAbort);
    }
  }

  private async execute(config: AppConfig, now: Date, signal: AbortSignal): Promise<RenderedDigest> {
    const startedAt = Date.now();
    const { server, newsletter, emailTemplate } = config;

    const collector = new ItemCollector(this.source, () => now);
    const collected = await collector.collect({
      windowDays: server.observedPeriodDays,
      filmFolders: server.watchedFilmFolders,
      tvFolders: server.watchedTvFolders,
      signal,
    });

    const grouped = groupEpisodesIntoShows(collected.episodes);
    this.logger.log(`Grouped episodes=${collected.episodes.length} into shows=${grouped.length}`);

    const cache = new MetadataCache<LookupOutcome>(newsletter.cacheMaxEntries);
    const enricher = new ContentEnricher(this.enrichmentClient, cache, {
      concurrency: newsletter.enrichmentConcurrency,
      runTimeoutMs: newsletter.runTimeoutMs,
    });
    const { digest, failures } = await enricher.enrich({
      movies: collected.movies,
      shows: grouped,
      generatedAt: now,
      signal,
    });

    const totals = await this.countTotals(config, signal);
    const labels = await loadLocaleLabels(this.templateRoot, emailTemplate.language);
    const { subject, context } = buildTemplateContext({ digest, config, labels, totals, now });

    const outcome = await this.rendererFor(newsletter.maxContextBytes).render(
      emailTemplate.template,
      context,
    );

    const stats = {
      moviesCount: digest.movies.length,
      showsCount: digest.shows.length,
      episodesCount: countEpisodes(digest.shows),
      enrichmentFailures: failures.length,
      cacheHits: cache.hits,
      cacheMisses: cache.misses,
      auditPassed: outcome.audit.passed,
      fallbackUsed: outcome.fallback,
      durationMs: Date.now() - startedAt,
    };
    this.logger.log(
      `Newsletter rendered movies=${stats.moviesCount} shows=${stats.showsCount} episodes=${stats.episodesCount} failures=${stats.enrichmentFailures} fallback=${stats.fallbackUsed} durationMs=${stats.durationMs}`,
    );

    return { html: outcome.html, subject: toHeaderText(subject), digest, failures, stats };
  }

  /** Sums counts across the watched folders of each kind; null when no folder reported one. */
  private async countTotals(config: AppConfig, signal: AbortSignal): Promise<ServerTotals> {
    const [movies, series] = await Promise.all([
      this.sumFolders(config.server.watchedFilmFolders, 'movie', signal),
      this.sumFolders(config.server.watchedTvFolders, 'tv', signal),
    ]);
    return { movies, series };
  }

  private async sumFolders(
    folders: readonly string[],
    kind: MediaKind,
    signal: AbortSignal,
  ): Promise<number | null> {
    const counts = await Promise.all(
      Array.from(new Set(folders)).map(async (folder) => {
        try {
          return await this.source.countItems(folder, kind, { signal });
        } catch (err) {
          if (signal.aborted) throw err;
          this.logger.warn(
            `Could not count ${kind} items in ${JSON.stringify(folder)}: ${errToMessage(err)}`,
          );
          return null;
        }
      }),
    );
    const known = counts.filter((n): n is number => typeof n === 'number');
    return known.length ? known.reduce((sum, n) => sum + n, 0) : null;
  }

  private rendererFor(maxContextBytes: number): SecureRenderer {
    let renderer = this.renderers.get(maxContextBytes);
    if (!renderer) {
      renderer = new SecureRenderer({ templateRoot: this.templateRoot, maxContextBytes });
      this.renderers.set(maxContextBytes, renderer);
    }
    return renderer;
  }
}
