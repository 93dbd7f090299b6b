import { Logger } from '@nestjs/common';
import pLimit from 'p-limit';
import { raceWithAbort } from '../lib/abort';
import { deepFreeze } from '../lib/deep-freeze';
import { titleKey } from '../lib/title-normalize';
import { redactSecrets } from '../security/redact';
import { MetadataCache } from './metadata-cache';
import { RunTimedOutError, errToMessage } from './newsletter.errors';
import type {
  Digest,
  EnrichedMovie,
  EnrichedShow,
  Enrichment,
  EnrichmentClient,
  EnrichmentFailure,
  LookupOutcome,
  LookupRequest,
  MediaKind,
  RawItem,
} from './newsletter.types';

export type EnricherOptions = {
  concurrency: number;
  /** Used for the RunTimedOutError raised when the run signal fires. */
  runTimeoutMs?: number;
};

export type EnrichParams = {
  movies: readonly RawItem[];
  shows: readonly EnrichedShow[];
  generatedAt: Date;
  signal?: AbortSignal;
};

export type EnrichResult = {
  digest: Digest;
  failures: EnrichmentFailure[];
};

export function lookupCacheKey(kind: MediaKind, title: string, year?: number | null): string {
  const y = typeof year === 'number' && Number.isFinite(year) ? String(Math.trunc(year)) : '';
  return `${kind}|${titleKey(title)}|${y}`;
}

function toEnrichment(outcome: LookupOutcome): Enrichment | null {
  if (outcome.status !== 'found') return null;
  const enrichment: Enrichment = {};
  if (outcome.posterUrl) enrichment.posterUrl = outcome.posterUrl;
  if (outcome.synopsis) enrichment.synopsis = outcome.synopsis;
  if (typeof outcome.rating === 'number' && Number.isFinite(outcome.rating)) {
    enrichment.rating = outcome.rating;
  }
  return enrichment;
}

function failureReason(outcome: LookupOutcome): string {
  switch (outcome.status) {
    case 'found':
      return 'found';
    case 'not_found':
      return 'not found';
    case 'malformed':
      return `malformed response: ${outcome.reason}`;
    case 'error':
      return outcome.reason;
  }
}

export class ContentEnricher {
  private readonly logger = new Logger(ContentEnricher.name);
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(
    private readonly client: EnrichmentClient,
    private readonly cache: MetadataCache<LookupOutcome>,
    private readonly options: EnricherOptions,
  ) {
    this.limit = pLimit(Math.max(1, Math.trunc(options.concurrency) || 1));
  }

  async enrich(params: EnrichParams): Promise<EnrichResult> {
    const { signal } = params;
    const toTimeout = (reason: unknown): Error =>
      reason instanceof RunTimedOutError
        ? reason
        : new RunTimedOutError(this.options.runTimeoutMs ?? 0);

    const movieLookups = params.movies.map((m) =>
      this.lookupOnce({ kind: 'movie', title: m.name, year: m.year ?? null }, signal),
    );
    const showLookups = params.shows.map((s) =>
      this.lookupOnce({ kind: 'tv', title: s.seriesName, year: s.year ?? null }, signal),
    );

    const [movieOutcomes, showOutcomes] = await raceWithAbort(
      Promise.all([Promise.all(movieLookups), Promise.all(showLookups)]),
      signal,
      toTimeout,
    );

    const failures: EnrichmentFailure[] = [];
    const recordFailure = (kind: MediaKind, title: string, outcome: LookupOutcome) => {
      const reason = failureReason(outcome);
      failures.push({ kind, title, reason });
      this.logger.warn(`Enrichment failed kind=${kind} title=${JSON.stringify(title)}: ${reason}`);
    };

    const movies: EnrichedMovie[] = params.movies.map((item, i) => {
      const outcome = movieOutcomes[i];
      const enrichment = toEnrichment(outcome);
      if (!enrichment) recordFailure('movie', item.name, outcome);
      const movie: EnrichedMovie = {
        id: item.id,
        name: item.name,
        addedAt: item.addedAt.toISOString(),
        ...(enrichment ?? {}),
      };
      if (typeof item.year === 'number') movie.year = item.year;
      return movie;
    });

    const shows: EnrichedShow[] = params.shows.map((show, i) => {
      const outcome = showOutcomes[i];
      const enrichment = toEnrichment(outcome);
      if (!enrichment) recordFailure('tv', show.seriesName, outcome);
      return { ...show, ...(enrichment ?? {}) };
    });

    const digest: Digest = deepFreeze({
      movies,
      shows,
      generatedAt: params.generatedAt.toISOString(),
    });

    this.logger.log(
      `Enriched movies=${movies.length} shows=${shows.length} failures=${failures.length} cacheHits=${this.cache.hits} cacheMisses=${this.cache.misses}`,
    );
    return { digest, failures };
  }

  private lookupOnce(request: LookupRequest, signal?: AbortSignal): Promise<LookupOutcome> {
    const key = lookupCacheKey(request.kind, request.title, request.year);
    return this.cache.getOrLoad(key, () => this.limit(() => this.load(request, signal)));
  }

  private async load(request: LookupRequest, signal?: AbortSignal): Promise<LookupOutcome> {
    if (signal?.aborted) return { status: 'error', reason: 'run aborted' };
    try {
      return await this.client.lookup({ ...request, signal });
    } catch (err) {
      return { status: 'error', reason: redactSecrets(errToMessage(err)) };
    }
  }
}
