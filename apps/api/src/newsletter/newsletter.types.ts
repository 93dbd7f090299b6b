export type MediaKind = 'movie' | 'tv';

export type RawItemType = 'Movie' | 'Episode';

/** One item as returned by the media server, already narrowed at the client boundary. */
export type RawItem = {
  id: string;
  type: RawItemType;
  name: string;
  addedAt: Date;
  libraryFolder: string;
  year?: number | null;
  seriesId?: string | null;
  seriesName?: string | null;
  seasonNumber?: number | null;
  episodeNumber?: number | null;
};

export type FetchOptions = {
  signal?: AbortSignal;
};

export interface LibrarySource {
  readonly serverType: string;
  /**
   * Items added to `folder` since `since`. Unknown folders yield an empty list.
   * Throws SourceUnavailableError once the transport retry policy is exhausted.
   */
  fetchRecent(folder: string, since: Date, options?: FetchOptions): Promise<RawItem[]>;
  /** Best-effort total of movies (`movie`) or series (`tv`) in a folder; null when unknown. */
  countItems(folder: string, kind: MediaKind, options?: FetchOptions): Promise<number | null>;
}

export type EnrichmentFound = {
  status: 'found';
  posterUrl?: string;
  synopsis?: string;
  rating?: number;
};

export type EnrichmentNotFound = { status: 'not_found' };

export type EnrichmentMalformed = { status: 'malformed'; reason: string };

export type LookupResult = EnrichmentFound | EnrichmentNotFound | EnrichmentMalformed;

export type LookupRequest = {
  title: string;
  year?: number | null;
  kind: MediaKind;
  signal?: AbortSignal;
};

export interface EnrichmentClient {
  /** Throws LookupFailedError on transport failure (timeouts, HTTP errors). */
  lookup(request: LookupRequest): Promise<LookupResult>;
}

/** What the cache remembers per key: a lookup result, or the failure that replaced it. */
export type LookupOutcome = LookupResult | { status: 'error'; reason: string };

export type Enrichment = {
  posterUrl?: string;
  synopsis?: string;
  rating?: number;
};

export type EnrichedMovie = Enrichment & {
  id: string;
  name: string;
  year?: number;
  addedAt: string;
};

export type Episode = {
  id: string;
  name: string;
  episodeNumber: number | null;
  addedAt: string;
};

export type Season = {
  /** null is the "unknown season" bucket, always ordered last. */
  seasonNumber: number | null;
  episodes: Episode[];
};

export type EnrichedShow = Enrichment & {
  seriesId: string;
  seriesName: string;
  year?: number;
  latestAddedAt: string;
  seasons: Season[];
};

export type Digest = {
  readonly movies: readonly EnrichedMovie[];
  readonly shows: readonly EnrichedShow[];
  readonly generatedAt: string;
};

export type EnrichmentFailure = {
  kind: MediaKind;
  title: string;
  reason: string;
};

export type ServerTotals = {
  movies: number | null;
  series: number | null;
};

export type RunStats = {
  moviesCount: number;
  showsCount: number;
  episodesCount: number;
  enrichmentFailures: number;
  cacheHits: number;
  cacheMisses: number;
  auditPassed: boolean;
  fallbackUsed: boolean;
  durationMs: number;
};

export type RenderedDigest = {
  html: string;
  subject: string;
  digest: Digest;
  failures: EnrichmentFailure[];
  stats: RunStats;
};
