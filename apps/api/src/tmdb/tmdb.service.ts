import { Logger } from '@nestjs/common';
import { fetchJson, isTransientHttpError } from '../lib/http-fetch';
import { buildTitleQueryVariants } from '../lib/title-normalize';
import { withRetry } from '../lib/with-retry';
import { LookupFailedError, errToMessage } from '../newsletter/newsletter.errors';
import type {
  EnrichmentClient,
  EnrichmentFound,
  LookupRequest,
  LookupResult,
} from '../newsletter/newsletter.types';
import { redactSecrets } from '../security/redact';

export const TMDB_API_BASE_URL = 'https://api.themoviedb.org/3';
export const TMDB_POSTER_BASE_URL = 'https://image.tmdb.org/t/p/w500';

const TMDB_DOCUMENTARY_GENRE_ID = 99;

export type TmdbServiceOptions = {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  retryAttempts?: number;
  retryDelayMs?: number;
};

export type TmdbSearchResult = {
  id: number;
  title: string;
  /** release_date for movies, first_air_date for TV. */
  date?: string;
  overview?: string;
  poster_path?: string;
  genre_ids?: number[];
  vote_count?: number;
  vote_average?: number;
  popularity?: number;
};

type SearchPage = { ok: true; results: TmdbSearchResult[] } | { ok: false; reason: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function toNumberOrUndefined(value: unknown): number | undefined {
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function toTrimmedString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const s = value.trim();
  return s || undefined;
}

/** v4 read access tokens are JWTs; v3 keys are 32 hex characters. */
function isBearerToken(apiKey: string): boolean {
  return apiKey.startsWith('eyJ') && apiKey.split('.').length === 3;
}

export function parseSearchResults(payload: unknown, kind: LookupRequest['kind']): SearchPage {
  if (!isPlainObject(payload)) return { ok: false, reason: 'response is not an object' };
  if (!Array.isArray(payload.results)) return { ok: false, reason: 'results is not an array' };

  const out: TmdbSearchResult[] = [];
  for (const rec of payload.results) {
    if (!isPlainObject(rec)) continue;
    const id = toNumberOrUndefined(rec.id);
    const title = toTrimmedString(kind === 'movie' ? rec.title : rec.name);
    if (id === undefined || id <= 0 || !title) continue;

    out.push({
      id: Math.trunc(id),
      title,
      date: toTrimmedString(kind === 'movie' ? rec.release_date : rec.first_air_date),
      overview: toTrimmedString(rec.overview),
      poster_path: toTrimmedString(rec.poster_path),
      genre_ids: Array.isArray(rec.genre_ids)
        ? rec.genre_ids
            .map((x: unknown) => toNumberOrUndefined(x))
            .filter((n): n is number => n !== undefined && n > 0)
        : undefined,
      vote_count: toNumberOrUndefined(rec.vote_count),
      vote_average: toNumberOrUndefined(rec.vote_average),
      popularity: toNumberOrUndefined(rec.popularity),
    });
  }
  return { ok: true, results: out };
}

/**
 * Pick the most plausible hit: title prefix/containment, year proximity and engagement,
 * with documentaries pushed down unless the query asks for one.
 */
export function bestSearchResult(
  query: string,
  results: TmdbSearchResult[],
  seedYear?: number | null,
): TmdbSearchResult | null {
  const q = query.trim().toLowerCase();
  if (!results.length) return null;

  const score = (r: TmdbSearchResult): number => {
    const title = r.title.trim().toLowerCase();
    const pop = r.popularity ?? 0;
    const votes = r.vote_count ?? 0;
    const vavg = r.vote_average ?? 0;
    const genreIds = new Set(r.genre_ids ?? []);

    const isDoc = genreIds.has(TMDB_DOCUMENTARY_GENRE_ID);
    const docPenalty = isDoc && !q.includes('documentary') ? -1000 : 0;

    const starts = q && title.startsWith(q) ? 80 : 0;
    const contains = q && title.includes(q) ? 30 : 0;

    const yearBoost = (() => {
      const y = Math.trunc(seedYear ?? NaN);
      if (!Number.isFinite(y) || y <= 1800) return 0;
      const ry = r.date ? Number(r.date.slice(0, 4)) : NaN;
      if (!Number.isFinite(ry)) return 0;
      const d = Math.abs(ry - y);
      if (d === 0) return 200;
      if (d === 1) return 50;
      if (d === 2) return 10;
      return 0;
    })();

    const engagement = votes * 0.05 + pop * 0.5 + vavg * 2.0;
    return docPenalty + starts + contains + yearBoost + engagement;
  };

  return results.reduce((best, cur) => (score(cur) > score(best) ? cur : best));
}

function toFound(result: TmdbSearchResult): EnrichmentFound {
  const found: EnrichmentFound = { status: 'found' };
  if (result.poster_path) found.posterUrl = `${TMDB_POSTER_BASE_URL}${result.poster_path}`;
  if (result.overview) found.synopsis = result.overview;
  if (result.vote_average !== undefined) found.rating = result.vote_average;
  return found;
}

/** TMDB search client. One lookup walks the title variants until one yields results. */
export class TmdbService implements EnrichmentClient {
  private readonly logger = new Logger(TmdbService.name);
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(private readonly options: TmdbServiceOptions) {
    this.apiKey = options.apiKey.trim();
    this.baseUrl = (options.baseUrl ?? TMDB_API_BASE_URL).replace(/\/+$/, '');
  }

  async lookup(request: LookupRequest): Promise<LookupResult> {
    const variants = buildTitleQueryVariants(request.title);
    if (!variants.length) return { status: 'not_found' };

    const year =
      typeof request.year === 'number' && Number.isFinite(request.year) && request.year > 1800
        ? Math.trunc(request.year)
        : null;
    // With a year filter first; a wrong year on the server side should not hide the title.
    const passes: Array<number | null> = year === null ? [null] : [year, null];

    for (const yearFilter of passes) {
      for (const query of variants) {
        const page = await this.search(request.kind, query, yearFilter, request.signal);
        if (!page.ok) {
          this.logger.warn(
            `TMDB search returned an unexpected shape kind=${request.kind} query=${JSON.stringify(query)}: ${page.reason}`,
          );
          return { status: 'malformed', reason: page.reason };
        }
        const best = bestSearchResult(query, page.results, year);
        if (best) {
          this.logger.debug(
            `TMDB match kind=${request.kind} query=${JSON.stringify(query)} -> id=${best.id} ${JSON.stringify(best.title)}`,
          );
          return toFound(best);
        }
      }
    }
    return { status: 'not_found' };
  }

  private async search(
    kind: LookupRequest['kind'],
    query: string,
    year: number | null,
    signal?: AbortSignal,
  ): Promise<SearchPage> {
    const url = new URL(`${this.baseUrl}/search/${kind === 'movie' ? 'movie' : 'tv'}`);
    url.searchParams.set('query', query);
    url.searchParams.set('include_adult', 'false');
    if (year !== null) {
      url.searchParams.set(kind === 'movie' ? 'year' : 'first_air_date_year', String(year));
    }

    const headers: Record<string, string> = {};
    if (isBearerToken(this.apiKey)) headers.Authorization = `Bearer ${this.apiKey}`;
    else url.searchParams.set('api_key', this.apiKey);

    const secrets = [this.apiKey];
    try {
      const payload = await withRetry(
        () =>
          fetchJson({
            service: 'TMDB',
            url: url.toString(),
            headers,
            timeoutMs: this.options.timeoutMs ?? 20_000,
            signal,
            logger: this.logger,
            secrets,
          }),
        {
          label: `TMDB search/${kind}`,
          logger: this.logger,
          attempts: this.options.retryAttempts ?? 3,
          delayMs: this.options.retryDelayMs ?? 1_000,
          signal,
          retryable: isTransientHttpError,
        },
      );
      return parseSearchResults(payload, kind);
    } catch (err) {
      if (err instanceof SyntaxError) return { ok: false, reason: 'invalid JSON' };
      throw new LookupFailedError(redactSecrets(errToMessage(err), secrets));
    }
  }
}
