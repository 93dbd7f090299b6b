import { readFile } from 'node:fs/promises';
import { formatDateInTimezone } from '../lib/dates';
import type { AppConfig, Language } from '../settings/settings.types';
import { ConfigurationError, errToMessage } from './newsletter.errors';
import type { Digest, Season, ServerTotals } from './newsletter.types';
import { sanitizePath } from './sanitizer';
import { summarizeEpisodeRanges } from './season-grouper';

/** Above this many titles the synopses are left out to keep the mail short. */
export const OVERVIEW_TITLE_LIMIT = 10;

export const LABEL_KEYS = [
  'discoverNow',
  'newMovies',
  'newShows',
  'currentlyAvailable',
  'moviesLabel',
  'seriesLabel',
  'footerLabel',
  'addedOn',
  'seasonLabel',
  'otherEpisodesLabel',
  'episodes',
  'episode',
  'ratingLabel',
  'emptyLabel',
] as const;

export type LabelKey = (typeof LABEL_KEYS)[number];
export type LocaleLabels = Record<LabelKey, string>;

const isLabel = (value: unknown): value is string =>
  typeof value === 'string' && value.trim() !== '';

function hasAllLabels(rec: Record<string, unknown>): rec is Record<string, unknown> & LocaleLabels {
  return LABEL_KEYS.every((key) => isLabel(rec[key]));
}

export async function loadLocaleLabels(
  templateRoot: string,
  language: Language,
): Promise<LocaleLabels> {
  const path = sanitizePath(`locales/${language}.json`, templateRoot);
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new ConfigurationError([`cannot load labels for language "${language}": ${errToMessage(err)}`]);
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigurationError([`labels for language "${language}" must be a JSON object`]);
  }

  const rec: Record<string, unknown> = { ...parsed };
  const missing = LABEL_KEYS.filter((key) => !isLabel(rec[key]));
  if (missing.length || !hasAllLabels(rec)) {
    throw new ConfigurationError(
      missing.map((key) => `labels for language "${language}" are missing "${key}"`),
    );
  }
  return rec;
}

/** Replace `{name}` for the given names only; other braces are left as written. */
export function applyPlaceholders(text: string, values: Readonly<Record<string, string>>): string {
  return text.replace(/\{([a-z_]+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match,
  );
}

export function describeSeasonEpisodes(season: Season, labels: LocaleLabels): string {
  if (season.seasonNumber === null) {
    return season.episodes.map((e) => e.name).join(', ');
  }
  const ranges = summarizeEpisodeRanges(season.episodes.map((e) => e.episodeNumber));
  if (season.episodes.length === 1 && ranges.length === 1) {
    return `${labels.episode} ${ranges[0]}`;
  }
  if (ranges.length <= 1) return `${labels.episodes} ${ranges.join('')}`;
  return `${labels.episodes} ${ranges.slice(0, -1).join(', ')} & ${ranges[ranges.length - 1]}`;
}

export type TemplateContextParams = {
  digest: Digest;
  config: AppConfig;
  labels: LocaleLabels;
  totals: ServerTotals;
  now: Date;
};

export type TemplateContext = {
  subject: string;
  context: Record<string, unknown>;
};

/**
 * Plain-data view of a digest for the template. Nothing here is escaped; the renderer
 * sanitizes the whole tree before binding it.
 */
export function buildTemplateContext(params: TemplateContextParams): TemplateContext {
  const { digest, config, labels, totals, now } = params;
  const { emailTemplate } = config;
  const tz = config.scheduler.timezone;

  const placeholders: Record<string, string> = {
    date: formatDateInTimezone(now, tz),
    observed_period_days: String(config.server.observedPeriodDays),
    server_owner_name: emailTemplate.serverOwnerName,
    unsubscribe_email: emailTemplate.unsubscribeEmail ?? '',
  };
  const fill = (text: string) => applyPlaceholders(text, placeholders);
  const formatDay = (iso: string) => formatDateInTimezone(new Date(iso), tz);
  const formatRating = (rating?: number) =>
    typeof rating === 'number' && rating > 0 ? rating.toFixed(1) : null;

  const titleCount = digest.movies.length + digest.shows.length;
  const includeOverview = titleCount <= OVERVIEW_TITLE_LIMIT;

  const context: Record<string, unknown> = {
    title: fill(emailTemplate.title),
    subtitle: fill(emailTemplate.subtitle),
    subject: fill(emailTemplate.subject),
    serverUrl: emailTemplate.serverUrl,
    serverOwnerName: emailTemplate.serverOwnerName,
    unsubscribeEmail: emailTemplate.unsubscribeEmail,
    showFooter: Boolean(emailTemplate.serverOwnerName && emailTemplate.unsubscribeEmail),
    footerText: fill(labels.footerLabel),
    emptyText: fill(labels.emptyLabel),
    labels,
    generatedOn: placeholders.date,
    isEmpty: titleCount === 0,
    hasMovies: digest.movies.length > 0,
    hasShows: digest.shows.length > 0,
    includeOverview,
    movies: digest.movies.map((m) => ({
      name: m.name,
      year: m.year ?? null,
      posterUrl: m.posterUrl ?? null,
      synopsis: includeOverview ? (m.synopsis ?? null) : null,
      rating: formatRating(m.rating),
      addedOn: formatDay(m.addedAt),
    })),
    shows: digest.shows.map((s) => ({
      seriesName: s.seriesName,
      posterUrl: s.posterUrl ?? null,
      synopsis: includeOverview ? (s.synopsis ?? null) : null,
      rating: formatRating(s.rating),
      addedOn: formatDay(s.latestAddedAt),
      seasons: s.seasons.map((season) => ({
        label:
          season.seasonNumber === null
            ? labels.otherEpisodesLabel
            : `${labels.seasonLabel} ${season.seasonNumber}`,
        summary: describeSeasonEpisodes(season, labels),
      })),
    })),
    totals: {
      show: totals.movies !== null || totals.series !== null,
      hasMovies: totals.movies !== null,
      hasSeries: totals.series !== null,
      movies: totals.movies,
      series: totals.series,
    },
  };

  return { subject: fill(emailTemplate.subject), context };
}
