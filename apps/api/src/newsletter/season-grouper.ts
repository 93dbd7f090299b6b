import { titleKey } from '../lib/title-normalize';
import type { EnrichedShow, Episode, RawItem, Season } from './newsletter.types';

const UNKNOWN_SERIES = 'Unknown series';

type ShowBucket = {
  seriesId: string;
  seriesName: string;
  latestMs: number;
  known: Map<number, Map<number, RawItem>>;
  unknown: RawItem[];
};

const asIndex = (value: number | null | undefined): number | null =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : null;

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

function toEpisode(item: RawItem, episodeNumber: number | null): Episode {
  return {
    id: item.id,
    name: item.name,
    episodeNumber,
    addedAt: item.addedAt.toISOString(),
  };
}

function showKey(item: RawItem): string {
  const id = item.seriesId?.trim();
  if (id) return id;
  return `name:${titleKey(item.seriesName ?? '')}`;
}

/**
 * Group episodes into shows and seasons. Episodes lacking a usable season or episode
 * number go to the `seasonNumber: null` season, which sorts last.
 */
export function groupEpisodesIntoShows(episodes: readonly RawItem[]): EnrichedShow[] {
  const buckets = new Map<string, ShowBucket>();

  for (const item of episodes) {
    const key = showKey(item);
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = {
        seriesId: key,
        seriesName: '',
        latestMs: Number.NEGATIVE_INFINITY,
        known: new Map(),
        unknown: [],
      };
      buckets.set(key, bucket);
    }
    if (!bucket.seriesName && item.seriesName?.trim()) {
      bucket.seriesName = item.seriesName.trim();
    }

    const season = asIndex(item.seasonNumber);
    const episodeNumber = asIndex(item.episodeNumber);
    if (season === null || episodeNumber === null) {
      bucket.unknown.push(item);
      bucket.latestMs = Math.max(bucket.latestMs, item.addedAt.getTime());
      continue;
    }
    let byEpisode = bucket.known.get(season);
    if (!byEpisode) {
      byEpisode = new Map();
      bucket.known.set(season, byEpisode);
    }
    // First one wins for a repeated episode number.
    if (byEpisode.has(episodeNumber)) continue;
    byEpisode.set(episodeNumber, item);
    bucket.latestMs = Math.max(bucket.latestMs, item.addedAt.getTime());
  }

  const shows: EnrichedShow[] = [];
  for (const bucket of buckets.values()) {
    const seasons: Season[] = Array.from(bucket.known.entries())
      .sort(([a], [b]) => a - b)
      .map(([seasonNumber, byEpisode]) => ({
        seasonNumber,
        episodes: Array.from(byEpisode.entries())
          .sort(([a], [b]) => a - b)
          .map(([n, item]) => toEpisode(item, n)),
      }));

    if (bucket.unknown.length) {
      seasons.push({
        seasonNumber: null,
        episodes: [...bucket.unknown]
          .sort((a, b) => a.addedAt.getTime() - b.addedAt.getTime())
          .map((item) => toEpisode(item, asIndex(item.episodeNumber))),
      });
    }

    shows.push({
      seriesId: bucket.seriesId,
      seriesName: bucket.seriesName || UNKNOWN_SERIES,
      latestAddedAt: new Date(bucket.latestMs).toISOString(),
      seasons,
    });
  }

  return shows.sort(
    (a, b) =>
      Date.parse(b.latestAddedAt) - Date.parse(a.latestAddedAt) ||
      compareText(a.seriesName, b.seriesName) ||
      compareText(a.seriesId, b.seriesId),
  );
}

/** `[1, 2, 3, 5, 7, 8]` becomes `['1-3', '5', '7-8']`. */
export function summarizeEpisodeRanges(numbers: readonly (number | null)[]): string[] {
  const sorted = Array.from(
    new Set(numbers.filter((n): n is number => typeof n === 'number' && Number.isInteger(n))),
  ).sort((a, b) => a - b);

  const ranges: string[] = [];
  let start: number | null = null;
  let prev: number | null = null;
  for (const n of sorted) {
    if (start !== null && prev !== null && n === prev + 1) {
      prev = n;
      continue;
    }
    if (start !== null && prev !== null) ranges.push(start === prev ? `${start}` : `${start}-${prev}`);
    start = n;
    prev = n;
  }
  if (start !== null && prev !== null) ranges.push(start === prev ? `${start}` : `${start}-${prev}`);
  return ranges;
}

export function countEpisodes(shows: readonly EnrichedShow[]): number {
  return shows.reduce(
    (total, show) => total + show.seasons.reduce((n, s) => n + s.episodes.length, 0),
    0,
  );
}
