import { Logger } from '@nestjs/common';
import { XMLParser } from 'fast-xml-parser';
import { fetchText, isTransientHttpError } from '../lib/http-fetch';
import { withRetry } from '../lib/with-retry';
import { SourceUnavailableError, errToMessage } from '../newsletter/newsletter.errors';
import type {
  FetchOptions,
  LibrarySource,
  MediaKind,
  RawItem,
} from '../newsletter/newsletter.types';
import { redactSecrets } from '../security/redact';

export type PlexLibrarySourceOptions = {
  baseUrl: string;
  token: string;
  timeoutMs?: number;
  retryAttempts?: number;
  retryDelayMs?: number;
};

type PlexSection = {
  key: string;
  title: string;
  type: string;
};

// Plex search types for /library/sections/:key/all
const PLEX_TYPE = { movie: 1, show: 2, episode: 4 } as const;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  // Titles such as "007" or "1e3" must stay strings; numeric attributes are converted per field.
  parseAttributeValue: false,
  allowBooleanAttributes: true,
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function asRecordArray(value: unknown): Record<string, unknown>[] {
  if (!value) return [];
  const list = Array.isArray(value) ? value : [value];
  return list.filter(isPlainObject);
}

function toStringSafe(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function toIntOrNull(value: unknown): number | null {
  const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : NaN;
  return Number.isInteger(n) ? n : null;
}

function mediaContainer(parsed: unknown): Record<string, unknown> {
  if (!isPlainObject(parsed) || !isPlainObject(parsed.MediaContainer)) return {};
  return parsed.MediaContainer;
}

/** Narrow one `<Video>` element. Plex `addedAt` is epoch seconds. */
export function parsePlexVideo(raw: Record<string, unknown>, folder: string): RawItem | null {
  const type = raw.type;
  if (type !== 'movie' && type !== 'episode') return null;

  const id = toStringSafe(raw.ratingKey);
  const name = toStringSafe(raw.title);
  const addedAtSec = toIntOrNull(raw.addedAt);
  if (!id || !name || addedAtSec === null) return null;

  const item: RawItem = {
    id,
    type: type === 'movie' ? 'Movie' : 'Episode',
    name,
    addedAt: new Date(addedAtSec * 1000),
    libraryFolder: folder,
    year: toIntOrNull(raw.year),
  };
  if (type === 'episode') {
    item.seriesId = toStringSafe(raw.grandparentRatingKey) || null;
    item.seriesName = toStringSafe(raw.grandparentTitle) || null;
    item.seasonNumber = toIntOrNull(raw.parentIndex);
    item.episodeNumber = toIntOrNull(raw.index);
  }
  return item;
}

export class PlexLibrarySource implements LibrarySource {
  readonly serverType = 'plex';
  private readonly logger = new Logger(PlexLibrarySource.name);
  private readonly baseUrl: string;

  constructor(private readonly options: PlexLibrarySourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async fetchRecent(folder: string, since: Date, options: FetchOptions = {}): Promise<RawItem[]> {
    const section = await this.resolveSection(folder, options.signal);
    if (!section) return [];

    const searchType = section.type === 'show' ? PLEX_TYPE.episode : PLEX_TYPE.movie;
    const container = mediaContainer(
      await this.get(
        `library/sections/${encodeURIComponent(section.key)}/all`,
        { type: String(searchType), sort: 'addedAt:desc' },
        options.signal,
      ),
    );

    const out: RawItem[] = [];
    for (const raw of asRecordArray(container.Video ?? container.Metadata)) {
      const item = parsePlexVideo(raw, folder);
      if (!item) continue;
      if (item.addedAt.getTime() < since.getTime()) continue;
      out.push(item);
    }
    return out;
  }

  async countItems(folder: string, kind: MediaKind, options: FetchOptions = {}): Promise<number | null> {
    const section = await this.resolveSection(folder, options.signal);
    if (!section) return null;

    const container = mediaContainer(
      await this.get(
        `library/sections/${encodeURIComponent(section.key)}/all`,
        {
          type: String(kind === 'movie' ? PLEX_TYPE.movie : PLEX_TYPE.show),
          'X-Plex-Container-Start': '0',
          'X-Plex-Container-Size': '0',
        },
        options.signal,
      ),
    );
    const total = toIntOrNull(container.totalSize ?? container.size);
    return total !== null && total >= 0 ? total : null;
  }

  private async resolveSection(folder: string, signal?: AbortSignal): Promise<PlexSection | null> {
    const container = mediaContainer(await this.get('library/sections', {}, signal));
    const wanted = folder.trim().toLowerCase();
    const sections: PlexSection[] = asRecordArray(container.Directory).map((d) => ({
      key: toStringSafe(d.key),
      title: toStringSafe(d.title),
      type: toStringSafe(d.type),
    }));
    const match = sections.find((s) => s.key && s.title.toLowerCase() === wanted);
    if (!match) {
      this.logger.warn(`Plex library section not found: ${JSON.stringify(folder)}`);
      return null;
    }
    return match;
  }

  private async get(path: string, query: Record<string, string>, signal?: AbortSignal): Promise<unknown> {
    const url = new URL(`${this.baseUrl}/${path}`);
    for (const [k, v] of Object.entries(query)) url.searchParams.set(k, v);
    const secrets = [this.options.token];

    try {
      const text = await withRetry(
        () =>
          fetchText({
            service: 'Plex',
            url: url.toString(),
            headers: { Accept: 'application/xml', 'X-Plex-Token': this.options.token },
            timeoutMs: this.options.timeoutMs ?? 20_000,
            signal,
            logger: this.logger,
            secrets,
          }),
        {
          label: `Plex GET /${path}`,
          logger: this.logger,
          attempts: this.options.retryAttempts ?? 3,
          delayMs: this.options.retryDelayMs ?? 1_000,
          signal,
          retryable: isTransientHttpError,
        },
      );
      const parsed: unknown = parser.parse(text);
      return parsed;
    } catch (err) {
      throw new SourceUnavailableError(redactSecrets(errToMessage(err), secrets));
    }
  }
}
