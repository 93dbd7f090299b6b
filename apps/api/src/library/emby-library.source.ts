import { Logger } from '@nestjs/common';
import { fetchJson, isTransientHttpError } from '../lib/http-fetch';
import { withRetry } from '../lib/with-retry';
import { SourceUnavailableError, errToMessage } from '../newsletter/newsletter.errors';
import type {
  FetchOptions,
  LibrarySource,
  MediaKind,
  RawItem,
} from '../newsletter/newsletter.types';
import { redactSecrets } from '../security/redact';

export type EmbyFlavor = 'emby' | 'jellyfin';

export type EmbyLibrarySourceOptions = {
  flavor: EmbyFlavor;
  baseUrl: string;
  apiToken: string;
  timeoutMs?: number;
  retryAttempts?: number;
  retryDelayMs?: number;
};

type EmbyItem = Record<string, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function asItems(payload: unknown): EmbyItem[] {
  if (!isPlainObject(payload) || !Array.isArray(payload.Items)) return [];
  return payload.Items.filter(isPlainObject);
}

function toStringSafe(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

function toIntOrNull(value: unknown): number | null {
  const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : NaN;
  return Number.isInteger(n) ? n : null;
}

/**
 * Narrow one Items entry. Virtual entries (known to the server but missing on disk) and
 * anything that is not a Movie or Episode are skipped.
 */
export function parseEmbyItem(raw: EmbyItem, folder: string): RawItem | null {
  const type = raw.Type;
  if (type !== 'Movie' && type !== 'Episode') return null;
  if (raw.LocationType === 'Virtual') return null;

  const id = toStringSafe(raw.Id);
  const name = toStringSafe(raw.Name);
  // Emby reports seven fractional digits; Date only takes three.
  const addedAt = new Date(toStringSafe(raw.DateCreated).replace(/(\.\d{3})\d+/, '$1'));
  if (!id || !name || !Number.isFinite(addedAt.getTime())) return null;

  const item: RawItem = {
    id,
    type,
    name,
    addedAt,
    libraryFolder: folder,
    year: toIntOrNull(raw.ProductionYear),
  };
  if (type === 'Episode') {
    item.seriesId = toStringSafe(raw.SeriesId) || null;
    item.seriesName = toStringSafe(raw.SeriesName) || null;
    item.seasonNumber = toIntOrNull(raw.ParentIndexNumber);
    item.episodeNumber = toIntOrNull(raw.IndexNumber);
  }
  return item;
}

/** Emby and Jellyfin share the Items API; they differ in path prefix and auth header. */
export class EmbyLibrarySource implements LibrarySource {
  private readonly logger = new Logger(EmbyLibrarySource.name);
  private readonly baseUrl: string;
  private readonly serviceLabel: string;

  constructor(private readonly options: EmbyLibrarySourceOptions) {
    const root = options.baseUrl.replace(/\/+$/, '');
    this.baseUrl = options.flavor === 'emby' ? `${root}/emby` : root;
    this.serviceLabel = options.flavor === 'emby' ? 'Emby' : 'Jellyfin';
  }

  get serverType(): EmbyFlavor {
    return this.options.flavor;
  }

  async fetchRecent(folder: string, since: Date, options: FetchOptions = {}): Promise<RawItem[]> {
    const parentId = await this.resolveFolderId(folder, options.signal);
    if (!parentId) return [];

    const payload = await this.get(
      'Items',
      {
        ParentId: parentId,
        Recursive: 'true',
        IncludeItemTypes: 'Movie,Episode',
        Fields: 'DateCreated,ProductionYear,ProviderIds',
        SortBy: 'DateCreated',
        SortOrder: 'Descending',
      },
      options.signal,
    );

    const out: RawItem[] = [];
    for (const raw of asItems(payload)) {
      const item = parseEmbyItem(raw, folder);
      if (!item) continue;
      if (item.addedAt.getTime() < since.getTime()) continue;
      out.push(item);
    }
    return out;
  }

  async countItems(folder: string, kind: MediaKind, options: FetchOptions = {}): Promise<number | null> {
    const parentId = await this.resolveFolderId(folder, options.signal);
    if (!parentId) return null;

    const payload = await this.get(
      'Items',
      {
        ParentId: parentId,
        Recursive: 'true',
        IncludeItemTypes: kind === 'movie' ? 'Movie' : 'Series',
        Limit: '0',
      },
      options.signal,
    );
    if (!isPlainObject(payload)) return null;
    const total = toIntOrNull(payload.TotalRecordCount);
    return total !== null && total >= 0 ? total : null;
  }

  /** Top-level library folders are matched by name, case-insensitively. */
  private async resolveFolderId(folder: string, signal?: AbortSignal): Promise<string | null> {
    const payload = await this.get('Items', {}, signal);
    const wanted = folder.trim().toLowerCase();
    const match = asItems(payload).find((item) => toStringSafe(item.Name).toLowerCase() === wanted);
    const id = match ? toStringSafe(match.Id) : '';
    if (!id) {
      this.logger.warn(`${this.serviceLabel} library folder not found: ${JSON.stringify(folder)}`);
      return null;
    }
    return id;
  }

  private authHeaders(): Record<string, string> {
    if (this.options.flavor === 'jellyfin') {
      return { Authorization: `MediaBrowser Token="${this.options.apiToken}"` };
    }
    return { 'X-Emby-Token': this.options.apiToken };
  }

  private async get(path: string, query: Record<string, string>, signal?: AbortSignal): Promise<unknown> {
    const url = new URL(`${this.baseUrl}/${path}`);
    for (const [k, v] of Object.entries(query)) url.searchParams.set(k, v);
    const secrets = [this.options.apiToken];

    try {
      return await withRetry(
        () =>
          fetchJson({
            service: this.serviceLabel,
            url: url.toString(),
            headers: this.authHeaders(),
            timeoutMs: this.options.timeoutMs ?? 20_000,
            signal,
            logger: this.logger,
            secrets,
          }),
        {
          label: `${this.serviceLabel} GET /${path}`,
          logger: this.logger,
          attempts: this.options.retryAttempts ?? 3,
          delayMs: this.options.retryDelayMs ?? 1_000,
          signal,
          retryable: isTransientHttpError,
        },
      );
    } catch (err) {
      throw new SourceUnavailableError(redactSecrets(errToMessage(err), secrets));
    }
  }
}
