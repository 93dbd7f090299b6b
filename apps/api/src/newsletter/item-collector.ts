import { Logger } from '@nestjs/common';
import { ConfigurationError } from './newsletter.errors';
import type { LibrarySource, RawItem } from './newsletter.types';

const DAY_MS = 24 * 60 * 60 * 1000;

export type CollectParams = {
  windowDays: number;
  filmFolders: readonly string[];
  tvFolders: readonly string[];
  signal?: AbortSignal;
};

export type CollectedItems = {
  movies: RawItem[];
  episodes: RawItem[];
  since: Date;
  until: Date;
};

export class ItemCollector {
  private readonly logger = new Logger(ItemCollector.name);

  constructor(
    private readonly source: LibrarySource,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async collect(params: CollectParams): Promise<CollectedItems> {
    const { windowDays, signal } = params;
    if (!Number.isInteger(windowDays) || windowDays <= 0) {
      throw new ConfigurationError([
        `server.observed_period_days must be a positive integer (got ${String(windowDays)})`,
      ]);
    }

    const until = this.clock();
    const since = new Date(until.getTime() - windowDays * DAY_MS);
    const filmSet = new Set(params.filmFolders);
    const tvSet = new Set(params.tvFolders);
    const folders = Array.from(new Set([...params.filmFolders, ...params.tvFolders]));

    const seen = new Set<string>();
    const movies: RawItem[] = [];
    const episodes: RawItem[] = [];

    for (const folder of folders) {
      const items = await this.source.fetchRecent(folder, since, { signal });
      let kept = 0;
      for (const item of items) {
        const addedMs = item.addedAt.getTime();
        if (!Number.isFinite(addedMs)) continue;
        if (addedMs < since.getTime() || addedMs > until.getTime()) continue;

        const isMovie = item.type === 'Movie' && filmSet.has(folder);
        const isEpisode = item.type === 'Episode' && tvSet.has(folder);
        if (!isMovie && !isEpisode) continue;
        if (seen.has(item.id)) continue;
        seen.add(item.id);

        const normalized: RawItem = { ...item, libraryFolder: folder };
        if (isMovie) movies.push(normalized);
        else episodes.push(normalized);
        kept += 1;
      }
      this.logger.debug(`folder=${JSON.stringify(folder)} fetched=${items.length} kept=${kept}`);
    }

    this.logger.log(
      `Collected movies=${movies.length} episodes=${episodes.length} window=${windowDays}d folders=${folders.length}`,
    );
    return { movies, episodes, since, until };
  }
}
