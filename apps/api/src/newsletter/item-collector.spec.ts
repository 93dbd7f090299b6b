import { ItemCollector } from './item-collector';
import { ConfigurationError, SourceUnavailableError } from './newsletter.errors';
import type { FetchOptions, LibrarySource, RawItem } from './newsletter.types';

const NOW = new Date('2024-06-15T12:00:00.000Z');
const DAY_MS = 24 * 60 * 60 * 1000;

function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY_MS);
}

function movie(id: string, folder: string, addedAt: Date): RawItem {
  return { id, type: 'Movie', name: `Movie ${id}`, addedAt, libraryFolder: folder };
}

function episode(id: string, folder: string, addedAt: Date): RawItem {
  return {
    id,
    type: 'Episode',
    name: `Episode ${id}`,
    addedAt,
    libraryFolder: folder,
    seriesId: 's1',
    seriesName: 'Show',
    seasonNumber: 1,
    episodeNumber: 1,
  };
}

function makeSource(byFolder: Record<string, RawItem[]>) {
  const fetchRecent = jest.fn<Promise<RawItem[]>, [string, Date, FetchOptions?]>(
    async (folder) => byFolder[folder] ?? [],
  );
  const source: LibrarySource = {
    serverType: 'emby',
    fetchRecent,
    countItems: jest.fn().mockResolvedValue(null),
  };
  return { source, fetchRecent };
}

describe('ItemCollector', () => {
  it('keeps items inside the window, inclusive at both ends', async () => {
    const { source } = makeSource({
      Movies: [
        movie('m1', 'Movies', daysAgo(7)),
        movie('m2', 'Movies', NOW),
        movie('m3', 'Movies', new Date(daysAgo(7).getTime() - 1)),
        movie('m4', 'Movies', new Date(NOW.getTime() + 1)),
      ],
    });
    const collector = new ItemCollector(source, () => NOW);

    const out = await collector.collect({ windowDays: 7, filmFolders: ['Movies'], tvFolders: [] });

    expect(out.movies.map((m) => m.id)).toEqual(['m1', 'm2']);
    expect(out.since.toISOString()).toBe('2024-06-08T12:00:00.000Z');
    expect(out.until).toBe(NOW);
  });

  it('filters by item type and watched folder', async () => {
    const { source } = makeSource({
      Movies: [movie('m1', 'Movies', daysAgo(1)), episode('e0', 'Movies', daysAgo(1))],
      Shows: [episode('e1', 'Shows', daysAgo(1)), movie('m0', 'Shows', daysAgo(1))],
    });
    const collector = new ItemCollector(source, () => NOW);

    const out = await collector.collect({
      windowDays: 7,
      filmFolders: ['Movies'],
      tvFolders: ['Shows'],
    });

    expect(out.movies.map((m) => m.id)).toEqual(['m1']);
    expect(out.episodes.map((e) => e.id)).toEqual(['e1']);
  });

  it('accepts both kinds from a folder listed in both sets', async () => {
    const { source, fetchRecent } = makeSource({
      Mixed: [movie('m1', 'Mixed', daysAgo(1)), episode('e1', 'Mixed', daysAgo(1))],
    });
    const collector = new ItemCollector(source, () => NOW);

    const out = await collector.collect({
      windowDays: 3,
      filmFolders: ['Mixed'],
      tvFolders: ['Mixed'],
    });

    expect(fetchRecent).toHaveBeenCalledTimes(1);
    expect(out.movies.map((m) => m.id)).toEqual(['m1']);
    expect(out.episodes.map((e) => e.id)).toEqual(['e1']);
  });

  it('drops duplicate ids, first occurrence wins', async () => {
    const { source } = makeSource({
      A: [movie('m1', 'A', daysAgo(1))],
      B: [movie('m1', 'B', daysAgo(2)), movie('m2', 'B', daysAgo(2))],
    });
    const collector = new ItemCollector(source, () => NOW);

    const out = await collector.collect({ windowDays: 7, filmFolders: ['A', 'B'], tvFolders: [] });

    expect(out.movies.map((m) => `${m.id}@${m.libraryFolder}`)).toEqual(['m1@A', 'm2@B']);
  });

  it('queries film folders first, then tv folders, passing the window start', async () => {
    const { source, fetchRecent } = makeSource({});
    const collector = new ItemCollector(source, () => NOW);

    await collector.collect({ windowDays: 2, filmFolders: ['F1', 'F2'], tvFolders: ['T1', 'F1'] });

    expect(fetchRecent.mock.calls.map((c) => c[0])).toEqual(['F1', 'F2', 'T1']);
    expect(fetchRecent.mock.calls[0][1]).toEqual(daysAgo(2));
  });

  it.each([0, -1, 1.5, Number.NaN])('rejects windowDays=%p', async (windowDays) => {
    const { source } = makeSource({});
    const collector = new ItemCollector(source, () => NOW);

    await expect(
      collector.collect({ windowDays, filmFolders: ['Movies'], tvFolders: [] }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('propagates SourceUnavailableError', async () => {
    const source: LibrarySource = {
      serverType: 'emby',
      fetchRecent: jest.fn().mockRejectedValue(new SourceUnavailableError('down')),
      countItems: jest.fn().mockResolvedValue(null),
    };
    const collector = new ItemCollector(source, () => NOW);

    await expect(
      collector.collect({ windowDays: 7, filmFolders: ['Movies'], tvFolders: [] }),
    ).rejects.toBeInstanceOf(SourceUnavailableError);
  });
});
